/**
 * Record store interface.
 * Source of NetworkRecords and sink for output rows. CsvRecordStore is the
 * file-based implementation; tests swap in MockRecordStore.
 */

import type { NetworkRecord } from '../types/models.js';
import type { OutputRow } from '../output/rows.js';

export interface IRecordStore {
  /** Names of the input files available for processing, sorted. */
  listInputFiles(): Promise<string[]>;

  /** Read and validate one input file. Rejects with InputError. */
  readRecords(fileName: string): Promise<NetworkRecord[]>;

  /**
   * Write all rows as one output file and return its path.
   * All-or-nothing: rejects with OutputError and leaves no partial file.
   */
  writeResults(rows: readonly OutputRow[]): Promise<string>;
}
