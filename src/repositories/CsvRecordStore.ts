/**
 * CSV-backed record store.
 * Reads traffic summaries exported as CSV (one row per remote `Path`) and
 * writes timestamped analysis files whose columns are the union of every
 * row's keys, sorted by name.
 */

import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import Papa from 'papaparse';
import type { IRecordStore } from './IRecordStore.js';
import type { NetworkRecord } from '../types/models.js';
import type { OutputRow, OutputValue } from '../output/rows.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { InputError, OutputError, errorMessage } from '../errors.js';

type CounterField = Exclude<keyof NetworkRecord, 'address'>;

const PATH_COLUMN = 'Path';

const COUNTER_COLUMNS: Record<CounterField, string> = {
  totalEvents: 'Total Events',
  connects: 'Connects',
  disconnects: 'Disconnects',
  sends: 'Sends',
  receives: 'Receives',
  sendBytes: 'Send Bytes',
  receiveBytes: 'Receive Bytes',
};

const OUTPUT_PREFIX = 'ip_analysis_';

export interface CsvRecordStoreOptions {
  inputDir: string;
  outputDir: string;
  /** Clock used for output file names. Default: current time. */
  now?: () => Date;
}

export class CsvRecordStore implements IRecordStore {
  private readonly inputDir: string;
  private readonly outputDir: string;
  private readonly now: () => Date;

  constructor(
    options: CsvRecordStoreOptions,
    private readonly logger: ILogProvider
  ) {
    this.inputDir = options.inputDir;
    this.outputDir = options.outputDir;
    this.now = options.now ?? (() => new Date());
  }

  async listInputFiles(): Promise<string[]> {
    await this.ensureDirectories();
    const entries = await readdir(this.inputDir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && e.name.endsWith('.csv'))
      .map((e) => e.name)
      .sort();
  }

  async readRecords(fileName: string): Promise<NetworkRecord[]> {
    const filePath = path.join(this.inputDir, fileName);

    let content: string;
    try {
      content = await readFile(filePath, 'utf8');
    } catch (err) {
      throw new InputError(`Cannot read input file ${fileName}: ${errorMessage(err)}`, { filePath }, { cause: err });
    }

    const parsed = Papa.parse<Record<string, string>>(stripBom(content), {
      header: true,
      skipEmptyLines: true,
      transformHeader: (header) => header.trim(),
    });

    const quoteError = parsed.errors.find((e) => e.type === 'Quotes');
    if (quoteError) {
      throw new InputError(`Malformed CSV in ${fileName}: ${quoteError.message}`, {
        filePath,
        row: quoteError.row,
      });
    }

    const columns = parsed.meta.fields ?? [];
    const missing = [PATH_COLUMN, ...Object.values(COUNTER_COLUMNS)].filter(
      (column) => !columns.includes(column)
    );
    if (missing.length > 0) {
      throw new InputError(`Input file ${fileName} is missing required columns: ${missing.join(', ')}`, {
        filePath,
        missing,
      });
    }

    // Papa reports data row indexes; rows are numbered from 1 like the counter errors.
    const truncated = parsed.errors.find((e) => e.code === 'TooFewFields');
    if (truncated) {
      const row = (truncated.row ?? 0) + 1;
      throw new InputError(`Row ${row}: ${truncated.message}`, { filePath, row });
    }

    const records: NetworkRecord[] = [];
    let skipped = 0;

    parsed.data.forEach((row, index) => {
      const address = extractAddress(row[PATH_COLUMN] ?? '');
      if (!address || !address.includes('.')) {
        skipped++;
        return;
      }

      const read = (field: CounterField) =>
        parseCounter(row[COUNTER_COLUMNS[field]], index + 1, COUNTER_COLUMNS[field]);

      records.push({
        address,
        totalEvents: read('totalEvents'),
        connects: read('connects'),
        disconnects: read('disconnects'),
        sends: read('sends'),
        receives: read('receives'),
        sendBytes: read('sendBytes'),
        receiveBytes: read('receiveBytes'),
      });
    });

    this.logger.info(`Read ${records.length} records from ${fileName}`, {
      fileName,
      records: records.length,
      skipped,
    });
    return records;
  }

  async writeResults(rows: readonly OutputRow[]): Promise<string> {
    const fileName = `${OUTPUT_PREFIX}${formatTimestamp(this.now())}.csv`;
    const outputPath = path.join(this.outputDir, fileName);
    const tempPath = `${outputPath}.tmp`;

    const columnSet = new Set<string>();
    for (const row of rows) {
      for (const key of Object.keys(row)) columnSet.add(key);
    }
    const columns = [...columnSet].sort();

    const csv = Papa.unparse(
      {
        fields: columns,
        data: rows.map((row) => columns.map((column) => formatCell(row[column]))),
      },
      { newline: '\n' }
    );

    try {
      await this.ensureDirectories();
      await writeFile(tempPath, `${csv}\n`, 'utf8');
      await rename(tempPath, outputPath);
    } catch (err) {
      await rm(tempPath, { force: true }).catch((cleanupErr: unknown) =>
        this.logger.warn('Could not remove temporary output file', {
          tempPath,
          error: errorMessage(cleanupErr),
        })
      );
      throw new OutputError(`Cannot write output file ${fileName}: ${errorMessage(err)}`, { outputPath }, { cause: err });
    }

    this.logger.info(`Wrote ${rows.length} rows to ${fileName}`, { outputPath, rows: rows.length });
    return outputPath;
  }

  private async ensureDirectories(): Promise<void> {
    await mkdir(this.inputDir, { recursive: true });
    await mkdir(this.outputDir, { recursive: true });
  }
}

// ── Helpers ──

/** Host part of a `Path` cell: everything before the first colon, trimmed. */
export function extractAddress(pathValue: string): string {
  const trimmed = pathValue.trim();
  const colon = trimmed.indexOf(':');
  return (colon === -1 ? trimmed : trimmed.slice(0, colon)).trim();
}

function parseCounter(value: string | undefined, row: number, column: string): number {
  const trimmed = (value ?? '').trim();
  if (trimmed === '') return 0;
  if (!/^\d+$/.test(trimmed)) {
    throw new InputError(`Row ${row}: column "${column}" is not a whole number: ${trimmed}`, {
      row,
      column,
      value: trimmed,
    });
  }
  const parsed = Number(trimmed);
  if (!Number.isSafeInteger(parsed)) {
    throw new InputError(`Row ${row}: column "${column}" is too large: ${trimmed}`, {
      row,
      column,
      value: trimmed,
    });
  }
  return parsed;
}

function formatCell(value: OutputValue | undefined): string {
  if (value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return value.join(', ');
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}
