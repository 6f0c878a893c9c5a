/**
 * One complete analysis run: read records, enrich them through the pool,
 * optionally re-run the pool over rows that failed, and write the output file.
 */

import type { IRecordStore } from '../repositories/IRecordStore.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { EnrichedRecord, NetworkRecord, ProgressReporter } from '../types/models.js';
import { toOutputRow } from '../output/rows.js';
import { EnrichmentPool } from './EnrichmentPool.js';

export interface AnalysisSettings {
  concurrency: number;
  pacingMs: number;
  /** Extra pool runs over the records whose latest result failed. */
  retryPasses: number;
}

export interface AnalysisSummary {
  outputPath: string;
  total: number;
  enriched: number;
  failed: number;
}

export class AnalysisService {
  constructor(
    private readonly store: IRecordStore,
    private readonly pool: EnrichmentPool,
    private readonly logger: ILogProvider,
    private readonly settings: AnalysisSettings,
    private readonly onProgress?: ProgressReporter
  ) {}

  async run(fileName: string, overrides?: Partial<AnalysisSettings>): Promise<AnalysisSummary> {
    const settings = { ...this.settings, ...overrides };
    const records = await this.store.readRecords(fileName);
    this.logger.info(`Processing ${records.length} records`, { fileName });

    const latest = new Map<NetworkRecord, EnrichedRecord>();
    for (const result of await this.runPool(records, settings)) {
      latest.set(result.record, result);
    }

    for (let pass = 1; pass <= settings.retryPasses; pass++) {
      const retry = records.filter((r) => latest.get(r)?.status !== 'enriched');
      if (retry.length === 0) break;

      this.logger.info(`Retry pass ${pass}: ${retry.length} failed records`, { pass, records: retry.length });
      for (const result of await this.runPool(retry, settings)) {
        latest.set(result.record, result);
      }
    }

    // One row per input record, in input order
    const results: EnrichedRecord[] = [];
    for (const record of records) {
      const result = latest.get(record);
      if (result) results.push(result);
    }

    const outputPath = await this.store.writeResults(results.map(toOutputRow));
    const failed = results.filter((r) => r.status === 'failed').length;

    const summary: AnalysisSummary = {
      outputPath,
      total: results.length,
      enriched: results.length - failed,
      failed,
    };
    this.logger.info('Analysis complete', { ...summary });
    return summary;
  }

  private runPool(records: readonly NetworkRecord[], settings: AnalysisSettings): Promise<EnrichedRecord[]> {
    return this.pool.run(records, {
      concurrency: settings.concurrency,
      pacingMs: settings.pacingMs,
      onProgress: this.onProgress,
    });
  }
}
