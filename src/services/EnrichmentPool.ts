/**
 * Bounded-concurrency scheduler for record enrichment.
 *
 * At most `concurrency` records are in flight. Each slot is held for the
 * enrichment itself plus a fixed pacing delay after it completes, which caps
 * the aggregate request rate against the external services. Results are
 * appended at one point in completion order; `run` resolves only once every
 * task has finished.
 */

import pLimit from 'p-limit';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { EnrichedRecord, NetworkRecord, ProgressReporter } from '../types/models.js';
import { ValidationError, errorMessage } from '../errors.js';
import { sanitizeErrorMessage } from './RecordEnricher.js';

export interface IRecordEnricher {
  enrich(record: NetworkRecord): Promise<EnrichedRecord>;
}

export type Sleep = (ms: number) => Promise<void>;

export interface PoolRunOptions {
  /** Maximum records in flight. Integer >= 1. */
  concurrency: number;
  /** Delay after each completion before its slot is released. */
  pacingMs: number;
  onProgress?: ProgressReporter;
}

export const delay: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class EnrichmentPool {
  constructor(
    private readonly enricher: IRecordEnricher,
    private readonly logger: ILogProvider,
    private readonly sleep: Sleep = delay
  ) {}

  async run(records: readonly NetworkRecord[], options: PoolRunOptions): Promise<EnrichedRecord[]> {
    this.validateOptions(options);

    const total = records.length;
    if (total === 0) return [];

    const limit = pLimit(options.concurrency);
    const results: EnrichedRecord[] = [];
    let completed = 0;

    this.logger.info('Enrichment started', {
      total,
      concurrency: options.concurrency,
      pacingMs: options.pacingMs,
    });

    const tasks = records.map((record) =>
      limit(async () => {
        const result = await this.enrichOne(record);
        results.push(result);
        completed++;
        this.report(options.onProgress, completed, total);

        if (options.pacingMs > 0) {
          await this.sleep(options.pacingMs);
        }
      })
    );

    const settled = await Promise.allSettled(tasks);
    const rejected = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
    if (rejected) {
      throw rejected.reason;
    }

    const failed = results.filter((r) => r.status === 'failed').length;
    this.logger.info('Enrichment finished', { total, enriched: total - failed, failed });
    return results;
  }

  /** The enricher is not supposed to reject; if it does, the record still yields a row. */
  private async enrichOne(record: NetworkRecord): Promise<EnrichedRecord> {
    try {
      return await this.enricher.enrich(record);
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error('Unexpected enrichment error', { address: record.address, error: message });
      return { status: 'failed', record, error: sanitizeErrorMessage(message) };
    }
  }

  private report(onProgress: ProgressReporter | undefined, completed: number, total: number): void {
    if (!onProgress) return;
    try {
      onProgress(completed, total);
    } catch (err) {
      this.logger.warn('Progress reporter threw', { error: errorMessage(err) });
    }
  }

  private validateOptions(options: PoolRunOptions): void {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new ValidationError('concurrency must be an integer of at least 1', {
        concurrency: options.concurrency,
      });
    }
    if (!Number.isFinite(options.pacingMs) || options.pacingMs < 0) {
      throw new ValidationError('pacingMs must be a non-negative number', {
        pacingMs: options.pacingMs,
      });
    }
  }
}

/** Progress reporter that logs `completed/total` at info level. */
export function createLogProgressReporter(logger: ILogProvider): ProgressReporter {
  return (completed, total) => {
    logger.info(`Progress: ${completed}/${total}`, { completed, total });
  };
}
