/**
 * Enricher stand-ins for pool tests.
 * InstantEnricher resolves immediately; DeferredEnricher holds every call
 * open until the test releases it, tracking how many are in flight.
 */

import type { IRecordEnricher } from '../../src/services/EnrichmentPool.js';
import type { EnrichedRecord, NetworkRecord } from '../../src/types/models.js';

export function enrichedResult(record: NetworkRecord): EnrichedRecord {
  return {
    status: 'enriched',
    record,
    lookup: {},
    assessment: {
      trustworthiness: '50',
      primaryPurpose: '',
      securityConcerns: '',
      recommendation: '',
    },
  };
}

export class InstantEnricher implements IRecordEnricher {
  readonly calls: NetworkRecord[] = [];

  async enrich(record: NetworkRecord): Promise<EnrichedRecord> {
    this.calls.push(record);
    return enrichedResult(record);
  }
}

export class DeferredEnricher implements IRecordEnricher {
  readonly calls: NetworkRecord[] = [];
  inFlight = 0;
  maxInFlight = 0;
  private pending: Array<{ address: string; release: () => void }> = [];

  enrich(record: NetworkRecord): Promise<EnrichedRecord> {
    this.calls.push(record);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    return new Promise((resolve) => {
      this.pending.push({
        address: record.address,
        release: () => {
          this.inFlight--;
          resolve(enrichedResult(record));
        },
      });
    });
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /** Complete the oldest in-flight call. */
  releaseNext(): void {
    const next = this.pending.shift();
    if (!next) throw new Error('No pending enrichment to release');
    next.release();
  }

  /** Complete the in-flight call for a specific address. */
  release(address: string): void {
    const index = this.pending.findIndex((p) => p.address === address);
    if (index === -1) throw new Error(`No pending enrichment for ${address}`);
    const [next] = this.pending.splice(index, 1);
    next.release();
  }
}

/** Let queued promise callbacks and microtasks run. */
export function flushAsync(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
