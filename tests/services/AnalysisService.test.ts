import { describe, it, expect, beforeEach } from 'vitest';
import { createContainer } from '../../src/container.js';
import type { AnalysisService } from '../../src/services/AnalysisService.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { InputError } from '../../src/errors.js';
import type { EnrichmentContext } from '../../src/types/models.js';
import { MockLookupGateway } from '../mocks/MockLookupGateway.js';
import { MockAssessmentGateway } from '../mocks/MockAssessmentGateway.js';
import { MockRecordStore, makeRecord } from '../mocks/MockRecordStore.js';

describe('AnalysisService', () => {
  let store: MockRecordStore;
  let lookup: MockLookupGateway;
  let assessment: MockAssessmentGateway;
  let logger: ConsoleLogProvider;
  let service: AnalysisService;

  beforeEach(() => {
    store = new MockRecordStore();
    lookup = new MockLookupGateway({ country: 'NL' });
    assessment = new MockAssessmentGateway();
    logger = new ConsoleLogProvider();
    service = createContainer({
      lookupGateway: lookup,
      assessmentGateway: assessment,
      store,
      logProvider: logger,
      settings: { concurrency: 2, pacingMs: 0, retryPasses: 0 },
    }).analysisService;
  });

  it('writes one row per record in input order and returns a summary', async () => {
    store.addFile('summary.csv', [
      makeRecord('10.0.0.1'),
      makeRecord('10.0.0.2'),
      makeRecord('10.0.0.3'),
    ]);
    assessment.failFor('10.0.0.2', 'Request timed out.');

    const summary = await service.run('summary.csv');

    expect(summary).toEqual({
      outputPath: 'memory://ip_analysis_1.csv',
      total: 3,
      enriched: 2,
      failed: 1,
    });
    const rows = store.written[0];
    expect(rows.map((r) => r.address)).toEqual(['10.0.0.1', '10.0.0.2', '10.0.0.3']);
    expect(rows[1].error).toBe('Request timed out.');
    expect(rows[0]).not.toHaveProperty('error');
    expect(rows[0].country).toBe('NL');
  });

  it('writes an empty output for an input with no records', async () => {
    store.addFile('empty.csv', []);

    const summary = await service.run('empty.csv');

    expect(summary.total).toBe(0);
    expect(store.written).toEqual([[]]);
  });

  it('propagates input errors without writing output', async () => {
    await expect(service.run('missing.csv')).rejects.toThrow(InputError);
    expect(store.written).toHaveLength(0);
  });

  it('logs progress through the shared provider', async () => {
    store.addFile('summary.csv', [makeRecord('10.0.0.1'), makeRecord('10.0.0.2')]);

    await service.run('summary.csv');

    const progress = logger.events.filter((e) => e.fields?.component === 'Progress');
    expect(progress.map((e) => e.message)).toEqual(['Progress: 1/2', 'Progress: 2/2']);
  });

  describe('retry passes', () => {
    it('re-runs only the failed records and replaces their results', async () => {
      store.addFile('summary.csv', [makeRecord('10.0.0.1'), makeRecord('10.0.0.2')]);
      let attempts = 0;
      const flaky = {
        name: 'flaky',
        async assess(context: EnrichmentContext): Promise<string> {
          if (context.record.address === '10.0.0.2' && attempts++ === 0) {
            throw new Error('rate limited');
          }
          return assessment.assess(context);
        },
      };
      service = createContainer({
        lookupGateway: lookup,
        assessmentGateway: flaky,
        store,
        logProvider: logger,
        settings: { concurrency: 2, pacingMs: 0, retryPasses: 0 },
      }).analysisService;

      const summary = await service.run('summary.csv', { retryPasses: 2 });

      expect(summary).toMatchObject({ total: 2, enriched: 2, failed: 0 });
      expect(lookup.calls).toEqual(['10.0.0.1', '10.0.0.2', '10.0.0.2']);
      expect(store.written[0].map((r) => r.address)).toEqual(['10.0.0.1', '10.0.0.2']);
    });

    it('stops once every record is enriched', async () => {
      store.addFile('summary.csv', [makeRecord('10.0.0.1')]);

      await service.run('summary.csv', { retryPasses: 3 });

      expect(lookup.calls).toEqual(['10.0.0.1']);
    });

    it('keeps the error row when every pass fails', async () => {
      store.addFile('summary.csv', [makeRecord('10.0.0.1')]);
      assessment.failFor('10.0.0.1', 'still down');

      const summary = await service.run('summary.csv', { retryPasses: 2 });

      expect(summary.failed).toBe(1);
      expect(lookup.calls).toHaveLength(3);
      expect(store.written[0]).toHaveLength(1);
      expect(store.written[0][0].error).toBe('still down');
    });
  });
});
