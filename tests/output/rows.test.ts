import { describe, it, expect } from 'vitest';
import { toOutputRow } from '../../src/output/rows.js';
import { RecordEnricher } from '../../src/services/RecordEnricher.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { MockLookupGateway } from '../mocks/MockLookupGateway.js';
import { MockAssessmentGateway, WELL_FORMED_ASSESSMENT } from '../mocks/MockAssessmentGateway.js';
import { makeRecord } from '../mocks/MockRecordStore.js';

describe('toOutputRow', () => {
  it('flattens the 10.0.0.5 example into snake_case columns with no error key', async () => {
    const enricher = new RecordEnricher(
      new MockLookupGateway({ country: 'US', organization: 'ExampleOrg' }),
      new MockAssessmentGateway(WELL_FORMED_ASSESSMENT),
      new ConsoleLogProvider()
    );
    const record = makeRecord('10.0.0.5', {
      totalEvents: 12,
      connects: 3,
      disconnects: 2,
      sends: 5,
      receives: 4,
      sendBytes: 1000,
      receiveBytes: 2000,
    });

    const row = toOutputRow(await enricher.enrich(record));

    expect(row).toEqual({
      address: '10.0.0.5',
      total_events: 12,
      connects: 3,
      disconnects: 2,
      sends: 5,
      receives: 4,
      send_bytes: 1000,
      receive_bytes: 2000,
      country: 'US',
      organization: 'ExampleOrg',
      trustworthiness: '80',
      primary_purpose: 'internal backup traffic',
      security_concerns: 'No risk identified',
      recommendation: 'No action required',
    });
    expect(row).not.toHaveProperty('error');
  });

  it('keeps only the counters and error for a failed record', () => {
    const record = makeRecord('10.0.0.8');
    const row = toOutputRow({ status: 'failed', record, error: 'Request timed out.' });

    expect(row).toEqual({
      address: '10.0.0.8',
      total_events: 12,
      connects: 3,
      disconnects: 2,
      sends: 5,
      receives: 4,
      send_bytes: 1000,
      receive_bytes: 2000,
      error: 'Request timed out.',
    });
  });

  it('carries lookup sequences and the risk score when present', () => {
    const row = toOutputRow({
      status: 'enriched',
      record: makeRecord('10.0.0.9'),
      lookup: {
        organization: 'Hosting Ltd',
        ports: [22, 443],
        services: ['SSH', 'HTTP'],
        lastUpdated: '2026-01-10T08:00:00Z',
      },
      assessment: {
        trustworthiness: '40',
        primaryPurpose: 'remote admin',
        securityConcerns: 'YES. Open SSH',
        recommendation: 'Requires Attention',
        riskScore: '65',
      },
    });

    expect(row).toMatchObject({
      organization: 'Hosting Ltd',
      ports: [22, 443],
      services: ['SSH', 'HTTP'],
      last_updated: '2026-01-10T08:00:00Z',
      risk_score: '65',
    });
    expect(row).not.toHaveProperty('country');
    expect(row).not.toHaveProperty('isp');
  });
});
