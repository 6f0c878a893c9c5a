/**
 * Flattening of enrichment results into output columns.
 * Column names are snake_case; the CSV writer takes the union across rows.
 */

import type { EnrichedRecord, NetworkRecord } from '../types/models.js';

export type OutputValue = string | number | readonly (string | number)[];

export type OutputRow = Record<string, OutputValue>;

function counterColumns(record: NetworkRecord): OutputRow {
  return {
    address: record.address,
    total_events: record.totalEvents,
    connects: record.connects,
    disconnects: record.disconnects,
    sends: record.sends,
    receives: record.receives,
    send_bytes: record.sendBytes,
    receive_bytes: record.receiveBytes,
  };
}

export function toOutputRow(result: EnrichedRecord): OutputRow {
  const row = counterColumns(result.record);

  if (result.status === 'failed') {
    row.error = result.error;
    return row;
  }

  const { lookup, assessment } = result;
  if (lookup.organization !== undefined) row.organization = lookup.organization;
  if (lookup.country !== undefined) row.country = lookup.country;
  if (lookup.isp !== undefined) row.isp = lookup.isp;
  if (lookup.ports !== undefined) row.ports = lookup.ports;
  if (lookup.services !== undefined) row.services = lookup.services;
  if (lookup.lastUpdated !== undefined) row.last_updated = lookup.lastUpdated;

  row.trustworthiness = assessment.trustworthiness;
  row.primary_purpose = assessment.primaryPurpose;
  row.security_concerns = assessment.securityConcerns;
  row.recommendation = assessment.recommendation;
  if (assessment.riskScore !== undefined) row.risk_score = assessment.riskScore;

  return row;
}
