/**
 * Assessment prompt.
 * The instruction block asks for one labelled field per line in a
 * CSV-safe alphabet. Models do not always comply; ResponseParser copes
 * with whatever comes back.
 */

import type { EnrichmentContext } from '../types/models.js';

export interface AssessmentField {
  label: string;
  format: string;
}

export const BASE_FIELDS: readonly AssessmentField[] = [
  { label: 'Trustworthiness', format: '<score from 1 to 100>' },
  {
    label: 'Primary Purpose',
    format: '<one line description of at most 20 words>.',
  },
  {
    label: 'Security Concerns',
    format: '<YES or NO>. <explanation of at most 15 words>.',
  },
  {
    label: 'Recommendation',
    format: "<'No action required' or 'Requires Attention'>. <if attention is needed at most 20 words>.",
  },
];

export const RISK_SCORE_FIELD: AssessmentField = {
  label: 'Risk Score',
  format: '<score from 1 to 100>',
};

const FORMAT_RULES = [
  'Do not use commas or any special characters other than hyphens and periods',
  'Put each field on its own line',
  'Use the field names exactly as shown',
  'Keep every answer within its word limit',
  'Follow each field name with exactly one colon and one space',
  'Do not add any other text or formatting',
];

const GUIDELINES = [
  'Known reputation of the address',
  'The organization and ISP behind it',
  'Communication patterns and connection frequency',
  'Ratio of sent to received data',
  'Unusual ports or geographic concerns',
];

/** The fixed instruction template sent with every record. */
export function buildInstructions(opts?: { includeRiskScore?: boolean }): string {
  const fields = opts?.includeRiskScore
    ? [...BASE_FIELDS.slice(0, 3), RISK_SCORE_FIELD, BASE_FIELDS[3]]
    : BASE_FIELDS;

  return [
    'You are a cybersecurity analyst specializing in network behavior analysis and threat detection.',
    '',
    'Answer in exactly this format:',
    ...fields.map((f) => `${f.label}: ${f.format}`),
    '',
    'Format rules:',
    ...FORMAT_RULES.map((rule, i) => `${i + 1}. ${rule}`),
    '',
    'Base your assessment on:',
    ...GUIDELINES.map((g) => `- ${g}`),
  ].join('\n');
}

/** Full prompt for one record: instructions followed by the record's data. */
export function renderAssessmentPrompt(context: EnrichmentContext): string {
  const { record, lookup, instructions } = context;

  return [
    instructions,
    '',
    'Input data:',
    `- Lookup information in JSON: ${JSON.stringify(lookup)}`,
    `- IP address: ${record.address}`,
    `- Total events: ${record.totalEvents}`,
    `- Connection events: ${record.connects} connects | ${record.disconnects} disconnects`,
    `- Data transfer: ${record.sends} sends (${record.sendBytes} bytes) | ${record.receives} receives (${record.receiveBytes} bytes)`,
  ].join('\n');
}
