/**
 * Free-text assessment parser.
 *
 * Line-oriented, case-insensitive, best-effort extraction of labelled fields
 * from whatever the assessment service returned. A line that contains a known
 * label and a colon opens that field; its value is everything after the first
 * colon. Following unlabelled lines are appended to the open field until another
 * label shows up. Nothing is ever thrown: text with no labels parses to all-empty fields.
 */

import type { StructuredAssessment } from '../types/models.js';

type AssessmentKey = keyof StructuredAssessment;

interface FieldLabel {
  /** Lower-case substring looked for in the lower-cased line. */
  label: string;
  key: AssessmentKey;
}

// Checked in this order; the first label found on a line wins.
const BASE_LABELS: readonly FieldLabel[] = [
  { label: 'trustworthiness', key: 'trustworthiness' },
  { label: 'primary purpose', key: 'primaryPurpose' },
  { label: 'security concerns', key: 'securityConcerns' },
  { label: 'recommendation', key: 'recommendation' },
];

const RISK_SCORE_LABEL: FieldLabel = { label: 'risk score', key: 'riskScore' };

export interface ResponseParserOptions {
  /** Also recognise a `Risk Score:` line. Default: false. */
  includeRiskScore?: boolean;
}

export class ResponseParser {
  private readonly labels: readonly FieldLabel[];
  private readonly includeRiskScore: boolean;

  constructor(options?: ResponseParserOptions) {
    this.includeRiskScore = options?.includeRiskScore ?? false;
    this.labels = this.includeRiskScore ? [...BASE_LABELS, RISK_SCORE_LABEL] : BASE_LABELS;
  }

  parse(text: string): StructuredAssessment {
    const parsed = this.emptyAssessment();
    let current: AssessmentKey | null = null;

    for (const rawLine of text.split('\n')) {
      const line = rawLine.trim();
      const match = this.matchLabel(line);

      if (match) {
        current = match;
        parsed[current] = line.slice(line.indexOf(':') + 1).trim();
      } else if (current && line) {
        parsed[current] = `${parsed[current] ?? ''} ${line}`;
      }
    }

    return parsed;
  }

  /** True when none of the recognised fields received a value. */
  isEmpty(assessment: StructuredAssessment): boolean {
    return this.labels.every(({ key }) => !assessment[key]);
  }

  private matchLabel(line: string): AssessmentKey | null {
    if (!line.includes(':')) return null;

    const lower = line.toLowerCase();
    for (const { label, key } of this.labels) {
      if (lower.includes(label)) return key;
    }
    return null;
  }

  private emptyAssessment(): StructuredAssessment {
    return {
      trustworthiness: '',
      primaryPurpose: '',
      securityConcerns: '',
      recommendation: '',
      ...(this.includeRiskScore && { riskScore: '' }),
    };
  }
}
