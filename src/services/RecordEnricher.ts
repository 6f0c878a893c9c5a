/**
 * Enrichment of a single record.
 * Lookup first (failure degrades to an empty lookup), then the assessment
 * (failure fails the record), then parsing. Never rejects: every failure
 * becomes a `failed` result carrying the record's counters.
 */

import type { ILookupGateway } from '../gateways/ILookupGateway.js';
import type { IAssessmentGateway } from '../gateways/IAssessmentGateway.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  EnrichedRecord,
  EnrichmentContext,
  LookupResult,
  NetworkRecord,
} from '../types/models.js';
import { ResponseParser } from './ResponseParser.js';
import { buildInstructions } from '../prompts/assessment.js';
import { AssessmentError, errorMessage } from '../errors.js';

/** Output is comma-delimited, so commas never reach an error cell. */
const COMMA_REPLACEMENT = ';';

export interface RecordEnricherOptions {
  /** Ask for and parse a risk score. Default: false. */
  includeRiskScore?: boolean;
  /** Treat an answer with no recognisable fields as a failure. Default: false. */
  rejectEmptyAssessment?: boolean;
}

export class RecordEnricher {
  private readonly parser: ResponseParser;
  private readonly instructions: string;
  private readonly rejectEmptyAssessment: boolean;

  constructor(
    private readonly lookupGateway: ILookupGateway,
    private readonly assessmentGateway: IAssessmentGateway,
    private readonly logger: ILogProvider,
    options?: RecordEnricherOptions
  ) {
    const includeRiskScore = options?.includeRiskScore ?? false;
    this.parser = new ResponseParser({ includeRiskScore });
    this.instructions = buildInstructions({ includeRiskScore });
    this.rejectEmptyAssessment = options?.rejectEmptyAssessment ?? false;
  }

  async enrich(record: NetworkRecord): Promise<EnrichedRecord> {
    try {
      const lookup = await this.lookupOrEmpty(record.address);
      const context: EnrichmentContext = {
        record,
        lookup,
        instructions: this.instructions,
      };

      const text = await this.assessmentGateway.assess(context);
      const assessment = this.parser.parse(text);

      if (this.rejectEmptyAssessment && this.parser.isEmpty(assessment)) {
        throw new AssessmentError('Assessment response contained no recognizable fields', {
          address: record.address,
        });
      }

      this.logger.debug('Record enriched', { address: record.address });
      return { status: 'enriched', record, lookup, assessment };
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error('Record enrichment failed', { address: record.address, error: message });
      return { status: 'failed', record, error: sanitizeErrorMessage(message) };
    }
  }

  private async lookupOrEmpty(address: string): Promise<LookupResult> {
    try {
      return await this.lookupGateway.lookup(address);
    } catch (err) {
      this.logger.warn('Lookup failed; continuing without lookup data', {
        address,
        gateway: this.lookupGateway.name,
        error: errorMessage(err),
      });
      return {};
    }
  }
}

export function sanitizeErrorMessage(message: string): string {
  return message.replace(/,/g, COMMA_REPLACEMENT);
}
