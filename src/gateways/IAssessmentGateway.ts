/**
 * Assessment gateway interface.
 * Wraps an external natural-language service that answers with free text.
 */

import type { EnrichmentContext } from '../types/models.js';

export interface IAssessmentGateway {
  /** Short backend name for logs. */
  readonly name: string;

  /**
   * Request an assessment for one record. Resolves with the complete raw text,
   * never a partial stream. Rejects with AssessmentError.
   */
  assess(context: EnrichmentContext): Promise<string>;
}
