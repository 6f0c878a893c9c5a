/**
 * Application error hierarchy.
 * Every failure the pipeline distinguishes has its own subclass and stable code.
 * Per-record failures (lookup, assessment) are caught at the enricher boundary;
 * the rest abort the run and are reported by the CLI.
 */

export type ErrorCode =
  | 'LOOKUP_FAILED'
  | 'ASSESSMENT_FAILED'
  | 'CONFIG_INVALID'
  | 'INPUT_INVALID'
  | 'OUTPUT_FAILED'
  | 'VALIDATION_ERROR';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Address lookup failed. Non-fatal: the record continues with absent fields. */
export class LookupError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super('LOOKUP_FAILED', message, details, options);
  }
}

/** Assessment call failed or its stream broke. Fatal for the record. */
export class AssessmentError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super('ASSESSMENT_FAILED', message, details, options);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIG_INVALID', message, details);
  }
}

/** Reading or validating the input file failed. */
export class InputError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super('INPUT_INVALID', message, details, options);
  }
}

/** Writing the output file failed. */
export class OutputError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super('OUTPUT_FAILED', message, details, options);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, details);
  }
}

/** Message text of anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
