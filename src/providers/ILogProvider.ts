/**
 * Logging provider interface.
 * One provider is created at process start and handed to every component,
 * each of which logs through a child bound to its own fields.
 */

/** Log severity levels, lowest first. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** A structured log event. */
export interface LogEvent {
  /** Severity level. */
  level: LogLevel;
  /** Human-readable message. */
  message: string;
  /** ISO-8601 timestamp (auto-set if omitted). */
  timestamp?: string;
  /** Arbitrary structured metadata. */
  fields?: Record<string, unknown>;
}

export interface ILogProvider {
  /** Record a structured log event. */
  log(event: LogEvent): void;

  /** Flush any buffered events. Returns when the flush attempt completes. */
  flush(): Promise<void>;

  /**
   * A logger that adds `fields` to every event it records.
   * Children share their parent's sink and level.
   */
  child(fields: Record<string, unknown>): ILogProvider;

  /* Convenience methods, all non-blocking. */
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
}
