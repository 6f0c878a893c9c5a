/**
 * Console-based log provider.
 * Keeps every accepted event in an inspectable buffer (useful in tests)
 * and optionally writes a formatted line per event to stderr, leaving
 * stdout to the CLI's own output.
 */

import { LOG_LEVELS, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to the console as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Events below this level are dropped. Default: 'debug'. */
  level?: LogLevel;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Inspectable buffer of all accepted events (most recent last), shared with children. */
  readonly events: LogEvent[];

  private readonly outputToConsole: boolean;
  private readonly minLevel: number;
  private readonly bound: Record<string, unknown>;

  constructor(
    options?: ConsoleLogProviderOptions,
    parent?: { events: LogEvent[]; bound: Record<string, unknown> }
  ) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minLevel = LOG_LEVELS.indexOf(options?.level ?? 'debug');
    this.events = parent?.events ?? [];
    this.bound = parent?.bound ?? {};
  }

  log(event: LogEvent): void {
    if (LOG_LEVELS.indexOf(event.level) < this.minLevel) return;

    const fields =
      Object.keys(this.bound).length > 0 ? { ...this.bound, ...event.fields } : event.fields;
    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
      ...(fields && { fields }),
    };
    this.events.push(stamped);

    if (this.outputToConsole) {
      console.error(formatEvent(stamped));
    }
  }

  async flush(): Promise<void> {
    // Events are written synchronously.
  }

  child(fields: Record<string, unknown>): ConsoleLogProvider {
    return new ConsoleLogProvider(
      { outputToConsole: this.outputToConsole, level: LOG_LEVELS[this.minLevel] },
      { events: this.events, bound: { ...this.bound, ...fields } }
    );
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }
}

/** `<timestamp> [LEVEL] component: message {extra fields}` */
export function formatEvent(event: LogEvent): string {
  const { component, ...rest } = event.fields ?? {};
  const prefix = `${event.timestamp ?? ''} [${event.level.toUpperCase()}]`;
  const source = typeof component === 'string' ? ` ${component}:` : '';
  const extra = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  return `${prefix}${source} ${event.message}${extra}`;
}
