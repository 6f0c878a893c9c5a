export type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';
export { LOG_LEVELS } from './ILogProvider.js';
export { ConsoleLogProvider, formatEvent } from './ConsoleLogProvider.js';
