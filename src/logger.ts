/**
 * Structured, level-based logging.
 *
 * Every entry carries the context of the logger that produced it; pipeline
 * code logs through child loggers bound to a run, language and container.
 * Entries go to a single process-wide handler: JSON lines on stderr by
 * default, the Terminal renderer under the CLI.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/** Ascending severity. */
const SEVERITY: readonly LogLevel[] = [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error];

const jsonLineHandler: LogHandler = ({ level, timestamp, message, context }) => {
  process.stderr.write(`${JSON.stringify({ level, ts: timestamp, msg: message, ...context })}\n`);
};

let handler: LogHandler = jsonLineHandler;
let threshold: LogLevel = LogLevel.Info;

export function setLogHandler(next: LogHandler): void {
  handler = next;
}

/** Back to JSON lines. */
export function resetLogHandler(): void {
  handler = jsonLineHandler;
}

/** Entries below level are dropped. */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/** Level the CLI runs at: debug under --verbose. */
export function levelFor(verbose: boolean): LogLevel {
  return verbose ? LogLevel.Debug : LogLevel.Info;
}

function emit(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (SEVERITY.indexOf(level) < SEVERITY.indexOf(threshold)) return;
  handler({ level, message, context, timestamp: new Date().toISOString() });
}

export function createLogger(bound: Record<string, unknown> = {}): Logger {
  const at =
    (level: LogLevel) =>
    (message: string, context?: Record<string, unknown>): void =>
      emit(level, message, { ...bound, ...context });
  return {
    debug: at(LogLevel.Debug),
    info: at(LogLevel.Info),
    warn: at(LogLevel.Warn),
    error: at(LogLevel.Error),
    child: (context) => createLogger({ ...bound, ...context }),
  };
}

export const logger = createLogger({ component: 'protopack' });
