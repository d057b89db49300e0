/**
 * protopack: Protocol Buffer package builder.
 *
 * Public exports for programmatic use. The command-line entry point lives
 * in cli.ts.
 */

export * from './domain';
export * from './commands';
export * from './config';
export * from './engine';
export * from './packager';
export * from './postprocess';
export * from './targets';
export * from './toolchain';
export * from './workspace';
export {
  Logger,
  LogLevel,
  LogEntry,
  LogHandler,
  createLogger,
  levelFor,
  setLogHandler,
  setLogLevel,
  resetLogHandler,
} from './logger';
export { Terminal, TerminalOptions } from './terminal';
export { VERSION } from './version';
