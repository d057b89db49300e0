/**
 * Human-readable terminal output for the CLI.
 */

import chalk from 'chalk';
import { PipelineError, createTypedError, describeError } from './domain/errors';
import { presentError } from './domain/error-presentation';
import { LogEntry, LogHandler, LogLevel } from './logger';

export type LineWriter = (line: string) => void;

export interface TerminalOptions {
  write?: LineWriter;
  /** Force colours on or off; auto-detected when omitted. */
  color?: boolean;
  /** Print log context and technical error details. */
  verbose?: boolean;
}

/** Context keys every entry carries; not worth repeating on each line. */
const AMBIENT_KEYS = new Set(['component', 'runId', 'language', 'shell', 'container', 'stage']);

const defaultWrite: LineWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

function palette(color: boolean | undefined): chalk.Chalk {
  return color === undefined ? chalk : new chalk.Instance({ level: color ? 1 : 0 });
}

export class Terminal {
  private write: LineWriter;
  private paint: chalk.Chalk;
  private verbose: boolean;

  constructor(options: TerminalOptions = {}) {
    this.write = options.write ?? defaultWrite;
    this.paint = palette(options.color);
    this.verbose = options.verbose ?? false;
  }

  /** Log handler for setLogHandler(). */
  handler(): LogHandler {
    return (entry: LogEntry) => this.write(this.formatEntry(entry));
  }

  formatEntry(entry: LogEntry): string {
    const label = this.label(entry.level);
    const extras = this.verbose ? this.formatContext(entry.context) : '';
    return extras ? `${label} ${entry.message} ${this.paint.gray(extras)}` : `${label} ${entry.message}`;
  }

  info(message: string): void {
    this.write(`${this.label(LogLevel.Info)} ${message}`);
  }

  success(message: string): void {
    this.write(`${this.paint.green('[SUCCESS]')} ${message}`);
  }

  /** Print any thrown value through the error presentation rules. */
  error(err: unknown): void {
    const typed =
      err instanceof PipelineError
        ? err.typedError
        : createTypedError({ code: 'PIPELINE.UNEXPECTED', message: describeError(err) });
    const presentation = presentError(typed);

    const label = presentation.severity === 'warning' ? this.paint.yellow('[WARNING]') : this.paint.red('[ERROR]');
    this.write(`${label} ${presentation.title}: ${presentation.userMessage}`);
    const location = presentation.stage ? `stage ${presentation.stage}, ` : '';
    this.write(`  ${location}code ${presentation.errorCode}`);
    for (const action of presentation.suggestedActions) {
      this.write(`  - ${action}`);
    }
    if (this.verbose && presentation.technicalDetails) {
      for (const line of presentation.technicalDetails.split('\n')) {
        this.write(this.paint.gray(`  ${line}`));
      }
    }
  }

  private label(level: LogLevel): string {
    switch (level) {
      case LogLevel.Debug:
        return this.paint.gray('[DEBUG]');
      case LogLevel.Info:
        return this.paint.blue('[INFO]');
      case LogLevel.Warn:
        return this.paint.yellow('[WARNING]');
      case LogLevel.Error:
        return this.paint.red('[ERROR]');
    }
  }

  private formatContext(context: Record<string, unknown> | undefined): string {
    if (!context) return '';
    return Object.entries(context)
      .filter(([key, value]) => !AMBIENT_KEYS.has(key) && value !== undefined)
      .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
      .join(' ');
  }
}
