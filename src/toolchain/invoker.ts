/**
 * Toolchain invoker: runs one external tool to completion.
 *
 * The invoker never looks at what a tool writes; it only turns the process
 * outcome into success or a typed failure. Where the tool runs (host or
 * build container) is decided by the shell it is given.
 */

import { toolchainExitError, toolchainTimeoutError, toolNotFoundError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { ProcessRequest, ProcessRunner } from './process-runner';

export interface InvocationResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Turns a tool call into the process that actually runs it. */
export interface ToolchainShell {
  readonly name: string;
  wrap(tool: string, args: string[], workingRoot: string): Pick<ProcessRequest, 'command' | 'args' | 'cwd'>;
}

export interface InvokerOptions {
  timeoutMs: number;
  verbose: boolean;
  logger?: Logger;
}

/** Run tools directly on this machine. */
export const hostShell: ToolchainShell = {
  name: 'host',
  wrap(tool, args, workingRoot) {
    return { command: tool, args, cwd: workingRoot };
  },
};

export class ToolchainInvoker {
  private logger: Logger;

  constructor(
    private runner: ProcessRunner,
    private shell: ToolchainShell,
    private options: InvokerOptions,
  ) {
    this.logger = (options.logger ?? rootLogger).child({ shell: shell.name });
  }

  /**
   * Run `tool args...` in workingRoot and block until it exits.
   * Throws ToolchainTimeout when the deadline passes and ToolchainError for any other failure.
   */
  invoke(tool: string, args: string[], workingRoot: string): InvocationResult {
    const wrapped = this.shell.wrap(tool, args, workingRoot);
    this.logger.debug('Invoking tool', { tool, command: wrapped.command, args: wrapped.args, cwd: wrapped.cwd });

    const startedAt = Date.now();
    const outcome = this.runner.run({
      ...wrapped,
      timeoutMs: this.options.timeoutMs,
      streamOutput: this.options.verbose,
    });
    const durationMs = Date.now() - startedAt;

    if (outcome.timedOut) {
      this.logger.error('Tool timed out and was terminated', { tool, timeoutMs: this.options.timeoutMs });
      throw toolchainTimeoutError(tool, this.options.timeoutMs);
    }
    if (outcome.spawnError !== undefined) {
      throw toolNotFoundError(tool, outcome.spawnError);
    }
    if (outcome.stderr.length > 0) {
      this.logger.debug('Tool stderr', { tool, stderr: outcome.stderr });
    }
    if (outcome.runError !== undefined) {
      const stderr = outcome.stderr.length > 0 ? `${outcome.stderr}\n${outcome.runError}` : outcome.runError;
      throw toolchainExitError(tool, outcome.exitCode, stderr);
    }
    if (outcome.exitCode !== 0) {
      throw toolchainExitError(tool, outcome.exitCode, outcome.stderr);
    }

    this.logger.debug('Tool finished', { tool, durationMs });
    return { exitCode: 0, stdout: outcome.stdout, stderr: outcome.stderr };
  }

  /** Same runner and options, different shell. */
  withShell(shell: ToolchainShell): ToolchainInvoker {
    return new ToolchainInvoker(this.runner, shell, this.options);
  }
}
