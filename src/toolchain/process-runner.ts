/**
 * Synchronous child-process execution.
 *
 * Every external tool goes through a ProcessRunner so tests can script
 * tool behaviour without spawning anything.
 */

import { SpawnSyncReturns, spawnSync } from 'child_process';

export interface ProcessRequest {
  command: string;
  args: string[];
  cwd?: string;
  /** Kill the child after this many milliseconds. */
  timeoutMs?: number;
  /** Forward the child's stdout to ours instead of capturing it. */
  streamOutput?: boolean;
}

export interface ProcessOutcome {
  /** Null when the process was killed or never started. */
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Set when the executable could not be started (ENOENT, EACCES). */
  spawnError?: string;
  /** Set when the process started but the run broke down otherwise (e.g. ENOBUFS). */
  runError?: string;
}

export interface ProcessRunner {
  run(request: ProcessRequest): ProcessOutcome;
}

const MAX_BUFFER_BYTES = 64 * 1024 * 1024;

function errorCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

/** Error codes meaning the executable itself could not be started. */
const NOT_STARTED_CODES = new Set(['ENOENT', 'EACCES']);

export function toProcessOutcome(result: SpawnSyncReturns<string>): ProcessOutcome {
  const code = result.error ? errorCode(result.error) : undefined;
  const timedOut = code === 'ETIMEDOUT';
  const outcome: ProcessOutcome = {
    exitCode: result.status,
    signal: result.signal,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    timedOut,
  };
  if (result.error && !timedOut) {
    if (code !== undefined && NOT_STARTED_CODES.has(code)) {
      outcome.spawnError = result.error.message;
    } else {
      outcome.runError = result.error.message;
    }
  }
  return outcome;
}

/** ProcessRunner backed by child_process.spawnSync. */
export const spawnSyncRunner: ProcessRunner = {
  run(request: ProcessRequest): ProcessOutcome {
    return toProcessOutcome(
      spawnSync(request.command, request.args, {
        cwd: request.cwd,
        timeout: request.timeoutMs,
        killSignal: 'SIGKILL',
        encoding: 'utf-8',
        maxBuffer: MAX_BUFFER_BYTES,
        stdio: ['ignore', request.streamOutput ? 'inherit' : 'pipe', 'pipe'],
      }),
    );
  },
};
