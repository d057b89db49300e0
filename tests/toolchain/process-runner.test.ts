import { SpawnSyncReturns } from 'child_process';
import { toProcessOutcome } from '../../src/toolchain/process-runner';

function result(overrides: Partial<SpawnSyncReturns<string>> = {}): SpawnSyncReturns<string> {
  return { pid: 42, output: [], stdout: '', stderr: '', status: 0, signal: null, ...overrides };
}

function systemError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('toProcessOutcome', () => {
  test('passes a clean exit through', () => {
    expect(toProcessOutcome(result({ stdout: 'libprotoc 25.1\n' }))).toEqual({
      exitCode: 0,
      signal: null,
      stdout: 'libprotoc 25.1\n',
      stderr: '',
      timedOut: false,
    });
  });

  test('ETIMEDOUT is a timeout', () => {
    const outcome = toProcessOutcome(
      result({ status: null, signal: 'SIGKILL', error: systemError('spawnSync protoc ETIMEDOUT', 'ETIMEDOUT') }),
    );
    expect(outcome.timedOut).toBe(true);
    expect(outcome.spawnError).toBeUndefined();
    expect(outcome.runError).toBeUndefined();
  });

  test.each(['ENOENT', 'EACCES'])('%s means the tool could not start', (code) => {
    const outcome = toProcessOutcome(result({ status: null, error: systemError(`spawnSync uv ${code}`, code) }));
    expect(outcome.spawnError).toBe(`spawnSync uv ${code}`);
    expect(outcome.runError).toBeUndefined();
  });

  test('ENOBUFS is a failed run, not a missing tool', () => {
    const outcome = toProcessOutcome(
      result({ status: null, signal: 'SIGTERM', error: systemError('spawnSync protoc ENOBUFS', 'ENOBUFS') }),
    );
    expect(outcome.spawnError).toBeUndefined();
    expect(outcome.runError).toBe('spawnSync protoc ENOBUFS');
    expect(outcome.timedOut).toBe(false);
  });
});
