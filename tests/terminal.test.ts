import { PipelineError, configError, createTypedError } from '../src/domain/errors';
import { LogLevel } from '../src/logger';
import { Terminal } from '../src/terminal';

function capture(verbose = false): { terminal: Terminal; lines: string[] } {
  const lines: string[] = [];
  return { terminal: new Terminal({ write: (line) => lines.push(line), color: false, verbose }), lines };
}

describe('Terminal', () => {
  test('labels log entries by level', () => {
    const { terminal } = capture();
    const entry = (level: LogLevel) => terminal.formatEntry({ level, message: 'hello', timestamp: '' });
    expect(entry(LogLevel.Debug)).toBe('[DEBUG] hello');
    expect(entry(LogLevel.Info)).toBe('[INFO] hello');
    expect(entry(LogLevel.Warn)).toBe('[WARNING] hello');
    expect(entry(LogLevel.Error)).toBe('[ERROR] hello');
  });

  test('verbose entries carry context except the ambient keys', () => {
    const { terminal } = capture(true);
    const line = terminal.formatEntry({
      level: LogLevel.Info,
      message: 'Generating code',
      timestamp: '',
      context: { component: 'protopack', runId: 'run_1', tool: 'python', count: 2, files: ['a.py'], skipped: undefined },
    });
    expect(line).toBe('[INFO] Generating code tool=python count=2 files=["a.py"]');
  });

  test('handler writes formatted entries', () => {
    const { terminal, lines } = capture();
    terminal.handler()({ level: LogLevel.Warn, message: 'Relocation overwrote existing files', timestamp: '' });
    expect(lines).toEqual(['[WARNING] Relocation overwrote existing files']);
  });

  test('success and info lines', () => {
    const { terminal, lines } = capture();
    terminal.info('Building python package');
    terminal.success('python package built: artifacts/python/x.whl');
    expect(lines).toEqual(['[INFO] Building python package', '[SUCCESS] python package built: artifacts/python/x.whl']);
  });

  test('presents a config error with its actions', () => {
    const { terminal, lines } = capture();
    terminal.error(configError('Invalid build options', ['language: bad']));
    expect(lines).toEqual([
      '[ERROR] Invalid Options: Invalid build options',
      '  code CONFIG.INVALID',
      '  - Run with --help to see the accepted options',
      '  - Correct the command-line options',
    ]);
  });

  test('presents a timeout as a warning with its stage', () => {
    const { terminal, lines } = capture();
    terminal.error(
      new PipelineError(
        createTypedError({
          code: 'TOOLCHAIN.TIMEOUT',
          message: 'python did not finish within 100ms',
          stage: 'generate',
          suggestedFixes: [{ type: 'INCREASE_TIMEOUT', params: {} }],
        }),
      ),
    );
    expect(lines).toEqual([
      '[WARNING] Generator Timed Out: A tool in the "generate" stage did not finish in time and was terminated.',
      '  stage generate, code TOOLCHAIN.TIMEOUT',
      '  - Raise --timeout',
      '  - Check that the build container is healthy',
      '  - Apply fix: INCREASE_TIMEOUT',
    ]);
  });

  test('wraps unknown errors and shows details only when verbose', () => {
    const quiet = capture();
    quiet.terminal.error(new Error('boom'));
    expect(quiet.lines).toEqual(['[ERROR] Pipeline Error: boom', '  code PIPELINE.UNEXPECTED']);

    const loud = capture(true);
    loud.terminal.error('boom');
    expect(loud.lines.slice(2)).toEqual(['  Code: PIPELINE.UNEXPECTED', '  Message: boom', '  Retryable: false']);
  });
});
