import path from 'path';
import fs from 'fs-extra';
import { createProgram } from '../src/cli';
import { LogLevel, resetLogHandler, setLogLevel } from '../src/logger';
import { PYTHON_WHEEL, makeProject, pythonRunner, removeProject } from './helpers/fixtures';

describe('protopack CLI', () => {
  let root: string;
  let lines: string[];

  beforeEach(async () => {
    root = await makeProject();
    lines = [];
  });

  afterEach(async () => {
    process.exitCode = undefined;
    resetLogHandler();
    setLogLevel(LogLevel.Info);
    await removeProject(root);
  });

  const program = () =>
    createProgram({
      runner: pythonRunner(root),
      write: (line) => lines.push(line),
      cwd: root,
      sleep: async () => undefined,
    });

  test('build python publishes the wheel', async () => {
    await program().parseAsync(['build', 'python', '--startup-delay', '0'], { from: 'user' });

    expect(process.exitCode).toBeUndefined();
    expect(await fs.pathExists(path.join(root, 'artifacts', 'python', PYTHON_WHEEL))).toBe(true);
    expect(lines[0]).toBe('[INFO] Building python package');
    expect(lines[lines.length - 1]).toBe(
      `[SUCCESS] python package built: ${path.join(root, 'artifacts', 'python', PYTHON_WHEEL)}`,
    );
  });

  test('an unknown language fails with exit code 1', async () => {
    await program().parseAsync(['build', 'rust'], { from: 'user' });

    expect(process.exitCode).toBe(1);
    expect(lines[0]).toBe('[ERROR] Invalid Options: Invalid build options');
  });

  test('a bad timeout is reported as an option error', async () => {
    await program().parseAsync(['build', 'python', '--timeout', 'soon'], { from: 'user' });

    expect(process.exitCode).toBe(1);
    expect(lines).toContain('  code CONFIG.INVALID');
  });
});
