#!/usr/bin/env node

import { Command } from 'commander';
import { allCommand } from './commands/all';
import { CommandContext, buildCommand } from './commands/build';
import { cleanCommand } from './commands/clean';
import { parseLanguage, parseRawOptions } from './commands/options';
import { statusCommand } from './commands/status';
import { TARGET_LANGUAGES } from './domain/language';
import { levelFor, setLogHandler, setLogLevel } from './logger';
import { LineWriter, Terminal } from './terminal';
import { ToolchainInvoker, hostShell } from './toolchain/invoker';
import { ProcessRunner, spawnSyncRunner } from './toolchain/process-runner';
import { VERSION } from './version';

const TOOL_DESCRIPTION = `
Generate language packages from Protocol Buffer definitions.

Each build runs protoc inside a pinned Docker image, lays the output out as an
installable package and builds it on the host:

  python      wheel      artifacts/python/protos_python-<version>-py3-none-any.whl
  typescript  tarball    artifacts/typescript/protos-typescript-<version>.tgz
  javascript  tarball    artifacts/javascript/protos-javascript-<version>.tgz
`;

/** Timeout for the short host queries made by clean and status. */
const QUERY_TIMEOUT_MS = 60_000;

export interface CliDependencies {
  runner?: ProcessRunner;
  write?: LineWriter;
  cwd?: string;
  sleep?: (ms: number) => Promise<void>;
}

function addBuildOptions(command: Command): Command {
  return command
    .option('-c, --clean', 'remove previous generated output first')
    .option('-v, --verbose', 'stream tool output and show debug logs')
    .option('--protoc-version <version>', 'protoc release baked into the image')
    .option('--grpc-version <version>', 'gRPC version (grpcio or @grpc/grpc-js)')
    .option('--runtime-version <version>', 'Python or Node.js version')
    .option('--python-version <version>', 'alias of --runtime-version for python')
    .option('--node-version <version>', 'alias of --runtime-version for typescript and javascript')
    .option('--grpc', 'generate gRPC service stubs')
    .option('--no-grpc', 'do not generate gRPC service stubs')
    .option('--grpc-web', 'generate gRPC-Web clients (typescript, javascript)')
    .option('--timeout <ms>', 'per-tool timeout in milliseconds')
    .option('--startup-delay <ms>', 'wait after starting the build container')
    .option('--root <dir>', 'project root holding containers/ and the output trees')
    .option('--source <dir>', 'directory of .proto files, relative to the root');
}

export function createProgram(deps: CliDependencies = {}): Command {
  const runner = deps.runner ?? spawnSyncRunner;

  const terminalFor = (verbose: boolean): Terminal => {
    const terminal = new Terminal({ write: deps.write, verbose });
    setLogHandler(terminal.handler());
    setLogLevel(levelFor(verbose));
    return terminal;
  };

  const hostInvoker = (): ToolchainInvoker =>
    new ToolchainInvoker(runner, hostShell, { timeoutMs: QUERY_TIMEOUT_MS, verbose: false });

  const guarded = async (terminal: Terminal, action: () => Promise<unknown>): Promise<void> => {
    try {
      await action();
    } catch (err) {
      terminal.error(err);
      process.exitCode = 1;
    }
  };

  const program = new Command();
  program.name('protopack').description(TOOL_DESCRIPTION).version(VERSION);

  addBuildOptions(
    program
      .command('build')
      .description('Build the package for one language')
      .argument('<language>', `one of ${TARGET_LANGUAGES.join(', ')}`),
  ).action(async (language: string, raw: Record<string, unknown>) => {
    const terminal = terminalFor(raw.verbose === true);
    await guarded(terminal, async () => {
      const context: CommandContext = { terminal, cwd: deps.cwd, coordinator: { runner, sleep: deps.sleep } };
      await buildCommand(parseLanguage(language), parseRawOptions(raw), context);
    });
  });

  addBuildOptions(program.command('all').description('Build the python and typescript packages in turn')).action(
    async (raw: Record<string, unknown>) => {
      const terminal = terminalFor(raw.verbose === true);
      await guarded(terminal, async () => {
        const context: CommandContext = { terminal, cwd: deps.cwd, coordinator: { runner, sleep: deps.sleep } };
        await allCommand(parseRawOptions(raw), context);
      });
    },
  );

  program
    .command('clean')
    .description('Remove generated/ (artifacts are kept)')
    .option('--images', 'also remove the builder Docker images')
    .option('--root <dir>', 'project root')
    .action(async (raw: { images?: boolean; root?: string }) => {
      const terminal = terminalFor(false);
      await guarded(terminal, () => cleanCommand(raw, terminal, hostInvoker(), deps.cwd));
    });

  program
    .command('status')
    .description('Show proto sources, generated trees, artifacts and Docker state')
    .option('--root <dir>', 'project root')
    .option('--source <dir>', 'directory of .proto files, relative to the root')
    .action(async (raw: { root?: string; source?: string }) => {
      const terminal = terminalFor(false);
      await guarded(terminal, () => statusCommand(raw, terminal, hostInvoker(), deps.cwd));
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      new Terminal().error(err);
      process.exitCode = 1;
    });
}
