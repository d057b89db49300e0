/**
 * Source formatting inside the build container.
 *
 * Every formatter runs even when an earlier one fails; the failures are
 * collected into one POSTPROCESS.FORMAT_FAILED error. The coordinator
 * treats that error as a warning.
 */

import { BuildConfig } from '../config/build-config';
import { describeError, postProcessError } from '../domain/errors';
import { Workspace } from '../domain/workspace';
import { Logger, logger as rootLogger } from '../logger';
import { LanguageTarget } from '../targets/target';
import { ToolchainInvoker } from '../toolchain/invoker';
import { listFiles } from './relocate';

export interface FormatReport {
  files: number;
  commands: number;
}

/**
 * @param workingRoot - the source root as seen by the invoker's shell
 */
export async function format(
  workspace: Workspace,
  target: LanguageTarget,
  config: BuildConfig,
  invoker: ToolchainInvoker,
  workingRoot: string,
  logger: Logger = rootLogger,
): Promise<FormatReport> {
  const files = (await listFiles(workspace.sourceRoot)).filter((file) =>
    target.formatExtensions.some((ext) => file.endsWith(ext)),
  );
  const commands = target.formatCommands(files, config);
  if (commands.length === 0) {
    logger.info('Nothing to format');
    return { files: 0, commands: 0 };
  }

  const failures: Array<{ tool: string; error: string }> = [];
  for (const command of commands) {
    try {
      invoker.invoke(command.tool, command.args, workingRoot);
    } catch (err) {
      failures.push({ tool: command.tool, error: describeError(err) });
    }
  }

  if (failures.length > 0) {
    throw postProcessError('FORMAT_FAILED', `Formatting failed: ${failures.map((f) => f.tool).join(', ')}`, {
      failures,
    });
  }

  logger.info('Formatted sources', { files: files.length, tools: commands.map((c) => c.tool) });
  return { files: files.length, commands: commands.length };
}
