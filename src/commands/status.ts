import path from 'path';
import { LANGUAGE_DEFAULTS } from '../config/defaults';
import { describeError } from '../domain/errors';
import { logger } from '../logger';
import { allTargets } from '../targets';
import { Terminal } from '../terminal';
import { ToolchainInvoker } from '../toolchain/invoker';
import { WorkspaceManager, WorkspaceStatus } from '../workspace/workspace-manager';

export interface StatusOptions {
  root?: string;
  source?: string;
}

export interface StatusReport extends WorkspaceStatus {
  dockerRunning: boolean;
}

export function isDockerRunning(host: ToolchainInvoker, projectRoot: string): boolean {
  try {
    host.invoke('docker', ['info'], projectRoot);
    return true;
  } catch (err) {
    logger.debug('docker info failed', { error: describeError(err) });
    return false;
  }
}

export async function statusCommand(
  options: StatusOptions,
  terminal: Terminal,
  host: ToolchainInvoker,
  cwd: string = process.cwd(),
): Promise<StatusReport> {
  const projectRoot = path.resolve(cwd, options.root ?? '.');
  const source = path.resolve(projectRoot, options.source ?? LANGUAGE_DEFAULTS.python.sourceDir);
  const status = await new WorkspaceManager().inspect(projectRoot, source, allTargets());
  const dockerRunning = isDockerRunning(host, projectRoot);

  terminal.info(`Proto files: ${status.protoFiles} in ${path.relative(projectRoot, source) || '.'}`);
  for (const language of status.languages) {
    const artifacts = language.artifacts.length > 0 ? language.artifacts.join(', ') : 'none';
    terminal.info(
      `${language.language}: generated ${language.generated ? 'yes' : 'no'}, ` +
        `package ${language.packaged ? 'yes' : 'no'}, artifacts ${artifacts}`,
    );
  }
  terminal.info(`Docker: ${dockerRunning ? 'running' : 'not running'}`);

  return { ...status, dockerRunning };
}
