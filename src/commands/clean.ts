import path from 'path';
import { createBuildConfig } from '../config/build-config';
import { allTargets } from '../targets';
import { ToolchainInvoker } from '../toolchain/invoker';
import { Terminal } from '../terminal';
import { WorkspaceManager } from '../workspace/workspace-manager';

export interface CleanOptions {
  images?: boolean;
  root?: string;
}

export async function cleanCommand(
  options: CleanOptions,
  terminal: Terminal,
  host: ToolchainInvoker,
  cwd: string = process.cwd(),
): Promise<void> {
  const projectRoot = path.resolve(cwd, options.root ?? '.');
  const workspaces = new WorkspaceManager();
  await workspaces.cleanGenerated(projectRoot);
  terminal.success('Removed generated files');

  if (options.images) {
    const images = allTargets().map((target) => target.container(createBuildConfig({ language: target.language, projectRoot })).image);
    const removed = workspaces.removeImages(images, host, projectRoot);
    terminal.info(`Removed ${removed.length} of ${images.length} builder images`);
  }
}
