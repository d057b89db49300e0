import path from 'path';
import fs from 'fs-extra';
import { BuildConfig } from '../config/build-config';
import { describeError, packagerError } from '../domain/errors';
import { Workspace } from '../domain/workspace';
import { Logger, logger as rootLogger } from '../logger';
import { LanguageTarget } from '../targets/target';

/** Render the target's manifests into the package root, overwriting. */
export async function writeManifest(
  workspace: Workspace,
  target: LanguageTarget,
  config: BuildConfig,
  logger: Logger = rootLogger,
): Promise<string[]> {
  const written: string[] = [];
  for (const file of target.manifestFiles(config)) {
    const destination = path.join(workspace.packageRoot, ...file.path.split('/'));
    try {
      await fs.outputFile(destination, file.content);
    } catch (err) {
      throw packagerError('MANIFEST_FAILED', `Could not write ${file.path}: ${describeError(err)}`, {
        path: destination,
      });
    }
    written.push(file.path);
  }
  logger.info('Wrote package manifest', { files: written, packageRoot: workspace.packageRoot });
  return written;
}
