/**
 * Relocation of raw generator output into the canonical source tree.
 *
 * Files are copied, so the intermediate tree stays available for
 * post-mortem inspection. When two files map to the same destination the
 * later one (in sorted order) wins; every overwrite is counted and logged.
 */

import path from 'path';
import fs from 'fs-extra';
import { glob } from 'glob';
import { GeneratedUnit } from '../domain/generated-unit';
import { postProcessError } from '../domain/errors';
import { Workspace } from '../domain/workspace';
import { Logger, logger as rootLogger } from '../logger';
import { LanguageTarget } from '../targets/target';

export interface RelocationResult {
  units: GeneratedUnit[];
  /** Destination paths that already held a file. */
  overwritten: string[];
  /** Intermediate files the target does not recognise. */
  skipped: string[];
}

/** All files under dir as sorted POSIX paths relative to dir. */
export async function listFiles(dir: string): Promise<string[]> {
  if (!(await fs.pathExists(dir))) return [];
  const files = await glob('**/*', { cwd: dir, nodir: true, posix: true, dot: false });
  return files.sort();
}

export function packagePathOf(relativePath: string): string {
  const dir = path.posix.dirname(relativePath);
  return dir === '.' ? '' : dir.split('/').join('.');
}

export async function relocate(
  workspace: Workspace,
  target: LanguageTarget,
  logger: Logger = rootLogger,
): Promise<RelocationResult> {
  const result: RelocationResult = { units: [], overwritten: [], skipped: [] };

  for (const relativePath of await listFiles(workspace.intermediate)) {
    const kind = target.classify(relativePath);
    if (kind === null) {
      result.skipped.push(relativePath);
      continue;
    }

    const destination = path.join(workspace.sourceRoot, ...relativePath.split('/'));
    if (await fs.pathExists(destination)) {
      result.overwritten.push(relativePath);
    }
    await fs.copy(path.join(workspace.intermediate, ...relativePath.split('/')), destination, { overwrite: true });

    result.units.push({
      relativePath,
      absolutePath: destination,
      packagePath: packagePathOf(relativePath),
      kind,
    });
  }

  if (result.units.length === 0) {
    throw postProcessError('NO_OUTPUT', `Generators produced no ${target.language} sources`, {
      intermediate: workspace.intermediate,
      skipped: result.skipped,
    });
  }

  if (result.overwritten.length > 0) {
    logger.warn('Relocation overwrote existing files', {
      count: result.overwritten.length,
      files: result.overwritten,
    });
  }
  logger.info('Relocated generated sources', {
    units: result.units.length,
    skipped: result.skipped.length,
    sourceRoot: workspace.sourceRoot,
  });

  return result;
}
