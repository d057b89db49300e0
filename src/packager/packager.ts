/**
 * Packager: builds the distributable on the host and publishes it.
 *
 * Nothing is written to the artifact directory unless the build produced
 * exactly one artifact. Publishing replaces earlier files of the same
 * package version through a temporary copy followed by a rename.
 */

import { createHash } from 'crypto';
import path from 'path';
import fs from 'fs-extra';
import { Artifact } from '../domain/artifact';
import {
  ToolchainError,
  ToolchainTimeout,
  builderMissingError,
  describeError,
  packagerError,
} from '../domain/errors';
import { Workspace } from '../domain/workspace';
import { Logger, logger as rootLogger } from '../logger';
import { LanguageTarget } from '../targets/target';
import { ToolchainInvoker } from '../toolchain/invoker';

function isToolFailure(err: unknown): err is ToolchainError | ToolchainTimeout {
  return err instanceof ToolchainError || err instanceof ToolchainTimeout;
}

export class Packager {
  private logger: Logger;

  constructor(
    private host: ToolchainInvoker,
    logger?: Logger,
  ) {
    this.logger = (logger ?? rootLogger).child({ component: 'packager' });
  }

  /** Build the package and return the path of the single artifact in dist/. */
  async build(workspace: Workspace, target: LanguageTarget): Promise<string> {
    this.checkBuilder(workspace, target.builder);

    await fs.emptyDir(workspace.distDir);

    for (const step of target.buildCommands()) {
      this.logger.info('Running build step', { tool: step.tool, args: step.args });
      try {
        this.host.invoke(step.tool, step.args, workspace.packageRoot);
      } catch (err) {
        if (!isToolFailure(err)) throw err;
        throw packagerError('BUILD_FAILED', `${[step.tool, ...step.args].join(' ')} failed: ${err.message}`, {
          tool: step.tool,
          cause: err.code,
          stderrTail: err instanceof ToolchainError ? err.stderrTail : undefined,
        });
      }
    }

    const produced = (await fs.readdir(workspace.distDir)).filter((name) => target.isArtifact(name)).sort();
    if (produced.length !== 1) {
      throw packagerError('NO_ARTIFACT', `Expected exactly one artifact in ${workspace.distDir}, found ${produced.length}`, {
        distDir: workspace.distDir,
        produced,
      });
    }
    return path.join(workspace.distDir, produced[0]);
  }

  /** Copy a built artifact into artifacts/<language>/ and fingerprint it. */
  async publish(workspace: Workspace, target: LanguageTarget, builtFile: string): Promise<Artifact> {
    const { name, version } = target.identity;
    const fileName = path.basename(builtFile);
    const destination = path.join(workspace.artifactDir, fileName);
    const temporary = path.join(workspace.artifactDir, `.${fileName}.tmp`);

    try {
      await fs.ensureDir(workspace.artifactDir);
      await fs.copy(builtFile, temporary, { overwrite: true });
      await fs.rename(temporary, destination);
      for (const existing of await fs.readdir(workspace.artifactDir)) {
        if (existing !== fileName && target.matchesVersion(existing, version)) {
          await fs.remove(path.join(workspace.artifactDir, existing));
          this.logger.debug('Removed stale artifact', { file: existing });
        }
      }
    } catch (err) {
      await fs.remove(temporary);
      throw packagerError('PUBLISH_FAILED', `Could not publish ${fileName}: ${describeError(err)}`, {
        artifactDir: workspace.artifactDir,
      });
    }

    const content = await fs.readFile(destination);
    const artifact: Artifact = {
      language: target.language,
      packageName: name,
      version,
      fileName,
      path: destination,
      sizeBytes: content.length,
      sha256: createHash('sha256').update(content).digest('hex'),
      createdAt: new Date().toISOString(),
    };
    this.logger.info('Published artifact', { file: fileName, sizeBytes: artifact.sizeBytes, sha256: artifact.sha256 });
    return artifact;
  }

  private checkBuilder(workspace: Workspace, builder: string): void {
    try {
      this.host.invoke(builder, ['--version'], workspace.packageRoot);
    } catch (err) {
      if (isToolFailure(err)) throw builderMissingError(builder);
      throw err;
    }
  }
}
