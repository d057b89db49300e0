/**
 * Workspace manager.
 *
 * Owns the on-disk layout of one pipeline: validates the proto sources,
 * creates (or, with --clean, recreates) the generated tree and releases the
 * build container when the pipeline ends.
 */

import path from 'path';
import fs from 'fs-extra';
import { glob } from 'glob';
import { BuildConfig } from '../config/build-config';
import {
  describeError,
  noProtoFilesError,
  notADirectoryError,
  notWritableError,
  sourceMissingError,
} from '../domain/errors';
import { TARGET_LANGUAGES, TargetLanguage } from '../domain/language';
import { Workspace } from '../domain/workspace';
import { Logger, logger as rootLogger } from '../logger';
import { LanguageTarget } from '../targets/target';
import { BuildContainer } from '../toolchain/container';
import { ToolchainInvoker } from '../toolchain/invoker';

export const GENERATED_DIR = 'generated';
export const ARTIFACTS_DIR = 'artifacts';

export interface PreparedWorkspace {
  workspace: Workspace;
  /** Proto files relative to the source directory, sorted, POSIX separators. */
  protoFiles: string[];
}

export interface LanguageStatus {
  language: TargetLanguage;
  generated: boolean;
  packaged: boolean;
  artifacts: string[];
}

export interface WorkspaceStatus {
  source: string;
  protoFiles: number;
  languages: LanguageStatus[];
}

export function resolveWorkspace(projectRoot: string, source: string, target: LanguageTarget): Workspace {
  const packageRoot = path.join(projectRoot, GENERATED_DIR, 'packages', target.language);
  return {
    language: target.language,
    projectRoot,
    source,
    intermediate: path.join(projectRoot, GENERATED_DIR, 'code', target.language),
    packageRoot,
    sourceRoot: path.join(packageRoot, target.sourceDirName),
    distDir: path.join(packageRoot, 'dist'),
    artifactDir: path.join(projectRoot, ARTIFACTS_DIR, target.language),
  };
}

export async function discoverProtoFiles(source: string): Promise<string[]> {
  const files = await glob('**/*.proto', { cwd: source, nodir: true, posix: true });
  return files.sort();
}

export class WorkspaceManager {
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = (logger ?? rootLogger).child({ component: 'workspace' });
  }

  async prepare(config: BuildConfig, target: LanguageTarget): Promise<PreparedWorkspace> {
    const workspace = resolveWorkspace(config.projectRoot, config.sourceDir, target);

    const sourceStat = await fs.stat(workspace.source).catch(() => null);
    if (!sourceStat || !sourceStat.isDirectory()) {
      throw sourceMissingError(workspace.source);
    }

    const owned = [
      workspace.intermediate,
      workspace.packageRoot,
      workspace.sourceRoot,
      workspace.distDir,
      workspace.artifactDir,
    ];
    for (const dir of owned) {
      const stat = await fs.stat(dir).catch(() => null);
      if (stat && !stat.isDirectory()) {
        throw notADirectoryError(dir);
      }
    }

    if (config.clean) {
      this.logger.info('Cleaning previous output', { language: target.language });
      await fs.remove(workspace.intermediate);
      await fs.remove(workspace.packageRoot);
    }

    for (const dir of [workspace.intermediate, workspace.sourceRoot, workspace.distDir, workspace.artifactDir]) {
      try {
        await fs.ensureDir(dir);
        await fs.access(dir, fs.constants.W_OK);
      } catch (err) {
        throw notWritableError(dir, describeError(err));
      }
    }

    const protoFiles = await discoverProtoFiles(workspace.source);
    if (protoFiles.length === 0) {
      throw noProtoFilesError(workspace.source);
    }

    this.logger.info('Workspace prepared', { language: target.language, protoFiles: protoFiles.length });
    return { workspace, protoFiles };
  }

  /** Release the build container, if one was created. Never throws. */
  teardown(container: BuildContainer | undefined): void {
    if (!container) return;
    try {
      container.release();
    } catch (err) {
      this.logger.warn('Teardown failed', { error: describeError(err) });
    }
  }

  /** Remove the whole generated/ tree. Artifacts are kept. */
  async cleanGenerated(projectRoot: string): Promise<void> {
    const generated = path.join(projectRoot, GENERATED_DIR);
    await fs.remove(generated);
    this.logger.info('Removed generated files', { path: generated });
  }

  /** `docker rmi` each image; failures are logged. Returns the removed images. */
  removeImages(images: string[], host: ToolchainInvoker, projectRoot: string): string[] {
    const removed: string[] = [];
    for (const image of images) {
      try {
        host.invoke('docker', ['rmi', image], projectRoot);
        removed.push(image);
      } catch (err) {
        this.logger.warn('Could not remove image', { image, error: describeError(err) });
      }
    }
    return removed;
  }

  async inspect(projectRoot: string, source: string, targets: LanguageTarget[]): Promise<WorkspaceStatus> {
    const protoFiles = (await fs.pathExists(source)) ? await discoverProtoFiles(source) : [];
    const languages: LanguageStatus[] = [];
    for (const target of targets) {
      const workspace = resolveWorkspace(projectRoot, source, target);
      const artifacts = (await fs.pathExists(workspace.artifactDir))
        ? (await fs.readdir(workspace.artifactDir)).filter((name) => target.isArtifact(name)).sort()
        : [];
      languages.push({
        language: target.language,
        generated: await fs.pathExists(workspace.intermediate),
        packaged: await fs.pathExists(path.join(workspace.packageRoot, target.manifestFile)),
        artifacts,
      });
    }
    languages.sort((a, b) => TARGET_LANGUAGES.indexOf(a.language) - TARGET_LANGUAGES.indexOf(b.language));
    return { source, protoFiles: protoFiles.length, languages };
  }
}
