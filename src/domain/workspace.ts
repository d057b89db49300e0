import { TargetLanguage } from './language';

/**
 * Directory roles of one pipeline. All paths are absolute and live under
 * the project root, so they can be mapped into the build container.
 */
export interface Workspace {
  readonly language: TargetLanguage;
  readonly projectRoot: string;
  /** Proto sources, never written. */
  readonly source: string;
  /** Raw generator output: generated/code/<language>. */
  readonly intermediate: string;
  /** generated/packages/<language>: manifests, canonical tree, dist/. */
  readonly packageRoot: string;
  /** Canonical source tree inside packageRoot. */
  readonly sourceRoot: string;
  readonly distDir: string;
  /** artifacts/<language> */
  readonly artifactDir: string;
}
