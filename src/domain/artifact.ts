/**
 * Artifact domain model.
 *
 * The distributable (wheel or npm tarball) published under
 * artifacts/<language>/. Only the packager creates one.
 */

import { TargetLanguage } from './language';

export interface Artifact {
  language: TargetLanguage;
  packageName: string;
  version: string;
  fileName: string;
  /** Absolute path inside the artifact directory. */
  path: string;
  sizeBytes: number;
  sha256: string;
  createdAt: string;
}
