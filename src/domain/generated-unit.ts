/**
 * Generated source files and the entry exports derived from them.
 */

export type UnitKind = 'message' | 'service' | 'declaration' | 'support';

/** One generated file placed in the canonical package tree. */
export interface GeneratedUnit {
  /** POSIX path relative to the canonical source root. */
  relativePath: string;
  absolutePath: string;
  /** Dotted directory path, e.g. "api.v1"; empty at the root. */
  packagePath: string;
  kind: UnitKind;
}

/** Tagged export of one top-level module in the synthesized entry file. */
export type EntryExport =
  | { kind: 'message-module'; modulePath: string; symbol: string; qualified: boolean }
  | { kind: 'service-module'; modulePath: string; symbol: string; qualified: boolean };

/** A file produced by post-processing or manifest templating. */
export interface RenderedFile {
  /** Path relative to the directory the file is written into. */
  path: string;
  content: string;
}
