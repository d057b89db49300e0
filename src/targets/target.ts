/**
 * Language target contract.
 *
 * A target knows everything language-specific about one pipeline: which
 * container to use, which generators to call, how to recognise their output,
 * what the entry file and manifests look like and how to build the package.
 * The coordinator and post-processor only ever talk to this interface.
 */

import { BuildConfig } from '../config/build-config';
import { EntryExport, GeneratedUnit, RenderedFile, UnitKind } from '../domain/generated-unit';
import { TargetLanguage } from '../domain/language';
import { ContainerSpec } from '../toolchain/container';

/** One tool call: `tool ...args`. */
export interface ToolCall {
  tool: string;
  args: string[];
}

/** Inputs to generator command construction. Paths are container paths. */
export interface GenerationContext {
  config: BuildConfig;
  sourceDir: string;
  outputDir: string;
  /** Proto files under sourceDir, sorted. */
  protoFiles: string[];
}

export interface PackageIdentity {
  /** Distribution name (pip / npm). */
  name: string;
  version: string;
}

/** Hook run after relocation, before entry synthesis. */
export interface ScaffoldContext {
  sourceRoot: string;
  units: GeneratedUnit[];
  identity: PackageIdentity;
}

export interface LanguageTarget {
  readonly language: TargetLanguage;
  readonly identity: PackageIdentity;
  /** Name of the canonical source directory inside the package root. */
  readonly sourceDirName: string;
  readonly manifestFile: string;
  /** Host executable that builds the package. */
  readonly builder: string;
  /** Extensions the formatters should see. */
  readonly formatExtensions: readonly string[];

  container(config: BuildConfig): ContainerSpec;
  generationCommands(context: GenerationContext): ToolCall[];
  /** Classify a generated file, or null when it is not ours to relocate. */
  classify(relativePath: string): UnitKind | null;
  /** Import path of a unit, relative to the source root, without extension. */
  modulePath(relativePath: string): string;
  /**
   * Top-level names a message module exports. Targets that flatten message
   * modules into one namespace provide it so clashing modules can be
   * namespaced instead.
   */
  exportedNames?(source: string): string[];
  /** Entry files, paths relative to the source root. */
  renderEntryFiles(exports: EntryExport[]): RenderedFile[];
  /** Formatter calls over the given container paths. */
  formatCommands(files: string[], config: BuildConfig): ToolCall[];
  /** Manifest files, paths relative to the package root. */
  manifestFiles(config: BuildConfig): RenderedFile[];
  /** Build steps, run on the host inside the package root. */
  buildCommands(): ToolCall[];
  isArtifact(fileName: string): boolean;
  /** Whether an artifact file belongs to the given package version. */
  matchesVersion(fileName: string, version: string): boolean;
  scaffold?(context: ScaffoldContext): Promise<string[]>;
}

/** Shared include path of the protoc well-known types inside the images. */
export const PROTOC_INCLUDE = '/usr/local/include';

export const GENERATED_HEADER = 'Generated by protopack. Do not edit.';

/** Strip the first matching extension. */
export function stripExtension(relativePath: string, extensions: readonly string[]): string {
  const match = extensions.find((ext) => relativePath.endsWith(ext));
  return match ? relativePath.slice(0, -match.length) : relativePath;
}

/** README shared by every package flavour. */
export function renderReadme(title: string, summary: string, facts: Array<[string, string]>): string {
  const lines = [
    `# ${title}`,
    '',
    summary,
    '',
    '## Generated from',
    '',
    ...facts.map(([label, value]) => `- ${label}: ${value}`),
    '',
  ];
  return lines.join('\n');
}
