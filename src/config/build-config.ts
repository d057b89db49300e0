/**
 * Build configuration.
 *
 * Raw options from the CLI are validated once, merged with per-language
 * defaults and frozen. Components receive the resulting BuildConfig
 * explicitly and never consult process.env.
 */

import path from 'path';
import { z } from 'zod';
import { configError } from '../domain/errors';
import { TARGET_LANGUAGES, TargetLanguage } from '../domain/language';
import { LANGUAGE_DEFAULTS } from './defaults';

export interface VersionPins {
  /** protoc release baked into the build image. */
  readonly protoc: string;
  /** gRPC framework version (grpcio for Python, @grpc/grpc-js for Node). */
  readonly grpc: string;
  /** Python or Node.js version. */
  readonly runtime: string;
}

export interface FeatureFlags {
  readonly grpc: boolean;
  readonly grpcWeb: boolean;
}

export interface BuildConfig {
  readonly language: TargetLanguage;
  readonly projectRoot: string;
  readonly sourceDir: string;
  readonly versions: VersionPins;
  readonly features: FeatureFlags;
  readonly clean: boolean;
  readonly verbose: boolean;
  readonly toolTimeoutMs: number;
  /** Fixed wait between starting the build container and the first tool call. */
  readonly containerStartupDelayMs: number;
}

const versionString = z
  .string()
  .trim()
  .min(1, 'must not be empty')
  .regex(/^[0-9A-Za-z.+-]+$/, 'must be a version such as 1.59.0');

export const buildConfigInputSchema = z.object({
  language: z.enum(TARGET_LANGUAGES),
  projectRoot: z.string().min(1).default('.'),
  sourceDir: z.string().min(1).optional(),
  protocVersion: versionString.optional(),
  grpcVersion: versionString.optional(),
  runtimeVersion: versionString.optional(),
  grpc: z.boolean().optional(),
  grpcWeb: z.boolean().default(false),
  clean: z.boolean().default(false),
  verbose: z.boolean().default(false),
  toolTimeoutMs: z.number().int().positive().default(600_000),
  containerStartupDelayMs: z.number().int().nonnegative().default(2_000),
});

export type BuildConfigInput = z.input<typeof buildConfigInputSchema>;

/** Validate raw options and produce an immutable BuildConfig. */
export function createBuildConfig(input: BuildConfigInput, cwd: string = process.cwd()): BuildConfig {
  const parsed = buildConfigInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`);
    throw configError('Invalid build options', issues);
  }

  const options = parsed.data;
  const defaults = LANGUAGE_DEFAULTS[options.language];
  const projectRoot = path.resolve(cwd, options.projectRoot);
  const sourceDir = path.resolve(projectRoot, options.sourceDir ?? defaults.sourceDir);

  const relative = path.relative(projectRoot, sourceDir);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw configError('Invalid build options', [`sourceDir: ${sourceDir} is outside the project root ${projectRoot}`]);
  }

  const config: BuildConfig = {
    language: options.language,
    projectRoot,
    sourceDir,
    versions: Object.freeze({
      protoc: options.protocVersion ?? defaults.protocVersion,
      grpc: options.grpcVersion ?? defaults.grpcVersion,
      runtime: options.runtimeVersion ?? defaults.runtimeVersion,
    }),
    features: Object.freeze({
      grpc: options.grpc ?? defaults.grpc,
      grpcWeb: options.grpcWeb,
    }),
    clean: options.clean,
    verbose: options.verbose,
    toolTimeoutMs: options.toolTimeoutMs,
    containerStartupDelayMs: options.containerStartupDelayMs,
  };
  return Object.freeze(config);
}
