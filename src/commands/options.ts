/**
 * Commander option parsing.
 *
 * Commander hands actions loosely typed option bags; they are validated
 * here and turned into BuildConfigInput before createBuildConfig applies
 * the per-language defaults.
 */

import { z } from 'zod';
import { BuildConfigInput } from '../config/build-config';
import { configError } from '../domain/errors';
import { TARGET_LANGUAGES, TargetLanguage, isTargetLanguage } from '../domain/language';

export const rawBuildOptionsSchema = z.object({
  clean: z.boolean().optional(),
  verbose: z.boolean().optional(),
  protocVersion: z.string().optional(),
  grpcVersion: z.string().optional(),
  runtimeVersion: z.string().optional(),
  pythonVersion: z.string().optional(),
  nodeVersion: z.string().optional(),
  grpc: z.boolean().optional(),
  grpcWeb: z.boolean().optional(),
  timeout: z.coerce.number().optional(),
  startupDelay: z.coerce.number().optional(),
  root: z.string().optional(),
  source: z.string().optional(),
});

export type RawBuildOptions = z.infer<typeof rawBuildOptionsSchema>;

export function parseLanguage(value: string): TargetLanguage {
  if (!isTargetLanguage(value)) {
    throw configError('Invalid build options', [`language: must be one of ${TARGET_LANGUAGES.join(', ')}, got "${value}"`]);
  }
  return value;
}

export function parseRawOptions(raw: unknown): RawBuildOptions {
  const parsed = rawBuildOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw configError(
      'Invalid build options',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/** Map validated CLI options onto the config input for one language. */
export function toBuildConfigInput(language: TargetLanguage, options: RawBuildOptions): BuildConfigInput {
  const runtimeAlias = language === 'python' ? options.pythonVersion : options.nodeVersion;
  return {
    language,
    projectRoot: options.root,
    sourceDir: options.source,
    protocVersion: options.protocVersion,
    grpcVersion: options.grpcVersion,
    runtimeVersion: options.runtimeVersion ?? runtimeAlias,
    grpc: options.grpc,
    grpcWeb: options.grpcWeb,
    clean: options.clean,
    verbose: options.verbose,
    toolTimeoutMs: options.timeout,
    containerStartupDelayMs: options.startupDelay,
  };
}
