import { TargetLanguage } from '../domain/language';
import { PipelineRun } from '../domain/pipeline';
import { CommandContext, buildLanguage, configFor } from './build';
import { RawBuildOptions } from './options';

/** Languages `all` builds, in order. */
export const ALL_LANGUAGES: readonly TargetLanguage[] = ['python', 'typescript'];

/**
 * Build every language one after the other, stopping at the first failure.
 * Each language keeps its own defaults; only shared flags carry over.
 */
export async function allCommand(
  options: RawBuildOptions,
  context: CommandContext,
  languages: readonly TargetLanguage[] = ALL_LANGUAGES,
): Promise<PipelineRun[]> {
  const configs = languages.map((language) => configFor(language, options, context.cwd));
  const runs: PipelineRun[] = [];
  for (const config of configs) {
    runs.push(await buildLanguage(config, context));
  }
  context.terminal.success(`Built ${runs.length} packages`);
  return runs;
}
