import { BuildConfig, createBuildConfig } from '../config/build-config';
import { TargetLanguage } from '../domain/language';
import { PipelineRun } from '../domain/pipeline';
import { CoordinatorOptions, PipelineCoordinator } from '../engine/coordinator';
import { Terminal } from '../terminal';
import { RawBuildOptions, toBuildConfigInput } from './options';

export interface CommandContext {
  terminal: Terminal;
  coordinator?: CoordinatorOptions;
  cwd?: string;
}

export function configFor(language: TargetLanguage, options: RawBuildOptions, cwd?: string): BuildConfig {
  return createBuildConfig(toBuildConfigInput(language, options), cwd);
}

/** Run one pipeline and report the artifact. */
export async function buildLanguage(config: BuildConfig, context: CommandContext): Promise<PipelineRun> {
  context.terminal.info(`Building ${config.language} package`);
  const run = await new PipelineCoordinator(context.coordinator).run(config);
  const degraded = run.stageResults.filter((result) => result.status === 'degraded').map((result) => result.stage);
  if (degraded.length > 0) {
    context.terminal.info(`Completed with warnings in: ${degraded.join(', ')}`);
  }
  context.terminal.success(`${config.language} package built: ${run.artifact?.path ?? 'no artifact'}`);
  return run;
}

export async function buildCommand(
  language: TargetLanguage,
  options: RawBuildOptions,
  context: CommandContext,
): Promise<PipelineRun> {
  return buildLanguage(configFor(language, options, context.cwd), context);
}
