/**
 * Stage runner: executes one pipeline stage and records its result.
 *
 * There are no retries. A failing critical stage yields a Failed result and
 * hands the original error back to the coordinator; a failing non-critical
 * stage is recorded as Degraded and logged.
 */

import { PipelineStage, PipelineError, TypedError, createTypedError, describeError } from '../domain/errors';
import { StageResult, StageStatus } from '../domain/pipeline';
import { Logger } from '../logger';

export interface StageDefinition {
  stage: PipelineStage;
  critical: boolean;
  execute(): Promise<void>;
}

export interface StageOutcome {
  result: StageResult;
  /** The thrown value, untouched apart from stage/run annotation. */
  error?: unknown;
}

/** Typed view of anything a stage may throw. */
export function toTypedError(err: unknown, stage: PipelineStage, runId: string): TypedError {
  if (err instanceof PipelineError) {
    return err.annotate(stage, runId).typedError;
  }
  return createTypedError({
    code: 'PIPELINE.UNEXPECTED',
    message: describeError(err),
    stage,
    runId,
  });
}

export async function executeStage(
  definition: StageDefinition,
  runId: string,
  logger: Logger,
): Promise<StageOutcome> {
  const log = logger.child({ stage: definition.stage });
  const startedAt = new Date().toISOString();
  const started = Date.now();
  log.debug('Stage started');

  try {
    await definition.execute();
    const durationMs = Date.now() - started;
    log.debug('Stage finished', { durationMs });
    return {
      result: {
        stage: definition.stage,
        status: StageStatus.Succeeded,
        startedAt,
        completedAt: new Date().toISOString(),
        durationMs,
      },
    };
  } catch (err) {
    const error = toTypedError(err, definition.stage, runId);
    const status = definition.critical ? StageStatus.Failed : StageStatus.Degraded;
    const result: StageResult = {
      stage: definition.stage,
      status,
      startedAt,
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - started,
      error,
    };

    if (!definition.critical) {
      log.warn('Non-critical stage failed, continuing', { code: error.code, error: error.message });
      return { result };
    }
    log.error('Stage failed', { code: error.code, error: error.message });
    return { result, error: err };
  }
}
