/**
 * Pipeline run model.
 *
 * One end-to-end build for a single target language, from proto sources
 * to a published artifact.
 */

import { Artifact } from './artifact';
import { PipelineStage, TypedError } from './errors';
import { TargetLanguage } from './language';

/** Pipeline lifecycle states. */
export enum PipelineState {
  Idle = 'idle',
  Prepared = 'prepared',
  Generated = 'generated',
  Relocated = 'relocated',
  Formatted = 'formatted',
  Manifested = 'manifested',
  Packaged = 'packaged',
  Done = 'done',
  Failed = 'failed',
}

/** Valid state transitions. Every non-terminal state may fail. */
export const VALID_PIPELINE_TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  [PipelineState.Idle]: [PipelineState.Prepared, PipelineState.Failed],
  [PipelineState.Prepared]: [PipelineState.Generated, PipelineState.Failed],
  [PipelineState.Generated]: [PipelineState.Relocated, PipelineState.Failed],
  [PipelineState.Relocated]: [PipelineState.Formatted, PipelineState.Failed],
  [PipelineState.Formatted]: [PipelineState.Manifested, PipelineState.Failed],
  [PipelineState.Manifested]: [PipelineState.Packaged, PipelineState.Failed],
  [PipelineState.Packaged]: [PipelineState.Done, PipelineState.Failed],
  [PipelineState.Done]: [],
  [PipelineState.Failed]: [],
};

export enum StageStatus {
  Succeeded = 'succeeded',
  /** Non-critical stage failed; the pipeline carried on. */
  Degraded = 'degraded',
  Failed = 'failed',
}

/** Result of a single stage. */
export interface StageResult {
  stage: PipelineStage;
  status: StageStatus;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  error?: TypedError;
}

/** A single pipeline execution. */
export interface PipelineRun {
  id: string;
  language: TargetLanguage;
  state: PipelineState;
  startedAt: string;
  completedAt?: string;
  stageResults: StageResult[];
  artifact?: Artifact;
  error?: TypedError;
}
