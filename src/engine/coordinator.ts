/**
 * Pipeline coordinator: the core orchestration engine.
 *
 * Drives one language pipeline through
 * prepare -> generate -> relocate -> format -> manifest -> package,
 * with a durable state transition after every stage. The build container
 * is released whatever happens, before the run reaches a terminal state.
 */

import path from 'path';
import { v4 as uuid } from 'uuid';
import { BuildConfig } from '../config/build-config';
import { CONTAINER_WORKSPACE } from '../config/defaults';
import { PipelineError, createTypedError } from '../domain/errors';
import { PipelineRun, PipelineState } from '../domain/pipeline';
import { Logger, logger as rootLogger } from '../logger';
import { synthesizeEntryPoints } from '../postprocess/entry-points';
import { format } from '../postprocess/format';
import { relocate } from '../postprocess/relocate';
import { writeManifest } from '../packager/manifest';
import { Packager } from '../packager/packager';
import { getTarget } from '../targets';
import { BuildContainer } from '../toolchain/container';
import { ToolchainInvoker, hostShell } from '../toolchain/invoker';
import { ProcessRunner, spawnSyncRunner } from '../toolchain/process-runner';
import { PreparedWorkspace, WorkspaceManager } from '../workspace/workspace-manager';
import { StageDefinition, executeStage, toTypedError } from './stage-runner';
import { isTerminalPipelineState, transitionPipelineState } from './state-machine';

export interface CoordinatorOptions {
  runner?: ProcessRunner;
  logger?: Logger;
  /** Wait used for the container startup delay. */
  sleep?: (ms: number) => Promise<void>;
  /** Host architecture, used to pick the protoc build. */
  arch?: string;
  /** Called with the run after every state change. */
  onStateChange?: (run: Readonly<PipelineRun>) => void;
}

interface PipelineStageDefinition extends StageDefinition {
  /** State reached when the stage completes, degraded or not. */
  next: PipelineState;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function need<T>(value: T | undefined, what: string): T {
  if (value === undefined) {
    throw new PipelineError(
      createTypedError({ code: 'PIPELINE.STAGE_ORDER', message: `${what} is not available yet` }),
    );
  }
  return value;
}

export class PipelineCoordinator {
  private runner: ProcessRunner;
  private logger: Logger;
  private sleep: (ms: number) => Promise<void>;
  private arch: string;
  private onStateChange?: (run: Readonly<PipelineRun>) => void;

  constructor(options: CoordinatorOptions = {}) {
    this.runner = options.runner ?? spawnSyncRunner;
    this.logger = options.logger ?? rootLogger;
    this.sleep = options.sleep ?? defaultSleep;
    this.arch = options.arch ?? process.arch;
    this.onStateChange = options.onStateChange;
  }

  /**
   * Run the whole pipeline for config.language.
   * Resolves with the finished run; rejects with the failing stage's error.
   */
  async run(config: BuildConfig): Promise<PipelineRun> {
    const target = getTarget(config.language);
    const run: PipelineRun = {
      id: `run_${uuid()}`,
      language: config.language,
      state: PipelineState.Idle,
      startedAt: new Date().toISOString(),
      stageResults: [],
    };
    const log = this.logger.child({ runId: run.id, language: config.language });

    const host = new ToolchainInvoker(this.runner, hostShell, {
      timeoutMs: config.toolTimeoutMs,
      verbose: config.verbose,
      logger: log,
    });
    const container = new BuildContainer(target.container(config), config.projectRoot, host, log, this.arch);
    const workspaces = new WorkspaceManager(log);
    const packager = new Packager(host, log);

    let prepared: PreparedWorkspace | undefined;

    const stages: PipelineStageDefinition[] = [
      {
        stage: 'prepare',
        critical: true,
        next: PipelineState.Prepared,
        execute: async () => {
          prepared = await workspaces.prepare(config, target);
        },
      },
      {
        stage: 'generate',
        critical: true,
        next: PipelineState.Generated,
        execute: async () => {
          const { workspace, protoFiles } = need(prepared, 'Workspace');
          container.acquire();
          await this.sleep(config.containerStartupDelayMs);

          const sourceDir = container.toContainerPath(workspace.source);
          const invoker = container.exec();
          const calls = target.generationCommands({
            config,
            sourceDir,
            outputDir: container.toContainerPath(workspace.intermediate),
            protoFiles: protoFiles.map((file) => path.posix.join(sourceDir, file)),
          });
          for (const call of calls) {
            log.info('Generating code', { tool: call.tool });
            invoker.invoke(call.tool, call.args, CONTAINER_WORKSPACE);
          }
        },
      },
      {
        stage: 'relocate',
        critical: true,
        next: PipelineState.Relocated,
        execute: async () => {
          const { workspace } = need(prepared, 'Workspace');
          const relocation = await relocate(workspace, target, log);
          if (target.scaffold) {
            const touched = await target.scaffold({
              sourceRoot: workspace.sourceRoot,
              units: relocation.units,
              identity: target.identity,
            });
            log.debug('Scaffolded package', { files: touched });
          }
          await synthesizeEntryPoints(workspace.sourceRoot, relocation.units, target, log);
        },
      },
      {
        stage: 'format',
        critical: false,
        next: PipelineState.Formatted,
        execute: async () => {
          const { workspace } = need(prepared, 'Workspace');
          await format(workspace, target, config, container.exec(), container.toContainerPath(workspace.sourceRoot), log);
        },
      },
      {
        stage: 'manifest',
        critical: true,
        next: PipelineState.Manifested,
        execute: async () => {
          await writeManifest(need(prepared, 'Workspace').workspace, target, config, log);
        },
      },
      {
        stage: 'package',
        critical: true,
        next: PipelineState.Packaged,
        execute: async () => {
          const { workspace } = need(prepared, 'Workspace');
          const built = await packager.build(workspace, target);
          run.artifact = await packager.publish(workspace, target, built);
        },
      },
    ];

    log.info('Pipeline started', { source: config.sourceDir, versions: config.versions, features: config.features });

    try {
      for (const definition of stages) {
        const outcome = await executeStage(definition, run.id, log);
        run.stageResults.push(outcome.result);
        if (outcome.error !== undefined) {
          throw outcome.error;
        }
        this.advance(run, definition.next);
      }
    } catch (err) {
      if (!isTerminalPipelineState(run.state)) {
        run.error = toTypedError(err, run.stageResults[run.stageResults.length - 1]?.stage ?? 'prepare', run.id);
        run.completedAt = new Date().toISOString();
        this.advance(run, PipelineState.Failed);
      }
      log.error('Pipeline failed', { state: run.state, code: run.error?.code, stage: run.error?.stage });
      throw err;
    } finally {
      workspaces.teardown(container);
    }

    run.completedAt = new Date().toISOString();
    this.advance(run, PipelineState.Done);
    log.info('Pipeline finished', { artifact: run.artifact?.path });
    return run;
  }

  private advance(run: PipelineRun, next: PipelineState): void {
    const result = transitionPipelineState(run.state, next);
    if (!result.success || result.newState === undefined) {
      throw new PipelineError(
        result.error ?? createTypedError({ code: 'PIPELINE.INVALID_TRANSITION', message: `${run.state} -> ${next}` }),
      );
    }
    run.state = result.newState;
    this.onStateChange?.(run);
  }
}
