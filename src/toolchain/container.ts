/**
 * Build container: the scoped resource every generator runs in.
 *
 * Lifecycle is acquire → exec* → release. The coordinator releases in a
 * finally block, and release() is a no-op after the first call, so the
 * service is stopped and removed exactly once per pipeline.
 */

import path from 'path';
import { COMPOSE_FILE, CONTAINER_WORKSPACE } from '../config/defaults';
import {
  PipelineError,
  ToolchainError,
  createTypedError,
  describeError,
  dockerUnavailableError,
  unsupportedPlatformError,
} from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { ToolchainInvoker, ToolchainShell } from './invoker';

export interface ContainerSpec {
  /** docker compose service name. */
  service: string;
  /** docker compose profile that enables the service. */
  profile: string;
  /** Image tag built before the service starts. */
  image: string;
  /** Dockerfile path relative to the project root. */
  dockerfile: string;
  buildArgs: Record<string, string>;
}

export type ContainerState = 'idle' | 'running' | 'released';

/** Map a Node.js architecture to the protoc release platform suffix. */
export function detectProtocPlatform(arch: string): string {
  switch (arch) {
    case 'x64':
      return 'linux-x86_64';
    case 'arm64':
      return 'linux-aarch_64';
    default:
      throw unsupportedPlatformError(arch);
  }
}

export class BuildContainer {
  private state: ContainerState = 'idle';
  /** Set once `compose up` has been attempted; only then is there anything to remove. */
  private started = false;
  private composeFile: string;
  private logger: Logger;

  constructor(
    private spec: ContainerSpec,
    private projectRoot: string,
    private host: ToolchainInvoker,
    logger?: Logger,
    private arch: string = process.arch,
  ) {
    this.composeFile = path.join(projectRoot, COMPOSE_FILE);
    this.logger = (logger ?? rootLogger).child({ container: spec.service });
  }

  get currentState(): ContainerState {
    return this.state;
  }

  /** Check Docker, build the image and start the compose service. */
  acquire(): void {
    if (this.state !== 'idle') {
      throw new PipelineError(
        createTypedError({
          code: 'PIPELINE.CONTAINER_STATE',
          message: `Cannot acquire container "${this.spec.service}" in state ${this.state}`,
        }),
      );
    }

    const args: Record<string, string> = {
      ...this.spec.buildArgs,
      PROTOC_PLATFORM: detectProtocPlatform(this.arch),
    };

    this.checkDocker();

    this.logger.info('Building Docker image', { image: this.spec.image, buildArgs: args });
    const buildArgs = Object.entries(args)
      .sort(([a], [b]) => a.localeCompare(b))
      .flatMap(([key, value]) => ['--build-arg', `${key}=${value}`]);
    this.host.invoke(
      'docker',
      ['build', ...buildArgs, '-f', path.join(this.projectRoot, this.spec.dockerfile), '-t', this.spec.image, this.projectRoot],
      this.projectRoot,
    );

    this.logger.info('Starting builder container', { profile: this.spec.profile });
    this.started = true;
    this.host.invoke(
      'docker',
      ['compose', '-f', this.composeFile, '--profile', this.spec.profile, 'up', '-d', this.spec.service],
      this.projectRoot,
    );
    this.state = 'running';
  }

  /** An invoker whose tools run inside this container. */
  exec(): ToolchainInvoker {
    if (this.state !== 'running') {
      throw new PipelineError(
        createTypedError({
          code: 'PIPELINE.CONTAINER_STATE',
          message: `Container "${this.spec.service}" is not running (state: ${this.state})`,
        }),
      );
    }
    return this.host.withShell(this.shell());
  }

  /** Translate a host path under the project root to its mount path. */
  toContainerPath(hostPath: string): string {
    const relative = path.relative(this.projectRoot, hostPath);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new PipelineError(
        createTypedError({
          code: 'PIPELINE.PATH_OUTSIDE_PROJECT',
          message: `Path is not visible inside the build container: ${hostPath}`,
          details: { hostPath, projectRoot: this.projectRoot },
        }),
      );
    }
    const segments = relative === '' ? [] : relative.split(path.sep);
    return path.posix.join(CONTAINER_WORKSPACE, ...segments);
  }

  /** Stop and remove the service. Never throws; only the first call acts. */
  release(): void {
    if (this.state === 'released') return;
    this.state = 'released';
    if (!this.started) {
      this.logger.debug('Builder container was never started');
      return;
    }

    for (const action of [['stop', this.spec.service], ['rm', '-f', this.spec.service]]) {
      try {
        this.host.invoke('docker', ['compose', '-f', this.composeFile, ...action], this.projectRoot);
      } catch (err) {
        this.logger.warn('Container cleanup step failed', { action: action[0], error: describeError(err) });
      }
    }
    this.logger.info('Builder container released');
  }

  private checkDocker(): void {
    try {
      this.host.invoke('docker', ['info'], this.projectRoot);
    } catch (err) {
      if (err instanceof ToolchainError) {
        throw dockerUnavailableError(err.stderrTail);
      }
      throw err;
    }
  }

  private shell(): ToolchainShell {
    const composeFile = this.composeFile;
    const service = this.spec.service;
    const projectRoot = this.projectRoot;
    return {
      name: `container:${service}`,
      wrap: (tool, args, workingRoot) => ({
        command: 'docker',
        args: ['compose', '-f', composeFile, 'exec', '-T', '-w', workingRoot, service, tool, ...args],
        cwd: projectRoot,
      }),
    };
  }
}
