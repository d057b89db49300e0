/**
 * Typed error model for machine-actionable error handling.
 *
 * Every pipeline failure carries a TypedError payload wrapped in an Error
 * subclass naming the failing component, so the CLI can print the stage,
 * the code and remediation hints without parsing messages.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'CONFIG'
  | 'WORKSPACE'
  | 'TOOLCHAIN'
  | 'POSTPROCESS'
  | 'PACKAGER'
  | 'PIPELINE';

/** Pipeline stage names, in execution order. */
export type PipelineStage =
  | 'prepare'
  | 'generate'
  | 'relocate'
  | 'format'
  | 'manifest'
  | 'package'
  | 'teardown';

/** Typed suggested fix that a user or script can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "TOOLCHAIN.TIMEOUT"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Stage that failed, filled in by the coordinator. */
  stage?: PipelineStage;
  /** Pipeline run the failure belongs to. */
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  stage?: PipelineStage;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    stage: params.stage,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Base class for every error the pipeline raises. */
export class PipelineError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'PipelineError';
  }

  get code(): string {
    return this.typedError.code;
  }

  /** Attach stage and run identifiers without losing the original class. */
  annotate(stage: PipelineStage, runId: string): this {
    this.typedError = { ...this.typedError, stage: this.typedError.stage ?? stage, runId };
    return this;
  }
}

export class ConfigError extends PipelineError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'ConfigError';
  }
}

export class WorkspaceError extends PipelineError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'WorkspaceError';
  }
}

export class ToolchainError extends PipelineError {
  constructor(
    typedError: TypedError,
    public readonly tool: string,
    public readonly exitCode: number | null,
    public readonly stderrTail: string,
  ) {
    super(typedError);
    this.name = 'ToolchainError';
  }
}

export class ToolchainTimeout extends PipelineError {
  constructor(
    typedError: TypedError,
    public readonly tool: string,
    public readonly timeoutMs: number,
  ) {
    super(typedError);
    this.name = 'ToolchainTimeout';
  }
}

export class PostProcessError extends PipelineError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'PostProcessError';
  }
}

export class PackagerError extends PipelineError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'PackagerError';
  }
}

// --- Factory functions ---

export function configError(message: string, issues: string[]): ConfigError {
  return new ConfigError(
    createTypedError({
      code: 'CONFIG.INVALID',
      message,
      details: { issues },
      suggestedFixes: [{ type: 'FIX_OPTIONS', params: {}, description: 'Correct the command-line options' }],
    }),
  );
}

export function notADirectoryError(path: string): WorkspaceError {
  return new WorkspaceError(
    createTypedError({
      code: 'WORKSPACE.NOT_A_DIRECTORY',
      message: `Workspace path exists and is not a directory: ${path}`,
      details: { path },
      suggestedFixes: [{ type: 'REMOVE_PATH', params: { path }, description: `Remove or rename "${path}"` }],
    }),
  );
}

export function notWritableError(path: string, reason: string): WorkspaceError {
  return new WorkspaceError(
    createTypedError({
      code: 'WORKSPACE.NOT_WRITABLE',
      message: `Workspace path is not writable: ${path}`,
      details: { path, reason },
    }),
  );
}

export function sourceMissingError(path: string): WorkspaceError {
  return new WorkspaceError(
    createTypedError({
      code: 'WORKSPACE.SOURCE_MISSING',
      message: `Proto source directory not found: ${path}`,
      details: { path },
      suggestedFixes: [{ type: 'SET_SOURCE', params: {}, description: 'Point --source at the directory holding the .proto files' }],
    }),
  );
}

export function noProtoFilesError(path: string): WorkspaceError {
  return new WorkspaceError(
    createTypedError({
      code: 'WORKSPACE.NO_PROTO_FILES',
      message: `No .proto files found under ${path}`,
      details: { path },
      suggestedFixes: [{ type: 'SET_SOURCE', params: {}, description: 'Point --source at the directory holding the .proto files' }],
    }),
  );
}

/** Keep the last lines of a stream for error payloads. */
export function tailLines(text: string, maxLines = 20, maxChars = 4000): string {
  const lines = text.replace(/\s+$/, '').split(/\r?\n/);
  const tail = lines.slice(-maxLines).join('\n');
  return tail.length > maxChars ? tail.slice(tail.length - maxChars) : tail;
}

export function toolchainExitError(tool: string, exitCode: number | null, stderr: string): ToolchainError {
  const stderrTail = tailLines(stderr);
  return new ToolchainError(
    createTypedError({
      code: 'TOOLCHAIN.EXIT',
      message: `${tool} exited with code ${exitCode ?? 'unknown'}`,
      details: { tool, exitCode, stderrTail },
    }),
    tool,
    exitCode,
    stderrTail,
  );
}

export function toolNotFoundError(tool: string, reason: string): ToolchainError {
  return new ToolchainError(
    createTypedError({
      code: 'TOOLCHAIN.NOT_FOUND',
      message: `Could not start ${tool}: ${reason}`,
      details: { tool, reason },
      suggestedFixes: [{ type: 'INSTALL_TOOL', params: { tool }, description: `Install "${tool}" and make sure it is on PATH` }],
    }),
    tool,
    null,
    '',
  );
}

export function toolchainTimeoutError(tool: string, timeoutMs: number): ToolchainTimeout {
  return new ToolchainTimeout(
    createTypedError({
      code: 'TOOLCHAIN.TIMEOUT',
      message: `${tool} did not finish within ${timeoutMs}ms`,
      retryable: true,
      details: { tool, timeoutMs },
      suggestedFixes: [{ type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } }],
    }),
    tool,
    timeoutMs,
  );
}

export function dockerUnavailableError(stderr: string): ToolchainError {
  const stderrTail = tailLines(stderr);
  return new ToolchainError(
    createTypedError({
      code: 'TOOLCHAIN.DOCKER_UNAVAILABLE',
      message: 'Docker is not running',
      retryable: true,
      details: { stderrTail },
      suggestedFixes: [{ type: 'START_DOCKER', params: {}, description: 'Start Docker and try again' }],
    }),
    'docker',
    null,
    stderrTail,
  );
}

export function unsupportedPlatformError(arch: string): ToolchainError {
  return new ToolchainError(
    createTypedError({
      code: 'TOOLCHAIN.UNSUPPORTED_PLATFORM',
      message: `Unsupported architecture: ${arch}`,
      details: { arch },
    }),
    'protoc',
    null,
    '',
  );
}

export function postProcessError(code: string, message: string, details?: Record<string, unknown>): PostProcessError {
  return new PostProcessError(createTypedError({ code: `POSTPROCESS.${code}`, message, details }));
}

export function builderMissingError(builder: string): PackagerError {
  return new PackagerError(
    createTypedError({
      code: 'PACKAGER.BUILDER_MISSING',
      message: `${builder} is not installed on this host`,
      details: { builder },
      suggestedFixes: [{ type: 'INSTALL_TOOL', params: { tool: builder }, description: `Install "${builder}" first` }],
    }),
  );
}

export function packagerError(code: string, message: string, details?: Record<string, unknown>): PackagerError {
  return new PackagerError(createTypedError({ code: `PACKAGER.${code}`, message, details }));
}

export function invalidTransitionError(from: string, to: string): PipelineError {
  return new PipelineError(
    createTypedError({
      code: 'PIPELINE.INVALID_TRANSITION',
      message: `Cannot transition pipeline from "${from}" to "${to}"`,
      details: { from, to },
    }),
  );
}

/** Extract a message from an unknown thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
