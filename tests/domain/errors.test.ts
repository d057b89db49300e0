import {
  ConfigError,
  PipelineError,
  ToolchainError,
  ToolchainTimeout,
  WorkspaceError,
  builderMissingError,
  configError,
  createTypedError,
  describeError,
  dockerUnavailableError,
  noProtoFilesError,
  postProcessError,
  tailLines,
  toolchainExitError,
  toolchainTimeoutError,
  toolNotFoundError,
} from '../../src/domain/errors';

describe('Typed Error Model', () => {
  test('createTypedError produces complete error object', () => {
    const error = createTypedError({
      code: 'TEST.ERROR',
      message: 'test error',
      retryable: true,
      details: { key: 'value' },
      suggestedFixes: [{ type: 'FIX', params: {} }],
    });

    expect(error.code).toBe('TEST.ERROR');
    expect(error.message).toBe('test error');
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ key: 'value' });
    expect(error.suggestedFixes).toHaveLength(1);
  });

  test('defaults retryable to false', () => {
    const error = createTypedError({ code: 'TEST', message: 'test' });
    expect(error.retryable).toBe(false);
    expect(error.suggestedFixes).toEqual([]);
  });

  test('configError lists the issues', () => {
    const error = configError('Invalid build options', ['timeout: must be positive']);
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toBeInstanceOf(PipelineError);
    expect(error.code).toBe('CONFIG.INVALID');
    expect(error.typedError.details).toEqual({ issues: ['timeout: must be positive'] });
  });

  test('noProtoFilesError is a workspace error', () => {
    const error = noProtoFilesError('/tmp/project/proto');
    expect(error).toBeInstanceOf(WorkspaceError);
    expect(error.code).toBe('WORKSPACE.NO_PROTO_FILES');
    expect(error.message).toBe('No .proto files found under /tmp/project/proto');
  });

  test('toolchainExitError carries tool, exit code and stderr tail', () => {
    const error = toolchainExitError('protoc', 1, 'helloworld.proto:3:1: Expected "}".\n');
    expect(error).toBeInstanceOf(ToolchainError);
    expect(error.tool).toBe('protoc');
    expect(error.exitCode).toBe(1);
    expect(error.stderrTail).toBe('helloworld.proto:3:1: Expected "}".');
    expect(error.message).toBe('protoc exited with code 1');
  });

  test('toolchainExitError reports an unknown exit code', () => {
    expect(toolchainExitError('black', null, '').message).toBe('black exited with code unknown');
  });

  test('toolNotFoundError suggests installing the tool', () => {
    const error = toolNotFoundError('uv', 'spawnSync uv ENOENT');
    expect(error.code).toBe('TOOLCHAIN.NOT_FOUND');
    expect(error.typedError.suggestedFixes[0].type).toBe('INSTALL_TOOL');
  });

  test('toolchainTimeoutError is retryable and suggests a longer timeout', () => {
    const error = toolchainTimeoutError('protoc', 1000);
    expect(error).toBeInstanceOf(ToolchainTimeout);
    expect(error.timeoutMs).toBe(1000);
    expect(error.typedError.retryable).toBe(true);
    expect(error.typedError.suggestedFixes.some((f) => f.type === 'INCREASE_TIMEOUT')).toBe(true);
  });

  test('dockerUnavailableError', () => {
    const error = dockerUnavailableError('Cannot connect to the Docker daemon');
    expect(error.code).toBe('TOOLCHAIN.DOCKER_UNAVAILABLE');
    expect(error.message).toBe('Docker is not running');
  });

  test('postProcessError and builderMissingError namespaces', () => {
    expect(postProcessError('NO_OUTPUT', 'nothing').code).toBe('POSTPROCESS.NO_OUTPUT');
    expect(builderMissingError('uv').message).toBe('uv is not installed on this host');
  });

  test('annotate keeps the class and fills stage and run', () => {
    const error = toolchainExitError('protoc', 2, '');
    const annotated = error.annotate('generate', 'run_1');
    expect(annotated).toBe(error);
    expect(annotated).toBeInstanceOf(ToolchainError);
    expect(annotated.typedError.stage).toBe('generate');
    expect(annotated.typedError.runId).toBe('run_1');
  });

  test('annotate does not overwrite an existing stage', () => {
    const error = postProcessError('NO_OUTPUT', 'nothing').annotate('relocate', 'run_1');
    error.annotate('format', 'run_1');
    expect(error.typedError.stage).toBe('relocate');
  });
});

describe('tailLines', () => {
  test('keeps the last lines without trailing whitespace', () => {
    expect(tailLines('a\nb\nc\n', 2)).toBe('b\nc');
  });

  test('caps the number of characters', () => {
    expect(tailLines('abcdef', 20, 3)).toBe('def');
  });
});

describe('describeError', () => {
  test('uses the message of an Error', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
  });

  test('stringifies anything else', () => {
    expect(describeError(42)).toBe('42');
  });
});
