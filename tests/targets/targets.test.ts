import path from 'path';
import { createBuildConfig } from '../../src/config/build-config';
import { getTarget, javascriptTarget, pythonTarget, typescriptTarget } from '../../src/targets';
import { blackTargetVersion } from '../../src/targets/python';

const ROOT = path.resolve('/tmp/project');

function context(language: 'python' | 'typescript' | 'javascript', grpc?: boolean, grpcWeb?: boolean) {
  return {
    config: createBuildConfig({ language, projectRoot: ROOT, grpc, grpcWeb }),
    sourceDir: '/workspace/proto',
    outputDir: '/workspace/generated/code/' + language,
    protoFiles: ['/workspace/proto/api/v1/helloworld.proto'],
  };
}

describe('getTarget', () => {
  test('returns the target for each language', () => {
    expect(getTarget('python')).toBe(pythonTarget);
    expect(getTarget('typescript')).toBe(typescriptTarget);
    expect(getTarget('javascript')).toBe(javascriptTarget);
  });
});

describe('python target', () => {
  test('generates messages, type stubs and gRPC stubs', () => {
    expect(pythonTarget.generationCommands(context('python'))).toEqual([
      {
        tool: 'python',
        args: [
          '-m',
          'grpc_tools.protoc',
          '--proto_path=/workspace/proto',
          '--proto_path=/usr/local/include',
          '--python_out=/workspace/generated/code/python',
          '--pyi_out=/workspace/generated/code/python',
          '--grpc_python_out=/workspace/generated/code/python',
          '/workspace/proto/api/v1/helloworld.proto',
        ],
      },
    ]);
  });

  test('skips gRPC stubs when disabled', () => {
    const [call] = pythonTarget.generationCommands(context('python', false));
    expect(call.args.some((arg) => arg.startsWith('--grpc_python_out'))).toBe(false);
  });

  test('container spec pins the versions', () => {
    expect(pythonTarget.container(context('python').config)).toEqual({
      service: 'python-builder',
      profile: 'python',
      image: 'protobuf-python-builder',
      dockerfile: 'containers/python/Dockerfile',
      buildArgs: { PYTHON_VERSION: '3.11', GRPC_VERSION: '1.59.0', PROTOC_VERSION: '25.1' },
    });
  });

  test('pyproject.toml follows the pins', () => {
    const [pyproject, readme] = pythonTarget.manifestFiles(context('python').config);

    expect(pyproject.path).toBe('pyproject.toml');
    expect(pyproject.content).toContain('build-backend = "hatchling.build"');
    expect(pyproject.content).toContain('requires-python = ">=3.11"');
    expect(pyproject.content).toContain('    "grpcio>=1.59.0",');
    expect(pyproject.content).toContain('    "grpcio-tools>=1.59.0",');
    expect(pyproject.content).toContain('    "protobuf>=4.0.0",');
    expect(pyproject.content).toContain('packages = ["protos_python"]');
    expect(readme.content.split('\n')).toEqual([
      '# Protos Python Package',
      '',
      'This package contains Python client libraries generated from protobuf definitions.',
      '',
      '## Generated from',
      '',
      '- Protocol Buffers version: 25.1',
      '- gRPC version: 1.59.0',
      '- Python version: 3.11',
      '',
    ]);
  });

  test('artifact naming', () => {
    expect(pythonTarget.buildCommands()).toEqual([{ tool: 'uv', args: ['build', '--wheel', '--out-dir', 'dist'] }]);
    expect(pythonTarget.isArtifact('protos_python-0.1.0-py3-none-any.whl')).toBe(true);
    expect(pythonTarget.isArtifact('protos_python-0.1.0.tar.gz')).toBe(false);
    expect(pythonTarget.matchesVersion('protos_python-0.1.0-py3-none-any.whl', '0.1.0')).toBe(true);
    expect(pythonTarget.matchesVersion('protos_python-0.1.1-py3-none-any.whl', '0.1.0')).toBe(false);
  });

  test('blackTargetVersion', () => {
    expect(blackTargetVersion('3.11')).toBe('py311');
    expect(blackTargetVersion('3.9.18')).toBe('py39');
  });
});

describe('typescript target', () => {
  test('generates messages only by default', () => {
    expect(typescriptTarget.generationCommands(context('typescript'))).toEqual([
      {
        tool: 'protoc',
        args: [
          '--proto_path=/workspace/proto',
          '--proto_path=/usr/local/include',
          '--js_out=import_style=commonjs,binary:/workspace/generated/code/typescript',
          '--ts_out=/workspace/generated/code/typescript',
          '/workspace/proto/api/v1/helloworld.proto',
        ],
      },
    ]);
  });

  test('adds gRPC and gRPC-Web generators when enabled', () => {
    const calls = typescriptTarget.generationCommands(context('typescript', true, true));

    expect(calls).toHaveLength(3);
    expect(calls[1].tool).toBe('npx');
    expect(calls[1].args[0]).toBe('grpc_tools_node_protoc');
    expect(calls[1].args).toContain('--grpc_out=grpc_js:/workspace/generated/code/typescript');
    expect(calls[2].args).toContain(
      '--grpc-web_out=import_style=typescript,mode=grpcwebtext:/workspace/generated/code/typescript',
    );
  });

  test('gRPC-Web clients get the grpc-web runtime', () => {
    expect(typescriptTarget.classify('api/v1/HelloworldServiceClientPb.ts')).toBe('service');

    const manifest: unknown = JSON.parse(typescriptTarget.manifestFiles(context('typescript', false, true).config)[0].content);
    expect(manifest).toMatchObject({
      dependencies: {
        '@grpc/grpc-js': '^1.9.4',
        '@grpc/proto-loader': '^0.7.0',
        'google-protobuf': '^3.21.2',
        'grpc-web': '^1.5.0',
        protobufjs: '^7.2.0',
      },
    });
  });

  test('container build args carry the feature flags', () => {
    expect(typescriptTarget.container(context('typescript', true).config).buildArgs).toEqual({
      NODE_VERSION: '20',
      GRPC_VERSION: '1.9.4',
      PROTOC_VERSION: '25.1',
      GENERATE_GRPC: 'true',
      GENERATE_GRPC_WEB: 'false',
    });
  });

  test('package.json manifest', () => {
    const files = typescriptTarget.manifestFiles(context('typescript').config);
    expect(files.map((f) => f.path)).toEqual(['package.json', 'tsconfig.json', 'README.md']);

    const manifest: unknown = JSON.parse(files[0].content);
    expect(manifest).toEqual({
      name: 'protos-typescript',
      version: '0.1.0',
      description: 'TypeScript client library generated from protobuf definitions',
      main: 'dist/index.js',
      types: 'dist/index.d.ts',
      files: ['dist', 'src'],
      scripts: { build: 'tsc' },
      dependencies: {
        '@grpc/grpc-js': '^1.9.4',
        '@grpc/proto-loader': '^0.7.0',
        'google-protobuf': '^3.21.2',
        protobufjs: '^7.2.0',
      },
      devDependencies: {
        '@types/google-protobuf': '^3.15.12',
        typescript: '^5.0.0',
      },
      engines: { node: '>=20.0.0' },
    });
    expect(files[0].content.endsWith('}\n')).toBe(true);
    expect(files[2].content).toContain('- gRPC-Web generation: false');
  });

  test('build steps and artifact naming', () => {
    expect(typescriptTarget.buildCommands().map((c) => [c.tool, ...c.args].join(' '))).toEqual([
      'npm install',
      'npm run build',
      'npm pack --pack-destination dist',
    ]);
    expect(typescriptTarget.matchesVersion('protos-typescript-0.1.0.tgz', '0.1.0')).toBe(true);
  });
});

describe('javascript target', () => {
  test('bundles with pbjs and pbts', () => {
    expect(javascriptTarget.generationCommands(context('javascript'))).toEqual([
      {
        tool: 'npx',
        args: [
          'pbjs',
          '--target',
          'static-module',
          '--wrap',
          'commonjs',
          '--out',
          '/workspace/generated/code/javascript/protobuf.js',
          '/workspace/proto/api/v1/helloworld.proto',
        ],
      },
      {
        tool: 'npx',
        args: [
          'pbts',
          '--out',
          '/workspace/generated/code/javascript/protobuf.d.ts',
          '/workspace/generated/code/javascript/protobuf.js',
        ],
      },
    ]);
  });

  test('classifies the bundle and its declarations', () => {
    expect(javascriptTarget.classify('protobuf.js')).toBe('message');
    expect(javascriptTarget.classify('protobuf.d.ts')).toBe('declaration');
    expect(javascriptTarget.classify('api/v1/helloworld_grpc_pb.js')).toBe('service');
    expect(javascriptTarget.classify('README')).toBeNull();
  });

  test('gRPC-Web clients are generated as CommonJS with declarations', () => {
    const calls = javascriptTarget.generationCommands(context('javascript', false, true));

    expect(calls).toHaveLength(3);
    expect(calls[2].args).toContain(
      '--grpc-web_out=import_style=commonjs+dts,mode=grpcwebtext:/workspace/generated/code/javascript',
    );
    expect(javascriptTarget.classify('api/v1/helloworld_grpc_web_pb.js')).toBe('service');
    expect(javascriptTarget.classify('api/v1/helloworld_grpc_web_pb.d.ts')).toBe('declaration');
    expect(javascriptTarget.classify('api/v1/helloworld_pb.js')).toBe('support');
  });

  test('gRPC-Web adds the grpc-web dependency only when enabled', () => {
    const dependencies = (grpcWeb: boolean): unknown =>
      JSON.parse(javascriptTarget.manifestFiles(context('javascript', false, grpcWeb).config)[0].content);

    expect(dependencies(true)).toMatchObject({ dependencies: { 'grpc-web': '^1.5.0' } });
    expect(dependencies(false)).not.toMatchObject({ dependencies: { 'grpc-web': '^1.5.0' } });
  });

  test('package.json points at the sources', () => {
    const manifest: unknown = JSON.parse(javascriptTarget.manifestFiles(context('javascript').config)[0].content);
    expect(manifest).toMatchObject({
      name: 'protos-javascript',
      main: 'src/index.js',
      types: 'src/index.d.ts',
      engines: { node: '>=18.0.0' },
    });
  });
});
