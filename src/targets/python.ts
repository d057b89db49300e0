import { BuildConfig } from '../config/build-config';
import { EntryExport, RenderedFile, UnitKind } from '../domain/generated-unit';
import { scaffoldPythonPackage } from '../postprocess/python-package';
import { ContainerSpec } from '../toolchain/container';
import {
  GENERATED_HEADER,
  GenerationContext,
  LanguageTarget,
  PROTOC_INCLUDE,
  ToolCall,
  renderReadme,
  stripExtension,
} from './target';

const DISTRIBUTION_NAME = 'protos-python';
const MODULE_NAME = 'protos_python';
const PACKAGE_VERSION = '0.1.0';

/** "3.11" -> "py311", the form black's --target-version expects. */
export function blackTargetVersion(runtime: string): string {
  const [major = '3', minor = ''] = runtime.split('.');
  return `py${major}${minor}`;
}

function renderPyproject(config: BuildConfig): string {
  const { grpc, runtime } = config.versions;
  return [
    '[build-system]',
    'requires = ["hatchling"]',
    'build-backend = "hatchling.build"',
    '',
    '[project]',
    `name = "${DISTRIBUTION_NAME}"`,
    `version = "${PACKAGE_VERSION}"`,
    'description = "Python client libraries generated from protobuf definitions"',
    'readme = "README.md"',
    `requires-python = ">=${runtime}"`,
    'dependencies = [',
    `    "grpcio>=${grpc}",`,
    `    "grpcio-tools>=${grpc}",`,
    '    "protobuf>=4.0.0",',
    ']',
    '',
    '[tool.hatch.build.targets.wheel]',
    `packages = ["${MODULE_NAME}"]`,
    '',
  ].join('\n');
}

/** `api/v1/helloworld_pb2` -> `from .api.v1 import helloworld_pb2`. */
function renderImport(entry: EntryExport): string {
  const segments = entry.modulePath.split('/');
  const moduleName = segments[segments.length - 1];
  const parent = segments.slice(0, -1).join('.');
  const alias = entry.symbol === moduleName ? '' : ` as ${entry.symbol}`;
  return `from .${parent} import ${moduleName}${alias}`;
}

export const pythonTarget: LanguageTarget = {
  language: 'python',
  identity: { name: DISTRIBUTION_NAME, version: PACKAGE_VERSION },
  sourceDirName: MODULE_NAME,
  manifestFile: 'pyproject.toml',
  builder: 'uv',
  formatExtensions: ['.py', '.pyi'],

  container(config): ContainerSpec {
    return {
      service: 'python-builder',
      profile: 'python',
      image: 'protobuf-python-builder',
      dockerfile: 'containers/python/Dockerfile',
      buildArgs: {
        PYTHON_VERSION: config.versions.runtime,
        GRPC_VERSION: config.versions.grpc,
        PROTOC_VERSION: config.versions.protoc,
      },
    };
  },

  generationCommands(context: GenerationContext): ToolCall[] {
    const out = context.outputDir;
    const args = [
      '-m',
      'grpc_tools.protoc',
      `--proto_path=${context.sourceDir}`,
      `--proto_path=${PROTOC_INCLUDE}`,
      `--python_out=${out}`,
      `--pyi_out=${out}`,
    ];
    if (context.config.features.grpc) {
      args.push(`--grpc_python_out=${out}`);
    }
    return [{ tool: 'python', args: [...args, ...context.protoFiles] }];
  },

  classify(relativePath): UnitKind | null {
    if (relativePath.endsWith('_pb2_grpc.py')) return 'service';
    if (relativePath.endsWith('_pb2.py')) return 'message';
    if (relativePath.endsWith('.pyi')) return 'declaration';
    if (relativePath.endsWith('.py')) return 'support';
    return null;
  },

  modulePath(relativePath) {
    return stripExtension(relativePath, ['.pyi', '.py']);
  },

  renderEntryFiles(exports): RenderedFile[] {
    const lines = [`# ${GENERATED_HEADER}`, ...exports.map(renderImport), ''];
    lines.push('__all__ = [');
    for (const entry of exports) {
      lines.push(`    "${entry.symbol}",`);
    }
    lines.push(']', '');
    return [{ path: '__init__.py', content: lines.join('\n') }];
  },

  formatCommands(files, config): ToolCall[] {
    const pyFiles = files.filter((file) => file.endsWith('.py'));
    const calls: ToolCall[] = [];
    if (files.length > 0) {
      calls.push({
        tool: 'black',
        args: ['--line-length=88', `--target-version=${blackTargetVersion(config.versions.runtime)}`, ...files],
      });
    }
    if (pyFiles.length > 0) {
      calls.push({ tool: 'isort', args: pyFiles });
    }
    return calls;
  },

  manifestFiles(config): RenderedFile[] {
    return [
      { path: 'pyproject.toml', content: renderPyproject(config) },
      {
        path: 'README.md',
        content: renderReadme(
          'Protos Python Package',
          'This package contains Python client libraries generated from protobuf definitions.',
          [
            ['Protocol Buffers version', config.versions.protoc],
            ['gRPC version', config.versions.grpc],
            ['Python version', config.versions.runtime],
          ],
        ),
      },
    ];
  },

  buildCommands(): ToolCall[] {
    return [{ tool: 'uv', args: ['build', '--wheel', '--out-dir', 'dist'] }];
  },

  isArtifact(fileName) {
    return fileName.endsWith('.whl');
  },

  matchesVersion(fileName, version) {
    return fileName.startsWith(`${MODULE_NAME}-${version}-`) && fileName.endsWith('.whl');
  },

  scaffold(context) {
    return scaffoldPythonPackage(context.sourceRoot, context.units, MODULE_NAME);
  },
};
