import { RenderedFile, UnitKind } from '../domain/generated-unit';
import {
  classifyNodeStub,
  nodeContainer,
  nodeDependencies,
  nodeModulePath,
  nodeReadme,
  prettierCommands,
  renderEsExports,
  stubCommands,
  toJson,
} from './node-common';
import { LanguageTarget, PROTOC_INCLUDE, ToolCall } from './target';

/** `export class X`, `export namespace api.v1` (binds `api`), and so on. */
const EXPORTED_DECLARATION =
  /^export\s+(?:declare\s+)?(?:abstract\s+)?(?:class|interface|enum|const|let|var|function|type|namespace)\s+([A-Za-z_$][\w$]*)/gm;

const PACKAGE_NAME = 'protos-typescript';
const PACKAGE_VERSION = '0.1.0';

const PACKAGE_TSCONFIG = {
  compilerOptions: {
    target: 'ES2020',
    module: 'commonjs',
    lib: ['ES2020'],
    declaration: true,
    allowJs: true,
    outDir: './dist',
    rootDir: './src',
    strict: true,
    esModuleInterop: true,
    skipLibCheck: true,
    forceConsistentCasingInFileNames: true,
    resolveJsonModule: true,
    moduleResolution: 'node',
  },
  include: ['src/**/*'],
  exclude: ['node_modules', 'dist'],
};

export const typescriptTarget: LanguageTarget = {
  language: 'typescript',
  identity: { name: PACKAGE_NAME, version: PACKAGE_VERSION },
  sourceDirName: 'src',
  manifestFile: 'package.json',
  builder: 'npm',
  formatExtensions: ['.ts', '.js'],

  container(config) {
    return nodeContainer('typescript', config);
  },

  generationCommands(context): ToolCall[] {
    const out = context.outputDir;
    return [
      {
        tool: 'protoc',
        args: [
          `--proto_path=${context.sourceDir}`,
          `--proto_path=${PROTOC_INCLUDE}`,
          `--js_out=import_style=commonjs,binary:${out}`,
          `--ts_out=${out}`,
          ...context.protoFiles,
        ],
      },
      ...stubCommands(context, 'typescript'),
    ];
  },

  classify(relativePath): UnitKind | null {
    const stub = classifyNodeStub(relativePath);
    if (stub !== undefined) return stub;
    // protoc-gen-ts output: one self-contained module per proto file.
    return relativePath.endsWith('.ts') ? 'message' : 'support';
  },

  modulePath: nodeModulePath,

  exportedNames(source) {
    return [...source.matchAll(EXPORTED_DECLARATION)].map((match) => match[1]);
  },

  renderEntryFiles(exports): RenderedFile[] {
    return [{ path: 'index.ts', content: renderEsExports(exports) }];
  },

  formatCommands(files) {
    return prettierCommands(files);
  },

  manifestFiles(config): RenderedFile[] {
    const manifest = {
      name: PACKAGE_NAME,
      version: PACKAGE_VERSION,
      description: 'TypeScript client library generated from protobuf definitions',
      main: 'dist/index.js',
      types: 'dist/index.d.ts',
      files: ['dist', 'src'],
      scripts: { build: 'tsc' },
      dependencies: nodeDependencies(config),
      devDependencies: {
        '@types/google-protobuf': '^3.15.12',
        typescript: '^5.0.0',
      },
      engines: { node: `>=${config.versions.runtime}.0.0` },
    };
    return [
      { path: 'package.json', content: toJson(manifest) },
      { path: 'tsconfig.json', content: toJson(PACKAGE_TSCONFIG) },
      { path: 'README.md', content: nodeReadme('Protos TypeScript Package', config) },
    ];
  },

  buildCommands(): ToolCall[] {
    return [
      { tool: 'npm', args: ['install'] },
      { tool: 'npm', args: ['run', 'build'] },
      { tool: 'npm', args: ['pack', '--pack-destination', 'dist'] },
    ];
  },

  isArtifact(fileName) {
    return fileName.endsWith('.tgz');
  },

  matchesVersion(fileName, version) {
    return fileName === `${PACKAGE_NAME}-${version}.tgz`;
  },
};
