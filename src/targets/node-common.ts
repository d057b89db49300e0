/**
 * Pieces shared by the TypeScript and JavaScript targets.
 */

import { BuildConfig } from '../config/build-config';
import { EntryExport, UnitKind } from '../domain/generated-unit';
import { ContainerSpec } from '../toolchain/container';
import { GENERATED_HEADER, GenerationContext, PROTOC_INCLUDE, ToolCall, renderReadme, stripExtension } from './target';

export const NODE_EXTENSIONS = ['.d.ts', '.ts', '.js'] as const;

export function nodeContainer(language: 'typescript' | 'javascript', config: BuildConfig): ContainerSpec {
  return {
    service: `${language}-builder`,
    profile: language,
    image: `protobuf-${language}-builder`,
    dockerfile: 'containers/typescript/Dockerfile',
    buildArgs: {
      NODE_VERSION: config.versions.runtime,
      GRPC_VERSION: config.versions.grpc,
      PROTOC_VERSION: config.versions.protoc,
      GENERATE_GRPC: String(config.features.grpc),
      GENERATE_GRPC_WEB: String(config.features.grpcWeb),
    },
  };
}

/** `typescript` emits .ts clients for tsc; `commonjs+dts` emits .js with declarations. */
export type GrpcWebImportStyle = 'typescript' | 'commonjs+dts';

/** grpc_tools_node_protoc calls for the optional stub kinds. */
export function stubCommands(context: GenerationContext, webStyle: GrpcWebImportStyle): ToolCall[] {
  const out = context.outputDir;
  const common = [
    `--proto_path=${context.sourceDir}`,
    `--proto_path=${PROTOC_INCLUDE}`,
    `--js_out=import_style=commonjs,binary:${out}`,
  ];
  const calls: ToolCall[] = [];
  if (context.config.features.grpc) {
    calls.push({
      tool: 'npx',
      args: ['grpc_tools_node_protoc', ...common, `--grpc_out=grpc_js:${out}`, ...context.protoFiles],
    });
  }
  if (context.config.features.grpcWeb) {
    calls.push({
      tool: 'npx',
      args: [
        'grpc_tools_node_protoc',
        ...common,
        `--grpc-web_out=import_style=${webStyle},mode=grpcwebtext:${out}`,
        ...context.protoFiles,
      ],
    });
  }
  return calls;
}

/**
 * Stub and declaration files common to both Node targets. Returns undefined
 * for files the caller classifies itself.
 */
export function classifyNodeStub(relativePath: string): UnitKind | null | undefined {
  if (relativePath.endsWith('.d.ts')) return 'declaration';
  if (relativePath.endsWith('ServiceClientPb.ts')) return 'service';
  if (relativePath.endsWith('_grpc_pb.js')) return 'service';
  if (relativePath.endsWith('_grpc_web_pb.js')) return 'service';
  if (relativePath.endsWith('_pb.js')) return 'support';
  if (!relativePath.endsWith('.ts') && !relativePath.endsWith('.js')) return null;
  return undefined;
}

export function nodeModulePath(relativePath: string): string {
  return stripExtension(relativePath, NODE_EXTENSIONS);
}

/** `export` lines for an ES module or declaration entry file. */
export function renderEsExports(exports: EntryExport[]): string {
  const lines = [`// ${GENERATED_HEADER}`];
  for (const entry of exports) {
    const specifier = `./${entry.modulePath}`;
    if (entry.kind === 'message-module' && !entry.qualified) {
      lines.push(`export * from '${specifier}';`);
    } else {
      lines.push(`export * as ${entry.symbol} from '${specifier}';`);
    }
  }
  lines.push('');
  return lines.join('\n');
}

export function prettierCommands(files: string[]): ToolCall[] {
  return files.length > 0 ? [{ tool: 'npx', args: ['prettier', '--write', ...files] }] : [];
}

export function nodeDependencies(config: BuildConfig): Record<string, string> {
  const dependencies: Record<string, string> = {
    '@grpc/grpc-js': `^${config.versions.grpc}`,
    '@grpc/proto-loader': '^0.7.0',
    'google-protobuf': '^3.21.2',
    protobufjs: '^7.2.0',
  };
  if (config.features.grpcWeb) {
    // Imported by every generated gRPC-Web client.
    dependencies['grpc-web'] = '^1.5.0';
  }
  return dependencies;
}

export function nodeReadme(title: string, config: BuildConfig): string {
  return renderReadme(title, 'This package contains TypeScript/JavaScript client libraries generated from protobuf definitions.', [
    ['Protocol Buffers version', config.versions.protoc],
    ['gRPC version', config.versions.grpc],
    ['Node.js version', config.versions.runtime],
    ['gRPC generation', String(config.features.grpc)],
    ['gRPC-Web generation', String(config.features.grpcWeb)],
  ]);
}

export function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}
