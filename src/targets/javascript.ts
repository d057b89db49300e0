import { RenderedFile, UnitKind } from '../domain/generated-unit';
import { GENERATED_HEADER, LanguageTarget, ToolCall } from './target';
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

const PACKAGE_NAME = 'protos-javascript';
const PACKAGE_VERSION = '0.1.0';

/** pbjs writes a single static module for every proto file. */
const BUNDLE = 'protobuf';

export const javascriptTarget: LanguageTarget = {
  language: 'javascript',
  identity: { name: PACKAGE_NAME, version: PACKAGE_VERSION },
  sourceDirName: 'src',
  manifestFile: 'package.json',
  builder: 'npm',
  formatExtensions: ['.ts', '.js'],

  container(config) {
    return nodeContainer('javascript', config);
  },

  generationCommands(context): ToolCall[] {
    const bundle = `${context.outputDir}/${BUNDLE}`;
    return [
      {
        tool: 'npx',
        args: ['pbjs', '--target', 'static-module', '--wrap', 'commonjs', '--out', `${bundle}.js`, ...context.protoFiles],
      },
      { tool: 'npx', args: ['pbts', '--out', `${bundle}.d.ts`, `${bundle}.js`] },
      ...stubCommands(context, 'commonjs+dts'),
    ];
  },

  classify(relativePath): UnitKind | null {
    if (relativePath === `${BUNDLE}.js`) return 'message';
    const stub = classifyNodeStub(relativePath);
    if (stub !== undefined) return stub;
    return 'support';
  },

  modulePath: nodeModulePath,

  renderEntryFiles(exports): RenderedFile[] {
    const lines = [`// ${GENERATED_HEADER}`, "'use strict';", '', 'module.exports = {'];
    for (const entry of exports) {
      const specifier = `./${entry.modulePath}`;
      if (entry.kind === 'message-module' && !entry.qualified) {
        lines.push(`  ...require('${specifier}'),`);
      } else {
        lines.push(`  ${entry.symbol}: require('${specifier}'),`);
      }
    }
    lines.push('};', '');
    return [
      { path: 'index.js', content: lines.join('\n') },
      { path: 'index.d.ts', content: renderEsExports(exports) },
    ];
  },

  formatCommands(files) {
    return prettierCommands(files);
  },

  manifestFiles(config): RenderedFile[] {
    const manifest = {
      name: PACKAGE_NAME,
      version: PACKAGE_VERSION,
      description: 'JavaScript client library generated from protobuf definitions',
      main: 'src/index.js',
      types: 'src/index.d.ts',
      files: ['src'],
      dependencies: nodeDependencies(config),
      engines: { node: `>=${config.versions.runtime}.0.0` },
    };
    return [
      { path: 'package.json', content: toJson(manifest) },
      { path: 'README.md', content: nodeReadme('Protos JavaScript Package', config) },
    ];
  },

  buildCommands(): ToolCall[] {
    return [{ tool: 'npm', args: ['pack', '--pack-destination', 'dist'] }];
  },

  isArtifact(fileName) {
    return fileName.endsWith('.tgz');
  },

  matchesVersion(fileName, version) {
    return fileName === `${PACKAGE_NAME}-${version}.tgz`;
  },
};
