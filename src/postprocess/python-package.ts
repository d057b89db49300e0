/**
 * Python package scaffolding.
 *
 * grpc_tools.protoc emits modules that import each other as top-level
 * modules (`import helloworld_pb2 as helloworld__pb2`). Once the files live
 * under a package those imports have to name the package.
 */

import path from 'path';
import fs from 'fs-extra';
import { GeneratedUnit } from '../domain/generated-unit';

const PLAIN_IMPORT = /^import (\w+)( as \w+)?\s*$/;
const FROM_IMPORT = /^from (\w+(?:\.\w+)*) import (.+)$/;

/** Dotted module path of every unit, e.g. `api.v1.helloworld_pb2`. */
export function localModules(units: GeneratedUnit[]): Set<string> {
  const modules = new Set<string>();
  for (const unit of units) {
    modules.add(unit.relativePath.replace(/\.pyi?$/, '').split('/').join('.'));
  }
  return modules;
}

/** Names bound by the right-hand side of a from-import. */
function importedNames(clause: string): string[] {
  return clause
    .replace(/[()]/g, '')
    .split(',')
    .map((part) => part.trim().split(/\s+/)[0])
    .filter((name) => name.length > 0);
}

/**
 * Rewrite imports of generated modules so they resolve inside packageName.
 * A from-import is local when it names a generated module or imports one;
 * a vendored `google/api` tree does not make `google.protobuf` local.
 */
export function rewritePythonImports(source: string, packageName: string, modules: ReadonlySet<string>): string {
  return source
    .split('\n')
    .map((line) => {
      const plain = PLAIN_IMPORT.exec(line);
      if (plain && modules.has(plain[1])) {
        return `from ${packageName} import ${plain[1]}${plain[2] ?? ''}`;
      }
      const from = FROM_IMPORT.exec(line);
      if (from) {
        const [, parent, clause] = from;
        const local = modules.has(parent) || importedNames(clause).some((name) => modules.has(`${parent}.${name}`));
        if (local) return `from ${packageName}.${parent} import ${clause}`;
      }
      return line;
    })
    .join('\n');
}

/** Every directory between the source root and a unit, root excluded. */
function packageDirectories(units: GeneratedUnit[]): string[] {
  const dirs = new Set<string>();
  for (const unit of units) {
    const segments = unit.relativePath.split('/').slice(0, -1);
    for (let depth = 1; depth <= segments.length; depth++) {
      dirs.add(segments.slice(0, depth).join('/'));
    }
  }
  return [...dirs].sort();
}

/**
 * Add `__init__.py` files below the root and rewrite imports in every
 * relocated .py/.pyi unit. Returns the touched paths, relative to sourceRoot.
 */
export async function scaffoldPythonPackage(
  sourceRoot: string,
  units: GeneratedUnit[],
  packageName: string,
): Promise<string[]> {
  const touched: string[] = [];

  for (const dir of packageDirectories(units)) {
    const initFile = path.join(sourceRoot, ...dir.split('/'), '__init__.py');
    if (!(await fs.pathExists(initFile))) {
      await fs.outputFile(initFile, '');
      touched.push(`${dir}/__init__.py`);
    }
  }

  const modules = localModules(units);
  for (const unit of units) {
    const original = await fs.readFile(unit.absolutePath, 'utf-8');
    const rewritten = rewritePythonImports(original, packageName, modules);
    if (rewritten !== original) {
      await fs.writeFile(unit.absolutePath, rewritten);
      touched.push(unit.relativePath);
    }
  }

  return touched;
}
