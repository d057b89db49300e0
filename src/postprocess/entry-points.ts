/**
 * Entry point synthesis.
 *
 * The entry file is derived from the relocated units rather than a fixed
 * template, so every generated message or service module is reachable from
 * the package root. Output order is sorted and therefore byte-stable.
 */

import path from 'path';
import fs from 'fs-extra';
import { EntryExport, GeneratedUnit } from '../domain/generated-unit';
import { postProcessError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { LanguageTarget } from '../targets/target';

export interface EntrySynthesis {
  exports: EntryExport[];
  /** Written entry files, relative to the source root. */
  files: string[];
}

/** Turn a path segment into an identifier valid in Python and TypeScript. */
export function toIdentifier(segment: string): string {
  const cleaned = segment.replace(/[^A-Za-z0-9_]/g, '_');
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}

export function deriveEntryExports(units: GeneratedUnit[], target: LanguageTarget): EntryExport[] {
  const modules = new Map<string, 'message-module' | 'service-module'>();
  for (const unit of units) {
    if (unit.kind !== 'message' && unit.kind !== 'service') continue;
    const modulePath = target.modulePath(unit.relativePath);
    if (!modules.has(modulePath)) {
      modules.set(modulePath, unit.kind === 'service' ? 'service-module' : 'message-module');
    }
  }

  const modulePaths = [...modules.keys()].sort();
  const baseNames = new Map<string, number>();
  for (const modulePath of modulePaths) {
    const base = toIdentifier(path.posix.basename(modulePath));
    baseNames.set(base, (baseNames.get(base) ?? 0) + 1);
  }

  const used = new Set<string>();
  return modulePaths.map((modulePath): EntryExport => {
    const base = toIdentifier(path.posix.basename(modulePath));
    let qualified = (baseNames.get(base) ?? 0) > 1;
    let symbol = qualified ? modulePath.split('/').map(toIdentifier).join('_') : base;

    if (used.has(symbol)) {
      let suffix = 2;
      while (used.has(`${symbol}_${suffix}`)) suffix++;
      symbol = `${symbol}_${suffix}`;
      qualified = true;
    }
    used.add(symbol);

    const kind = modules.get(modulePath) ?? 'message-module';
    return { kind, modulePath, symbol, qualified };
  });
}

/**
 * Mark flattened message modules as qualified when another flattened module
 * exports one of the same names. Needs the target's exportedNames hook.
 */
export async function qualifyClashingExports(
  exports: EntryExport[],
  units: GeneratedUnit[],
  target: LanguageTarget,
): Promise<{ exports: EntryExport[]; clashes: string[] }> {
  if (!target.exportedNames) return { exports, clashes: [] };

  const owners = new Map<string, Set<string>>();
  for (const entry of exports) {
    if (entry.kind !== 'message-module' || entry.qualified) continue;
    for (const unit of units) {
      if (unit.kind !== 'message' || target.modulePath(unit.relativePath) !== entry.modulePath) continue;
      for (const name of target.exportedNames(await fs.readFile(unit.absolutePath, 'utf-8'))) {
        const modules = owners.get(name) ?? new Set<string>();
        modules.add(entry.modulePath);
        owners.set(name, modules);
      }
    }
  }

  const clashes: string[] = [];
  const clashing = new Set<string>();
  for (const [name, modules] of owners) {
    if (modules.size < 2) continue;
    clashes.push(name);
    modules.forEach((modulePath) => clashing.add(modulePath));
  }

  return {
    exports: exports.map((entry) => (clashing.has(entry.modulePath) ? { ...entry, qualified: true } : entry)),
    clashes: clashes.sort(),
  };
}

/** Derive the exports and write the target's entry files into the source root. */
export async function synthesizeEntryPoints(
  sourceRoot: string,
  units: GeneratedUnit[],
  target: LanguageTarget,
  logger: Logger = rootLogger,
): Promise<EntrySynthesis> {
  const derived = deriveEntryExports(units, target);
  if (derived.length === 0) {
    throw postProcessError('NO_EXPORTS', 'No message or service modules to export', {
      units: units.map((unit) => unit.relativePath),
    });
  }

  const { exports, clashes } = await qualifyClashingExports(derived, units, target);
  if (clashes.length > 0) {
    logger.warn('Namespaced message modules with clashing exports', {
      names: clashes,
      modules: exports.filter((entry, i) => entry.qualified && !derived[i].qualified).map((entry) => entry.symbol),
    });
  }

  const files: string[] = [];
  for (const file of target.renderEntryFiles(exports)) {
    await fs.outputFile(path.join(sourceRoot, ...file.path.split('/')), file.content);
    files.push(file.path);
  }

  logger.info('Synthesized entry points', {
    files,
    modules: exports.length,
    services: exports.filter((entry) => entry.kind === 'service-module').length,
  });
  return { exports, files };
}
