import { TargetLanguage } from '../domain/language';
import { javascriptTarget } from './javascript';
import { pythonTarget } from './python';
import { LanguageTarget } from './target';
import { typescriptTarget } from './typescript';

export * from './target';

const TARGETS: Record<TargetLanguage, LanguageTarget> = {
  python: pythonTarget,
  typescript: typescriptTarget,
  javascript: javascriptTarget,
};

export function getTarget(language: TargetLanguage): LanguageTarget {
  return TARGETS[language];
}

export function allTargets(): LanguageTarget[] {
  return Object.values(TARGETS);
}

export { javascriptTarget, pythonTarget, typescriptTarget };
