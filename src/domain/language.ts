/** Languages a pipeline can package for. */
export const TARGET_LANGUAGES = ['python', 'typescript', 'javascript'] as const;

export type TargetLanguage = (typeof TARGET_LANGUAGES)[number];

export function isTargetLanguage(value: string): value is TargetLanguage {
  return TARGET_LANGUAGES.some((language) => language === value);
}
