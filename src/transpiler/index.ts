import { TranslationContext, type LanguageLookup, type TranslationLimits } from './context';
import { isTranspileError } from './errors';
import { languageFileName, renderLanguage } from './render';
import { StateWalker } from './walker';
import type { LanguageDefinition, OutputLine } from './types';

export interface TranslatedLanguage {
  language: LanguageDefinition;
  fileName: string;
  lines: OutputLine[];
  source: string;
}

/** Translates one language from its root state. Errors come back tagged with the language name. */
export function translateLanguage(
  language: LanguageDefinition,
  limits: Partial<TranslationLimits> = {},
  lookup?: LanguageLookup
): OutputLine[] {
  const ctx = new TranslationContext(language, limits, lookup);
  try {
    return new StateWalker(ctx).walk();
  } catch (error: unknown) {
    if (isTranspileError(error)) error.withContext({ language: language.name });
    throw error;
  }
}

export function transpileLanguage(
  language: LanguageDefinition,
  limits: Partial<TranslationLimits> = {},
  lookup?: LanguageLookup
): TranslatedLanguage {
  const lines = translateLanguage(language, limits, lookup);
  return {
    language,
    fileName: languageFileName(language.name),
    lines,
    source: renderLanguage(language.name, lines),
  };
}

export * from './context';
export * from './errors';
export * from './regex-dialect';
export * from './region';
export * from './render';
export * from './resolver';
export * from './sample';
export * from './types';
export { StateWalker } from './walker';
