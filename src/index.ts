export * from './transpiler/index';
export { GraphLexer, LexerError, withoutCaptures } from './lexer/index';
export type { GraphToken } from './lexer/index';
export { parseRegex } from './grammar/regex';
export type { ParsedRegex, RegexNode } from './grammar/regex';
export {
  LEXER_FILE_PATTERN,
  discoverFiles,
  loadLanguageFile,
  parseLanguage,
  parseRule,
  parseTokenSpec,
} from './catalogue/loader';
export { LanguageRegistry } from './catalogue/registry';
export type { LoadFailure } from './catalogue/registry';
export { LANG_MAP_FILE, addToLangMap, extensionOf, renderLangMap, writeLangMap } from './catalogue/lang-map';
export type { LangMap } from './catalogue/lang-map';
export * from './style/index';
export { LOGICAL_COLORS, makeColorTranslators, makePalette, rgbTo256 } from './style/palette';
export type { ColorTranslators, Palette, Rgb } from './style/palette';
export { CONFIG_FILE, ConfigError, DEFAULT_CONFIG, loadConfig, resolveConfig, validateConfig } from './config';
export type { TranspileConfig } from './config';
export { generateLanguages, generateStyles, loadStyles } from './generate';
export type { GenerateOptions, GenerationFailure, GenerationReport } from './generate';
export { createLogger, formatError, formatTranspileError, highlightSnippet, silentLogger } from './utils/index';
export type { Logger, LoggerOptions } from './utils/index';
