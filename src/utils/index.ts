export { formatError, formatTranspileError } from './format';
export { highlightSnippet } from './highlight';
export { errorMessage, isObject, isStringList } from './json';
export type { JsonObject } from './json';
export { createLogger, silentLogger } from './log';
export type { Logger, LoggerOptions } from './log';
