import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { DEFAULT_LIMITS } from './transpiler/context';
import { errorMessage, isObject, isStringList } from './utils/json';

export const CONFIG_FILE = 'transpile.config.json';

export interface TranspileConfig {
  catalogueDir: string;
  outDir: string;
  /** Display names or aliases to generate; empty means every catalogue language. */
  languages: string[];
  /** Style names to generate; empty means every catalogue style. */
  styles: string[];
  maxDepth: number;
  maxCandidates: number;
  expansionLimit: number;
  failFast: boolean;
}

export const DEFAULT_CONFIG: TranspileConfig = {
  catalogueDir: './catalogue',
  outDir: './share/lang',
  languages: [],
  styles: [],
  ...DEFAULT_LIMITS,
  failFast: false,
};

export class ConfigError extends Error {
  constructor(public readonly file: string, public readonly problems: string[]) {
    super(`Invalid ${path.basename(file)}:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/** Checks each known field by type; every problem is reported, not just the first. */
export function validateConfig(raw: unknown, file: string = CONFIG_FILE): Partial<TranspileConfig> {
  if (!isObject(raw)) throw new ConfigError(file, ['configuration must be a JSON object']);

  const errors: string[] = [];
  const normalized: Partial<TranspileConfig> = {};

  if (raw.catalogueDir !== undefined) {
    if (typeof raw.catalogueDir === 'string') normalized.catalogueDir = raw.catalogueDir;
    else errors.push('catalogueDir must be a string');
  }
  if (raw.outDir !== undefined) {
    if (typeof raw.outDir === 'string') normalized.outDir = raw.outDir;
    else errors.push('outDir must be a string');
  }

  const normalizeList = (value: unknown, key: string): string[] | undefined => {
    if (value === undefined) return undefined;
    if (isStringList(value)) return value;
    if (typeof value === 'string') return [value];
    errors.push(`${key} must be a string or string[]`);
    return undefined;
  };
  const languages = normalizeList(raw.languages, 'languages');
  const styles = normalizeList(raw.styles, 'styles');
  if (languages) normalized.languages = languages;
  if (styles) normalized.styles = styles;

  const normalizeCount = (value: unknown, key: string): number | undefined => {
    if (value === undefined) return undefined;
    if (typeof value === 'number' && Number.isInteger(value) && value > 0) return value;
    errors.push(`${key} must be a positive integer`);
    return undefined;
  };
  const maxDepth = normalizeCount(raw.maxDepth, 'maxDepth');
  const maxCandidates = normalizeCount(raw.maxCandidates, 'maxCandidates');
  const expansionLimit = normalizeCount(raw.expansionLimit, 'expansionLimit');
  if (maxDepth !== undefined) normalized.maxDepth = maxDepth;
  if (maxCandidates !== undefined) normalized.maxCandidates = maxCandidates;
  if (expansionLimit !== undefined) normalized.expansionLimit = expansionLimit;

  if (raw.failFast !== undefined) {
    if (typeof raw.failFast === 'boolean') normalized.failFast = raw.failFast;
    else errors.push('failFast must be a boolean');
  }

  if (errors.length > 0) throw new ConfigError(file, errors);
  return normalized;
}

/**
 * Reads `transpile.config.json` from `cwd`, or the explicit `configPath`.
 * A missing default file is not an error; a missing explicit one is.
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): Partial<TranspileConfig> | null {
  const file = configPath ? path.resolve(cwd, configPath) : path.join(cwd, CONFIG_FILE);
  if (!existsSync(file)) {
    if (configPath) throw new ConfigError(file, ['file does not exist']);
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (error: unknown) {
    throw new ConfigError(file, [`invalid JSON: ${errorMessage(error)}`]);
  }
  return validateConfig(raw, file);
}

/** Later layers win; each layer only overrides the fields it sets. */
export function resolveConfig(...layers: Array<Partial<TranspileConfig> | null | undefined>): TranspileConfig {
  const config: TranspileConfig = { ...DEFAULT_CONFIG, languages: [], styles: [] };
  for (const layer of layers) {
    if (!layer) continue;
    Object.assign(config, Object.fromEntries(Object.entries(layer).filter(([, value]) => value !== undefined)));
  }
  return config;
}
