import fs from 'node:fs/promises';
import path from 'node:path';
import { addToLangMap, writeLangMap, type LangMap } from './catalogue/lang-map';
import { discoverFiles } from './catalogue/loader';
import type { LanguageRegistry } from './catalogue/registry';
import {
  OUTLANG_MAP_FILE,
  STYLE_FILE_PATTERN,
  compileStyle,
  loadStyleFile,
  outlangFileName,
  outlangKey,
  styleFileName,
  StyleError,
  type CompiledStyle,
  type StyleDefinition,
} from './style/index';
import type { TranslationLimits } from './transpiler/context';
import { isTranspileError } from './transpiler/errors';
import { transpileLanguage, type TranslatedLanguage } from './transpiler/index';
import type { LanguageDefinition } from './transpiler/types';
import { formatError } from './utils/format';
import { silentLogger, type Logger } from './utils/log';

export interface GenerateOptions extends Partial<TranslationLimits> {
  outDir: string;
  failFast?: boolean;
  logger?: Logger;
  color?: boolean;
}

export interface GenerationFailure {
  name: string;
  error: Error;
}

export interface GenerationReport {
  written: string[];
  failures: GenerationFailure[];
  /** Set when a lookup table was written. */
  mapFile?: string;
}

function limitsOf(options: GenerateOptions): Partial<TranslationLimits> {
  const { maxDepth, maxCandidates, expansionLimit } = options;
  return { maxDepth, maxCandidates, expansionLimit };
}

/**
 * Translates each language in memory and writes its `.lang` file, then the
 * `lang.map` covering every language that succeeded. Translation errors are
 * logged and counted; with `failFast` the first one ends the batch.
 */
export async function generateLanguages(
  languages: readonly LanguageDefinition[],
  registry: LanguageRegistry,
  options: GenerateOptions
): Promise<GenerationReport> {
  const log = options.logger ?? silentLogger;
  const report: GenerationReport = { written: [], failures: [] };
  const langMap: LangMap = new Map();
  const limits = limitsOf(options);

  await fs.mkdir(options.outDir, { recursive: true });

  for (const language of languages) {
    log.info(`Generating lexer ${language.name}`);
    let translated: TranslatedLanguage;
    try {
      translated = transpileLanguage(language, limits, registry.lookup);
    } catch (error: unknown) {
      if (!isTranspileError(error)) throw error;
      log.error(formatError(error, options.color ?? false));
      report.failures.push({ name: language.name, error });
      if (options.failFast) break;
      continue;
    }

    const file = path.join(options.outDir, translated.fileName);
    await fs.writeFile(file, translated.source, 'utf-8');
    log.debug(`Wrote ${file} (${translated.lines.length} lines)`);
    report.written.push(file);
    addToLangMap(langMap, language, translated.fileName);
  }

  if (langMap.size > 0) {
    report.mapFile = await writeLangMap(langMap, options.outDir);
    log.debug(`Wrote ${report.mapFile}`);
  }
  return report;
}

export async function loadStyles(dir: string): Promise<{ styles: StyleDefinition[]; failures: GenerationFailure[] }> {
  const styles: StyleDefinition[] = [];
  const failures: GenerationFailure[] = [];
  for (const file of await discoverFiles(dir, STYLE_FILE_PATTERN)) {
    try {
      styles.push(await loadStyleFile(file));
    } catch (error: unknown) {
      failures.push({ name: path.basename(file), error: error instanceof Error ? error : new Error(String(error)) });
    }
  }
  return { styles, failures };
}

/** Writes `<style>.style` and `<style>_esc256.outlang` per style, then `outlang.map`. */
export async function generateStyles(
  styles: readonly StyleDefinition[],
  options: GenerateOptions
): Promise<GenerationReport> {
  const log = options.logger ?? silentLogger;
  const report: GenerationReport = { written: [], failures: [] };
  const outlangMap: LangMap = new Map();

  await fs.mkdir(options.outDir, { recursive: true });

  for (const style of styles) {
    log.info(`Generating style ${style.name}`);
    let compiled: CompiledStyle;
    try {
      compiled = compileStyle(style);
    } catch (error: unknown) {
      if (!(error instanceof StyleError)) throw error;
      log.error(formatError(error, options.color ?? false));
      report.failures.push({ name: style.name, error });
      if (options.failFast) break;
      continue;
    }

    const sheet = path.join(options.outDir, styleFileName(style.name));
    const outlang = path.join(options.outDir, outlangFileName(style.name));
    await fs.writeFile(sheet, compiled.sheet, 'utf-8');
    await fs.writeFile(outlang, compiled.outlang, 'utf-8');
    report.written.push(sheet, outlang);
    outlangMap.set(outlangKey(style.name), outlangFileName(style.name));
  }

  if (outlangMap.size > 0) {
    report.mapFile = await writeLangMap(outlangMap, options.outDir, OUTLANG_MAP_FILE);
    log.debug(`Wrote ${report.mapFile}`);
  }
  return report;
}
