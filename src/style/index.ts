import fs from 'node:fs/promises';
import path from 'node:path';
import { CatalogueError } from '../transpiler/errors';
import { tokenRuleName } from '../transpiler/regex-dialect';
import { errorMessage, isObject } from '../utils/json';
import {
  hexToRgb,
  makeColorTranslators,
  makePalette,
  normalizeHex,
  type ColorTranslators,
} from './palette';

export const STYLE_FILE_PATTERN = '**/*.style.json';
export const OUTLANG_MAP_FILE = 'outlang.map';

export class StyleError extends Error {
  constructor(message: string, public readonly style?: string, public readonly token?: string) {
    super(message);
    this.name = 'StyleError';
  }

  toString(): string {
    const where = [this.style, this.token].filter((part) => part !== undefined).join(' ');
    return `${this.name}${where ? ` in ${where}` : ''}: ${this.message}`;
  }
}

export interface StyleDefinition {
  name: string;
  /** Token type → space-separated style words; empty means inherit. */
  styles: ReadonlyMap<string, string>;
  sourceFile?: string;
}

const MODIFIER_TRANSLATIONS: ReadonlyMap<string, string> = new Map([
  ['bold', 'b'],
  ['italic', 'i'],
  ['underline', 'u'],
]);

const IGNORED_WORDS = new Set(['noinherit', 'nobold', 'noitalic', 'nounderline']);

export function parseStyle(raw: unknown, file: string): StyleDefinition {
  const problems: string[] = [];
  if (!isObject(raw)) {
    throw new CatalogueError(file, ['document must be a JSON object']);
  }
  const { name, styles } = raw;
  if (typeof name !== 'string' || name.trim() === '') problems.push('/name must be a non-empty string');

  const entries = new Map<string, string>();
  if (!isObject(styles)) {
    problems.push('/styles must be an object of token type to style string');
  } else {
    for (const [token, value] of Object.entries(styles)) {
      if (typeof value === 'string') entries.set(token, value);
      else problems.push(`/styles/${token} must be a string`);
    }
  }

  if (problems.length > 0 || typeof name !== 'string') throw new CatalogueError(file, problems);
  return { name, styles: entries, sourceFile: file };
}

export async function loadStyleFile(file: string): Promise<StyleDefinition> {
  const text = await fs.readFile(file, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error: unknown) {
    throw new CatalogueError(file, [`invalid JSON: ${errorMessage(error)}`]);
  }
  return parseStyle(raw, file);
}

function parentToken(token: string): string | undefined {
  const dot = token.lastIndexOf('.');
  return dot === -1 ? undefined : token.slice(0, dot);
}

/** Resolves an empty (inheriting) value through the token's ancestors. */
export function findTokenColor(styles: ReadonlyMap<string, string>, token: string, fallback: string): string {
  let current: string | undefined = token;
  let color = styles.get(token) ?? fallback;
  while (color === '') {
    current = current === undefined ? undefined : parentToken(current);
    color = current === undefined ? fallback : styles.get(current) ?? fallback;
  }
  return color;
}

function logicalName(hex: string, translators: ColorTranslators): string | undefined {
  const exact = translators.hexesToNames.get(hex);
  if (exact !== undefined) return exact;

  const [r, g, b] = hexToRgb(hex);
  let best: string | undefined;
  let bestDistance = Infinity;
  for (const [name, candidate] of translators.namesToHexes) {
    const [cr, cg, cb] = hexToRgb(candidate);
    const d = (r - cr) ** 2 + (g - cg) ** 2 + (b - cb) ** 2;
    if (d < bestDistance) {
      best = name;
      bestDistance = d;
    }
  }
  return best;
}

/** Translates one style value into destination color words. */
export function translateColor(value: string, translators: ColorTranslators): string {
  const translated: string[] = [];
  const modifiers: string[] = [];

  const colorName = (text: string): string => {
    const hex = normalizeHex(text);
    const name = hex === undefined ? undefined : logicalName(hex, translators);
    if (name === undefined) throw new StyleError(`could not translate color '${text}' in '${value}'`);
    return name;
  };

  for (const word of value.split(/\s+/).filter((w) => w !== '')) {
    const modifier = MODIFIER_TRANSLATIONS.get(word);
    if (word.startsWith('#')) {
      translated.push(colorName(word));
    } else if (word.startsWith('bg:#')) {
      translated.push(`bg:${colorName(word.slice(3))}`);
    } else if (modifier !== undefined) {
      modifiers.push(modifier);
    } else if (!IGNORED_WORDS.has(word) && !word.startsWith('border:')) {
      throw new StyleError(`could not translate style word '${word}' in '${value}'`);
    }
  }

  if (modifiers.length > 0) translated.push(modifiers.join(', '));
  return translated.join(' ');
}

/** Orders dotted token names segment by segment, parents before children. */
export function compareTokens(a: string, b: string): number {
  const left = a.split('.');
  const right = b.split('.');
  for (let i = 0; i < Math.min(left.length, right.length); i++) {
    if (left[i] !== right[i]) return left[i] < right[i] ? -1 : 1;
  }
  return left.length - right.length;
}

export interface CompiledStyle {
  style: StyleDefinition;
  translators: ColorTranslators;
  /** `.style` file contents. */
  sheet: string;
  /** `_esc256.outlang` file contents. */
  outlang: string;
}

export function styleFileName(name: string): string {
  return `${name.toLowerCase()}.style`;
}

export function outlangFileName(name: string): string {
  return `${name.toLowerCase()}_esc256.outlang`;
}

export function renderStyleSheet(style: StyleDefinition, translators: ColorTranslators): string {
  const hexes = [...translators.hexesToNames.keys()].sort();
  const foreground = `#${hexes[hexes.length - 1]}`;

  const lines = [...style.styles.keys()].sort(compareTokens).map((token) => {
    const color = findTokenColor(style.styles, token, foreground);
    try {
      return `${tokenRuleName(token)} ${translateColor(color, translators)};`;
    } catch (error: unknown) {
      if (error instanceof StyleError) throw new StyleError(error.message, style.name, token);
      throw error;
    }
  });
  return lines.join('\n') + '\n';
}

export function renderEsc256Outlang(style: StyleDefinition, translators: ColorTranslators): string {
  const colors = [...translators.namesToShort.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, index]) => `"${name}" "${index}"`);
  return [
    `# style map for ${style.name}`,
    'extension "txt"',
    '',
    'styletemplate "\\x1b[$stylem$text\\x1b[m"',
    'color "00;38;05;$style"',
    '',
    'colormap',
    ...colors,
    'default "255"',
    'end',
    '',
  ].join('\n');
}

export function compileStyle(style: StyleDefinition): CompiledStyle {
  const translators = makeColorTranslators(makePalette(style.styles.values()));
  if (translators.hexesToNames.size === 0) {
    throw new StyleError('style mentions no colors', style.name);
  }
  return {
    style,
    translators,
    sheet: renderStyleSheet(style, translators),
    outlang: renderEsc256Outlang(style, translators),
  };
}

/** `outlang.map` key for a style: its outlang file name without the extension. */
export function outlangKey(name: string): string {
  return path.basename(outlangFileName(name), '.outlang');
}
