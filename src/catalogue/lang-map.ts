import fs from 'node:fs/promises';
import path from 'node:path';
import type { LanguageDefinition } from '../transpiler/types';

export const LANG_MAP_FILE = 'lang.map';

/** Lookup key → `.lang` file name. */
export type LangMap = Map<string, string>;

/** Text after the last `.` of a filename glob, or the whole glob when it has none. */
export function extensionOf(glob: string): string {
  return glob.slice(glob.lastIndexOf('.') + 1);
}

function addKey(map: LangMap, key: string, fileName: string): void {
  map.set(key, fileName);
  map.set(key.toLowerCase(), fileName);
}

/** Later additions win when two languages claim the same key. */
export function addToLangMap(map: LangMap, language: LanguageDefinition, fileName: string): void {
  addKey(map, language.name, fileName);
  language.aliases.forEach((alias) => addKey(map, alias, fileName));
  [...language.filenames, ...language.aliasFilenames].forEach((glob) => addKey(map, extensionOf(glob), fileName));
}

export function renderLangMap(map: LangMap): string {
  const keys = [...map.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  return keys.map((key) => `${key} = ${map.get(key) ?? ''}`).join('\n') + '\n';
}

export async function writeLangMap(map: LangMap, outDir: string, fileName: string = LANG_MAP_FILE): Promise<string> {
  const file = path.join(outDir, fileName);
  await fs.writeFile(file, renderLangMap(map), 'utf-8');
  return file;
}
