import fs from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import { CatalogueError, TranspileError, isTranspileError } from '../transpiler/errors';
import {
  ROOT_STATE,
  TEXT_TOKEN,
  literal,
  type LanguageDefinition,
  type Rule,
  type TokenSpec,
} from '../transpiler/types';
import { errorMessage, isObject, isStringList } from '../utils/json';

export const LEXER_FILE_PATTERN = '**/*.lexer.json';

const POP_ACTION = /^#pop(?::(\d+))?$/;

function describeEntry(entry: unknown): string {
  return JSON.stringify(entry) ?? String(entry);
}

export function parseTokenSpec(raw: unknown, where: string): TokenSpec {
  if (typeof raw === 'string') return literal(raw);
  if (isObject(raw)) {
    const { bygroups, using, state } = raw;
    if (Array.isArray(bygroups)) {
      const items: unknown[] = bygroups;
      return { kind: 'compound', items: items.map((item, i) => parseTokenSpec(item, `${where}/bygroups/${i}`)) };
    }
    if (typeof using === 'string' && (state === undefined || typeof state === 'string')) {
      return { kind: 'dynamic', ref: { lexer: using, state } };
    }
  }
  throw new TranspileError('UnsupportedTokenSpec', `${where}: cannot interpret token ${describeEntry(raw)}`);
}

export function parseRule(raw: unknown, where: string): Rule {
  if (typeof raw === 'string') return { kind: 'include', target: raw };

  if (isObject(raw)) {
    if (typeof raw.include === 'string') return { kind: 'include', target: raw.include };
    if (typeof raw.default === 'string') {
      return { kind: 'nested', pattern: '', token: literal(TEXT_TOKEN), target: raw.default };
    }
  }

  const entry: unknown[] | undefined = Array.isArray(raw) ? raw : undefined;
  const pattern = entry?.[0];
  if (entry && (entry.length === 2 || entry.length === 3) && typeof pattern === 'string') {
    const token = parseTokenSpec(entry[1], `${where}/1`);
    if (entry.length === 2) return { kind: 'literal', pattern, token };

    const action = entry[2];
    if (action === '#push') return { kind: 'push', pattern, token };
    if (typeof action === 'string') {
      const pop = POP_ACTION.exec(action);
      if (pop) return { kind: 'pop', pattern, token, count: pop[1] === undefined ? 1 : parseInt(pop[1], 10) };
      if (!action.startsWith('#')) return { kind: 'nested', pattern, token, target: action };
    }
  }

  throw new TranspileError('UnrecognizedRuleShape', `${where}: cannot interpret rule ${describeEntry(raw)}`);
}

function referencedStates(rule: Rule): string[] {
  switch (rule.kind) {
    case 'include':
    case 'nested':
      return [rule.target];
    default: {
      const spec = rule.token;
      const specs = spec.kind === 'compound' ? spec.items : [spec];
      return specs.flatMap((item) =>
        item.kind === 'dynamic' && item.ref.lexer === 'this' && item.ref.state !== undefined ? [item.ref.state] : []
      );
    }
  }
}

function checkReferences(graph: ReadonlyMap<string, readonly Rule[]>): void {
  for (const [state, rules] of graph) {
    for (const rule of rules) {
      for (const target of referencedStates(rule)) {
        if (!graph.has(target)) {
          throw new TranspileError('UnknownState', `state '${state}' refers to undefined state '${target}'`, {
            state,
            pattern: 'pattern' in rule ? rule.pattern : undefined,
          });
        }
      }
    }
  }
}

/**
 * Validates a parsed `*.lexer.json` document. Field-level problems are collected
 * into one CatalogueError; rule problems surface as TranspileErrors.
 */
export function parseLanguage(raw: unknown, file: string): LanguageDefinition {
  const problems: string[] = [];
  if (!isObject(raw)) {
    throw new CatalogueError(file, ['document must be a JSON object']);
  }

  const name = typeof raw.name === 'string' && raw.name.trim() !== '' ? raw.name : undefined;
  if (name === undefined) problems.push('/name must be a non-empty string');

  const lists: Record<'aliases' | 'filenames' | 'aliasFilenames', string[]> = {
    aliases: [],
    filenames: [],
    aliasFilenames: [],
  };
  for (const key of ['aliases', 'filenames', 'aliasFilenames'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (isStringList(value)) lists[key] = value;
    else problems.push(`/${key} must be a string[]`);
  }

  const tokens = raw.tokens;
  if (!isObject(tokens)) {
    problems.push('/tokens must be an object of state name to rule list');
  } else {
    for (const [state, rules] of Object.entries(tokens)) {
      if (!Array.isArray(rules)) problems.push(`/tokens/${state} must be an array`);
    }
    if (!(ROOT_STATE in tokens)) problems.push(`/tokens must define a '${ROOT_STATE}' state`);
  }

  if (problems.length > 0 || name === undefined || !isObject(tokens)) {
    throw new CatalogueError(file, problems);
  }

  const graph = new Map<string, readonly Rule[]>();
  try {
    for (const [state, entries] of Object.entries(tokens)) {
      const list: unknown[] = Array.isArray(entries) ? entries : [];
      const rules = list.map((entry, i) => {
        try {
          return parseRule(entry, `/tokens/${state}/${i}`);
        } catch (error: unknown) {
          if (isTranspileError(error)) error.withContext({ state });
          throw error;
        }
      });
      graph.set(state, Object.freeze(rules));
    }
    checkReferences(graph);
  } catch (error: unknown) {
    if (isTranspileError(error)) error.withContext({ language: name });
    throw error;
  }

  return {
    name,
    aliases: Object.freeze(lists.aliases),
    filenames: Object.freeze(lists.filenames),
    aliasFilenames: Object.freeze(lists.aliasFilenames),
    graph,
    sourceFile: file,
  };
}

export async function loadLanguageFile(file: string): Promise<LanguageDefinition> {
  const text = await fs.readFile(file, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error: unknown) {
    throw new CatalogueError(file, [`invalid JSON: ${errorMessage(error)}`]);
  }
  return parseLanguage(raw, file);
}

/** Catalogue files under `dir`, absolute and in sorted path order. */
export async function discoverFiles(dir: string, pattern: string = LEXER_FILE_PATTERN): Promise<string[]> {
  const files = await fg(pattern, { cwd: path.resolve(dir), absolute: true, onlyFiles: true, unique: true, dot: false });
  return files.sort();
}
