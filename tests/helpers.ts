import { TranspileError } from '../src/transpiler/errors';
import type { LanguageDefinition, Rule, TokenSpec } from '../src/transpiler/types';

export function makeLanguage(
  tokens: Record<string, Rule[]>,
  name = 'Test',
  extra: Partial<Omit<LanguageDefinition, 'graph' | 'name'>> = {}
): LanguageDefinition {
  return {
    name,
    aliases: [],
    filenames: [],
    aliasFilenames: [],
    ...extra,
    graph: new Map(Object.entries(tokens)),
  };
}

export const lit = (token: string): TokenSpec => ({ kind: 'literal', token });

type RuleOf<K extends Rule['kind']> = Extract<Rule, { kind: K }>;

export const rules = {
  literal: (pattern: string, token: string): RuleOf<'literal'> => ({ kind: 'literal', pattern, token: lit(token) }),
  nested: (pattern: string, token: string, target: string): RuleOf<'nested'> => ({
    kind: 'nested',
    pattern,
    token: lit(token),
    target,
  }),
  include: (target: string): RuleOf<'include'> => ({ kind: 'include', target }),
  push: (pattern: string, token: string): RuleOf<'push'> => ({ kind: 'push', pattern, token: lit(token) }),
  pop: (pattern: string, token: string, count = 1): RuleOf<'pop'> => ({ kind: 'pop', pattern, token: lit(token), count }),
  groups: (pattern: string, items: TokenSpec[]): RuleOf<'literal'> => ({
    kind: 'literal',
    pattern,
    token: { kind: 'compound', items },
  }),
};

export function captureError(fn: () => unknown): TranspileError {
  try {
    fn();
  } catch (error: unknown) {
    if (error instanceof TranspileError) return error;
    throw error;
  }
  throw new Error('expected a TranspileError to be thrown');
}

export async function captureErrorAsync(fn: () => Promise<unknown>): Promise<unknown> {
  try {
    await fn();
  } catch (error: unknown) {
    return error;
  }
  throw new Error('expected the promise to reject');
}
