import type { TranslationContext } from './context';
import { TranspileError } from './errors';
import { topLevelGroups, translatePattern } from './regex-dialect';
import { longestSample } from './sample';
import type { Binding, SubLexerRef, TokenSpec, TokenType } from './types';

// A popping rule on this pattern only marks the end of the line.
const LINE_END_PATTERN = '\\n';

// Suffixes that make a rule run to the end of the line.
const LINE_RUNNING_SUFFIXES: readonly string[] = ['\\n', '.*'];

function firstOf<T>(items: Iterable<T>): T | undefined {
  for (const item of items) return item;
  return undefined;
}

function lineStartBinding(pattern: string, token: TokenType): Binding | null | undefined {
  const suffix = LINE_RUNNING_SUFFIXES.find((s) => pattern.endsWith(s));
  if (suffix === undefined) return undefined;
  let prefix = pattern.slice(0, pattern.length - suffix.length);
  if (prefix.endsWith('.*')) prefix = prefix.slice(0, -2);
  if (prefix === '' || prefix === '^') return null;
  return { kind: 'start', token, prefix: translatePattern(prefix) };
}

/**
 * Finds the token a sub-lexer assigns to what `group` matches: the longest
 * generated sample is matched against the group and the matched text is lexed.
 */
export function resolveDynamicToken(group: string, ref: SubLexerRef, ctx: TranslationContext): TokenType {
  const sample = longestSample(group, ctx.limits.maxCandidates, ctx.limits.expansionLimit);

  let matcher: RegExp;
  try {
    matcher = new RegExp(group, 'y');
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TranspileError('MalformedGroupSample', `group cannot be compiled: ${reason}`, { pattern: group });
  }

  const match = matcher.exec(sample);
  if (match === null) {
    throw new TranspileError('MalformedGroupSample', `generated sample '${sample}' does not match its group`, {
      pattern: group,
    });
  }

  const token = firstOf(ctx.invoke(ref, match[0]));
  if (token === undefined) {
    throw new TranspileError('MalformedGroupSample', `sub-lexer produced no token for '${match[0]}'`, {
      pattern: group,
    });
  }
  return token.type;
}

function resolveGroups(pattern: string, items: TokenSpec[], ctx: TranslationContext): Binding {
  const translated = translatePattern(pattern);
  const groups = topLevelGroups(translated);
  if (groups.length !== items.length) {
    throw new TranspileError(
      'GroupCountMismatch',
      `pattern has ${groups.length} top-level group(s) but ${items.length} token(s) are bound`,
      { pattern: translated }
    );
  }

  const tokens = items.map((item, index): TokenType => {
    switch (item.kind) {
      case 'literal':
        return item.token;
      case 'dynamic':
        return resolveDynamicToken(groups[index], item.ref, ctx);
      case 'compound':
        throw new TranspileError('UnsupportedTokenSpec', `group ${index + 1} binds a nested group list`, {
          pattern: translated,
        });
    }
  });

  return { kind: 'groups', tokens, pattern: translated };
}

/**
 * Decides the destination binding for one `(pattern, token)` pair.
 * Returns null when the rule has nothing left to say and its line is dropped.
 */
export function resolveBinding(
  pattern: string,
  spec: TokenSpec,
  ctx: TranslationContext,
  pops: boolean = false
): Binding | null {
  switch (spec.kind) {
    case 'literal': {
      if (pops && pattern === LINE_END_PATTERN) {
        return { kind: 'eol', token: spec.token };
      }
      const start = lineStartBinding(pattern, spec.token);
      if (start !== undefined) return start;
      return { kind: 'match', token: spec.token, pattern: translatePattern(pattern) };
    }
    case 'compound':
      return resolveGroups(pattern, spec.items, ctx);
    case 'dynamic':
      throw new TranspileError('UnsupportedTokenSpec', 'a sub-lexer can only be bound to a group', { pattern });
  }
}
