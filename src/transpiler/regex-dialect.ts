import { TranspileError } from './errors';
import type { TokenType } from './types';

// Destination rules bind token names to capturing groups by position, so any
// group that does not capture has to be rewritten away or rejected.

export interface RewritePass {
  name: string;
  from: string;
  to: string;
}

// Order matters: later passes assume earlier ones already ran.
export const REWRITE_PASSES: readonly RewritePass[] = [
  { name: 'not-colon-lookahead', from: '(?!:)', to: '[^:]' },
  { name: 'optional-ellipsis', from: '(\\.\\.\\.)?', to: '(|\\.\\.\\.)' },
  { name: 'dotted-identifier', from: '((?:[$a-zA-Z_]\\w*|\\.)+)', to: '([$a-zA-Z_0-9.]+)' },
  {
    name: 'generic-identifier',
    from: '([$a-zA-Z_]\\w*(?:\\.<\\w+>)?)',
    to: '([$a-zA-Z_]\\w*|[$a-zA-Z_]\\w*\\.<\\w+>)',
  },
  {
    name: 'generic-identifier-or-star',
    from: '([$a-zA-Z_]\\w*(?:\\.<\\w+>)?|\\*)',
    to: '([$a-zA-Z_]\\w*|[$a-zA-Z_]\\w*\\.<\\w+>|\\*)',
  },
];

export const UNSUPPORTED_PREFIXES: readonly string[] = ['(?:', '(?=', '(?!', '(?<=', '(?<!'];

export function stripAnchor(pattern: string): string {
  return pattern.startsWith('^') ? pattern.slice(1) : pattern;
}

export function applyRewrite(pattern: string, pass: RewritePass): string {
  return pattern.split(pass.from).join(pass.to);
}

export function findUnsupported(pattern: string): { prefix: string; offset: number } | null {
  for (const prefix of UNSUPPORTED_PREFIXES) {
    const offset = pattern.indexOf(prefix);
    if (offset !== -1) return { prefix, offset };
  }
  return null;
}

/**
 * Rewrites one source pattern into the destination dialect.
 * Throws `UnsupportedConstruct` when a non-capturing construct survives the rewrites.
 */
export function translatePattern(pattern: string): string {
  let translated = stripAnchor(pattern);
  for (const pass of REWRITE_PASSES) {
    translated = applyRewrite(translated, pass);
  }
  const unsupported = findUnsupported(translated);
  if (unsupported) {
    throw new TranspileError(
      'UnsupportedConstruct',
      `uncaptured prefix '${unsupported.prefix}' remains after rewriting`,
      { pattern: translated, offset: unsupported.offset }
    );
  }
  return translated;
}

/**
 * Splits a pattern into its top-level parenthesized spans, in order.
 * Escaped parentheses and parentheses inside character classes do not count.
 */
export function topLevelGroups(pattern: string): string[] {
  const groups: string[] = [];
  let depth = 0;
  let start = 0;
  let inClass = false;

  for (let i = 0; i < pattern.length; i++) {
    const c = pattern[i];
    if (c === '\\') {
      i++;
      continue;
    }
    if (inClass) {
      if (c === ']') inClass = false;
      continue;
    }
    if (c === '[') {
      inClass = true;
      if (pattern[i + 1] === '^') i++;
      if (pattern[i + 1] === ']') i++;
      continue;
    }
    if (c === '(') {
      if (depth === 0) start = i;
      depth++;
    } else if (c === ')' && depth > 0) {
      depth--;
      if (depth === 0) groups.push(pattern.slice(start, i + 1));
    }
  }
  return groups;
}

export function quoteSafe(text: string): string {
  return text.replace(/'/g, '\\x27');
}

export function tokenRuleName(token: TokenType): string {
  return token.replace(/\./g, '_');
}

/** True when the pattern holds a raw line break. The `\n` escape alone does not count. */
export function spansLines(pattern: string): boolean {
  return pattern.includes('\n');
}
