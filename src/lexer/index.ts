import moo from 'moo';
import {
  ERROR_TOKEN,
  ROOT_STATE,
  TEXT_TOKEN,
  type LanguageDefinition,
  type MatchingRule,
  type TokenSpec,
  type TokenType,
} from '../transpiler/types';

export interface GraphToken {
  type: TokenType;
  text: string;
  offset: number;
}

export class LexerError extends Error {
  public language: string;
  public state?: string;
  public pattern?: string;

  constructor(message: string, language: string, state?: string, pattern?: string) {
    super(message);
    this.name = 'LexerError';
    this.language = language;
    this.state = state;
    this.pattern = pattern;
  }

  toString(): string {
    const location = this.state ? `${this.language}:${this.state}` : this.language;
    let output = `${this.name} at ${location}: ${this.message}`;
    if (this.pattern !== undefined) {
      output += `\n\n  | ${this.pattern}`;
    }
    return output;
  }
}

/**
 * Rewrites every capturing group as a non-capturing one. moo joins all rules of a
 * state into one alternation and rejects rules that capture.
 */
export function withoutCaptures(pattern: string): string {
  let out = '';
  let inClass = false;
  for (let i = 0; i < pattern.length; i++) {
    const c = pattern[i];
    if (c === '\\') {
      out += pattern.slice(i, i + 2);
      i++;
      continue;
    }
    if (inClass) {
      if (c === ']') inClass = false;
      out += c;
      continue;
    }
    if (c === '[') {
      inClass = true;
      out += c;
      continue;
    }
    if (c === '(') {
      const named = /^\(\?P?<[A-Za-z_]\w*>/.exec(pattern.slice(i));
      if (named) {
        out += '(?:';
        i += named[0].length - 1;
        continue;
      }
      out += pattern[i + 1] === '?' ? c : '(?:';
      continue;
    }
    out += c;
  }
  return out;
}

/**
 * Drops a leading anchor and spells named groups and their backreferences the
 * way `RegExp` reads them: `(?P<n>` as `(?<n>`, `(?P=n)` as `\k<n>`.
 */
export function hostPattern(pattern: string): string {
  const source = pattern.startsWith('^') ? pattern.slice(1) : pattern;
  let out = '';
  let inClass = false;
  for (let i = 0; i < source.length; i++) {
    const c = source[i];
    if (c === '\\') {
      out += source.slice(i, i + 2);
      i++;
      continue;
    }
    if (inClass) {
      if (c === ']') inClass = false;
      out += c;
      continue;
    }
    if (c === '[') {
      inClass = true;
    } else if (source.startsWith('(?P<', i)) {
      out += '(?<';
      i += 3;
      continue;
    } else if (source.startsWith('(?P=', i)) {
      const ref = /^\(\?P=([A-Za-z_]\w*)\)/.exec(source.slice(i));
      if (ref) {
        out += `\\k<${ref[1]}>`;
        i += ref[0].length - 1;
        continue;
      }
    }
    out += c;
  }
  return out;
}

function firstGroupToken(pattern: RegExp, items: TokenSpec[]): (text: string) => string {
  return (text: string) => {
    pattern.lastIndex = 0;
    const match = pattern.exec(text);
    if (match) {
      for (let i = 0; i < items.length; i++) {
        const item = items[i];
        if (match[i + 1] === undefined) continue;
        return item.kind === 'literal' ? item.token : TEXT_TOKEN;
      }
    }
    return TEXT_TOKEN;
  };
}

/**
 * Runs a language's lexer graph over text with moo. Zero-width rules are skipped and
 * unmatched input comes back as a single error token instead of throwing.
 */
export class GraphLexer {
  private readonly lexer: moo.Lexer;
  private readonly language: LanguageDefinition;

  constructor(language: LanguageDefinition, startState: string = ROOT_STATE) {
    this.language = language;
    if (!language.graph.has(startState)) {
      throw new LexerError(`Unknown start state '${startState}'`, language.name, startState);
    }

    const states: { [state: string]: moo.Rules } = {};
    for (const stateName of language.graph.keys()) {
      states[stateName] = this.convertState(stateName);
    }

    try {
      this.lexer = moo.states(states, startState);
    } catch (error: unknown) {
      throw new LexerError(
        `Lexer compilation failed: ${error instanceof Error ? error.message : String(error)}`,
        language.name,
        startState
      );
    }
  }

  private flatten(stateName: string, seen: Set<string>): MatchingRule[] {
    if (seen.has(stateName)) return [];
    seen.add(stateName);
    const rules: MatchingRule[] = [];
    for (const rule of this.language.graph.get(stateName) ?? []) {
      if (rule.kind === 'include') {
        rules.push(...this.flatten(rule.target, seen));
      } else {
        rules.push(rule);
      }
    }
    return rules;
  }

  private convertState(stateName: string): moo.Rules {
    const rules: moo.Rules = {};
    this.flatten(stateName, new Set()).forEach((rule, index) => {
      const mooRule = this.convertRule(rule, stateName);
      if (mooRule) rules[`rule${index}`] = mooRule;
    });
    rules[ERROR_TOKEN] = moo.error;
    return rules;
  }

  private compile(rule: MatchingRule, stateName: string, source: string, flags?: string): RegExp {
    try {
      return new RegExp(source, flags);
    } catch (error: unknown) {
      throw new LexerError(
        `Invalid pattern: ${error instanceof Error ? error.message : String(error)}`,
        this.language.name,
        stateName,
        rule.pattern
      );
    }
  }

  private convertRule(rule: MatchingRule, stateName: string): moo.Rule | null {
    const match = this.compile(rule, stateName, withoutCaptures(hostPattern(rule.pattern)));
    if (match.test('')) return null;

    const mooRule: moo.Rule = { match, lineBreaks: true, type: this.typeMapper(rule, stateName) };
    switch (rule.kind) {
      case 'nested':
        mooRule.push = rule.target;
        break;
      case 'push':
        mooRule.push = stateName;
        break;
      case 'pop':
        mooRule.pop = 1;
        break;
      case 'literal':
        break;
    }
    return mooRule;
  }

  private typeMapper(rule: MatchingRule, stateName: string): (text: string) => string {
    const spec = rule.token;
    switch (spec.kind) {
      case 'literal':
        return () => spec.token;
      case 'compound':
        return firstGroupToken(this.compile(rule, stateName, hostPattern(rule.pattern), 'y'), spec.items);
      case 'dynamic':
        return () => TEXT_TOKEN;
    }
  }

  *tokenize(input: string): Generator<GraphToken> {
    this.lexer.reset(input);
    for (let token = this.lexer.next(); token !== undefined; token = this.lexer.next()) {
      yield { type: token.type ?? ERROR_TOKEN, text: token.text, offset: token.offset };
    }
  }
}
