import { GraphLexer, LexerError, type GraphToken } from '../lexer/index';
import { TranspileError } from './errors';
import { DEFAULT_EXPANSION_LIMIT, DEFAULT_MAX_CANDIDATES } from './sample';
import { ROOT_STATE, type LanguageDefinition, type Rule, type SubLexerRef } from './types';

export const DEFAULT_MAX_DEPTH = 64;

export interface TranslationLimits {
  /** Upper bound on nested state translations, includes and cycles counted alike. */
  maxDepth: number;
  maxCandidates: number;
  expansionLimit: number;
}

export const DEFAULT_LIMITS: TranslationLimits = {
  maxDepth: DEFAULT_MAX_DEPTH,
  maxCandidates: DEFAULT_MAX_CANDIDATES,
  expansionLimit: DEFAULT_EXPANSION_LIMIT,
};

export type LanguageLookup = (name: string) => LanguageDefinition | undefined;

/**
 * Everything a single language translation needs to see: the active grammar,
 * other catalogue entries for `using` references, and the limits in force.
 * Sub-lexers are compiled once per context and reused.
 */
export class TranslationContext {
  readonly language: LanguageDefinition;
  readonly limits: TranslationLimits;
  private readonly lookup: LanguageLookup;
  private readonly lexers = new Map<string, GraphLexer>();

  constructor(language: LanguageDefinition, limits: Partial<TranslationLimits> = {}, lookup: LanguageLookup = () => undefined) {
    this.language = language;
    this.limits = {
      maxDepth: limits.maxDepth ?? DEFAULT_LIMITS.maxDepth,
      maxCandidates: limits.maxCandidates ?? DEFAULT_LIMITS.maxCandidates,
      expansionLimit: limits.expansionLimit ?? DEFAULT_LIMITS.expansionLimit,
    };
    this.lookup = lookup;
  }

  rulesOf(state: string): readonly Rule[] {
    const rules = this.language.graph.get(state);
    if (rules === undefined) {
      throw new TranspileError('UnknownState', `state '${state}' is not defined`, { state });
    }
    return rules;
  }

  private resolveLanguage(ref: SubLexerRef): LanguageDefinition {
    if (ref.lexer === 'this') return this.language;
    const language = this.lookup(ref.lexer);
    if (language === undefined) {
      throw new TranspileError('UnsupportedTokenSpec', `no lexer named '${ref.lexer}' is available`);
    }
    return language;
  }

  /** Runs the referenced sub-lexer over `text`. */
  invoke(ref: SubLexerRef, text: string): Iterable<GraphToken> {
    const language = this.resolveLanguage(ref);
    const state = ref.state ?? ROOT_STATE;
    if (!language.graph.has(state)) {
      throw new TranspileError('UnknownState', `lexer '${language.name}' has no state '${state}'`, { state });
    }

    const key = `${language.name}\u0000${state}`;
    let lexer = this.lexers.get(key);
    if (lexer === undefined) {
      try {
        lexer = new GraphLexer(language, state);
      } catch (error: unknown) {
        if (error instanceof LexerError) {
          throw new TranspileError('MalformedGroupSample', `sub-lexer '${language.name}' cannot run: ${error.message}`);
        }
        throw error;
      }
      this.lexers.set(key, lexer);
    }
    return lexer.tokenize(text);
  }
}
