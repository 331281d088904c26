// Core data model shared by the catalogue loader, the transpiler and the sub-lexer runtime.

/** Token type in dotted form, e.g. `Token.Name.Function`. */
export type TokenType = string;

/** Names a lexer to run over a sample: the active language (`this`) or another catalogue entry. */
export interface SubLexerRef {
  lexer: 'this' | string;
  state?: string;
}

export type TokenSpec =
  | { kind: 'literal'; token: TokenType }
  | { kind: 'compound'; items: TokenSpec[] }
  | { kind: 'dynamic'; ref: SubLexerRef };

export type Rule =
  | { kind: 'literal'; pattern: string; token: TokenSpec }
  | { kind: 'nested'; pattern: string; token: TokenSpec; target: string }
  | { kind: 'include'; target: string }
  | { kind: 'push'; pattern: string; token: TokenSpec }
  | { kind: 'pop'; pattern: string; token: TokenSpec; count: number };

export type RuleKind = Rule['kind'];

/** Rules that consume input; everything but `include`. */
export type MatchingRule = Exclude<Rule, { kind: 'include' }>;

/** State name → ordered rule list. Read-only once loaded. */
export type LexerGraph = ReadonlyMap<string, readonly Rule[]>;

export interface LanguageDefinition {
  name: string;
  aliases: readonly string[];
  filenames: readonly string[];
  aliasFilenames: readonly string[];
  graph: LexerGraph;
  sourceFile?: string;
}

// --- Destination DSL ---

export type Binding =
  | { kind: 'match'; token: TokenType; pattern: string }
  | { kind: 'eol'; token: TokenType }
  | { kind: 'start'; token: TokenType; prefix: string }
  | { kind: 'groups'; tokens: TokenType[]; pattern: string }
  | { kind: 'delim'; token: TokenType; enter: string; exit: string; multiline: boolean };

export type OutputLine =
  | { kind: 'comment'; depth: number; text: string }
  | { kind: 'rule'; depth: number; binding: Binding }
  | { kind: 'exit'; depth: number; binding: Binding; count: number }
  | { kind: 'open'; depth: number; binding: Binding }
  | { kind: 'close'; depth: number };

export const ROOT_STATE = 'root';
export const TEXT_TOKEN: TokenType = 'Token.Text';
export const ERROR_TOKEN: TokenType = 'Token.Error';

export function literal(token: TokenType): TokenSpec {
  return { kind: 'literal', token };
}
