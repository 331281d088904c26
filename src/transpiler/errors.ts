export type TranspileErrorKind =
  | 'UnsupportedConstruct'
  | 'UnsupportedTokenSpec'
  | 'MalformedGroupSample'
  | 'UnrecognizedRuleShape'
  | 'RecursionLimitExceeded'
  | 'UnknownState'
  | 'GroupCountMismatch';

export interface TranspileErrorContext {
  pattern?: string;
  state?: string;
  language?: string;
  /** Position inside `pattern` the error points at. */
  offset?: number;
}

/**
 * Fatal for the language being translated. Carries enough context to point at
 * the offending rule; the caller decides whether the batch continues.
 */
export class TranspileError extends Error {
  public readonly kind: TranspileErrorKind;
  public pattern?: string;
  public state?: string;
  public language?: string;
  public offset?: number;

  constructor(kind: TranspileErrorKind, message: string, context: TranspileErrorContext = {}) {
    super(message);
    this.name = 'TranspileError';
    this.kind = kind;
    this.pattern = context.pattern;
    this.state = context.state;
    this.language = context.language;
    this.offset = context.offset;
  }

  /** Fills in context the raising site did not know, without overwriting what it did. */
  withContext(context: TranspileErrorContext): this {
    this.pattern ??= context.pattern;
    this.state ??= context.state;
    this.language ??= context.language;
    return this;
  }

  toString(): string {
    let where = this.language ? ` in ${this.language}` : '';
    if (this.state) where += ` [${this.state}]`;
    let output = `${this.kind}${where}: ${this.message}`;
    if (this.pattern !== undefined) {
      output += `\n\n  | ${this.pattern}`;
      if (this.offset !== undefined) {
        output += `\n  | ${' '.repeat(this.offset)}^`;
      }
    }
    return output;
  }
}

export function isTranspileError(error: unknown): error is TranspileError {
  return error instanceof TranspileError;
}

/** A catalogue file that does not describe a usable language or style. */
export class CatalogueError extends Error {
  constructor(public readonly file: string, public readonly problems: string[]) {
    super(`Invalid catalogue file ${file}:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
    this.name = 'CatalogueError';
  }
}
