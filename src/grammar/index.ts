import { readFileSync } from 'node:fs';
import { generate } from 'peggy';
import type { ParserBuildOptions, LocationRange } from 'peggy';

/**
 * Shape of the errors thrown by Peggy, both while generating a parser and
 * by the generated parser itself.
 */
export interface GrammarSyntaxError extends Error {
  location: LocationRange;
  expected?: unknown[];
  found?: string | null;
}

export function isGrammarSyntaxError(error: unknown): error is GrammarSyntaxError {
  return (
    error instanceof Error &&
    'location' in error &&
    typeof error.location === 'object' &&
    error.location !== null
  );
}

export interface CompiledGrammar<ASTNode = unknown> {
  parse: (input: string) => ASTNode;
  source: string;
  options: CompileOptions;
}

export interface CompileOptions {
  allowedStartRules?: string[];
  cache?: boolean;
  grammarSource?: string;
  trace?: boolean;
}

export function compileGrammar<ASTNode = unknown>(
  grammar: string,
  options: CompileOptions = {}
): CompiledGrammar<ASTNode> {
  const defaultOptions: CompileOptions = {
    cache: false,
    trace: false,
    ...options,
  };
  const buildOptions: ParserBuildOptions = { ...defaultOptions, output: 'parser' };

  try {
    const parser = generate(grammar, buildOptions);
    return {
      parse: (input: string): ASTNode => parser.parse(input),
      source: grammar,
      options: defaultOptions,
    };
  } catch (error: unknown) {
    const where = isGrammarSyntaxError(error)
      ? ` at ${error.location.start.line}:${error.location.start.column}`
      : '';
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Grammar compilation failed${where}: ${message}`);
  }
}

export function compileGrammarFromFile<ASTNode = unknown>(
  filePath: string,
  options: CompileOptions = {}
): CompiledGrammar<ASTNode> {
  let grammar: string;
  try {
    grammar = readFileSync(filePath, 'utf-8');
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read grammar file ${filePath}: ${message}`);
  }
  return compileGrammar<ASTNode>(grammar, { ...options, grammarSource: filePath });
}
