import * as colors from 'colorette';
import { CatalogueError, isTranspileError, type TranspileError } from '../transpiler/errors';
import { highlightSnippet } from './highlight';

function transpileHeader(error: TranspileError): string {
  let where = error.language ? ` in ${error.language}` : '';
  if (error.state) where += ` [${error.state}]`;
  return `${error.kind}${where}: ${error.message}`;
}

/** Like `TranspileError#toString`, with the snippet colored when `useColor` is set. */
export function formatTranspileError(error: TranspileError, useColor = true): string {
  const header = useColor ? colors.bold(transpileHeader(error)) : transpileHeader(error);
  if (error.pattern === undefined) return header;
  return `${header}\n\n${highlightSnippet(error.pattern, error.offset, useColor)}`;
}

export function formatError(error: unknown, useColor = true): string {
  if (isTranspileError(error)) return formatTranspileError(error, useColor);
  if (error instanceof CatalogueError) return error.message;
  if (error instanceof Error) return error.toString();
  return String(error);
}
