import chalk from 'chalk';

const plain = new chalk.Instance({ level: 0 });

/**
 * Renders a single-line pattern with a caret under `offset`. Line breaks
 * inside the pattern are shown escaped so the caret stays aligned.
 */
export function highlightSnippet(pattern: string, offset?: number, useColor = true): string {
  const paint = useColor ? chalk : plain;
  const shown = pattern.replace(/\r/g, '\\r').replace(/\n/g, '\\n');
  const prefix = '  | ';
  const lines = [prefix + paint.redBright(shown)];

  if (offset !== undefined && offset >= 0 && offset <= pattern.length) {
    const column = pattern.slice(0, offset).replace(/\r/g, '\\r').replace(/\n/g, '\\n').length;
    lines.push(prefix + paint.yellow(' '.repeat(column) + '^'));
  }
  return lines.join('\n');
}
