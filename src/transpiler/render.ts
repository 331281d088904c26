import { quoteSafe, tokenRuleName } from './regex-dialect';
import type { Binding, OutputLine } from './types';

const INDENT = '  ';

function quoted(pattern: string): string {
  return `'${quoteSafe(pattern)}'`;
}

export function renderBinding(binding: Binding): string {
  switch (binding.kind) {
    case 'match':
      return `${tokenRuleName(binding.token)} = ${quoted(binding.pattern)}`;
    case 'eol':
      return `${tokenRuleName(binding.token)} = '$'`;
    case 'start':
      return `${tokenRuleName(binding.token)} start ${quoted(binding.prefix)}`;
    case 'groups':
      return `(${binding.tokens.map(tokenRuleName).join(',')}) = \`${binding.pattern}\``;
    case 'delim': {
      const flags = binding.multiline ? 'multiline nested' : 'nested';
      return `${tokenRuleName(binding.token)} delim ${quoted(binding.enter)} ${quoted(binding.exit)} ${flags}`;
    }
  }
}

export function renderLine(line: OutputLine): string {
  const indent = INDENT.repeat(line.depth);
  switch (line.kind) {
    case 'comment':
      return `${indent}# ${line.text}`;
    case 'rule':
      return indent + renderBinding(line.binding);
    case 'exit':
      return `${indent}${renderBinding(line.binding)} exit${line.count > 1 ? ` ${line.count}` : ''}`;
    case 'open':
      return `${indent}state ${renderBinding(line.binding)} begin`;
    case 'close':
      return `${indent}end`;
  }
}

export function languageHeader(name: string): string {
  return `# autogenerated from the ${name} lexer grammar`;
}

/** Whole `.lang` file: header, one line per statement, trailing newline. */
export function renderLanguage(name: string, lines: readonly OutputLine[]): string {
  return [languageHeader(name), ...lines.map(renderLine)].join('\n') + '\n';
}

export function languageFileName(name: string): string {
  return `${name.toLowerCase().replace(/ /g, '-')}.lang`;
}
