import path from 'node:path';
import { compileGrammarFromFile, type CompiledGrammar } from './index';

export type ClassName = 'd' | 'w' | 's' | 'D' | 'W' | 'S' | 'any';

export type ClassItem =
  | { type: 'range'; from: string; to: string }
  | { type: 'class'; name: ClassName };

export type RegexNode =
  | { type: 'alt'; options: RegexNode[] }
  | { type: 'seq'; items: RegexNode[] }
  | { type: 'char'; value: string }
  | { type: 'set'; negated: boolean; items: ClassItem[] }
  | { type: 'group'; capture: boolean; name?: string; index?: number; body: RegexNode }
  | { type: 'look'; body: RegexNode }
  | { type: 'anchor' }
  | { type: 'repeat'; body: RegexNode; min: number; max: number | null }
  | { type: 'backref'; ref: number | string };

export interface ParsedRegex {
  root: RegexNode;
  groupCount: number;
  /** Named group → capture index. */
  names: Map<string, number>;
}

const GRAMMAR_PATH = path.join(__dirname, 'regex.peg');

let compiled: CompiledGrammar<RegexNode> | undefined;

function regexGrammar(): CompiledGrammar<RegexNode> {
  compiled ??= compileGrammarFromFile<RegexNode>(GRAMMAR_PATH);
  return compiled;
}

/** Numbers capturing groups left to right by their opening parenthesis. */
function numberGroups(node: RegexNode, state: { next: number; names: Map<string, number> }): void {
  switch (node.type) {
    case 'alt':
      node.options.forEach((option) => numberGroups(option, state));
      break;
    case 'seq':
      node.items.forEach((item) => numberGroups(item, state));
      break;
    case 'group':
      if (node.capture) {
        node.index = state.next++;
        if (node.name) state.names.set(node.name, node.index);
      }
      numberGroups(node.body, state);
      break;
    case 'look':
    case 'repeat':
      numberGroups(node.body, state);
      break;
    default:
      break;
  }
}

/** Throws the generated parser's syntax error when the pattern is outside the supported subset. */
export function parseRegex(pattern: string): ParsedRegex {
  const root = regexGrammar().parse(pattern);
  const state = { next: 1, names: new Map<string, number>() };
  numberGroups(root, state);
  return { root, groupCount: state.next - 1, names: state.names };
}
