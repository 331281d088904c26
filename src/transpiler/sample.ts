import { isGrammarSyntaxError } from '../grammar/index';
import { parseRegex, type ClassItem, type ClassName, type ParsedRegex, type RegexNode } from '../grammar/regex';
import { TranspileError } from './errors';

export const DEFAULT_MAX_CANDIDATES = 100;
export const DEFAULT_EXPANSION_LIMIT = 100;

// Tab, LF, VT, FF, CR and printable ASCII, in code-point order.
const ALPHABET: readonly string[] = [
  '\t', '\n', '\v', '\f', '\r',
  ...Array.from({ length: 0x7f - 0x20 }, (_, i) => String.fromCharCode(0x20 + i)),
];

// Enumeration steps allowed per requested candidate and unit of expansion width.
const STEPS_PER_CANDIDATE = 10;

// Widest explicit range a positive class contributes before it is cut off.
const MAX_RANGE_WIDTH = 256;

type Captures = ReadonlyMap<number, string>;

interface Expansion {
  text: string;
  captures: Captures;
}

function inClass(name: ClassName, c: string): boolean {
  switch (name) {
    case 'd':
      return c >= '0' && c <= '9';
    case 'w':
      return /^\w$/.test(c);
    case 's':
      return /^\s$/.test(c);
    case 'D':
      return !inClass('d', c);
    case 'W':
      return !inClass('w', c);
    case 'S':
      return !inClass('s', c);
    case 'any':
      return c !== '\n';
  }
}

function itemMatches(item: ClassItem, c: string): boolean {
  return item.type === 'class' ? inClass(item.name, c) : c >= item.from && c <= item.to;
}

function setMembers(negated: boolean, items: ClassItem[]): string[] {
  if (negated) {
    return ALPHABET.filter((c) => !items.some((item) => itemMatches(item, c)));
  }
  const members = new Set<string>();
  for (const item of items) {
    if (item.type === 'class') {
      ALPHABET.filter((c) => inClass(item.name, c)).forEach((c) => members.add(c));
      continue;
    }
    const from = item.from.charCodeAt(0);
    const to = Math.min(item.to.charCodeAt(0), from + MAX_RANGE_WIDTH - 1);
    for (let code = from; code <= to; code++) {
      members.add(String.fromCharCode(code));
    }
  }
  return [...members].sort((a, b) => a.charCodeAt(0) - b.charCodeAt(0));
}

/**
 * Lazily enumerates the strings a parsed pattern matches. Repetition is capped at
 * `limit`, so every branch of the enumeration is finite.
 */
class SampleEnumerator {
  private steps = 0;

  constructor(
    private readonly regex: ParsedRegex,
    private readonly limit: number,
    private readonly budget: number
  ) {}

  /** False once the step budget is spent; every open branch then winds down without yielding. */
  private tick(): boolean {
    return ++this.steps <= this.budget;
  }

  *expand(node: RegexNode, captures: Captures): Generator<Expansion> {
    if (!this.tick()) return;
    switch (node.type) {
      case 'char':
        yield { text: node.value, captures };
        return;
      case 'set':
        for (const c of setMembers(node.negated, node.items)) {
          yield { text: c, captures };
        }
        return;
      case 'anchor':
      case 'look':
        yield { text: '', captures };
        return;
      case 'seq':
        yield* this.sequence(node.items, 0, captures);
        return;
      case 'alt':
        for (const option of node.options) {
          yield* this.expand(option, captures);
        }
        return;
      case 'group':
        for (const inner of this.expand(node.body, captures)) {
          if (node.index === undefined) {
            yield inner;
          } else {
            const next = new Map(inner.captures);
            next.set(node.index, inner.text);
            yield { text: inner.text, captures: next };
          }
        }
        return;
      case 'backref': {
        const index = typeof node.ref === 'number' ? node.ref : this.regex.names.get(node.ref);
        yield { text: index === undefined ? '' : captures.get(index) ?? '', captures };
        return;
      }
      case 'repeat': {
        const max = node.max === null ? this.limit : Math.min(node.max, this.limit);
        for (let count = Math.min(node.min, max); count <= max; count++) {
          yield* this.sequence(new Array<RegexNode>(count).fill(node.body), 0, captures);
        }
        return;
      }
    }
  }

  private *sequence(items: RegexNode[], index: number, captures: Captures): Generator<Expansion> {
    if (!this.tick()) return;
    if (index === items.length) {
      yield { text: '', captures };
      return;
    }
    for (const head of this.expand(items[index], captures)) {
      for (const tail of this.sequence(items, index + 1, head.captures)) {
        yield { text: head.text + tail.text, captures: tail.captures };
      }
    }
  }
}

function parseForSampling(pattern: string): ParsedRegex {
  try {
    return parseRegex(pattern);
  } catch (error: unknown) {
    if (isGrammarSyntaxError(error)) {
      throw new TranspileError('MalformedGroupSample', `cannot sample pattern: ${error.message}`, {
        pattern,
        offset: error.location.start.offset,
      });
    }
    throw error;
  }
}

/** Yields at most `maxCandidates` strings matching `pattern`, in a fixed order. */
export function* generateSamples(
  pattern: string,
  maxCandidates: number = DEFAULT_MAX_CANDIDATES,
  expansionLimit: number = DEFAULT_EXPANSION_LIMIT
): Generator<string> {
  const regex = parseForSampling(pattern);
  const enumerator = new SampleEnumerator(regex, expansionLimit, maxCandidates * expansionLimit * STEPS_PER_CANDIDATE);
  let produced = 0;
  if (maxCandidates <= 0) return;
  for (const expansion of enumerator.expand(regex.root, new Map())) {
    yield expansion.text;
    if (++produced >= maxCandidates) return;
  }
}

/**
 * Longest of the generated candidates once line breaks are removed; the first
 * one wins a tie. Empty when nothing can be generated.
 */
export function longestSample(
  pattern: string,
  maxCandidates: number = DEFAULT_MAX_CANDIDATES,
  expansionLimit: number = DEFAULT_EXPANSION_LIMIT
): string {
  let longest = '';
  for (const candidate of generateSamples(pattern, maxCandidates, expansionLimit)) {
    const flat = candidate.replace(/[\r\n]/g, '');
    if (flat.length > longest.length) longest = flat;
  }
  return longest;
}
