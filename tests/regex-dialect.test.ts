import {
  REWRITE_PASSES,
  applyRewrite,
  findUnsupported,
  quoteSafe,
  spansLines,
  tokenRuleName,
  topLevelGroups,
  translatePattern,
} from '../src/transpiler/regex-dialect';
import { captureError } from './helpers';

describe('regex dialect rewrites', () => {
  it('runs the passes in a fixed order', () => {
    expect(REWRITE_PASSES.map((pass) => pass.name)).toEqual([
      'not-colon-lookahead',
      'optional-ellipsis',
      'dotted-identifier',
      'generic-identifier',
      'generic-identifier-or-star',
    ]);
  });

  it('replaces the not-colon lookahead with a negated class', () => {
    expect(applyRewrite('a(?!:)b', REWRITE_PASSES[0])).toBe('a[^:]b');
    expect(translatePattern('(\\w+)(?!:)')).toBe('(\\w+)[^:]');
  });

  it('turns the optional ellipsis into an alternation with an empty branch', () => {
    expect(translatePattern('(\\.\\.\\.)?(\\w+)')).toBe('(|\\.\\.\\.)(\\w+)');
  });

  it('flattens the dotted identifier group', () => {
    expect(translatePattern('(import)(\\s+)((?:[$a-zA-Z_]\\w*|\\.)+)')).toBe(
      '(import)(\\s+)([$a-zA-Z_0-9.]+)'
    );
  });

  it('spells out the generic identifier suffix', () => {
    expect(translatePattern('([$a-zA-Z_]\\w*(?:\\.<\\w+>)?)')).toBe('([$a-zA-Z_]\\w*|[$a-zA-Z_]\\w*\\.<\\w+>)');
  });

  it('spells out the generic identifier suffix with a star branch', () => {
    expect(translatePattern('([$a-zA-Z_]\\w*(?:\\.<\\w+>)?|\\*)')).toBe(
      '([$a-zA-Z_]\\w*|[$a-zA-Z_]\\w*\\.<\\w+>|\\*)'
    );
  });

  it('strips a leading anchor only', () => {
    expect(translatePattern('^foo')).toBe('foo');
    expect(translatePattern('a^b')).toBe('a^b');
  });

  it('leaves ordinary patterns untouched', () => {
    expect(translatePattern('[a-z]+\\d*')).toBe('[a-z]+\\d*');
  });
});

describe('unsupported constructs', () => {
  it('rejects a non-capturing group with its offset', () => {
    const error = captureError(() => translatePattern('^ab(?:cd)+'));
    expect(error.kind).toBe('UnsupportedConstruct');
    expect(error.message).toBe("uncaptured prefix '(?:' remains after rewriting");
    expect(error.pattern).toBe('ab(?:cd)+');
    expect(error.offset).toBe(2);
  });

  it('names the lookbehind that survives the rewrites', () => {
    const error = captureError(() => translatePattern('(?<=@)\\w+'));
    expect(error.kind).toBe('UnsupportedConstruct');
    expect(error.message).toContain("'(?<='");
  });

  it('finds negative lookbehind and lookahead prefixes', () => {
    expect(findUnsupported('x(?<!y)')).toEqual({ prefix: '(?<!', offset: 1 });
    expect(findUnsupported('x(?=y)')).toEqual({ prefix: '(?=', offset: 1 });
    expect(findUnsupported('(x)(y)')).toBeNull();
  });

  it('renders the caret under the offending prefix', () => {
    const error = captureError(() => translatePattern('ab(?=c)'));
    expect(error.toString()).toBe(
      "UnsupportedConstruct: uncaptured prefix '(?=' remains after rewriting\n\n  | ab(?=c)\n  |   ^"
    );
  });
});

describe('topLevelGroups', () => {
  it('returns each outermost parenthesized span', () => {
    expect(topLevelGroups('(a)(b(c))d')).toEqual(['(a)', '(b(c))']);
  });

  it('ignores escaped parentheses', () => {
    expect(topLevelGroups('\\((x)\\)')).toEqual(['(x)']);
  });

  it('ignores parentheses inside character classes', () => {
    expect(topLevelGroups('([()])(y)')).toEqual(['([()])', '(y)']);
    expect(topLevelGroups('([^)\\]]+)')).toEqual(['([^)\\]]+)']);
  });

  it('returns nothing for a pattern without groups', () => {
    expect(topLevelGroups('abc')).toEqual([]);
  });
});

describe('destination helpers', () => {
  it('escapes single quotes', () => {
    expect(quoteSafe("it's 'x'")).toBe('it\\x27s \\x27x\\x27');
  });

  it('derives rule names from dotted token types', () => {
    expect(tokenRuleName('Token.Name.Function')).toBe('Token_Name_Function');
  });

  it('detects raw line breaks only', () => {
    expect(spansLines('a\nb')).toBe(true);
    expect(spansLines('a\\nb')).toBe(false);
    expect(spansLines('abc')).toBe(false);
  });
});
