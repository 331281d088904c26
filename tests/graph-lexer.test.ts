import { GraphLexer, hostPattern, LexerError, withoutCaptures } from '../src/lexer/index';
import type { LanguageDefinition } from '../src/transpiler/types';
import { lit, makeLanguage, rules } from './helpers';

const lex = (language: LanguageDefinition, input: string, state?: string) =>
  [...new GraphLexer(language, state).tokenize(input)].map(({ type, text }) => [type, text]);

describe('withoutCaptures', () => {
  it('turns plain and named groups into non-capturing ones', () => {
    expect(withoutCaptures('(a)(?:b)(?P<n>c)(?<m>d)')).toBe('(?:a)(?:b)(?:c)(?:d)');
  });

  it('leaves escaped and bracketed parentheses and lookarounds alone', () => {
    expect(withoutCaptures('\\([(]x(?=y)')).toBe('\\([(]x(?=y)');
  });
});

describe('hostPattern', () => {
  it('respells named groups and their backreferences', () => {
    expect(hostPattern('^(?P<q>[\'"])x(?P=q)')).toBe('(?<q>[\'"])x\\k<q>');
  });

  it('leaves escaped and bracketed text alone', () => {
    expect(hostPattern('\\(?P<n>[(?P<]')).toBe('\\(?P<n>[(?P<]');
  });
});

describe('GraphLexer', () => {
  const quoted = makeLanguage({
    root: [
      rules.literal('[a-z]+', 'Token.Name'),
      rules.literal('\\s+', 'Token.Text'),
      rules.nested('"', 'Token.String', 'string'),
    ],
    string: [rules.literal('[^"]+', 'Token.String'), rules.pop('"', 'Token.String')],
  });

  it('follows nested states and pops back out', () => {
    const tokens = [...new GraphLexer(quoted).tokenize('ab "cd"')];
    expect(tokens).toEqual([
      { type: 'Token.Name', text: 'ab', offset: 0 },
      { type: 'Token.Text', text: ' ', offset: 2 },
      { type: 'Token.String', text: '"', offset: 3 },
      { type: 'Token.String', text: 'cd', offset: 4 },
      { type: 'Token.String', text: '"', offset: 6 },
    ]);
  });

  it('can start in another state', () => {
    expect(lex(quoted, 'x y', 'string')).toEqual([['Token.String', 'x y']]);
  });

  it('re-enters a state on push', () => {
    const language = makeLanguage({
      root: [rules.nested('\\{', 'P', 'block'), rules.literal('[a-z]+', 'R')],
      block: [rules.push('\\{', 'P'), rules.pop('\\}', 'P'), rules.literal('[a-z]+', 'N')],
    });
    expect(lex(language, '{a{b}}x')).toEqual([
      ['P', '{'],
      ['N', 'a'],
      ['P', '{'],
      ['N', 'b'],
      ['P', '}'],
      ['P', '}'],
      ['R', 'x'],
    ]);
  });

  it('flattens included states', () => {
    const language = makeLanguage({ root: [rules.include('words')], words: [rules.literal('[a-z]+', 'W')] });
    expect(lex(language, 'ab')).toEqual([['W', 'ab']]);
  });

  it('types a group list by the first group that took part in the match', () => {
    const language = makeLanguage({
      root: [rules.groups('(if)|([a-z]+)', [lit('Token.Keyword'), lit('Token.Name')]), rules.literal(' ', 'S')],
    });
    expect(lex(language, 'if x')).toEqual([
      ['Token.Keyword', 'if'],
      ['S', ' '],
      ['Token.Name', 'x'],
    ]);
  });

  it('types a group list whose groups are named', () => {
    const language = makeLanguage({
      root: [
        rules.groups('(?P<kw>if)|(?P<name>[a-z]+)', [lit('Token.Keyword'), lit('Token.Name')]),
        rules.literal(' ', 'S'),
      ],
    });
    expect(lex(language, 'if x')).toEqual([
      ['Token.Keyword', 'if'],
      ['S', ' '],
      ['Token.Name', 'x'],
    ]);
  });

  it('skips rules that match the empty string and reports the rest as an error token', () => {
    const language = makeLanguage({ root: [rules.literal('a*', 'A'), rules.literal('b', 'B')] });
    const tokens = [...new GraphLexer(language).tokenize('ba')];
    expect(tokens).toEqual([
      { type: 'B', text: 'b', offset: 0 },
      { type: 'Token.Error', text: 'a', offset: 1 },
    ]);
  });

  it('rejects an unknown start state', () => {
    expect(() => new GraphLexer(quoted, 'nowhere')).toThrow(LexerError);
  });

  it('rejects a pattern the host engine cannot compile', () => {
    let caught: unknown;
    try {
      new GraphLexer(makeLanguage({ root: [rules.literal('(', 'X')] }));
    } catch (error: unknown) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(LexerError);
    expect(caught instanceof LexerError && caught.pattern).toBe('(');
  });
});
