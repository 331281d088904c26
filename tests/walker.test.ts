import { TranslationContext } from '../src/transpiler/context';
import { translateLanguage, transpileLanguage } from '../src/transpiler/index';
import { renderLine } from '../src/transpiler/render';
import { StateWalker } from '../src/transpiler/walker';
import type { LanguageDefinition } from '../src/transpiler/types';
import { captureError, lit, makeLanguage, rules } from './helpers';

const render = (language: LanguageDefinition, maxDepth?: number) =>
  translateLanguage(language, { maxDepth }).map(renderLine);

describe('StateWalker', () => {
  it('emits one line for a single plain rule', () => {
    expect(render(makeLanguage({ root: [rules.literal('foo', 'TokenA')] }))).toEqual(["TokenA = 'foo'"]);
  });

  it('drops rules with nothing left after trimming and keeps line-start prefixes', () => {
    const language = makeLanguage({
      root: [rules.literal('.*\\n', 'TokenB'), rules.literal('prefix.*\\n', 'TokenB')],
    });
    expect(render(language)).toEqual(["TokenB start 'prefix'"]);
  });

  it('compiles a state of enter and exit rules into one region', () => {
    const language = makeLanguage({ root: [rules.push('{', 'TokenC'), rules.pop('}', 'TokenC')] });
    expect(render(language)).toEqual(["TokenC delim '{' '}' nested"]);
  });

  it('reports a lookbehind with its state and language', () => {
    const error = captureError(() => render(makeLanguage({ root: [rules.literal('(?<=a)b', 'T')] })));
    expect(error.kind).toBe('UnsupportedConstruct');
    expect(error.message).toContain('(?<=');
    expect(error.state).toBe('root');
    expect(error.language).toBe('Test');
    expect(error.pattern).toBe('(?<=a)b');
  });

  it('preserves rule order', () => {
    const language = makeLanguage({
      root: [rules.literal('b', 'Token.B'), rules.literal('a', 'Token.A'), rules.literal('c', 'Token.C')],
    });
    expect(render(language)).toEqual(["Token_B = 'b'", "Token_A = 'a'", "Token_C = 'c'"]);
  });

  it('splices included states in place', () => {
    const language = makeLanguage({
      root: [rules.include('common'), rules.literal('b', 'B')],
      common: [rules.literal('a', 'A')],
    });
    expect(render(language)).toEqual(["A = 'a'", "B = 'b'"]);
  });

  it('opens a block for a nested state with its exit rule inside', () => {
    const language = makeLanguage({
      root: [rules.literal('x', 'Token.Name'), rules.nested('"', 'Token.String', 'string')],
      string: [rules.literal('[^"]+', 'Token.String'), rules.pop('"', 'Token.String')],
    });
    expect(render(language)).toEqual([
      "Token_Name = 'x'",
      '# string state',
      `state Token_String = '"' begin`,
      `  Token_String = '[^"]+'`,
      `  Token_String = '"' exit`,
      'end',
    ]);
  });

  it('anchors a line-end exit and keeps its pop count', () => {
    const language = makeLanguage({
      root: [rules.nested('@', 'Token.Keyword', 'directive')],
      directive: [rules.literal('\\w+', 'Token.Name'), rules.pop('\\n', 'Token.Text', 2)],
    });
    expect(render(language)).toEqual([
      '# directive state',
      "state Token_Keyword = '@' begin",
      "  Token_Name = '\\w+'",
      "  Token_Text = '$' exit 2",
      'end',
    ]);
  });

  it('inlines the target when the nested rule itself is dropped', () => {
    const language = makeLanguage({
      root: [rules.nested('.*\\n', 'Token.Text', 'after')],
      after: [rules.literal('z', 'Z')],
    });
    expect(render(language)).toEqual(["Z = 'z'"]);
  });

  it('emits a region block once and keeps the other rules at the outer level', () => {
    const language = makeLanguage({
      root: [rules.literal('x', 'X'), rules.nested('"', 'Token.String', 'string')],
      string: [
        rules.push('\\{', 'Token.String'),
        rules.literal('[a-z]+', 'Token.Name'),
        rules.pop('\\}', 'Token.String'),
        rules.push('\\[', 'Token.String'),
      ],
    });
    expect(render(language)).toEqual([
      "X = 'x'",
      '# string state',
      `state Token_String = '"' begin`,
      '  # nested string state',
      "  state Token_String delim '(\\{)|(\\[)' '\\}' nested begin",
      "    Token_Name = '[a-z]+'",
      '  end',
      "  Token_Name = '[a-z]+'",
      'end',
    ]);
  });

  it('renders group lists with their arity', () => {
    const language = makeLanguage({ root: [rules.groups('(a)(b)', [lit('A'), lit('B')])] });
    expect(render(language)).toEqual(['(A,B) = `(a)(b)`']);
  });

  it('escapes quotes in rule patterns', () => {
    expect(render(makeLanguage({ root: [rules.literal("it's", 'T')] }))).toEqual(["T = 'it\\x27s'"]);
  });

  it('stops a cycle of nested states at the depth limit', () => {
    const language = makeLanguage({
      root: [rules.nested('a', 'A', 'loop')],
      loop: [rules.nested('b', 'B', 'root')],
    });
    const error = captureError(() => render(language, 8));
    expect(error.kind).toBe('RecursionLimitExceeded');
    expect(error.language).toBe('Test');
  });

  it('stops a state that includes itself', () => {
    const language = makeLanguage({ root: [rules.include('root')] });
    expect(captureError(() => render(language, 4)).kind).toBe('RecursionLimitExceeded');
  });

  it('allows deep but finite nesting within the limit', () => {
    const language = makeLanguage({
      root: [rules.nested('a', 'A', 'one')],
      one: [rules.nested('b', 'B', 'two')],
      two: [rules.literal('c', 'C')],
    });
    expect(render(language, 3)).toHaveLength(7);
    expect(captureError(() => render(language, 2)).kind).toBe('RecursionLimitExceeded');
  });

  it('rejects an include of an undefined state', () => {
    const error = captureError(() => render(makeLanguage({ root: [rules.include('missing')] })));
    expect(error.kind).toBe('UnknownState');
    expect(error.state).toBe('missing');
  });

  it('walks from any state on request', () => {
    const language = makeLanguage({ root: [rules.literal('a', 'A')], other: [rules.literal('b', 'B')] });
    const lines = new StateWalker(new TranslationContext(language)).walk('other', 2);
    expect(lines.map(renderLine)).toEqual(["    B = 'b'"]);
  });

  it('produces identical output on repeated runs', () => {
    const language = makeLanguage({
      root: [rules.literal('x', 'X'), rules.nested('"', 'Token.String', 'string')],
      string: [rules.push('\\{', 'Token.String'), rules.literal('y', 'Y'), rules.pop('\\}', 'Token.String')],
    });
    expect(transpileLanguage(language).source).toBe(transpileLanguage(language).source);
  });
});

describe('transpileLanguage', () => {
  it('names the output file after the language and adds the header', () => {
    const result = transpileLanguage(makeLanguage({ root: [rules.literal('foo', 'Token.Keyword')] }, 'My Lang'));
    expect(result.fileName).toBe('my-lang.lang');
    expect(result.source).toBe("# autogenerated from the My Lang lexer grammar\nToken_Keyword = 'foo'\n");
  });
});
