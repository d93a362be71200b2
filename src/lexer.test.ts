import { describe, it, expect } from 'vitest';
import { TotGrammarError, TotLexicalError } from './errors.js';
import { isBareKey, Scanner } from './lexer.js';

describe('Scanner.skipIgnored', () => {
  it('skips whitespace, commas and both comment forms', () => {
    const s = new Scanner('  // line\n, /* block */\r\n\tvalue');
    s.skipIgnored();
    expect(s.peek()).toBe('v');
  });

  it('runs a line comment to end of input', () => {
    const s = new Scanner('// trailing');
    s.skipIgnored();
    expect(s.atEnd).toBe(true);
  });

  it('rejects an unclosed block comment', () => {
    const s = new Scanner('/* open');
    expect(() => s.skipIgnored()).toThrow(TotLexicalError);
    expect(() => new Scanner('/* open').skipIgnored()).toThrow('Unclosed block comment');
  });

  it('does not nest block comments', () => {
    const s = new Scanner('/* a /* b */ x');
    s.skipIgnored();
    expect(s.peek()).toBe('x');
  });
});

describe('Scanner.matchNumber', () => {
  const cases: [string, number][] = [
    ['22', 22],
    ['-1.5e3', -1500],
    ['.5', 0.5],
    ['+3', 3],
    ['1.', 1],
    ['1E-2', 0.01],
  ];
  for (const [text, expected] of cases) {
    it(`reads ${text}`, () => {
      const s = new Scanner(text);
      expect(s.matchNumber()).toBe(expected);
      expect(s.atEnd).toBe(true);
    });
  }

  it('stops at a delimiter or comment', () => {
    const s = new Scanner('1,2');
    expect(s.matchNumber()).toBe(1);
    expect(s.peek()).toBe(',');
    expect(new Scanner('7// c').matchNumber()).toBe(7);
  });

  it('reports a miss without consuming input', () => {
    const s = new Scanner('abc');
    expect(s.matchNumber()).toBeUndefined();
    expect(s.offset).toBe(0);
    expect(new Scanner('-').matchNumber()).toBeUndefined();
  });

  it('rejects a number running into other characters', () => {
    expect(() => new Scanner('12abc').matchNumber()).toThrow('Invalid character in number: "a"');
    expect(() => new Scanner('1.0.0').matchNumber()).toThrow(TotLexicalError);
  });

  it('rejects a number that overflows a double', () => {
    expect(() => new Scanner('1e999').matchNumber()).toThrow('Number out of range: 1e999');
  });
});

describe('Scanner keywords', () => {
  it('matches null, true and false at a token boundary', () => {
    expect(new Scanner('null').matchUnit()).toBe(true);
    expect(new Scanner('true]').matchBool()).toBe(true);
    expect(new Scanner('false ').matchBool()).toBe(false);
  });

  it('does not match a keyword prefix of a longer token', () => {
    const s = new Scanner('nullable');
    expect(s.matchUnit()).toBe(false);
    expect(s.offset).toBe(0);
    expect(new Scanner('falsey').matchBool()).toBeUndefined();
  });
});

describe('Scanner.matchString', () => {
  it('decodes simple escapes', () => {
    expect(new Scanner('"a\\nb\\t\\"q\\" \\\\ \\/"').matchString()).toBe('a\nb\t"q" \\ /');
  });

  it('decodes braced unicode escapes', () => {
    expect(new Scanner('"\\u{41}\\u{1F600}"').matchString()).toBe('A\u{1F600}');
  });

  it('rejects surrogate code points', () => {
    expect(() => new Scanner('"\\u{D800}"').matchString()).toThrow('Invalid unicode scalar value: U+D800');
  });

  it('rejects malformed unicode escapes', () => {
    expect(() => new Scanner('"\\u0041"').matchString()).toThrow(
      'Invalid unicode escape, expected \\u{H} with 1 to 6 hex digits'
    );
  });

  it('rejects unknown escapes', () => {
    expect(() => new Scanner('"\\x"').matchString()).toThrow('Invalid escape sequence \\x');
  });

  it('elides a backslash followed by whitespace', () => {
    expect(new Scanner('"one \\\n    two"').matchString()).toBe('one two');
  });

  it('keeps raw newlines', () => {
    expect(new Scanner('"a\nb"').matchString()).toBe('a\nb');
  });

  it('reports an unterminated string at its opening quote', () => {
    const s = new Scanner('x "abc');
    s.matchToken();
    s.skipIgnored();
    try {
      s.matchString();
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TotLexicalError);
      if (!(error instanceof TotLexicalError)) return;
      expect(error.message).toBe('Unterminated string');
      expect(error.position).toEqual({ line: 1, column: 3, offset: 2 });
    }
  });

  it('returns undefined when no string starts here', () => {
    expect(new Scanner('abc').matchString()).toBeUndefined();
  });
});

describe('Scanner.parseKey', () => {
  it('reads bare and quoted keys', () => {
    expect(new Scanner('key value').parseKey()).toBe('key');
    expect(new Scanner('"quoted key" 1').parseKey()).toBe('quoted key');
    expect(new Scanner('x-y.z/w 1').parseKey()).toBe('x-y.z/w');
  });

  it('ends a bare key at a comment', () => {
    expect(new Scanner('a//c').parseKey()).toBe('a');
  });

  it('rejects a closing delimiter', () => {
    expect(() => new Scanner('}').parseKey()).toThrow("Unexpected '}' where a key was expected");
    expect(() => new Scanner('{').parseKey()).toThrow(TotGrammarError);
  });
});

describe('isBareKey', () => {
  it('accepts token text', () => {
    expect(isBareKey('name')).toBe(true);
    expect(isBareKey('x-y.z')).toBe(true);
    expect(isBareKey('1.0')).toBe(true);
  });

  it('rejects text that needs quoting', () => {
    expect(isBareKey('')).toBe(false);
    expect(isBareKey('a b')).toBe(false);
    expect(isBareKey('a/b')).toBe(false);
    expect(isBareKey('a,b')).toBe(false);
    expect(isBareKey('[x]')).toBe(false);
  });
});

describe('Scanner diagnostics', () => {
  it('quotes a short excerpt of the remaining input', () => {
    expect(new Scanner('hello world this is long').excerpt()).toBe('"hello world this"');
    expect(new Scanner('ab\ncd').excerpt()).toBe('"ab"');
    expect(new Scanner('').excerpt()).toBe('end of input');
  });

  it('reports 1-based line and column', () => {
    const error = new Scanner('a\nbc').grammarError('boom', 3);
    expect(error.position).toEqual({ line: 2, column: 2, offset: 3 });
    expect(error.toString()).toBe('boom (line 2, column 2)');
  });

  it('records the UTF-8 byte offset beside the position', () => {
    const s = new Scanner('é [');
    expect(s.byteOffset(2)).toBe(3);
    const error = s.grammarError('boom', 2);
    expect(error.position).toEqual({ line: 1, column: 3, offset: 2 });
    expect(error.byteOffset).toBe(3);
    expect(new Scanner('😀"').lexicalError('boom', 2).byteOffset).toBe(4);
  });
});
