/**
 * Tot lexical primitives. A Scanner is a cursor over the input; each `match*`
 * method either recognizes a form at the cursor and consumes it, reports a miss
 * without consuming anything, or throws when the form starts but is malformed.
 */

import { positionAt, type SourcePosition } from './ast.js';
import { TotGrammarError, TotLexicalError } from './errors.js';

const SPACE = 32;
const TAB = 9;
const LF = 10;
const CR = 13;
const COMMA = 44;
const SLASH = 47;
const STAR = 42;
const QUOTE = 34;
const BACKSLASH = 92;

/** Characters that end a bare token besides whitespace. */
const DELIMITERS = new Set([',', '{', '}', '[', ']', '"']);

const NUMBER = /[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y;
const HEX = /^[\da-fA-F]{1,6}$/;

const UTF8 = new TextEncoder();

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  n: '\n',
  r: '\r',
  t: '\t',
  b: '\b',
  f: '\f',
};

export function isWhitespace(c: string | undefined): boolean {
  return c === ' ' || c === '\t' || c === '\n' || c === '\r';
}

function isTokenChar(c: string): boolean {
  return !isWhitespace(c) && !DELIMITERS.has(c);
}

/** True when the serializer may write `key` without quotes. */
export function isBareKey(key: string): boolean {
  if (key.length === 0) return false;
  for (const c of key) {
    if (!isTokenChar(c) || c === '/') return false;
  }
  return true;
}

export class Scanner {
  private cursor: number;

  constructor(
    readonly input: string,
    offset = 0
  ) {
    this.cursor = offset;
  }

  get offset(): number {
    return this.cursor;
  }

  get atEnd(): boolean {
    return this.cursor >= this.input.length;
  }

  /** The character at the cursor, or undefined at end of input. */
  peek(): string | undefined {
    return this.input[this.cursor];
  }

  /** An independent scanner at the same position, for lookahead. */
  fork(): Scanner {
    return new Scanner(this.input, this.cursor);
  }

  position(offset = this.cursor): SourcePosition {
    return positionAt(this.input, offset);
  }

  /** A short, quoted excerpt of the input at the cursor, for error messages. */
  excerpt(offset = this.cursor): string {
    if (offset >= this.input.length) return 'end of input';
    const rest = this.input.slice(offset, offset + 16);
    const line = rest.split('\n')[0] ?? '';
    return JSON.stringify(line.length > 0 ? line : rest.slice(0, 1));
  }

  /** UTF-8 length of the input before `offset`. */
  byteOffset(offset = this.cursor): number {
    return UTF8.encode(this.input.slice(0, offset)).length;
  }

  lexicalError(message: string, offset = this.cursor): TotLexicalError {
    return new TotLexicalError(message, { position: this.position(offset), byteOffset: this.byteOffset(offset) });
  }

  grammarError(message: string, offset = this.cursor): TotGrammarError {
    return new TotGrammarError(message, { position: this.position(offset), byteOffset: this.byteOffset(offset) });
  }

  /** Skip whitespace, commas and comments. */
  skipIgnored(): void {
    const input = this.input;
    while (this.cursor < input.length) {
      const c = input.charCodeAt(this.cursor);
      if (c === SPACE || c === TAB || c === LF || c === CR || c === COMMA) {
        this.cursor++;
        continue;
      }
      if (c === SLASH && input.charCodeAt(this.cursor + 1) === SLASH) {
        const eol = input.indexOf('\n', this.cursor + 2);
        this.cursor = eol === -1 ? input.length : eol;
        continue;
      }
      if (c === SLASH && input.charCodeAt(this.cursor + 1) === STAR) {
        const close = input.indexOf('*/', this.cursor + 2);
        if (close === -1) throw this.lexicalError('Unclosed block comment');
        this.cursor = close + 2;
        continue;
      }
      return;
    }
  }

  /** Consume the keyword if the input continues with it and the token ends there. */
  private matchKeyword(keyword: string): boolean {
    if (!this.input.startsWith(keyword, this.cursor)) return false;
    const end = this.cursor + keyword.length;
    const next = this.input[end];
    if (next !== undefined && isTokenChar(next) && next !== '/') return false;
    this.cursor = end;
    return true;
  }

  /** Consume one expected delimiter character or fail naming what was found. */
  expectChar(expected: string): void {
    if (this.peek() === expected) {
      this.cursor++;
      return;
    }
    throw this.grammarError(`Expected '${expected}', found ${this.excerpt()}`);
  }

  matchUnit(): boolean {
    return this.matchKeyword('null');
  }

  matchBool(): boolean | undefined {
    if (this.matchKeyword('true')) return true;
    if (this.matchKeyword('false')) return false;
    return undefined;
  }

  matchNumber(): number | undefined {
    NUMBER.lastIndex = this.cursor;
    const m = NUMBER.exec(this.input);
    if (m === null) return undefined;
    const start = this.cursor;
    const end = start + m[0].length;
    const next = this.input[end];
    if (next !== undefined && isTokenChar(next) && !this.input.startsWith('//', end) && !this.input.startsWith('/*', end)) {
      throw this.lexicalError(`Invalid character in number: ${JSON.stringify(next)}`, end);
    }
    const n = Number(m[0]);
    if (!Number.isFinite(n)) {
      throw this.lexicalError(`Number out of range: ${m[0]}`, start);
    }
    this.cursor = end;
    return n;
  }

  matchString(): string | undefined {
    const input = this.input;
    if (input.charCodeAt(this.cursor) !== QUOTE) return undefined;
    const start = this.cursor;
    let i = start + 1;
    let buf = '';
    for (;;) {
      if (i >= input.length) throw this.lexicalError('Unterminated string', start);
      const c = input.charCodeAt(i);
      if (c === QUOTE) break;
      if (c !== BACKSLASH) {
        // copy the literal run up to the next quote or backslash in one go
        let j = i + 1;
        while (j < input.length) {
          const d = input.charCodeAt(j);
          if (d === QUOTE || d === BACKSLASH) break;
          j++;
        }
        buf += input.slice(i, j);
        i = j;
        continue;
      }
      const esc = input[i + 1];
      if (esc === undefined) throw this.lexicalError('Unterminated string', start);
      const simple = SIMPLE_ESCAPES[esc];
      if (simple !== undefined) {
        buf += simple;
        i += 2;
      } else if (esc === 'u') {
        const close = input.indexOf('}', i + 2);
        const hex = close === -1 ? '' : input.slice(i + 3, close);
        if (input[i + 2] !== '{' || !HEX.test(hex)) {
          throw this.lexicalError('Invalid unicode escape, expected \\u{H} with 1 to 6 hex digits', i);
        }
        const cp = parseInt(hex, 16);
        if (cp > 0x10ffff || (cp >= 0xd800 && cp <= 0xdfff)) {
          throw this.lexicalError(`Invalid unicode scalar value: U+${hex.toUpperCase()}`, i);
        }
        buf += String.fromCodePoint(cp);
        i = close + 1;
      } else if (isWhitespace(esc)) {
        i += 2;
        while (isWhitespace(input[i])) i++;
      } else {
        throw this.lexicalError(`Invalid escape sequence \\${esc}`, i);
      }
    }
    this.cursor = i + 1;
    return buf;
  }

  /** A bare token: the run of non-whitespace, non-delimiter characters. */
  matchToken(): string | undefined {
    const input = this.input;
    let i = this.cursor;
    while (i < input.length) {
      const c = input[i];
      if (c === undefined || !isTokenChar(c)) break;
      if (c === '/' && (input[i + 1] === '/' || input[i + 1] === '*')) break;
      i++;
    }
    if (i === this.cursor) return undefined;
    const token = input.slice(this.cursor, i);
    this.cursor = i;
    return token;
  }

  /** A dict key: quoted string or bare token. */
  parseKey(): string {
    const quoted = this.matchString();
    if (quoted !== undefined) return quoted;
    const token = this.matchToken();
    if (token !== undefined) return token;
    const c = this.peek();
    if (c === '}' || c === ']') throw this.grammarError(`Unexpected '${c}' where a key was expected`);
    throw this.grammarError(`Expected a key, found ${this.excerpt()}`);
  }
}
