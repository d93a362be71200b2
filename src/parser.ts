/**
 * Tot value parser. Builds a TotValue in one pass over the input; the document
 * root is a dict body without braces.
 */

import { dictFromEntries, type TotValue } from './ast.js';
import { TotError } from './errors.js';
import { Scanner } from './lexer.js';

export interface ParseOptions {
  /** Max nesting depth of explicit lists and dicts (default 1024). */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 1024;

export function parseValue(text: string, options: ParseOptions = {}): TotValue {
  const p = new Parser(new Scanner(text), options.maxDepth ?? DEFAULT_MAX_DEPTH);
  return p.parseDocument();
}

/**
 * True when the document at the scanner is one value (a bracketed list or dict,
 * or a lone scalar) rather than an implicit root dict. Does not move the scanner.
 */
export function isSingleValueDocument(scanner: Scanner, maxDepth = DEFAULT_MAX_DEPTH): boolean {
  const probe = scanner.fork();
  probe.skipIgnored();
  const c = probe.peek();
  if (c === undefined) return false;
  if (c === '[' || c === '{') return true;
  try {
    new Parser(probe, maxDepth).parseScalar(0);
  } catch (error) {
    // Not a scalar here, so the document must be a dict body.
    if (error instanceof TotError) return false;
    throw error;
  }
  probe.skipIgnored();
  return probe.atEnd;
}

export class Parser {
  constructor(
    private readonly scanner: Scanner,
    private readonly maxDepth: number
  ) {}

  parseDocument(): TotValue {
    const s = this.scanner;
    let value: TotValue;
    if (isSingleValueDocument(s, this.maxDepth)) {
      s.skipIgnored();
      value = this.parseScalar(0);
    } else {
      value = this.parseDictBody(0, true);
    }
    s.skipIgnored();
    if (!s.atEnd) {
      const c = s.peek();
      if (c === ']' || c === '}') throw s.grammarError(`Unmatched '${c}'`);
      throw s.grammarError(`Trailing input after document: ${s.excerpt()}`);
    }
    return value;
  }

  parseScalar(depth: number): TotValue {
    const s = this.scanner;
    const c = s.peek();
    switch (c) {
      case '[':
        return this.parseList(depth + 1);
      case '{':
        return this.parseDict(depth + 1);
      case '"':
        return s.matchString() ?? '';
      case ']':
      case '}':
        throw s.grammarError(`Unmatched '${c}'`);
      case undefined:
        throw s.grammarError('Expected a value, found end of input');
    }
    if (s.matchUnit()) return null;
    const b = s.matchBool();
    if (b !== undefined) return b;
    const n = s.matchNumber();
    if (n !== undefined) return n;
    throw s.grammarError(`Expected a value, found ${s.excerpt()}`);
  }

  private enter(depth: number): void {
    if (depth > this.maxDepth) {
      throw this.scanner.grammarError(`Maximum nesting depth exceeded (${this.maxDepth})`);
    }
  }

  private parseList(depth: number): TotValue[] {
    const s = this.scanner;
    this.enter(depth);
    const open = s.offset;
    s.expectChar('[');
    const list: TotValue[] = [];
    for (;;) {
      s.skipIgnored();
      const c = s.peek();
      if (c === ']') break;
      if (c === undefined) throw s.grammarError("Unmatched '['", open);
      if (c === '}') throw s.grammarError("Expected ']', found '}'");
      list.push(this.parseScalar(depth));
    }
    s.expectChar(']');
    return list;
  }

  private parseDict(depth: number): TotValue {
    const s = this.scanner;
    this.enter(depth);
    s.expectChar('{');
    const dict = this.parseDictBody(depth, false);
    s.expectChar('}');
    return dict;
  }

  /** key value pairs up to '}' (explicit) or end of input (implicit root). */
  private parseDictBody(depth: number, implicit: boolean): TotValue {
    const s = this.scanner;
    const open = s.offset - 1;
    const entries: [string, TotValue][] = [];
    for (;;) {
      s.skipIgnored();
      const c = s.peek();
      if (c === undefined) {
        if (implicit) break;
        throw s.grammarError("Unmatched '{'", open);
      }
      if (c === '}' && !implicit) break;
      if (c === ']' && !implicit) throw s.grammarError("Expected '}', found ']'");
      const keyAt = s.offset;
      const key = s.parseKey();
      s.skipIgnored();
      const next = s.peek();
      if (next === undefined || next === '}' || next === ']') {
        throw s.grammarError(`Key ${JSON.stringify(key)} has no value`, keyAt);
      }
      entries.push([key, this.parseScalar(depth)]);
    }
    return dictFromEntries(entries);
  }
}
