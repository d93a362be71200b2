/**
 * Output policy for the Tot serializer. The formatter owns indentation and the
 * implicit-root rule: a dict opened at depth 0 is written without braces.
 */

import { isBareKey } from './lexer.js';

export interface TextSink {
  write(chunk: string): void;
}

export type FormatMode = 'pretty' | 'compact';

export interface Formatter {
  readonly mode: FormatMode;
  writeNull(out: TextSink): void;
  writeBool(out: TextSink, value: boolean): void;
  writeNumber(out: TextSink, value: number): void;
  writeString(out: TextSink, value: string): void;
  writeKey(out: TextSink, key: string): void;
  beginList(out: TextSink): void;
  beginListElement(out: TextSink, first: boolean): void;
  endList(out: TextSink, empty: boolean): void;
  beginDict(out: TextSink): void;
  beginDictKey(out: TextSink, first: boolean): void;
  endDict(out: TextSink, empty: boolean): void;
  /** Called once after the last event. */
  finish(out: TextSink, endsWithNewline: boolean): void;
}

const INDENT = '    ';

const ESCAPES: Readonly<Record<string, string>> = {
  '"': '\\"',
  '\\': '\\\\',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\b': '\\b',
  '\f': '\\f',
};

/**
 * Shortest text that reads back as the same double. Integral values keep a
 * `.0` so every number looks like a float: 22 -> "22.0", 1e21 -> "1e21".
 */
export function formatNumber(n: number): string {
  if (Object.is(n, -0)) return '-0.0';
  const s = String(n);
  if (s.includes('e')) return s.replace('e+', 'e');
  return s.includes('.') ? s : `${s}.0`;
}

export function quoteString(s: string): string {
  let out = '"';
  for (const c of s) {
    const esc = ESCAPES[c];
    if (esc !== undefined) {
      out += esc;
      continue;
    }
    const code = c.charCodeAt(0);
    out += code < 0x20 || code === 0x7f ? `\\u{${code.toString(16)}}` : c;
  }
  return out + '"';
}

abstract class BaseFormatter implements Formatter {
  abstract readonly mode: FormatMode;
  protected indent = 0;
  /** One entry per open container: true for the implicit root dict. */
  private readonly open: boolean[] = [];

  protected abstract separator(out: TextSink, first: boolean, implicitRoot: boolean): void;
  protected abstract close(out: TextSink, delimiter: ']' | '}', empty: boolean): void;
  abstract finish(out: TextSink, endsWithNewline: boolean): void;

  writeNull(out: TextSink): void {
    out.write('null');
  }

  writeBool(out: TextSink, value: boolean): void {
    out.write(value ? 'true' : 'false');
  }

  writeNumber(out: TextSink, value: number): void {
    out.write(formatNumber(value));
  }

  writeString(out: TextSink, value: string): void {
    out.write(quoteString(value));
  }

  writeKey(out: TextSink, key: string): void {
    out.write(isBareKey(key) ? key : quoteString(key));
    out.write(' ');
  }

  beginList(out: TextSink): void {
    this.open.push(false);
    this.indent++;
    out.write('[');
  }

  beginListElement(out: TextSink, first: boolean): void {
    this.separator(out, first, false);
  }

  endList(out: TextSink, empty: boolean): void {
    this.open.pop();
    this.indent--;
    this.close(out, ']', empty);
  }

  beginDict(out: TextSink): void {
    const implicit = this.open.length === 0;
    this.open.push(implicit);
    if (implicit) return;
    this.indent++;
    out.write('{');
  }

  beginDictKey(out: TextSink, first: boolean): void {
    this.separator(out, first, this.open[this.open.length - 1] === true);
  }

  endDict(out: TextSink, empty: boolean): void {
    const implicit = this.open.pop();
    if (implicit === true) return;
    this.indent--;
    this.close(out, '}', empty);
  }
}

/** Four spaces per level, one entry per line, trailing newline. */
export class PrettyFormatter extends BaseFormatter {
  readonly mode = 'pretty';

  protected separator(out: TextSink, first: boolean, implicitRoot: boolean): void {
    if (implicitRoot) {
      if (!first) out.write('\n');
      return;
    }
    out.write('\n' + INDENT.repeat(this.indent));
  }

  protected close(out: TextSink, delimiter: ']' | '}', empty: boolean): void {
    out.write(empty ? delimiter : '\n' + INDENT.repeat(this.indent) + delimiter);
  }

  finish(out: TextSink, endsWithNewline: boolean): void {
    if (!endsWithNewline) out.write('\n');
  }
}

/** Everything on one line; entries separated by ", ". */
export class CompactFormatter extends BaseFormatter {
  readonly mode = 'compact';

  protected separator(out: TextSink, first: boolean): void {
    if (!first) out.write(', ');
  }

  protected close(out: TextSink, delimiter: ']' | '}'): void {
    out.write(delimiter);
  }

  finish(): void {}
}

export function createFormatter(mode: FormatMode): Formatter {
  return mode === 'compact' ? new CompactFormatter() : new PrettyFormatter();
}
