import { describe, it, expect } from 'vitest';
import { StringSink } from './encoder.js';
import { CompactFormatter, PrettyFormatter, createFormatter, formatNumber, quoteString } from './formatter.js';

describe('formatNumber', () => {
  it('keeps a fraction on integral values', () => {
    expect(formatNumber(22)).toBe('22.0');
    expect(formatNumber(-3)).toBe('-3.0');
    expect(formatNumber(1.5)).toBe('1.5');
  });

  it('keeps the sign of negative zero', () => {
    expect(formatNumber(-0)).toBe('-0.0');
    expect(formatNumber(0)).toBe('0.0');
  });

  it('writes exponents without a plus sign', () => {
    expect(formatNumber(1e21)).toBe('1e21');
    expect(formatNumber(1e-7)).toBe('1e-7');
    expect(formatNumber(1.5e300)).toBe('1.5e300');
  });
});

describe('quoteString', () => {
  it('escapes quotes, backslashes and control characters', () => {
    expect(quoteString('say "hi"')).toBe('"say \\"hi\\""');
    expect(quoteString('a\\b')).toBe('"a\\\\b"');
    expect(quoteString('l1\nl2\t')).toBe('"l1\\nl2\\t"');
    expect(quoteString('\u0001\u007f')).toBe('"\\u{1}\\u{7f}"');
  });

  it('leaves other characters alone', () => {
    expect(quoteString('héllo 😀')).toBe('"héllo 😀"');
  });
});

describe('formatters', () => {
  it('writes the root dict without braces', () => {
    const out = new StringSink();
    const f = new PrettyFormatter();
    f.beginDict(out);
    f.beginDictKey(out, true);
    f.writeKey(out, 'a');
    f.writeBool(out, true);
    f.beginDictKey(out, false);
    f.writeKey(out, 'b c');
    f.writeNull(out);
    f.endDict(out, false);
    f.finish(out, false);
    expect(out.toString()).toBe('a true\n"b c" null\n');
  });

  it('indents nested containers', () => {
    const out = new StringSink();
    const f = new PrettyFormatter();
    f.beginList(out);
    f.beginListElement(out, true);
    f.beginDict(out);
    f.beginDictKey(out, true);
    f.writeKey(out, 'k');
    f.writeNumber(out, 1);
    f.endDict(out, false);
    f.endList(out, false);
    f.finish(out, false);
    expect(out.toString()).toBe('[\n    {\n        k 1.0\n    }\n]\n');
  });

  it('writes compact entries on one line', () => {
    const out = new StringSink();
    const f = new CompactFormatter();
    f.beginList(out);
    f.beginListElement(out, true);
    f.writeString(out, 'x');
    f.beginListElement(out, false);
    f.beginList(out);
    f.endList(out, true);
    f.endList(out, false);
    f.finish();
    expect(out.toString()).toBe('["x", []]');
  });

  it('picks a formatter by mode', () => {
    expect(createFormatter('compact').mode).toBe('compact');
    expect(createFormatter('pretty').mode).toBe('pretty');
  });
});
