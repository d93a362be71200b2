import { describe, it, expect } from 'vitest';
import { coerceInteger, decode, roundHalfAway } from './decoder.js';
import { IntegerOutOfRangeError, TotCoercionError, TotError, TotFrameworkError, TotGrammarError } from './errors.js';
import { t, variant, type Shape } from './shapes.js';

function failure<T>(text: string, shape: Shape<T>): TotError {
  try {
    decode(text, shape);
  } catch (error) {
    if (error instanceof TotError) return error;
    throw error;
  }
  throw new Error(`expected ${JSON.stringify(text)} to fail`);
}

const Flat = t.struct('Flat', { boolean: t.bool, integer: t.i32, string: t.string });

const Mode = t.enumeration(
  'Mode',
  variant.unit('Unit'),
  variant.newtype('Bool', t.bool),
  variant.tuple('Tuple', t.i32, t.bool),
  variant.struct('Struct', { string: t.string, integer: t.i32 })
);

describe('decode records', () => {
  it('decodes a flat record', () => {
    expect(decode('boolean true\ninteger 22.0\nstring "hello world"\n', Flat)).toEqual({
      boolean: true,
      integer: 22,
      string: 'hello world',
    });
  });

  it('decodes a nested record', () => {
    const Nested = t.struct('Nested', {
      boolean: t.bool,
      fields: t.struct('Fields', { key1: t.string, key2: t.string, key3: t.string }),
    });
    const text = 'boolean true\nfields {\n    key1 "hello"\n    key2 "world"\n    key3 "goodbye"\n}\n';
    expect(decode(text, Nested)).toEqual({
      boolean: true,
      fields: { key1: 'hello', key2: 'world', key3: 'goodbye' },
    });
  });

  it('decodes a list field', () => {
    const Xs = t.struct('Xs', { xs: t.array(t.bool) });
    expect(decode('xs [\n    true\n    false\n    true\n]\n', Xs)).toEqual({ xs: [true, false, true] });
  });

  it('fills a missing optional field with null', () => {
    const S = t.struct('S', { a: t.i32, b: t.option(t.string) });
    expect(decode('a 1', S)).toEqual({ a: 1, b: null });
    expect(decode('a 1 b "x"', S)).toEqual({ a: 1, b: 'x' });
  });

  it('rejects a missing required field', () => {
    const S = t.struct('S', { a: t.i32, b: t.i32 });
    const error = failure('a 1', S);
    expect(error).toBeInstanceOf(TotFrameworkError);
    expect(error.message).toBe('missing field `b` in S');
  });

  it('rejects unknown fields unless allowed', () => {
    const strict = t.struct('S', { a: t.i32 });
    expect(failure('a 1 b [2 3]', strict).message).toBe('unknown field `b` in S, expected one of `a`');
    const lenient = t.struct('S', { a: t.i32 }, { allowUnknownFields: true });
    expect(decode('a 1 b [2 3]', lenient)).toEqual({ a: 1 });
  });

  it('reports a key without a value', () => {
    const error = failure('a', t.struct('S', { a: t.i32 }));
    expect(error).toBeInstanceOf(TotGrammarError);
    expect(error.message).toBe('Key a has no value');
  });

  it('rejects trailing input', () => {
    expect(failure('1 2', t.f64).message).toBe('Trailing input after document: "2"');
    expect(failure('[1] }', t.array(t.f64)).message).toBe("Unmatched '}'");
  });
});

describe('decode scalars and containers', () => {
  it('decodes unit only from null', () => {
    expect(decode('null', t.unit)).toBeNull();
    expect(failure('', t.unit).message).toBe('Expected null, found end of input');
  });

  it('decodes options', () => {
    expect(decode('null', t.option(t.i32))).toBeNull();
    expect(decode('5', t.option(t.i32))).toBe(5);
  });

  it('decodes a unit struct from null', () => {
    const Marker = t.unitStruct('Marker');
    expect(decode('null', Marker)).toBeNull();
    expect(decode('m null', t.struct('S', { m: Marker }))).toEqual({ m: null });
    expect(failure('1', Marker).message).toBe('Expected null, found "1"');
  });

  it('reads an optional dict at the root even when a key starts with n', () => {
    const S = t.struct('S', { name: t.string });
    expect(decode('name "x"', t.option(S))).toEqual({ name: 'x' });
    expect(decode('null', t.option(S))).toBeNull();
    expect(decode('null 1', t.option(t.record(t.f64)))).toEqual({ null: 1 });
    expect(decode('[null "a"]', t.array(t.option(t.string)))).toEqual([null, 'a']);
  });

  it('decodes a char from a one-character string', () => {
    expect(decode('"a"', t.char)).toBe('a');
    expect(decode('"\\u{1F600}"', t.char)).toBe('\u{1F600}');
    const error = failure('"abc"', t.char);
    expect(error).toBeInstanceOf(TotCoercionError);
    expect(error.message).toBe('Expected a single character, found "abc"');
  });

  it('rejects the wrong scalar kind', () => {
    expect(failure('"x"', t.bool).message).toBe('Expected a boolean, found "\\"x\\""');
    expect(failure('true', t.string).message).toBe('Expected a string, found "true"');
  });

  it('decodes f32 with single precision', () => {
    expect(decode('0.1', t.f32)).toBe(Math.fround(0.1));
  });

  it('decodes tuples', () => {
    expect(decode('[10 -123]', t.tuple(t.i32, t.i32))).toEqual([10, -123]);
    const pair = t.tuple(t.i32, t.i32);
    expect(decode('[[1 2] [3 4]]', t.tuple(pair, pair))).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it('rejects tuples of the wrong length', () => {
    expect(failure('[1]', t.tuple(t.i32, t.i32)).message).toBe('invalid length 1, expected (i32, i32) with 2 elements');
    expect(failure('[1 2 3]', t.tuple(t.i32, t.i32)).message).toBe('Expected \']\', found "3]"');
  });

  it('decodes maps with integer keys', () => {
    expect(decode('1 2\n3 4', t.map(t.i32, t.i32))).toEqual(
      new Map([
        [1, 2],
        [3, 4],
      ])
    );
  });

  it('decodes records with quoted and bare keys', () => {
    expect(decode('plain 1 "with space" 2', t.record(t.f64))).toEqual({ plain: 1, 'with space': 2 });
  });

  it('decodes an untyped document', () => {
    expect(decode('a 1\nb [true null "s"]\nc { d {} }', t.value)).toEqual({
      a: 1,
      b: [true, null, 's'],
      c: { d: {} },
    });
    expect(decode('[1 2]', t.value)).toEqual([1, 2]);
    expect(decode('"only"', t.value)).toBe('only');
    expect(decode('', t.value)).toEqual({});
  });

  it('limits nesting depth', () => {
    expect(decode('a [1]', t.value, { maxDepth: 1 })).toEqual({ a: [1] });
    expect(() => decode('[[1]]', t.value, { maxDepth: 1 })).toThrow('Maximum nesting depth exceeded (1)');
  });
});

describe('decode enums', () => {
  it('reads a unit variant from its quoted name', () => {
    expect(decode('"Unit"', Mode)).toEqual({ tag: 'Unit' });
  });

  it('reads payload variants at the root without braces', () => {
    expect(decode('Bool true', Mode)).toEqual({ tag: 'Bool', value: true });
    expect(decode('Tuple [\n    100.0\n    false\n]', Mode)).toEqual({ tag: 'Tuple', value: [100, false] });
    expect(decode('Struct {\n    string "hello"\n    integer 10.0\n}', Mode)).toEqual({
      tag: 'Struct',
      value: { string: 'hello', integer: 10 },
    });
  });

  it('reads nested variants inside braces', () => {
    const Holder = t.struct('Holder', { mode: Mode, other: Mode });
    expect(decode('mode {\n    Bool false\n}\nother "Unit"', Holder)).toEqual({
      mode: { tag: 'Bool', value: false },
      other: { tag: 'Unit' },
    });
  });

  it('rejects an unknown variant', () => {
    expect(failure('"Nope"', Mode).message).toBe(
      'unknown variant `Nope` of Mode, expected one of `Unit`, `Bool`, `Tuple`, `Struct`'
    );
  });

  it('rejects a payload variant written as a bare name', () => {
    expect(failure('"Bool"', Mode).message).toBe(
      'Expected a one-entry dict for a variant with a payload, found a quoted name'
    );
  });

  it('rejects more than one entry in a variant dict', () => {
    expect(failure('Bool true\nUnit null', Mode).message).toBe('Trailing input after document: "Unit null"');
  });
});

describe('integer coercion', () => {
  it('rounds half away from zero', () => {
    expect(roundHalfAway(2.5)).toBe(3);
    expect(roundHalfAway(-2.5)).toBe(-3);
    expect(roundHalfAway(2.4)).toBe(2);
    expect(decode('3.5', t.i32)).toBe(4);
    expect(decode('-3.5', t.i32)).toBe(-4);
  });

  it('accepts the bounds of narrow kinds', () => {
    expect(decode('-128', t.i8)).toBe(-128);
    expect(decode('127', t.i8)).toBe(127);
    expect(decode('255.4', t.u8)).toBe(255);
    expect(decode('65535', t.u16)).toBe(65535);
    expect(decode('-2147483648', t.i32)).toBe(-2147483648);
    expect(decode('4294967295', t.u32)).toBe(4294967295);
  });

  it('rejects narrow values out of range', () => {
    const error = failure('256', t.u8);
    expect(error).toBeInstanceOf(IntegerOutOfRangeError);
    expect(error.message).toBe('integer 256 is out of range for u8');
    expect(failure('-129', t.i8).message).toBe('integer -129 is out of range for i8');
    expect(failure('1e10', t.i32).message).toBe('integer 10000000000 is out of range for i32');
  });

  it('locates an out-of-range value', () => {
    const S = t.struct('S', { a: t.u8, b: t.u8 });
    const error = failure('a 1\nb 300', S);
    expect(error.location).toBe('line 2, column 3');
  });

  it('saturates negative values of unsigned kinds to zero', () => {
    expect(decode('-3', t.u8)).toBe(0);
    expect(decode('-70000', t.u32)).toBe(0);
    expect(decode('-5', t.u64)).toBe(0n);
  });

  it('saturates 64-bit kinds', () => {
    expect(decode('9223372036854775809', t.i64)).toBe(9223372036854775807n);
    expect(decode('-9223372036854775809', t.i64)).toBe(-9223372036854775808n);
    expect(decode('18446744073709551616', t.u64)).toBe(18446744073709551615n);
    expect(decode('1e30', t.i64)).toBe(9223372036854775807n);
    expect(decode('42', t.u64)).toBe(42n);
  });

  it('coerces without a document', () => {
    expect(coerceInteger(-0.4, 'i16')).toBe(0n);
    expect(() => coerceInteger(40000, 'i16')).toThrow(IntegerOutOfRangeError);
  });
});
