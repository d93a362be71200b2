/**
 * Tot deserializer: walks the input directly and hands values to a shape
 * without building a tree. Shares the Scanner with the value parser.
 *
 * `depth` counts entered containers, the implicit root dict included; a map or
 * enum begun at depth 0 is the implicit root and has no braces.
 */

import { TotCoercionError, TotError, TotFrameworkError, IntegerOutOfRangeError } from './errors.js';
import { Scanner } from './lexer.js';
import { DEFAULT_MAX_DEPTH, isSingleValueDocument, type ParseOptions } from './parser.js';
import {
  INTEGER_BOUNDS,
  ShapeError,
  type Deserializer,
  type IntegerKind,
  type MapAccess,
  type NarrowIntegerKind,
  type Read,
  type SeqAccess,
  type VariantAccess,
  type Visitor,
  type WideIntegerKind,
} from './protocol.js';
import type { Shape } from './shapes.js';

export type DecodeOptions = ParseOptions;

/**
 * Decode a Tot document into the type described by `shape`.
 * Fails when non-ignored input remains after the value.
 */
export function decode<T>(text: string, shape: Shape<T>, options: DecodeOptions = {}): T {
  const de = new TotDeserializer(text, options);
  try {
    const value = shape.deserialize(de);
    de.end();
    return value;
  } catch (error) {
    if (error instanceof ShapeError) {
      throw new TotFrameworkError(error.message, { position: de.scanner.position(), cause: error });
    }
    throw error;
  }
}

/** Round half away from zero. */
export function roundHalfAway(n: number): number {
  return Math.sign(n) * Math.round(Math.abs(n));
}

/**
 * Coerce a double to an integer kind. Narrow kinds reject out-of-range values,
 * 64-bit kinds saturate, and unsigned kinds take negatives as zero.
 */
export function coerceInteger(n: number, kind: IntegerKind): bigint {
  const bounds = INTEGER_BOUNDS[kind];
  const rounded = roundHalfAway(n);
  if (!bounds.signed && rounded < 0) return 0n;
  const value = BigInt(rounded);
  if (value >= bounds.min && value <= bounds.max) return value;
  if (bounds.bits < 64) throw new IntegerOutOfRangeError(kind, rounded);
  return value < bounds.min ? bounds.min : bounds.max;
}

export class TotDeserializer implements Deserializer {
  readonly scanner: Scanner;
  private readonly maxDepth: number;
  /** Entered containers, the implicit root included. */
  depth = 0;
  /** Entered brackets and braces; bounded by maxDepth. */
  private nesting = 0;

  constructor(text: string, options: DecodeOptions = {}) {
    this.scanner = new Scanner(text);
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  /** Consume trailing ignored input and require the end of the document. */
  end(): void {
    const s = this.scanner;
    s.skipIgnored();
    if (s.atEnd) return;
    const c = s.peek();
    if (c === ']' || c === '}') throw s.grammarError(`Unmatched '${c}'`);
    throw s.grammarError(`Trailing input after document: ${s.excerpt()}`);
  }

  private next(): string | undefined {
    this.scanner.skipIgnored();
    return this.scanner.peek();
  }

  private expected(what: string): TotError {
    const s = this.scanner;
    return s.grammarError(`Expected ${what}, found ${s.excerpt()}`);
  }

  private enter(explicit: boolean): void {
    if (explicit && this.nesting >= this.maxDepth) {
      throw this.scanner.grammarError(`Maximum nesting depth exceeded (${this.maxDepth})`);
    }
    this.depth++;
    if (explicit) this.nesting++;
  }

  private leave(explicit: boolean): void {
    this.depth--;
    if (explicit) this.nesting--;
  }

  deserializeAny<T>(visitor: Visitor<T>): T {
    const c = this.next();
    if (this.depth === 0 && c !== '[' && c !== '{' && !isSingleValueDocument(this.scanner, this.maxDepth)) {
      return this.deserializeMap((map) => visitor.visitMap(map));
    }
    switch (c) {
      case 'n':
        this.deserializeUnit();
        return visitor.visitUnit();
      case 't':
      case 'f':
        return visitor.visitBool(this.deserializeBool());
      case '"':
        return visitor.visitString(this.deserializeString());
      case '[':
        return this.deserializeSeq((seq) => visitor.visitSeq(seq));
      case '{':
        return this.deserializeMap((map) => visitor.visitMap(map));
      case undefined:
        throw this.scanner.grammarError('Expected a value, found end of input');
    }
    if (c === '-' || c === '+' || c === '.' || (c >= '0' && c <= '9')) {
      return visitor.visitNumber(this.deserializeNumber());
    }
    throw this.expected('a value');
  }

  deserializeUnit(): null {
    this.next();
    if (!this.scanner.matchUnit()) throw this.expected('null');
    return null;
  }

  deserializeBool(): boolean {
    this.next();
    const b = this.scanner.matchBool();
    if (b === undefined) throw this.expected('a boolean');
    return b;
  }

  deserializeNumber(): number {
    this.next();
    const n = this.scanner.matchNumber();
    if (n === undefined) throw this.expected('a number');
    return n;
  }

  deserializeF32(): number {
    return Math.fround(this.deserializeNumber());
  }

  deserializeInteger(kind: NarrowIntegerKind): number {
    return Number(this.coerce(kind));
  }

  deserializeBigInteger(kind: WideIntegerKind): bigint {
    return this.coerce(kind);
  }

  private coerce(kind: IntegerKind): bigint {
    this.next();
    const start = this.scanner.offset;
    const n = this.deserializeNumber();
    try {
      return coerceInteger(n, kind);
    } catch (error) {
      if (error instanceof TotCoercionError) {
        throw new IntegerOutOfRangeError(kind, roundHalfAway(n), { position: this.scanner.position(start) });
      }
      throw error;
    }
  }

  deserializeChar(): string {
    this.next();
    const start = this.scanner.offset;
    const s = this.deserializeString();
    if ([...s].length !== 1) {
      throw new TotCoercionError(`Expected a single character, found ${JSON.stringify(s)}`, {
        position: this.scanner.position(start),
      });
    }
    return s;
  }

  deserializeString(): string {
    this.next();
    const s = this.scanner.matchString();
    if (s === undefined) throw this.expected('a string');
    return s;
  }

  deserializeIdentifier(): string {
    this.next();
    return this.scanner.parseKey();
  }

  deserializeOption<T>(read: Read<T>): T | null {
    this.next();
    const probe = this.scanner.fork();
    // at the root, `null ...` is an implicit dict whose first key is null
    if (probe.matchUnit() && (this.depth > 0 || isSingleValueDocument(this.scanner, this.maxDepth))) {
      this.deserializeUnit();
      return null;
    }
    return read(this);
  }

  deserializeSeq<T>(visit: (seq: SeqAccess) => T): T {
    if (this.next() !== '[') throw this.expected("'['");
    const open = this.scanner.offset;
    this.enter(true);
    try {
      this.scanner.expectChar('[');
      const value = visit(new TotSeqAccess(this, open));
      if (this.next() !== ']') throw this.expected("']'");
      this.scanner.expectChar(']');
      return value;
    } finally {
      this.leave(true);
    }
  }

  deserializeMap<T>(visit: (map: MapAccess) => T): T {
    return this.withDict((implicit, open) => visit(new TotMapAccess(this, implicit, open)));
  }

  deserializeEnum<T>(visit: (name: string, variant: VariantAccess) => T): T {
    if (this.next() === '"') {
      return visit(this.deserializeString(), unitOnlyVariant(this));
    }
    return this.withDict(() => {
      const name = this.deserializeIdentifier();
      return visit(name, new TotVariantAccess(this, name));
    });
  }

  /** Enter a dict, braced unless it is the implicit root, and leave it again. */
  private withDict<T>(body: (implicit: boolean, open: number) => T): T {
    const implicit = this.depth === 0;
    if (!implicit && this.next() !== '{') throw this.expected("'{'");
    const open = this.scanner.offset;
    this.enter(!implicit);
    try {
      if (!implicit) this.scanner.expectChar('{');
      const value = body(implicit, open);
      if (!implicit) {
        if (this.next() !== '}') throw this.expected("'}'");
        this.scanner.expectChar('}');
      }
      return value;
    } finally {
      this.leave(!implicit);
    }
  }
}

class TotSeqAccess implements SeqAccess {
  constructor(
    private readonly de: TotDeserializer,
    private readonly open: number
  ) {}

  hasNextElement(): boolean {
    const s = this.de.scanner;
    s.skipIgnored();
    const c = s.peek();
    if (c === undefined) throw s.grammarError("Unmatched '['", this.open);
    if (c === '}') throw s.grammarError("Expected ']', found '}'");
    return c !== ']';
  }

  nextElement<T>(read: Read<T>): T {
    return read(this.de);
  }
}

class TotMapAccess implements MapAccess {
  private key = '';

  constructor(
    private readonly de: TotDeserializer,
    private readonly implicit: boolean,
    private readonly open: number
  ) {}

  hasNextKey(): boolean {
    const s = this.de.scanner;
    s.skipIgnored();
    const c = s.peek();
    if (this.implicit) return c !== undefined;
    if (c === undefined) throw s.grammarError("Unmatched '{'", this.open);
    if (c === ']') throw s.grammarError("Expected '}', found ']'");
    return c !== '}';
  }

  nextKey<K>(read: Read<K>): K {
    const s = this.de.scanner;
    s.skipIgnored();
    const start = s.offset;
    const key = read(new KeyDeserializer(this.de));
    this.key = s.input.slice(start, s.offset);
    return key;
  }

  nextValue<V>(read: Read<V>): V {
    const s = this.de.scanner;
    s.skipIgnored();
    const c = s.peek();
    if (c === undefined || (c === '}' && !this.implicit)) {
      throw s.grammarError(`Key ${this.key} has no value`);
    }
    return read(this.de);
  }
}

class TotVariantAccess implements VariantAccess {
  constructor(
    private readonly de: TotDeserializer,
    private readonly name: string
  ) {}

  unitVariant(): void {
    throw this.de.scanner.grammarError(`Unit variant ${this.name} must be written as a quoted name`);
  }

  newtypeVariant<T>(read: Read<T>): T {
    return read(this.de);
  }

  tupleVariant<T>(visit: (seq: SeqAccess) => T): T {
    return this.de.deserializeSeq(visit);
  }

  structVariant<T>(visit: (map: MapAccess) => T): T {
    return this.de.deserializeMap(visit);
  }
}

function unitOnlyVariant(de: TotDeserializer): VariantAccess {
  const fail = (): never => {
    throw de.scanner.grammarError('Expected a one-entry dict for a variant with a payload, found a quoted name');
  };
  return {
    unitVariant: () => undefined,
    newtypeVariant: fail,
    tupleVariant: fail,
    structVariant: fail,
  };
}

/**
 * Reads map keys: strings are keys (quoted or bare), everything else is read
 * the way a value would be.
 */
class KeyDeserializer implements Deserializer {
  constructor(private readonly de: TotDeserializer) {}

  deserializeAny<T>(visitor: Visitor<T>): T {
    return visitor.visitString(this.deserializeString());
  }

  deserializeUnit(): null {
    return this.de.deserializeUnit();
  }

  deserializeBool(): boolean {
    return this.de.deserializeBool();
  }

  deserializeNumber(): number {
    return this.de.deserializeNumber();
  }

  deserializeF32(): number {
    return this.de.deserializeF32();
  }

  deserializeInteger(kind: NarrowIntegerKind): number {
    return this.de.deserializeInteger(kind);
  }

  deserializeBigInteger(kind: WideIntegerKind): bigint {
    return this.de.deserializeBigInteger(kind);
  }

  deserializeChar(): string {
    const key = this.deserializeString();
    if ([...key].length !== 1) throw new TotCoercionError(`Expected a single character key, found ${JSON.stringify(key)}`);
    return key;
  }

  deserializeString(): string {
    return this.de.deserializeIdentifier();
  }

  deserializeIdentifier(): string {
    return this.de.deserializeIdentifier();
  }

  deserializeOption<T>(read: Read<T>): T | null {
    return this.de.deserializeOption(read);
  }

  deserializeSeq<T>(visit: (seq: SeqAccess) => T): T {
    return this.de.deserializeSeq(visit);
  }

  deserializeMap<T>(visit: (map: MapAccess) => T): T {
    return this.de.deserializeMap(visit);
  }

  deserializeEnum<T>(visit: (name: string, variant: VariantAccess) => T): T {
    return visit(this.deserializeIdentifier(), unitOnlyVariant(this.de));
  }
}
