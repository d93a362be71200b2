/**
 * Contracts of the generic serialization layer. Shapes (see shapes.ts) describe
 * user types and drive a Deserializer by pulling values from it, or a Serializer
 * by pushing events into it; the codec only implements these interfaces.
 */

/** Integer kinds narrower than 64 bits; values are numbers. */
export type NarrowIntegerKind = 'i8' | 'i16' | 'i32' | 'u8' | 'u16' | 'u32';
/** 64-bit integer kinds; values are bigints. */
export type WideIntegerKind = 'i64' | 'u64';
export type IntegerKind = NarrowIntegerKind | WideIntegerKind;

export interface IntegerBounds {
  bits: 8 | 16 | 32 | 64;
  signed: boolean;
  min: bigint;
  max: bigint;
}

export const INTEGER_BOUNDS: Readonly<Record<IntegerKind, IntegerBounds>> = {
  i8: { bits: 8, signed: true, min: -(2n ** 7n), max: 2n ** 7n - 1n },
  i16: { bits: 16, signed: true, min: -(2n ** 15n), max: 2n ** 15n - 1n },
  i32: { bits: 32, signed: true, min: -(2n ** 31n), max: 2n ** 31n - 1n },
  i64: { bits: 64, signed: true, min: -(2n ** 63n), max: 2n ** 63n - 1n },
  u8: { bits: 8, signed: false, min: 0n, max: 2n ** 8n - 1n },
  u16: { bits: 16, signed: false, min: 0n, max: 2n ** 16n - 1n },
  u32: { bits: 32, signed: false, min: 0n, max: 2n ** 32n - 1n },
  u64: { bits: 64, signed: false, min: 0n, max: 2n ** 64n - 1n },
};

/** Raised by a shape when the caller's type rejects what it was given. */
export class ShapeError extends Error {
  override readonly name = 'ShapeError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, ShapeError.prototype);
  }
}

export type Read<T> = (de: Deserializer) => T;

/** Receives whatever value `deserializeAny` finds. */
export interface Visitor<T> {
  visitUnit(): T;
  visitBool(value: boolean): T;
  visitNumber(value: number): T;
  visitString(value: string): T;
  visitSeq(seq: SeqAccess): T;
  visitMap(map: MapAccess): T;
}

export interface SeqAccess {
  /** Skips ignored input; false once the closing bracket is next. */
  hasNextElement(): boolean;
  nextElement<T>(read: Read<T>): T;
}

export interface MapAccess {
  /** Skips ignored input; false once the dict (or the implicit root) is exhausted. */
  hasNextKey(): boolean;
  nextKey<K>(read: Read<K>): K;
  nextValue<V>(read: Read<V>): V;
}

export interface VariantAccess {
  unitVariant(): void;
  newtypeVariant<T>(read: Read<T>): T;
  tupleVariant<T>(visit: (seq: SeqAccess) => T): T;
  structVariant<T>(visit: (map: MapAccess) => T): T;
}

export interface Deserializer {
  deserializeAny<T>(visitor: Visitor<T>): T;
  deserializeUnit(): null;
  deserializeBool(): boolean;
  deserializeNumber(): number;
  deserializeF32(): number;
  /** Rounds half away from zero; out-of-range values are an error. */
  deserializeInteger(kind: NarrowIntegerKind): number;
  /** Rounds half away from zero; out-of-range values saturate. */
  deserializeBigInteger(kind: WideIntegerKind): bigint;
  deserializeChar(): string;
  deserializeString(): string;
  /** A struct field or variant name. */
  deserializeIdentifier(): string;
  deserializeOption<T>(read: Read<T>): T | null;
  deserializeSeq<T>(visit: (seq: SeqAccess) => T): T;
  deserializeMap<T>(visit: (map: MapAccess) => T): T;
  deserializeEnum<T>(visit: (name: string, variant: VariantAccess) => T): T;
}

export interface Serializer {
  serializeUnit(): void;
  serializeBool(value: boolean): void;
  serializeNumber(value: number): void;
  serializeInteger(value: number | bigint): void;
  serializeString(value: string): void;
  serializeChar(value: string): void;
  serializeNone(): void;
  serializeSome(write: () => void): void;
  beginSeq(): void;
  endSeq(): void;
  beginMap(): void;
  serializeKey(key: string): void;
  endMap(): void;
  /** A serializer whose scalar events are written as the next map key. */
  keySerializer(): Serializer;
  serializeUnitVariant(name: string): void;
  /** Opens a one-entry dict keyed by the variant name; the payload follows. */
  beginVariant(name: string): void;
  endVariant(): void;
}
