/**
 * Shapes: declarations of how a TypeScript type is read from a Deserializer and
 * written to a Serializer.
 *
 * ```ts
 * const Config = t.struct('Config', {
 *   name: t.string,
 *   port: t.u16,
 *   tags: t.array(t.string),
 *   mode: t.enumeration('Mode', variant.unit('Fast'), variant.newtype('Limit', t.u32)),
 * });
 * type Config = Infer<typeof Config>;
 * ```
 */

import { dictFromEntries, type TotDict, type TotValue } from './ast.js';
import {
  ShapeError,
  type Deserializer,
  type MapAccess,
  type NarrowIntegerKind,
  type SeqAccess,
  type Serializer,
  type VariantAccess,
  type Visitor,
  type WideIntegerKind,
} from './protocol.js';

export interface Shape<T> {
  readonly name: string;
  /** Set by `t.option`: a struct field of this shape may be left out. */
  readonly optional?: boolean;
  deserialize(de: Deserializer): T;
  serialize(value: T, ser: Serializer): void;
}

export type Infer<S> = S extends Shape<infer T> ? T : never;

export type Fields = { readonly [field: string]: Shape<unknown> };

export type StructValue<F extends Fields> = { -readonly [K in keyof F]: Infer<F[K]> };

export type TupleValue<S extends readonly Shape<unknown>[]> = { -readonly [K in keyof S]: Infer<S[K]> };

export interface StructOptions {
  /** Skip keys that name no field instead of failing (default false). */
  allowUnknownFields?: boolean;
}

function defineShape<T>(
  name: string,
  deserialize: (de: Deserializer) => T,
  serialize: (value: T, ser: Serializer) => void
): Shape<T> {
  return { name, deserialize, serialize };
}

function narrowInteger(kind: NarrowIntegerKind): Shape<number> {
  return defineShape(
    kind,
    (de) => de.deserializeInteger(kind),
    (value, ser) => {
      if (!Number.isInteger(value)) throw new ShapeError(`${kind} value must be an integer, got ${value}`);
      ser.serializeInteger(value);
    }
  );
}

function wideInteger(kind: WideIntegerKind): Shape<bigint> {
  return defineShape(
    kind,
    (de) => de.deserializeBigInteger(kind),
    (value, ser) => ser.serializeInteger(value)
  );
}

const valueVisitor: Visitor<TotValue> = {
  visitUnit: () => null,
  visitBool: (value) => value,
  visitNumber: (value) => value,
  visitString: (value) => value,
  visitSeq(seq) {
    const list: TotValue[] = [];
    while (seq.hasNextElement()) list.push(seq.nextElement((d) => d.deserializeAny(valueVisitor)));
    return list;
  },
  visitMap(map) {
    const entries: [string, TotValue][] = [];
    while (map.hasNextKey()) {
      const key = map.nextKey((d) => d.deserializeString());
      entries.push([key, map.nextValue((d) => d.deserializeAny(valueVisitor))]);
    }
    return dictFromEntries(entries);
  },
};

function writeValue(value: TotValue, ser: Serializer): void {
  if (value === null) ser.serializeUnit();
  else if (typeof value === 'boolean') ser.serializeBool(value);
  else if (typeof value === 'number') ser.serializeNumber(value);
  else if (typeof value === 'string') ser.serializeString(value);
  else if (Array.isArray(value)) {
    ser.beginSeq();
    for (const item of value) writeValue(item, ser);
    ser.endSeq();
  } else {
    writeDict(value, ser);
  }
}

function writeDict(dict: TotDict, ser: Serializer): void {
  ser.beginMap();
  for (const [key, item] of Object.entries(dict)) {
    ser.serializeKey(key);
    writeValue(item, ser);
  }
  ser.endMap();
}

function readTuple<S extends readonly Shape<unknown>[]>(name: string, shapes: S, seq: SeqAccess): TupleValue<S> {
  const items: unknown[] = [];
  for (const shape of shapes) {
    if (!seq.hasNextElement()) {
      throw new ShapeError(`invalid length ${items.length}, expected ${name} with ${shapes.length} elements`);
    }
    items.push(seq.nextElement((d) => shape.deserialize(d)));
  }
  // one element per shape, in order
  return items as TupleValue<S>;
}

function writeTuple<S extends readonly Shape<unknown>[]>(shapes: S, value: TupleValue<S>, ser: Serializer): void {
  const items: readonly unknown[] = value;
  if (items.length !== shapes.length) {
    throw new ShapeError(`invalid length ${items.length}, expected ${shapes.length} elements`);
  }
  ser.beginSeq();
  shapes.forEach((shape, i) => shape.serialize(items[i], ser));
  ser.endSeq();
}

function readStruct<F extends Fields>(name: string, fields: F, map: MapAccess, options: StructOptions): StructValue<F> {
  const found = new Map<string, unknown>();
  while (map.hasNextKey()) {
    const key = map.nextKey((d) => d.deserializeIdentifier());
    const field = Object.hasOwn(fields, key) ? fields[key] : undefined;
    if (field === undefined) {
      if (options.allowUnknownFields !== true) {
        const expected = Object.keys(fields).map((f) => `\`${f}\``).join(', ');
        throw new ShapeError(`unknown field \`${key}\` in ${name}, expected one of ${expected}`);
      }
      map.nextValue((d) => d.deserializeAny(valueVisitor));
      continue;
    }
    found.set(key, map.nextValue((d) => field.deserialize(d)));
  }
  const table: Fields = fields;
  for (const [key, field] of Object.entries(table)) {
    if (found.has(key)) continue;
    if (field.optional !== true) throw new ShapeError(`missing field \`${key}\` in ${name}`);
    found.set(key, null);
  }
  // every declared field is present and was read with its own shape
  return Object.fromEntries(found) as StructValue<F>;
}

function writeStruct<F extends Fields>(fields: F, value: StructValue<F>, ser: Serializer): void {
  const record: Readonly<Record<string, unknown>> = value;
  const table: Fields = fields;
  ser.beginMap();
  for (const [key, field] of Object.entries(table)) {
    const item = record[key];
    if (item === undefined && field.optional !== true) throw new ShapeError(`missing field \`${key}\``);
    ser.serializeKey(key);
    field.serialize(item ?? null, ser);
  }
  ser.endMap();
}

export type Tagged = { readonly tag: string };

/** One variant of an enumeration; `tag` is the variant name on the wire. */
export interface VariantShape<V extends Tagged> {
  readonly tag: V['tag'];
  read(access: VariantAccess): V;
  write(value: V, ser: Serializer): void;
}

export type VariantValue<V> = V extends VariantShape<infer E extends Tagged> ? E : never;

export const variant = {
  /** Written as the quoted variant name. */
  unit<const N extends string>(tag: N): VariantShape<{ readonly tag: N }> {
    return {
      tag,
      read(access) {
        access.unitVariant();
        return { tag };
      },
      write(_value, ser) {
        ser.serializeUnitVariant(tag);
      },
    };
  },

  /** Written as `{ Name payload }`. */
  newtype<const N extends string, T>(tag: N, shape: Shape<T>): VariantShape<{ readonly tag: N; readonly value: T }> {
    return {
      tag,
      read: (access) => ({ tag, value: access.newtypeVariant((d) => shape.deserialize(d)) }),
      write(value, ser) {
        ser.beginVariant(tag);
        shape.serialize(value.value, ser);
        ser.endVariant();
      },
    };
  },

  /** Written as `{ Name [ ... ] }`. */
  tuple<const N extends string, const S extends readonly Shape<unknown>[]>(
    tag: N,
    ...shapes: S
  ): VariantShape<{ readonly tag: N; readonly value: TupleValue<S> }> {
    return {
      tag,
      read: (access) => ({ tag, value: access.tupleVariant((seq) => readTuple(tag, shapes, seq)) }),
      write(value, ser) {
        ser.beginVariant(tag);
        writeTuple(shapes, value.value, ser);
        ser.endVariant();
      },
    };
  },

  /** Written as `{ Name { field value ... } }`. */
  struct<const N extends string, F extends Fields>(
    tag: N,
    fields: F
  ): VariantShape<{ readonly tag: N; readonly value: StructValue<F> }> {
    return {
      tag,
      read: (access) => ({ tag, value: access.structVariant((map) => readStruct(tag, fields, map, {})) }),
      write(value, ser) {
        ser.beginVariant(tag);
        writeStruct(fields, value.value, ser);
        ser.endVariant();
      },
    };
  },
};

export const t = {
  unit: defineShape<null>(
    'unit',
    (de) => de.deserializeUnit(),
    (_value, ser) => ser.serializeUnit()
  ),
  bool: defineShape<boolean>(
    'bool',
    (de) => de.deserializeBool(),
    (value, ser) => ser.serializeBool(value)
  ),
  i8: narrowInteger('i8'),
  i16: narrowInteger('i16'),
  i32: narrowInteger('i32'),
  i64: wideInteger('i64'),
  u8: narrowInteger('u8'),
  u16: narrowInteger('u16'),
  u32: narrowInteger('u32'),
  u64: wideInteger('u64'),
  f32: defineShape<number>(
    'f32',
    (de) => de.deserializeF32(),
    (value, ser) => ser.serializeNumber(Math.fround(value))
  ),
  f64: defineShape<number>(
    'f64',
    (de) => de.deserializeNumber(),
    (value, ser) => ser.serializeNumber(value)
  ),
  char: defineShape<string>(
    'char',
    (de) => de.deserializeChar(),
    (value, ser) => {
      if ([...value].length !== 1) throw new ShapeError(`char must be one character, got ${JSON.stringify(value)}`);
      ser.serializeChar(value);
    }
  ),
  string: defineShape<string>(
    'string',
    (de) => de.deserializeString(),
    (value, ser) => ser.serializeString(value)
  ),
  /** Any Tot value, untyped. */
  value: defineShape<TotValue>('value', (de) => de.deserializeAny(valueVisitor), writeValue),

  option<T>(inner: Shape<T>): Shape<T | null> {
    return {
      name: `option<${inner.name}>`,
      optional: true,
      deserialize: (de) => de.deserializeOption((d) => inner.deserialize(d)),
      serialize(value, ser) {
        if (value === null) ser.serializeNone();
        else ser.serializeSome(() => inner.serialize(value, ser));
      },
    };
  },

  array<T>(item: Shape<T>): Shape<T[]> {
    return defineShape(
      `array<${item.name}>`,
      (de) =>
        de.deserializeSeq((seq) => {
          const items: T[] = [];
          while (seq.hasNextElement()) items.push(seq.nextElement((d) => item.deserialize(d)));
          return items;
        }),
      (value, ser) => {
        ser.beginSeq();
        for (const v of value) item.serialize(v, ser);
        ser.endSeq();
      }
    );
  },

  tuple<const S extends readonly Shape<unknown>[]>(...shapes: S): Shape<TupleValue<S>> {
    const name = `(${shapes.map((s) => s.name).join(', ')})`;
    return defineShape(
      name,
      (de) => de.deserializeSeq((seq) => readTuple(name, shapes, seq)),
      (value, ser) => writeTuple(shapes, value, ser)
    );
  },

  /** A dict with string keys and values of one shape. */
  record<V>(valueShape: Shape<V>): Shape<Record<string, V>> {
    return defineShape(
      `record<${valueShape.name}>`,
      (de) =>
        de.deserializeMap((map) => {
          const entries: [string, V][] = [];
          while (map.hasNextKey()) {
            const key = map.nextKey((d) => d.deserializeString());
            entries.push([key, map.nextValue((d) => valueShape.deserialize(d))]);
          }
          return Object.fromEntries(entries);
        }),
      (value, ser) => {
        ser.beginMap();
        for (const [key, v] of Object.entries(value)) {
          ser.serializeKey(key);
          valueShape.serialize(v, ser);
        }
        ser.endMap();
      }
    );
  },

  /** A dict whose keys have their own shape, e.g. `t.map(t.i32, t.string)`. */
  map<K, V>(keyShape: Shape<K>, valueShape: Shape<V>): Shape<Map<K, V>> {
    return defineShape(
      `map<${keyShape.name}, ${valueShape.name}>`,
      (de) =>
        de.deserializeMap((map) => {
          const out = new Map<K, V>();
          while (map.hasNextKey()) {
            const key = map.nextKey((d) => keyShape.deserialize(d));
            out.set(key, map.nextValue((d) => valueShape.deserialize(d)));
          }
          return out;
        }),
      (value, ser) => {
        ser.beginMap();
        for (const [key, v] of value) {
          keyShape.serialize(key, ser.keySerializer());
          valueShape.serialize(v, ser);
        }
        ser.endMap();
      }
    );
  },

  struct<F extends Fields>(name: string, fields: F, options: StructOptions = {}): Shape<StructValue<F>> {
    return defineShape(
      name,
      (de) => de.deserializeMap((map) => readStruct(name, fields, map, options)),
      (value, ser) => writeStruct(fields, value, ser)
    );
  },

  /** A named wrapper that is written exactly like its inner value. */
  newtype<T>(name: string, inner: Shape<T>): Shape<T> {
    return { ...inner, name };
  },

  /** A named type with no fields, written as `null`. */
  unitStruct(name: string): Shape<null> {
    return defineShape<null>(
      name,
      (de) => de.deserializeUnit(),
      (_value, ser) => ser.serializeUnit()
    );
  },

  enumeration<const V extends readonly VariantShape<Tagged>[]>(
    name: string,
    ...variants: V
  ): Shape<VariantValue<V[number]>> {
    const byTag = new Map(variants.map((v): [string, VariantShape<Tagged>] => [v.tag, v]));
    const expected = variants.map((v) => `\`${v.tag}\``).join(', ');
    const lookup = (tag: string): VariantShape<Tagged> => {
      const v = byTag.get(tag);
      if (v === undefined) throw new ShapeError(`unknown variant \`${tag}\` of ${name}, expected one of ${expected}`);
      return v;
    };
    return defineShape(
      name,
      // the variant found under `tag` produced the value
      (de) => de.deserializeEnum((tag, access) => lookup(tag).read(access) as VariantValue<V[number]>),
      (value, ser) => lookup(value.tag).write(value, ser)
    );
  },
};
