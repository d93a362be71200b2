/**
 * Tot serializer. Shapes push events in; the serializer checks their order and
 * hands them to a Formatter that writes text to a sink.
 */

import { TotCoercionError, TotFrameworkError, TotIoError } from './errors.js';
import { createFormatter, formatNumber, type FormatMode, type Formatter, type TextSink } from './formatter.js';
import { ShapeError, type Serializer } from './protocol.js';
import type { Shape } from './shapes.js';

export interface EncodeOptions {
  /** Output layout (default "pretty"). */
  format?: FormatMode;
  /** Max nesting depth of lists and braced dicts (default 1024). */
  maxDepth?: number;
}

const DEFAULT_MAX_DEPTH = 1024;

/** Collects output in memory. */
export class StringSink implements TextSink {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }
}

/**
 * Encode a value described by `shape` as Tot text.
 */
export function encode<T>(value: T, shape: Shape<T>, options: EncodeOptions = {}): string {
  const sink = new StringSink();
  encodeTo(sink, value, shape, options);
  return sink.toString();
}

export function encodeCompact<T>(value: T, shape: Shape<T>, options: Omit<EncodeOptions, 'format'> = {}): string {
  return encode(value, shape, { ...options, format: 'compact' });
}

/**
 * Stream a value to `sink`. A sink that throws fails the call with TotIoError.
 */
export function encodeTo<T>(sink: TextSink, value: T, shape: Shape<T>, options: EncodeOptions = {}): void {
  const ser = new TotSerializer(sink, createFormatter(options.format ?? 'pretty'), options.maxDepth);
  try {
    shape.serialize(value, ser);
    ser.finish();
  } catch (error) {
    if (error instanceof ShapeError) throw new TotFrameworkError(error.message, { cause: error });
    throw error;
  }
}

const UTF8 = new TextEncoder();

interface Frame {
  kind: 'list' | 'dict';
  count: number;
  /** A key was written and its value has not been. */
  pending: boolean;
  /** False for the implicit root dict. */
  delimited: boolean;
}

export class TotSerializer implements Serializer {
  private readonly frames: Frame[] = [];
  private readonly out: TextSink;
  private rootWritten = false;
  private nesting = 0;
  private endsWithNewline = false;
  /** UTF-8 bytes accepted by the sink so far. */
  private written = 0;

  constructor(
    sink: TextSink,
    private readonly formatter: Formatter,
    private readonly maxDepth = DEFAULT_MAX_DEPTH
  ) {
    this.out = {
      write: (chunk) => {
        if (chunk.length === 0) return;
        try {
          sink.write(chunk);
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          throw new TotIoError(`Failed to write output: ${reason}`, { byteOffset: this.written, cause: error });
        }
        this.written += UTF8.encode(chunk).length;
        this.endsWithNewline = chunk.endsWith('\n');
      },
    };
  }

  private top(): Frame | undefined {
    return this.frames[this.frames.length - 1];
  }

  /** Position the output for the next value. */
  private beforeValue(): void {
    const top = this.top();
    if (top === undefined) {
      if (this.rootWritten) throw new TotFrameworkError('A document holds a single root value');
      this.rootWritten = true;
      return;
    }
    if (top.kind === 'list') {
      this.formatter.beginListElement(this.out, top.count === 0);
      top.count++;
      return;
    }
    if (!top.pending) throw new TotFrameworkError('Dict value written without a key');
    top.pending = false;
  }

  private push(kind: Frame['kind']): void {
    const delimited = kind === 'list' || this.frames.length > 0;
    if (delimited) {
      if (this.nesting >= this.maxDepth) {
        throw new TotFrameworkError(`Maximum nesting depth exceeded (${this.maxDepth})`);
      }
      this.nesting++;
    }
    this.frames.push({ kind, count: 0, pending: false, delimited });
  }

  private pop(kind: Frame['kind']): Frame {
    const top = this.frames.pop();
    if (top === undefined || top.kind !== kind) {
      throw new TotFrameworkError(`Unbalanced end of ${kind === 'list' ? 'sequence' : 'map'}`);
    }
    if (top.delimited) this.nesting--;
    return top;
  }

  serializeUnit(): void {
    this.beforeValue();
    this.formatter.writeNull(this.out);
  }

  serializeBool(value: boolean): void {
    this.beforeValue();
    this.formatter.writeBool(this.out, value);
  }

  serializeNumber(value: number): void {
    if (!Number.isFinite(value)) throw new TotCoercionError(`Cannot write non-finite number ${value}`);
    this.beforeValue();
    this.formatter.writeNumber(this.out, value);
  }

  serializeInteger(value: number | bigint): void {
    this.serializeNumber(Number(value));
  }

  serializeString(value: string): void {
    this.beforeValue();
    this.formatter.writeString(this.out, value);
  }

  serializeChar(value: string): void {
    this.serializeString(value);
  }

  serializeNone(): void {
    this.serializeUnit();
  }

  serializeSome(write: () => void): void {
    write();
  }

  beginSeq(): void {
    this.beforeValue();
    this.formatter.beginList(this.out);
    this.push('list');
  }

  endSeq(): void {
    const frame = this.pop('list');
    this.formatter.endList(this.out, frame.count === 0);
  }

  beginMap(): void {
    this.beforeValue();
    this.formatter.beginDict(this.out);
    this.push('dict');
  }

  serializeKey(key: string): void {
    const top = this.top();
    if (top === undefined || top.kind !== 'dict') throw new TotFrameworkError(`Key ${key} written outside a dict`);
    if (top.pending) throw new TotFrameworkError(`Key ${key} written before the previous key's value`);
    this.formatter.beginDictKey(this.out, top.count === 0);
    this.formatter.writeKey(this.out, key);
    top.count++;
    top.pending = true;
  }

  endMap(): void {
    const frame = this.pop('dict');
    if (frame.pending) throw new TotFrameworkError('Dict ended after a key without a value');
    this.formatter.endDict(this.out, frame.count === 0);
  }

  keySerializer(): Serializer {
    return new KeySerializer(this);
  }

  serializeUnitVariant(name: string): void {
    this.serializeString(name);
  }

  beginVariant(name: string): void {
    this.beginMap();
    this.serializeKey(name);
  }

  endVariant(): void {
    this.endMap();
  }

  finish(): void {
    if (this.frames.length > 0) throw new TotFrameworkError('Document ended inside an open container');
    this.formatter.finish(this.out, this.endsWithNewline);
  }
}

function keyError(): TotFrameworkError {
  return new TotFrameworkError('Map keys must be strings, numbers or booleans');
}

/** Writes scalar events as the next key of the enclosing dict. */
class KeySerializer implements Serializer {
  constructor(private readonly parent: TotSerializer) {}

  serializeUnit(): void {
    throw keyError();
  }

  serializeBool(value: boolean): void {
    this.parent.serializeKey(value ? 'true' : 'false');
  }

  serializeNumber(value: number): void {
    if (!Number.isFinite(value)) throw new TotCoercionError(`Cannot write non-finite number ${value}`);
    this.parent.serializeKey(formatNumber(value));
  }

  serializeInteger(value: number | bigint): void {
    this.serializeNumber(Number(value));
  }

  serializeString(value: string): void {
    this.parent.serializeKey(value);
  }

  serializeChar(value: string): void {
    this.parent.serializeKey(value);
  }

  serializeNone(): void {
    throw keyError();
  }

  serializeSome(write: () => void): void {
    write();
  }

  beginSeq(): void {
    throw keyError();
  }

  endSeq(): void {
    throw keyError();
  }

  beginMap(): void {
    throw keyError();
  }

  serializeKey(): void {
    throw keyError();
  }

  endMap(): void {
    throw keyError();
  }

  keySerializer(): Serializer {
    return this;
  }

  serializeUnitVariant(name: string): void {
    this.parent.serializeKey(name);
  }

  beginVariant(): void {
    throw keyError();
  }

  endVariant(): void {
    throw keyError();
  }
}
