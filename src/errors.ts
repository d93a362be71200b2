/**
 * Tot errors. Every codec failure is one of five kinds; callers match on `kind`
 * or on the subclass.
 */

import type { SourcePosition } from './ast.js';
import type { IntegerKind } from './protocol.js';

export type TotErrorKind = 'lexical' | 'grammar' | 'coercion' | 'framework' | 'io';

type ConstructorOptions = { position?: SourcePosition; byteOffset?: number; cause?: unknown };

export abstract class TotError extends Error {
  override readonly name: string = 'TotError';
  abstract readonly kind: TotErrorKind;
  readonly position?: SourcePosition;
  readonly byteOffset?: number;

  constructor(message: string, options?: ConstructorOptions) {
    super(message);
    this.position = options?.position;
    this.byteOffset = options?.byteOffset;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    if (this.position) {
      return `line ${this.position.line}, column ${this.position.column}`;
    }
    if (this.byteOffset !== undefined) {
      return `byte offset ${this.byteOffset}`;
    }
    return '';
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.message} (${loc})` : this.message;
  }
}

/** Malformed token: unterminated string, bad escape, bad number. */
export class TotLexicalError extends TotError {
  override readonly name = 'TotLexicalError';
  readonly kind = 'lexical';
}

/** Structural mismatch: wrong delimiter, trailing input, key without value. */
export class TotGrammarError extends TotError {
  override readonly name = 'TotGrammarError';
  readonly kind = 'grammar';
}

export class TotCoercionError extends TotError {
  override readonly name: string = 'TotCoercionError';
  readonly kind = 'coercion';
}

/** A rounded number that does not fit an integer kind narrower than 64 bits. */
export class IntegerOutOfRangeError extends TotCoercionError {
  override readonly name = 'IntegerOutOfRangeError';
  readonly target: IntegerKind;
  readonly value: number;

  constructor(target: IntegerKind, value: number, options?: ConstructorOptions) {
    super(`integer ${value} is out of range for ${target}`, options);
    this.target = target;
    this.value = value;
  }
}

/** The caller's shape rejected the structure it was given. */
export class TotFrameworkError extends TotError {
  override readonly name = 'TotFrameworkError';
  readonly kind = 'framework';
}

/** The output sink failed during emission. */
export class TotIoError extends TotError {
  override readonly name = 'TotIoError';
  readonly kind = 'io';
}
