/**
 * Tot value types and source positions.
 * A parsed tree is immutable once returned; dict key order is not significant.
 */

export interface SourcePosition {
  line: number;
  column: number;
  offset: number;
}

/** Unit is `null`; Number is always a double. */
export type TotValue =
  | TotDict
  | TotList
  | string
  | number
  | boolean
  | null;

export interface TotDict {
  [key: string]: TotValue;
}

export type TotList = TotValue[];

/** Type guard for dict (and not list, which is also typeof 'object') */
export function isTotDict(v: TotValue): v is TotDict {
  return typeof v === 'object' && v !== null && Array.isArray(v) === false;
}

export function isTotList(v: TotValue): v is TotList {
  return Array.isArray(v);
}

export function isTotString(v: TotValue): v is string {
  return typeof v === 'string';
}

export function isTotNumber(v: TotValue): v is number {
  return typeof v === 'number';
}

export function isTotBoolean(v: TotValue): v is boolean {
  return typeof v === 'boolean';
}

export function isTotUnit(v: TotValue): v is null {
  return v === null;
}

/**
 * Build a dict from key/value pairs. Later pairs overwrite earlier ones, and a
 * `__proto__` key becomes an ordinary own property.
 */
export function dictFromEntries(entries: Iterable<readonly [string, TotValue]>): TotDict {
  return Object.fromEntries(entries);
}

/** 1-based line and column for a UTF-16 offset into `text`. */
export function positionAt(text: string, offset: number): SourcePosition {
  let line = 1;
  let lineStart = 0;
  const end = Math.min(offset, text.length);
  for (let i = 0; i < end; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: end - lineStart + 1, offset: end };
}
