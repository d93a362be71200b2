/**
 * TotValue to text. Keys that are bare tokens are emitted unquoted; strings are
 * always quoted.
 */

import type { TotValue } from './ast.js';
import { encode, type EncodeOptions } from './encoder.js';
import { parseValue, type ParseOptions } from './parser.js';
import { t } from './shapes.js';

export type StringifyOptions = EncodeOptions;

/**
 * Serialize an untyped value. A dict is written as the implicit root.
 */
export function stringify(value: TotValue, options: StringifyOptions = {}): string {
  return encode(value, t.value, options);
}

/** Parse and re-emit a document in the given layout. */
export function reformat(text: string, options: StringifyOptions & ParseOptions = {}): string {
  return stringify(parseValue(text, options), options);
}
