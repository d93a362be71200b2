/**
 * Tot: a small configuration language. Typed decode/encode through shapes,
 * plus an untyped TotValue tree.
 */

export type { SourcePosition, TotDict, TotList, TotValue } from './ast.js';
export { isTotBoolean, isTotDict, isTotList, isTotNumber, isTotString, isTotUnit } from './ast.js';
export {
  IntegerOutOfRangeError,
  TotCoercionError,
  TotError,
  TotFrameworkError,
  TotGrammarError,
  TotIoError,
  TotLexicalError,
  type TotErrorKind,
} from './errors.js';
export { DEFAULT_MAX_DEPTH, parseValue, type ParseOptions } from './parser.js';
export { coerceInteger, decode, roundHalfAway, TotDeserializer, type DecodeOptions } from './decoder.js';
export { encode, encodeCompact, encodeTo, StringSink, TotSerializer, type EncodeOptions } from './encoder.js';
export {
  CompactFormatter,
  createFormatter,
  formatNumber,
  PrettyFormatter,
  quoteString,
  type FormatMode,
  type Formatter,
  type TextSink,
} from './formatter.js';
export { reformat, stringify, type StringifyOptions } from './stringify.js';
export { t, variant, type Infer, type Shape, type StructOptions, type VariantShape } from './shapes.js';
export { INTEGER_BOUNDS, ShapeError, type Deserializer, type IntegerKind, type Serializer } from './protocol.js';
export {
  fromJson,
  fromToml,
  fromYaml,
  toJson,
  toToml,
  toTotValue,
  toYaml,
  type ForeignFormat,
} from './convert.js';
