/**
 * Translation between TotValue trees and JSON, YAML and TOML documents.
 */

import * as TOML from '@iarna/toml';
import * as yaml from 'js-yaml';
import {
  dictFromEntries,
  isTotBoolean,
  isTotDict,
  isTotList,
  isTotNumber,
  isTotString,
  type TotDict,
  type TotList,
  type TotValue,
} from './ast.js';
import { TotFrameworkError } from './errors.js';

export type ForeignFormat = 'json' | 'yaml' | 'toml';

export const FOREIGN_FORMATS: readonly ForeignFormat[] = ['json', 'yaml', 'toml'];

type TomlTable = Parameters<typeof TOML.stringify>[0];
type TomlValue = TomlTable[string];
type TomlFlatArray = boolean[] | number[] | string[] | TomlTable[];

function describe(path: string): string {
  return path === '' ? 'the document root' : path;
}

/**
 * Map a parsed foreign document onto Tot's value model. Dates become ISO
 * strings and bigints become doubles.
 */
export function toTotValue(input: unknown, path = ''): TotValue {
  if (input === null || input === undefined) return null;
  if (typeof input === 'boolean' || typeof input === 'string') return input;
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) throw new TotFrameworkError(`Non-finite number at ${describe(path)}`);
    return input;
  }
  if (typeof input === 'bigint') return Number(input);
  if (input instanceof Date) return input.toISOString();
  // boxed values, as some TOML readers produce
  if (input instanceof Number || input instanceof String || input instanceof Boolean) {
    return toTotValue(input.valueOf(), path);
  }
  if (Array.isArray(input)) return input.map((item: unknown, i) => toTotValue(item, `${path}[${i}]`));
  if (typeof input === 'object') {
    return dictFromEntries(
      Object.entries(input).map(([key, item]: [string, unknown]): [string, TotValue] => [
        key,
        toTotValue(item, path === '' ? key : `${path}.${key}`),
      ])
    );
  }
  throw new TotFrameworkError(`Cannot represent a ${typeof input} at ${describe(path)}`);
}

function foreignError(format: ForeignFormat, error: unknown): TotFrameworkError {
  const reason = error instanceof Error ? error.message : String(error);
  return new TotFrameworkError(`Invalid ${format.toUpperCase()} input: ${reason}`, { cause: error });
}

export function fromJson(text: string): TotValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw foreignError('json', error);
  }
  return toTotValue(parsed);
}

export function fromYaml(text: string): TotValue {
  let parsed: unknown;
  try {
    parsed = yaml.load(text);
  } catch (error) {
    throw foreignError('yaml', error);
  }
  return toTotValue(parsed);
}

export function fromToml(text: string): TotValue {
  let parsed: TomlTable;
  try {
    parsed = TOML.parse(text);
  } catch (error) {
    throw foreignError('toml', error);
  }
  return toTotValue(parsed);
}

export function toJson(value: TotValue): string {
  return JSON.stringify(value, null, 2) + '\n';
}

export function toYaml(value: TotValue): string {
  return yaml.dump(value);
}

/** TOML needs a table at the top, has no null, and wants arrays of one type. */
export function toToml(value: TotValue): string {
  if (!isTotDict(value)) throw new TotFrameworkError('TOML output needs a dict at the document root');
  return TOML.stringify(tomlTable(value, ''));
}

function tomlTable(dict: TotDict, path: string): TomlTable {
  const table: TomlTable = {};
  for (const [key, item] of Object.entries(dict)) {
    table[key] = tomlValue(item, path === '' ? key : `${path}.${key}`);
  }
  return table;
}

function tomlValue(value: TotValue, path: string): TomlValue {
  if (value === null) throw new TotFrameworkError(`TOML has no null (at ${path})`);
  if (isTotList(value)) {
    const nested = value.filter(isTotList);
    if (value.length > 0 && nested.length === value.length) {
      return nested.map((list, i) => tomlFlatArray(list, `${path}[${i}]`));
    }
    return tomlFlatArray(value, path);
  }
  if (isTotDict(value)) return tomlTable(value, path);
  return value;
}

function tomlFlatArray(list: TotList, path: string): TomlFlatArray {
  const bools = list.filter(isTotBoolean);
  if (bools.length === list.length) return bools;
  const numbers = list.filter(isTotNumber);
  if (numbers.length === list.length) return numbers;
  const strings = list.filter(isTotString);
  if (strings.length === list.length) return strings;
  const tables = list.filter(isTotDict);
  if (tables.length === list.length) return tables.map((dict, i) => tomlTable(dict, `${path}[${i}]`));
  throw new TotFrameworkError(`TOML arrays hold values of a single type (at ${path})`);
}

const READERS: Readonly<Record<ForeignFormat, (text: string) => TotValue>> = {
  json: fromJson,
  yaml: fromYaml,
  toml: fromToml,
};

const WRITERS: Readonly<Record<ForeignFormat, (value: TotValue) => string>> = {
  json: toJson,
  yaml: toYaml,
  toml: toToml,
};

export function readForeign(format: ForeignFormat, text: string): TotValue {
  return READERS[format](text);
}

export function writeForeign(format: ForeignFormat, value: TotValue): string {
  return WRITERS[format](value);
}

export function isForeignFormat(value: string): value is ForeignFormat {
  return FOREIGN_FORMATS.some((format) => format === value);
}
