/**
 * Supported column data types
 *
 * Each type carries its tag, a runtime guard, an identity key (used for
 * uniqueness and index buckets), a JSON codec and a display formatter.
 *
 * Invariants:
 * - Two values are "the same" for a column iff their keys are equal
 * - decode(encode(v)) has the same key as v
 * - decode never throws: JSON that is not an encoding of the type comes back
 *   unchanged, so row validation reports the mismatch
 * - clone(v) has the same key as v and shares no mutable state with it
 */

import { Buffer } from "node:buffer";
import { UnsupportedTypeError } from "./errors.js";
import { canonicalKey } from "./format.js";
import type { CellValue, DataTypeTag, JsonValue } from "./types.js";

export interface DataType<T extends CellValue = CellValue> {
  readonly tag: DataTypeTag;
  /** Human-readable name used in error messages */
  readonly description: string;
  is(value: unknown): value is T;
  key(value: T): string;
  encode(value: T): JsonValue;
  decode(json: JsonValue): CellValue;
  format(value: T): string;
  /** Copy sharing no mutable state with the argument */
  clone(value: T): T;
}

/**
 * All supported tags, in declaration order
 */
export const DATA_TYPE_TAGS = [
  "integer",
  "float",
  "string",
  "list",
  "tuple",
  "mapping",
  "boolean",
  "null",
  "datetime",
  "date",
  "time",
  "decimal",
  "bytes",
  "bytearray",
  "counter",
  "ordered_mapping",
] as const satisfies readonly DataTypeTag[];

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATETIME_PREFIX = /^\d{4}-\d{2}-\d{2}T/;
const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d)(?:\.(\d{1,6}))?)?$/;
const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Check that a value survives JSON encoding unchanged
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "boolean" || typeof value === "string") {
    return true;
  }
  if (typeof value === "number") {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (isPlainObject(value)) {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

function isJsonArray(value: unknown): value is JsonValue[] {
  return Array.isArray(value) && value.every(isJsonValue);
}

function isCalendarDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  if (year < 1) return false;
  // setUTCFullYear avoids the 1900 offset Date.UTC applies to years < 100
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

function normalizeTime(value: string): string {
  const match = TIME_PATTERN.exec(value);
  if (!match) return value;
  const [, hours, minutes, seconds, fraction] = match;
  return `${hours}:${minutes}:${seconds ?? "00"}.${(fraction ?? "").padEnd(6, "0")}`;
}

function isDecimal(value: string): boolean {
  const match = DECIMAL_PATTERN.exec(value);
  // Require at least one digit in the mantissa
  return match !== null && `${match[2]}${match[3] ?? ""}`.length > 0;
}

/**
 * Numeric identity of a decimal numeral: 1.0, 1.00 and 0.1e1 share a key
 */
function normalizeDecimal(value: string): string {
  const match = DECIMAL_PATTERN.exec(value);
  if (!match) return value;
  const [, sign, whole, fraction = "", exponent = "0"] = match;
  let digits = `${whole}${fraction}`.replace(/^0+/, "");
  let scale = Number(exponent) - fraction.length;
  if (digits.length === 0) return "0";
  while (digits.endsWith("0")) {
    digits = digits.slice(0, -1);
    scale++;
  }
  return `${sign === "-" ? "-" : ""}${digits}e${scale}`;
}

function toHex(value: Uint8Array): string {
  return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("hex");
}

function toBase64(value: Uint8Array): string {
  return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("base64");
}

function formatEntries(entries: Iterable<[string, JsonValue]>): string {
  const parts = Array.from(entries, ([k, v]) => `${JSON.stringify(k)}:${JSON.stringify(v)}`);
  return `{${parts.join(",")}}`;
}

const integerType: DataType<number> = {
  tag: "integer",
  description: "integer",
  is: (value): value is number => typeof value === "number" && Number.isInteger(value),
  key: (value) => String(value),
  encode: (value) => value,
  decode: (json) => json,
  format: (value) => String(value),
  clone: (value) => value,
};

const SPECIAL_FLOATS: Record<string, number> = {
  "-0": -0,
  NaN: Number.NaN,
  Infinity: Number.POSITIVE_INFINITY,
  "-Infinity": Number.NEGATIVE_INFINITY,
};

const floatType: DataType<number> = {
  tag: "float",
  description: "float",
  is: (value): value is number => typeof value === "number",
  key: (value) => String(value),
  // JSON has no NaN or Infinity literals, and JSON.stringify writes -0 as 0
  encode: (value) => {
    if (Object.is(value, -0)) return "-0";
    return Number.isFinite(value) ? value : String(value);
  },
  decode: (json) =>
    typeof json === "string" && Object.hasOwn(SPECIAL_FLOATS, json) ? SPECIAL_FLOATS[json] : json,
  format: (value) => String(value),
  clone: (value) => value,
};

const stringType: DataType<string> = {
  tag: "string",
  description: "string",
  is: (value): value is string => typeof value === "string",
  key: (value) => value,
  encode: (value) => value,
  decode: (json) => json,
  format: (value) => value,
  clone: (value) => value,
};

const listType: DataType<JsonValue[]> = {
  tag: "list",
  description: "list (mutable array of JSON values)",
  is: (value): value is JsonValue[] => isJsonArray(value) && !Object.isFrozen(value),
  key: (value) => canonicalKey(value),
  encode: (value) => value,
  decode: (json) => json,
  format: (value) => JSON.stringify(value),
  clone: (value) => structuredClone(value),
};

const tupleType: DataType<readonly JsonValue[]> = {
  tag: "tuple",
  description: "tuple (frozen array of JSON values)",
  is: (value): value is readonly JsonValue[] => isJsonArray(value) && Object.isFrozen(value),
  key: (value) => canonicalKey(value),
  encode: (value) => [...value],
  decode: (json) => (Array.isArray(json) ? Object.freeze([...json]) : json),
  format: (value) => JSON.stringify(value),
  clone: (value) => Object.freeze(structuredClone([...value])),
};

const mappingType: DataType<{ [key: string]: JsonValue }> = {
  tag: "mapping",
  description: "mapping (plain object of JSON values)",
  is: (value): value is { [key: string]: JsonValue } =>
    isPlainObject(value) && Object.values(value).every(isJsonValue),
  key: (value) => canonicalKey(value),
  encode: (value) => value,
  decode: (json) => json,
  format: (value) => JSON.stringify(value),
  clone: (value) => structuredClone(value),
};

const booleanType: DataType<boolean> = {
  tag: "boolean",
  description: "boolean",
  is: (value): value is boolean => typeof value === "boolean",
  key: (value) => String(value),
  encode: (value) => value,
  decode: (json) => json,
  format: (value) => String(value),
  clone: (value) => value,
};

const nullType: DataType<null> = {
  tag: "null",
  description: "null",
  is: (value): value is null => value === null,
  key: () => "null",
  encode: () => null,
  decode: (json) => json,
  format: () => "null",
  clone: (value) => value,
};

const datetimeType: DataType<Date> = {
  tag: "datetime",
  description: "datetime (valid Date)",
  is: (value): value is Date => value instanceof Date && !Number.isNaN(value.getTime()),
  key: (value) => String(value.getTime()),
  encode: (value) => value.toISOString(),
  decode: (json) => {
    if (typeof json !== "string" || !ISO_DATETIME_PREFIX.test(json)) return json;
    const date = new Date(json);
    return Number.isNaN(date.getTime()) ? json : date;
  },
  format: (value) => value.toISOString(),
  clone: (value) => new Date(value.getTime()),
};

const dateType: DataType<string> = {
  tag: "date",
  description: "date (YYYY-MM-DD)",
  is: (value): value is string => typeof value === "string" && isCalendarDate(value),
  key: (value) => value,
  encode: (value) => value,
  decode: (json) => json,
  format: (value) => value,
  clone: (value) => value,
};

const timeType: DataType<string> = {
  tag: "time",
  description: "time (HH:MM[:SS[.ffffff]])",
  is: (value): value is string => typeof value === "string" && TIME_PATTERN.test(value),
  key: (value) => normalizeTime(value),
  encode: (value) => value,
  decode: (json) => json,
  format: (value) => value,
  clone: (value) => value,
};

const decimalType: DataType<string> = {
  tag: "decimal",
  description: "decimal (numeral string)",
  is: (value): value is string => typeof value === "string" && isDecimal(value),
  key: (value) => normalizeDecimal(value),
  encode: (value) => value,
  decode: (json) => json,
  format: (value) => value,
  clone: (value) => value,
};

const bytesType: DataType<Buffer> = {
  tag: "bytes",
  description: "bytes (Buffer)",
  is: (value): value is Buffer => Buffer.isBuffer(value),
  key: (value) => value.toString("hex"),
  encode: (value) => value.toString("base64"),
  decode: (json) =>
    typeof json === "string" && BASE64_PATTERN.test(json) ? Buffer.from(json, "base64") : json,
  format: (value) => value.toString("hex"),
  clone: (value) => Buffer.from(value),
};

const bytearrayType: DataType<Uint8Array> = {
  tag: "bytearray",
  description: "bytearray (Uint8Array)",
  is: (value): value is Uint8Array => value instanceof Uint8Array && !Buffer.isBuffer(value),
  key: (value) => toHex(value),
  encode: (value) => toBase64(value),
  decode: (json) =>
    typeof json === "string" && BASE64_PATTERN.test(json)
      ? new Uint8Array(Buffer.from(json, "base64"))
      : json,
  format: (value) => toHex(value),
  clone: (value) => new Uint8Array(value),
};

const counterType: DataType<ReadonlyMap<string, number>> = {
  tag: "counter",
  description: "counter (Map of string to integer)",
  is: (value): value is ReadonlyMap<string, number> =>
    value instanceof Map &&
    Array.from(value.entries()).every(
      ([k, v]) => typeof k === "string" && typeof v === "number" && Number.isInteger(v)
    ),
  // Counts are order-independent
  key: (value) => canonicalKey(Object.fromEntries(value)),
  encode: (value) => Object.fromEntries(value),
  decode: (json) => {
    if (!isPlainObject(json)) return json;
    const counts = new Map<string, number>();
    for (const [k, v] of Object.entries(json)) {
      if (typeof v !== "number" || !Number.isInteger(v)) return json;
      counts.set(k, v);
    }
    return counts;
  },
  format: (value) => formatEntries(value),
  clone: (value) => new Map(value),
};

const orderedMappingType: DataType<ReadonlyMap<string, JsonValue>> = {
  tag: "ordered_mapping",
  description: "ordered mapping (Map of string to JSON value)",
  is: (value): value is ReadonlyMap<string, JsonValue> =>
    value instanceof Map &&
    Array.from(value.entries()).every(([k, v]) => typeof k === "string" && isJsonValue(v)),
  // Entry order is part of the identity
  key: (value) => canonicalKey(Array.from(value.entries())),
  encode: (value) => Array.from(value.entries(), ([k, v]): JsonValue => [k, v]),
  decode: (json) => {
    if (!Array.isArray(json)) return json;
    const entries = new Map<string, JsonValue>();
    for (const pair of json) {
      if (!Array.isArray(pair) || pair.length !== 2) return json;
      const [k, v] = pair;
      if (typeof k !== "string") return json;
      entries.set(k, v);
    }
    return entries;
  },
  format: (value) => formatEntries(value),
  clone: (value) => structuredClone(value),
};

const REGISTRY: Record<DataTypeTag, DataType> = {
  integer: integerType,
  float: floatType,
  string: stringType,
  list: listType,
  tuple: tupleType,
  mapping: mappingType,
  boolean: booleanType,
  null: nullType,
  datetime: datetimeType,
  date: dateType,
  time: timeType,
  decimal: decimalType,
  bytes: bytesType,
  bytearray: bytearrayType,
  counter: counterType,
  ordered_mapping: orderedMappingType,
};

/**
 * Check whether a string names a supported type
 */
export function isDataTypeTag(tag: string): tag is DataTypeTag {
  return DATA_TYPE_TAGS.some((known) => known === tag);
}

/**
 * Look up a data type by tag
 * @throws UnsupportedTypeError if the tag is not in the supported set
 */
export function getDataType(tag: string): DataType {
  if (!isDataTypeTag(tag)) {
    throw new UnsupportedTypeError(tag, DATA_TYPE_TAGS);
  }
  return REGISTRY[tag];
}

/**
 * Identity key of a cell, null included
 */
export function cellKey(type: DataType, value: CellValue): string {
  return value === null ? "null" : `=${type.key(value)}`;
}

/**
 * Detached copy of a cell, null included
 */
export function cloneCell(type: DataType, value: CellValue): CellValue {
  return value === null ? null : type.clone(value);
}

/**
 * Display string of a cell, null included
 */
export function formatCell(type: DataType, value: CellValue): string {
  return value === null ? "null" : type.format(value);
}

/**
 * Short description of a value's runtime type, for error messages
 */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (Array.isArray(value)) return Object.isFrozen(value) ? "frozen array" : "array";
  if (typeof value === "object") {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === null || proto === Object.prototype) return "object";
    return Buffer.isBuffer(value) ? "Buffer" : value.constructor.name;
  }
  return typeof value;
}
