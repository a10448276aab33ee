// values/valueParser.ts

import type { Column, ColumnType, ScalarKind } from "../model-types.js";
import { ValueParseError } from "../errors.js";

export type ScalarValue =
  | { kind: "Int32"; value: number }
  | { kind: "Int64"; value: bigint }
  | { kind: "Float64"; value: number }
  | { kind: "Bool"; value: boolean }
  | { kind: "String"; value: string }
  | { kind: "DateTime"; value: Date }
  | { kind: "Bytes"; value: Uint8Array };

export interface ArrayValue {
  kind: "Array";
  values: ScalarValue[];
}

export type Value = ScalarValue | ArrayValue;

/** What a prepared statement receives */
export type StorageValue = number | bigint | string | Buffer | null;

export interface ValueParser {
  readonly column: string;
  readonly type: ColumnType;
  parse(raw: string): Value;
}

/* ===================================================== */
/* ZERO VALUES                                           */
/* ===================================================== */

function zeroTime(): Date {
  const d = new Date(0);
  d.setUTCFullYear(1, 0, 1);
  return d;
}

const ZERO_TIME_MS = zeroTime().getTime();

export function zeroValue(kind: ScalarKind): ScalarValue {
  switch (kind) {
    case "Int32":
      return { kind, value: 0 };
    case "Int64":
      return { kind, value: 0n };
    case "Float64":
      return { kind, value: 0 };
    case "Bool":
      return { kind, value: false };
    case "String":
      return { kind, value: "" };
    case "DateTime":
      return { kind, value: zeroTime() };
    case "Bytes":
      return { kind, value: new Uint8Array(0) };
  }
}

export function isZero(v: Value): boolean {
  switch (v.kind) {
    case "Int32":
    case "Float64":
      return v.value === 0;
    case "Int64":
      return v.value === 0n;
    case "Bool":
      return !v.value;
    case "String":
      return v.value === "";
    case "DateTime":
      return v.value.getTime() === ZERO_TIME_MS;
    case "Bytes":
      return v.value.length === 0;
    case "Array":
      return v.values.length === 0;
  }
}

/* ===================================================== */
/* SCALAR CONVERTERS                                     */
/* ===================================================== */

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

function parseInteger(s: string, min: bigint, max: bigint): bigint {
  if (!/^[+-]?\d+$/.test(s)) {
    throw new Error(`invalid integer '${s}'`);
  }
  const n = BigInt(s.startsWith("+") ? s.slice(1) : s);
  if (n < min || n > max) {
    throw new Error(`integer '${s}' out of range`);
  }
  return n;
}

function parseFloat64(s: string): number {
  const special = /^([+-]?)(inf|infinity|nan)$/i.exec(s);
  if (special) {
    if (special[2]?.toLowerCase() === "nan") return Number.NaN;
    return special[1] === "-" ? -Infinity : Infinity;
  }

  if (!/^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/.test(s)) {
    throw new Error(`invalid number '${s}'`);
  }

  const n = Number(s);
  if (!Number.isFinite(n)) {
    throw new Error(`number '${s}' out of range`);
  }
  return n;
}

const TRUE_STRINGS = new Set(["1", "t", "T", "true", "TRUE", "True"]);
const FALSE_STRINGS = new Set(["0", "f", "F", "false", "FALSE", "False"]);

function parseBool(s: string): boolean {
  if (TRUE_STRINGS.has(s)) return true;
  if (FALSE_STRINGS.has(s)) return false;
  throw new Error(`invalid boolean '${s}'`);
}

/*
 * Tried in order, first match wins. Values without a zone marker are read as
 * UTC wall-clock time, the same as values ending in Z.
 */
const DATE_FORMATS: readonly RegExp[] = [
  // 2024-01-02 15:04:05[.fff]
  /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?$/,
  /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?Z$/,
  // 2024-01-02T15:04:05[.fff]
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?$/,
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?Z$/,
  // 2024-01-02
  /^(\d{4})-(\d{2})-(\d{2})$/,
];

function toUtcDate(parts: readonly (string | undefined)[]): Date | null {
  const num = (i: number) => Number(parts[i] ?? 0);
  const [y, mo, d, h, mi, s] = [num(0), num(1), num(2), num(3), num(4), num(5)];
  const ms = Number(((parts[6] ?? "") + "000").slice(0, 3));

  if (mo < 1 || mo > 12 || d < 1 || h > 23 || mi > 59 || s > 59) return null;

  const date = new Date(0);
  date.setUTCFullYear(y, mo - 1, d);
  date.setUTCHours(h, mi, s, ms);

  // Feb 30 and friends roll over into the next month
  if (date.getUTCMonth() !== mo - 1 || date.getUTCDate() !== d) return null;
  return date;
}

export function parseDateTime(s: string): Date {
  for (const pattern of DATE_FORMATS) {
    const m = pattern.exec(s);
    if (!m) continue;

    const date = toUtcDate(m.slice(1));
    if (date) return date;
  }
  throw new Error(`failed to parse date '${s}'`);
}

const CONVERTERS: { [K in ScalarKind]: (s: string) => ScalarValue } = {
  Int32: (s) => ({
    kind: "Int32",
    value: Number(parseInteger(s, INT32_MIN, INT32_MAX)),
  }),
  Int64: (s) => ({ kind: "Int64", value: parseInteger(s, INT64_MIN, INT64_MAX) }),
  Float64: (s) => ({ kind: "Float64", value: parseFloat64(s) }),
  Bool: (s) => ({ kind: "Bool", value: parseBool(s) }),
  String: (s) => ({ kind: "String", value: s }),
  DateTime: (s) => ({ kind: "DateTime", value: parseDateTime(s) }),
  Bytes: (s) => ({ kind: "Bytes", value: Buffer.from(s, "utf8") }),
};

/* ===================================================== */
/* PARSERS                                               */
/* ===================================================== */

export class ScalarParser implements ValueParser {
  readonly type: ColumnType;

  constructor(readonly column: string, readonly kind: ScalarKind) {
    this.type = { isArray: false, kind };
  }

  parse(raw: string): ScalarValue {
    const s = String(raw ?? "").trim();
    if (s === "") return zeroValue(this.kind);

    try {
      return CONVERTERS[this.kind](s);
    } catch (err) {
      throw new ValueParseError(
        this.column,
        s,
        err instanceof Error ? err.message : String(err)
      );
    }
  }
}

/**
 * Comma separated elements, each parsed by the base parser. Zero elements are
 * dropped.
 */
export class ArrayParser implements ValueParser {
  readonly type: ColumnType;
  private readonly base: ScalarParser;

  constructor(readonly column: string, baseKind: ScalarKind) {
    this.base = new ScalarParser(column, baseKind);
    this.type = { isArray: true, baseType: { isArray: false, kind: baseKind } };
  }

  /** One element; non-finite numbers have no JSON form */
  parseElement(raw: string): ScalarValue {
    const v = this.base.parse(raw);
    if (v.kind === "Float64" && !Number.isFinite(v.value)) {
      throw new ValueParseError(
        this.column,
        String(raw ?? "").trim(),
        `number '${String(raw ?? "").trim()}' cannot be stored in an array`
      );
    }
    return v;
  }

  parse(raw: string): ArrayValue {
    const values: ScalarValue[] = [];
    for (const item of String(raw ?? "").split(",")) {
      const v = this.parseElement(item);
      if (!isZero(v)) values.push(v);
    }
    return { kind: "Array", values };
  }
}

/** Chosen once per column, not per row */
export function createParser(column: Column): ValueParser {
  if (column.type.isArray) {
    return new ArrayParser(column.name, column.type.baseType.kind);
  }
  return new ScalarParser(column.name, column.type.kind);
}

/* ===================================================== */
/* STORAGE                                               */
/* ===================================================== */

function encodeElement(v: ScalarValue): string {
  switch (v.kind) {
    case "Int64":
      return v.value.toString();
    case "DateTime":
      return JSON.stringify(v.value.toISOString());
    case "Bytes":
      return JSON.stringify(Buffer.from(v.value).toString("base64"));
    case "Float64":
      if (!Number.isFinite(v.value)) {
        throw new RangeError(`number ${v.value} cannot be stored in an array`);
      }
      return JSON.stringify(v.value);
    default:
      return JSON.stringify(v.value);
  }
}

/**
 * JSON array text; Int64 elements are written as bare digits.
 * @throws RangeError for a non-finite Float64 element
 */
export function encodeArray(values: readonly ScalarValue[]): string {
  return `[${values.map(encodeElement).join(",")}]`;
}

export function toStorageValue(v: Value): StorageValue {
  switch (v.kind) {
    case "Int32":
    case "Float64":
    case "Int64":
    case "String":
      return v.value;
    case "Bool":
      return v.value ? 1 : 0;
    case "DateTime":
      return v.value.toISOString();
    case "Bytes":
      return Buffer.from(v.value);
    case "Array":
      return encodeArray(v.values);
  }
}
