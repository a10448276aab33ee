// utils/canonicalType.ts

import type {
  ColumnType,
  ScalarColumnType,
  ScalarKind,
  StorageType,
} from "../model-types.js";

const ARRAY_PREFIX = "array<";

const SYNONYMS: Record<string, ScalarKind> = {
  // INTEGER FAMILY
  int: "Int32",
  int32: "Int32",
  integer: "Int32",
  int64: "Int64",
  bigint: "Int64",

  // FLOATING POINT
  float: "Float64",
  float64: "Float64",
  double: "Float64",

  // BOOLEAN
  bool: "Bool",
  boolean: "Bool",

  // TIME / DATE
  time: "DateTime",
  datetime: "DateTime",
  timestamp: "DateTime",
  date: "DateTime",

  // BINARY
  "[]byte": "Bytes",
  blob: "Bytes",

  // TEXT
  string: "String",
  text: "String",
  varchar: "String",
};

const STORAGE: Record<ScalarKind, StorageType> = {
  Int32: "INTEGER",
  Int64: "BIGINT",
  Float64: "REAL",
  Bool: "BOOLEAN",
  String: "TEXT",
  DateTime: "DATETIME",
  Bytes: "BLOB",
};

const TS_TYPES: Record<ScalarKind, string> = {
  Int32: "number",
  Int64: "bigint",
  Float64: "number",
  Bool: "boolean",
  String: "string",
  DateTime: "string",
  Bytes: "Uint8Array",
};

export function scalarType(kind: ScalarKind): ScalarColumnType {
  return { isArray: false, kind };
}

/**
 * Inner type string of an `array<...>` declaration, or null when the
 * declaration is not an array. A missing closing `>` is tolerated.
 */
export function arrayElementType(typeStr: string): string | null {
  const t = typeStr.trim().toLowerCase();
  if (!t.startsWith(ARRAY_PREFIX)) return null;

  const inner = t.slice(ARRAY_PREFIX.length);
  return inner.endsWith(">") ? inner.slice(0, -1) : inner;
}

/**
 * Resolve a declared type string. Unknown tokens resolve to String so a typo
 * in one header cell never fails the sheet.
 */
export function parseColumnType(typeStr: string): ColumnType {
  const t = String(typeStr ?? "").trim().toLowerCase();

  if (t.startsWith(ARRAY_PREFIX) && t.endsWith(">")) {
    const inner = parseColumnType(t.slice(ARRAY_PREFIX.length, -1));
    return {
      isArray: true,
      baseType: inner.isArray ? inner.baseType : inner,
    };
  }

  return scalarType(SYNONYMS[t] ?? "String");
}

export function sqlTypeString(type: ColumnType): StorageType {
  if (type.isArray) return "TEXT";
  return STORAGE[type.kind];
}

export function tsTypeString(type: ColumnType): string {
  if (type.isArray) return `${TS_TYPES[type.baseType.kind]}[]`;
  return TS_TYPES[type.kind];
}

/** Human readable form, e.g. `array<Int32>` */
export function describeType(type: ColumnType): string {
  return type.isArray ? `array<${type.baseType.kind}>` : type.kind;
}
