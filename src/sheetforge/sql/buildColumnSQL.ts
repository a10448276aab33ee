// sql/buildColumnSQL.ts

import type { Column, ScalarKind } from "../model-types.js";
import { sqlTypeString } from "../utils/canonicalType.js";
import { quoteIdentifier } from "../utils/identifiers.js";
import { getTagValue, hasTag } from "../utils/tags.js";

const NUMERIC_KINDS = new Set<ScalarKind>(["Int32", "Int64", "Float64"]);

const BARE_DEFAULTS = new Set([
  "NULL",
  "TRUE",
  "FALSE",
  "CURRENT_TIME",
  "CURRENT_DATE",
  "CURRENT_TIMESTAMP",
]);

function isNumber(v: string): boolean {
  return /^[+-]?\d+(\.\d+)?([eE][+-]?\d+)?$/.test(v);
}

function escapeLiteral(s: string) {
  return s.replace(/'/g, "''");
}

function looksLikeFunction(raw: string) {
  return /^\w+\s*\(.*\)$/.test(raw);
}

/** Render a `default:` tag value as an SQLite literal */
export function buildDefaultSQL(column: Column, raw: string): string {
  const value = raw.trim();
  const kind = column.type.isArray ? null : column.type.kind;

  // numeric
  if (kind && NUMERIC_KINDS.has(kind) && isNumber(value)) return value;

  // boolean, stored as 0/1
  if (kind === "Bool") {
    const lower = value.toLowerCase();
    if (["1", "t", "true"].includes(lower)) return "1";
    if (["0", "f", "false"].includes(lower)) return "0";
  }

  // keyword, function call or already quoted literal
  if (BARE_DEFAULTS.has(value.toUpperCase())) return value.toUpperCase();
  if (looksLikeFunction(value)) return `(${value})`;
  if (/^'.*'$/s.test(value)) return value;

  return `'${escapeLiteral(value)}'`;
}

/**
 * `<name> <type>` followed by constraint clauses, always in the order
 * NOT NULL, PRIMARY KEY, UNIQUE, DEFAULT.
 */
export function buildColumnSQL(column: Column): string {
  const parts: string[] = [];
  parts.push(quoteIdentifier(column.name));
  parts.push(sqlTypeString(column.type));

  const tags = column.constraints;
  if (hasTag(tags, "notNull")) parts.push("NOT NULL");
  if (hasTag(tags, "primaryKey")) parts.push("PRIMARY KEY");
  if (column.isUnique) parts.push("UNIQUE");

  const def = getTagValue(tags, "default");
  if (def !== undefined && def !== "") {
    parts.push(`DEFAULT ${buildDefaultSQL(column, def)}`);
  }

  return parts.join(" ");
}
