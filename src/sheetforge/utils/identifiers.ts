// utils/identifiers.ts

import { readFileSync } from "node:fs";

const SQLITE_KEYWORDS: ReadonlySet<string> = new Set(
  (
    JSON.parse(
      readFileSync(
        new URL("../../../data/sqlite-keywords.json", import.meta.url),
        "utf8"
      )
    ) as string[]
  ).map((w) => w.toLowerCase())
);

const NEEDS_QUOTES = /[\s"\-+()[\]{}.,;]/;

/** Columns the generated models always carry */
const RESERVED_COLUMN_NAMES = new Set([
  "id",
  "created_at",
  "updated_at",
  "deleted_at",
]);

export function isSqlKeyword(name: string): boolean {
  return SQLITE_KEYWORDS.has(name.toLowerCase());
}

/**
 * Quote a table, column or index name for SQLite. Every statement builder goes
 * through here so DDL, index and insert text agree on each identifier.
 */
export function quoteIdentifier(name: string): string {
  if (isSqlKeyword(name) || NEEDS_QUOTES.test(name)) {
    return `"${name.replace(/"/g, '""')}"`;
  }
  return name;
}

/**
 * "level req" -> "LevelReq". Only the first character of each word changes.
 * Used for both column and table names.
 */
export function formatName(name: string): string {
  const trimmed = String(name ?? "").trim();
  if (!trimmed) return "";

  return trimmed
    .split(/\s+/)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}

/** Compared after normalization, so `i d` and `Id` are both reserved */
export function isReservedColumnName(name: string): boolean {
  return RESERVED_COLUMN_NAMES.has(formatName(name).toLowerCase());
}
