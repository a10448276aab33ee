// sql/buildTableSQL.ts

import type { Relation, Table } from "../model-types.js";
import { hasTag } from "../utils/tags.js";
import { quoteIdentifier as q } from "../utils/identifiers.js";
import { buildColumnSQL } from "./buildColumnSQL.js";

export const SCHEMA_HEADER =
  "-- Schema generated by sheetforge\n\nPRAGMA foreign_keys=ON;\n\n";

/** Relations that put a foreign key on this table */
export function foreignKeys(table: Table): Relation[] {
  return table.relations.filter(
    (r) => r.relationType === "belongsTo" && r.sourceTable === table.name
  );
}

export function indexName(table: string, column: string): string {
  return `idx_${table}_${column}`;
}

export function buildCreateTableSQL(table: Table): string {
  const clauses = ["id INTEGER PRIMARY KEY AUTOINCREMENT"];

  for (const col of table.columns) {
    clauses.push(buildColumnSQL(col));
  }

  for (const rel of foreignKeys(table)) {
    clauses.push(
      `FOREIGN KEY(${q(rel.foreignKey)}) REFERENCES ${q(rel.targetTable)}(id)`
    );
  }

  return `CREATE TABLE IF NOT EXISTS ${q(table.name)} (\n  ${clauses.join(
    ",\n  "
  )}\n);`;
}

/** Tagged `index` columns first, then one per belongsTo foreign key */
export function buildIndexSQL(table: Table): string[] {
  const indexed = table.columns
    .filter((c) => hasTag(c.constraints, "index"))
    .map((c) => c.name);

  const fks = foreignKeys(table).map((r) => r.foreignKey);

  return [...new Set([...indexed, ...fks])].map(
    (column) =>
      `CREATE INDEX IF NOT EXISTS ${q(indexName(table.name, column))} ON ${q(
        table.name
      )}(${q(column)});`
  );
}

/**
 * Column order matches buildCreateTableSQL, so a row converted against
 * `table.columns` binds positionally.
 */
export function buildInsertSQL(table: Table): string {
  if (table.columns.length === 0) {
    return `INSERT INTO ${q(table.name)} DEFAULT VALUES`;
  }

  const names = table.columns.map((c) => q(c.name));
  const placeholders = table.columns.map(() => "?");

  return `INSERT INTO ${q(table.name)} (${names.join(
    ", "
  )}) VALUES (${placeholders.join(", ")})`;
}

export function buildSchemaSQL(tables: readonly Table[]): string {
  let out = SCHEMA_HEADER;

  for (const table of tables) {
    out += buildCreateTableSQL(table) + "\n";
    for (const idx of buildIndexSQL(table)) {
      out += idx + "\n";
    }
    out += "\n";
  }

  return out;
}
