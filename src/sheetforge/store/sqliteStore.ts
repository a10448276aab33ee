// store/sqliteStore.ts

import Database from "better-sqlite3";

import type { Table } from "../model-types.js";
import type { CellParseError } from "../errors.js";
import { convertRows, type ConvertedRow } from "../values/convertRows.js";
import {
  buildCreateTableSQL,
  buildIndexSQL,
  buildInsertSQL,
} from "../sql/buildTableSQL.js";

export interface PopulateResult {
  /** rows written per table */
  inserted: Record<string, number>;
  errors: CellParseError[];
}

/**
 * SQLite sink. Statements come from the same builders that write schema.sql,
 * so the database and the schema file never disagree.
 */
export class SqliteStore {
  readonly db: Database.Database;

  constructor(filename = ":memory:") {
    this.db = new Database(filename);
    this.db.pragma("foreign_keys = ON");
  }

  /** Idempotent: every statement is IF NOT EXISTS */
  applySchema(tables: readonly Table[]): void {
    const apply = this.db.transaction(() => {
      for (const table of tables) {
        this.db.exec(buildCreateTableSQL(table));
        for (const idx of buildIndexSQL(table)) this.db.exec(idx);
      }
    });
    apply();
  }

  insertRows(table: Table, rows: readonly ConvertedRow[]): number {
    const stmt = this.db.prepare(buildInsertSQL(table));
    const insert = this.db.transaction((batch: readonly ConvertedRow[]) => {
      for (const row of batch) stmt.run(...row.values);
      return batch.length;
    });
    return insert(rows);
  }

  /** Convert and insert every table's rows; failed cells are stored as NULL */
  populate(tables: readonly Table[]): PopulateResult {
    const result: PopulateResult = { inserted: {}, errors: [] };

    for (const table of tables) {
      const { rows, errors } = convertRows(table);
      result.errors.push(...errors);
      result.inserted[table.name] =
        (result.inserted[table.name] ?? 0) + this.insertRows(table, rows);
    }

    return result;
  }

  close(): void {
    this.db.close();
  }
}
