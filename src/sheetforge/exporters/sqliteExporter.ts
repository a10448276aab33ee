// exporters/sqliteExporter.ts

import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { Table } from "../model-types.js";
import { buildSchemaSQL } from "../sql/buildTableSQL.js";
import { SqliteStore } from "../store/sqliteStore.js";
import { createLogger } from "../utils/logColors.js";
import type { ExportResult, Exporter, ExporterOptions } from "./exporter.js";

/** Writes `<dbName>` with every table populated, plus schema.sql */
export class SqliteExporter implements Exporter {
  readonly language = "sqlite";

  async export(
    tables: readonly Table[],
    options: ExporterOptions
  ): Promise<ExportResult> {
    const log = createLogger(options.silent);
    const dbPath = join(
      options.outputDir,
      options.dbName || `${options.packageName}.db`
    );
    const schemaPath = join(options.outputDir, "schema.sql");

    await mkdir(options.outputDir, { recursive: true });
    // a previous run's rows would collide with UNIQUE columns
    await rm(dbPath, { force: true });

    log.section("SQLITE EXPORT");

    const store = new SqliteStore(dbPath);
    try {
      store.applySchema(tables);
      const { inserted, errors } = store.populate(tables);

      for (const err of errors) {
        log.action("warn", "Invalid value", err.message);
      }
      for (const [table, count] of Object.entries(inserted)) {
        log.action("success", "Inserted", `${table} (${count} rows)`);
      }
    } finally {
      store.close();
    }

    await writeFile(schemaPath, buildSchemaSQL(tables), "utf8");
    log.action("success", "Created", dbPath);
    log.action("success", "Created", schemaPath);

    return { language: this.language, files: [dbPath, schemaPath] };
  }
}
