// sheetforge.ts

import { join } from "node:path";

import type { Relation, Table, WorkbookData } from "./model-types.js";
import {
  SheetforgeError,
  WorkbookReadError,
  type SourceError,
} from "./errors.js";
import {
  isLockFile,
  parseWorkbook,
  readWorkbookFile,
  type ParsedWorkbook,
} from "./sheet/workbook.js";
import { createDefaultRegistry } from "./exporters/index.js";
import type { ExporterRegistry } from "./exporters/registry.js";
import type { ExportResult, ExporterOptions } from "./exporters/exporter.js";
import { createLogger, type Logger } from "./utils/logColors.js";
import {
  assignRelations,
  sortTables,
  validateRelations,
} from "./utils/relationValidator.js";
import { runWorkerPool } from "./utils/workerPool.js";

export interface SheetforgeOptions {
  /** files read in parallel */
  workers?: number;
  silent?: boolean;
  reader?: (path: string) => Promise<WorkbookData>;
  registry?: ExporterRegistry;
}

export interface ExportFailure {
  language: string;
  error: Error;
}

export class Sheetforge {
  private loaded: Table[] = [];
  private relations: Relation[] = [];
  private errors: SourceError[] = [];

  private readonly workers: number;
  private readonly reader: (path: string) => Promise<WorkbookData>;
  private readonly log: Logger;
  private readonly silent: boolean;
  readonly registry: ExporterRegistry;

  constructor(options: SheetforgeOptions = {}) {
    this.workers = Math.max(1, options.workers ?? 4);
    this.reader = options.reader ?? readWorkbookFile;
    this.silent = options.silent ?? false;
    this.log = createLogger(this.silent);
    this.registry = options.registry ?? createDefaultRegistry();
  }

  /* ================================
   * Loading
   * ================================ */

  /** Add one workbook's tables and relations; sheet failures are recorded */
  loadWorkbook(source: string, data: WorkbookData): ParsedWorkbook {
    const parsed = parseWorkbook(source, data);

    this.loaded.push(...parsed.tables);
    this.relations.push(...parsed.relations);
    this.errors.push(...parsed.errors);

    this.log.section("SHEETFORGE LOAD");
    for (const t of parsed.tables) {
      this.log.action("success", "Parsed", `${source} › ${t.sheetName}`);
    }
    for (const e of parsed.errors) {
      this.log.action("error", "Skipped", `${source} › ${e.sheet}: ${e.error.message}`);
    }
    for (const s of parsed.skippedRelations) {
      this.log.action(
        "warn",
        "Invalid relation",
        `${source} row ${s.rowNumber}: '${s.relationType}'`
      );
    }

    return parsed;
  }

  /**
   * Read and parse files on the worker pool. One failing file does not stop
   * the others.
   */
  async loadFiles(paths: readonly string[]): Promise<void> {
    const files = paths.filter((p) => !isLockFile(p));

    const { results, failures } = await runWorkerPool(
      files,
      this.workers,
      async (path) => ({ path, data: await this.reader(path) })
    );

    // merged in input order, in one place, once every read has settled
    for (const { path, data } of results) this.loadWorkbook(path, data);

    for (const { item, error } of failures) {
      const err =
        error instanceof SheetforgeError
          ? error
          : new WorkbookReadError(item, error);
      this.errors.push({ source: item, error: err });
      this.log.section("SHEETFORGE LOAD");
      this.log.action("error", "Failed", err.message);
    }
  }

  /* ================================
   * Model
   * ================================ */

  /** Loaded tables with relations attached, in dependency order */
  tables(): Table[] {
    const withRelations = assignRelations(this.loaded, this.relations);
    const { sorted, cyclic } = sortTables(withRelations);

    const warnings = validateRelations(sorted);
    if (cyclic || warnings.length) {
      this.log.section("RELATION WARNING");
      if (cyclic) {
        this.log.action("warn", "Cyclic relations", "tables kept in name order");
      }
      for (const w of warnings) this.log.action("warn", "Relation", w);
    }

    return sorted;
  }

  getErrors(): readonly SourceError[] {
    return this.errors;
  }

  /* ================================
   * Export
   * ================================ */

  /**
   * Run the requested exporters ("all" means every registered language).
   * A failing exporter is reported and the others still run.
   */
  async export(
    languages: readonly string[] | "all",
    options: Partial<ExporterOptions> = {}
  ): Promise<{ results: ExportResult[]; failures: ExportFailure[] }> {
    const langs = languages === "all" ? this.registry.languages() : languages;
    const tables = this.tables();
    const results: ExportResult[] = [];
    const failures: ExportFailure[] = [];

    for (const language of langs) {
      try {
        results.push(
          await this.registry.export(language, tables, {
            silent: this.silent,
            ...options,
            outputDir: join(options.outputDir || "generated", language),
          })
        );
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        failures.push({ language, error });
        this.log.section("SHEETFORGE EXPORT");
        this.log.action("error", "Failed", `${language}: ${error.message}`);
      }
    }

    return { results, failures };
  }
}
