// exporters/typescriptExporter.ts

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { Table } from "../model-types.js";
import {
  generateIndexSource,
  generateModelSource,
  modelFileName,
} from "../codegen/generateModelSource.js";
import { createLogger } from "../utils/logColors.js";
import type { ExportResult, Exporter, ExporterOptions } from "./exporter.js";

/** One model module per table under `<outputDir>/<packageName>/` */
export class TypescriptExporter implements Exporter {
  readonly language = "typescript";

  async export(
    tables: readonly Table[],
    options: ExporterOptions
  ): Promise<ExportResult> {
    const log = createLogger(options.silent);
    const dir = join(options.outputDir, options.packageName);
    const files: string[] = [];

    await mkdir(dir, { recursive: true });
    log.section("TYPESCRIPT EXPORT");

    for (const table of tables) {
      const path = join(dir, modelFileName(table));
      await writeFile(path, generateModelSource(table), "utf8");
      files.push(path);
      log.action("success", "Generated", path);
    }

    const indexPath = join(dir, "index.ts");
    await writeFile(indexPath, generateIndexSource(tables), "utf8");
    files.push(indexPath);

    return { language: this.language, files };
  }
}
