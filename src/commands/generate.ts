// commands/generate.ts

import type { Config } from "../config.js";
import { parseLanguages } from "../config.js";
import { Sheetforge } from "../sheetforge/sheetforge.js";
import { collectWorkbookFiles } from "../sheetforge/sheet/workbook.js";
import { createLogger } from "../sheetforge/utils/logColors.js";

export interface GenerateOptions {
  inputDir?: string;
  inputFiles?: string;
  output: string;
  lang: string;
  package: string;
  /** sqlite database file name */
  dbName?: string;
  workers: string;
  silent?: boolean;
}

export function generateDefaults(config: Config): GenerateOptions {
  return {
    output: config.outputDir,
    lang: config.languages === "all" ? "all" : config.languages.join(","),
    package: config.packageName,
    dbName: config.dbName,
    workers: String(config.workers),
  };
}

/** @returns false when any file, sheet or exporter failed */
export async function generateCommand(opts: GenerateOptions): Promise<boolean> {
  const log = createLogger(opts.silent);

  let files: string[];
  if (opts.inputDir) {
    files = await collectWorkbookFiles(opts.inputDir);
  } else if (opts.inputFiles) {
    files = opts.inputFiles
      .split(",")
      .map((f) => f.trim())
      .filter(Boolean);
  } else {
    throw new Error("either --input-dir or --input-files must be provided");
  }

  const workers = Number(opts.workers);
  if (!Number.isInteger(workers) || workers <= 0) {
    throw new Error(`--workers must be a positive integer, got '${opts.workers}'`);
  }

  const forge = new Sheetforge({ workers, silent: opts.silent });
  await forge.loadFiles(files);

  const { results, failures } = await forge.export(parseLanguages(opts.lang), {
    outputDir: opts.output,
    packageName: opts.package,
    dbName: opts.dbName,
  });

  log.section("SHEETFORGE");
  for (const r of results) {
    log.action("success", "Exported", `${r.language} (${r.files.length} files)`);
  }

  return failures.length === 0 && forge.getErrors().length === 0;
}
