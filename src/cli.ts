#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";

import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import {
  generateCommand,
  generateDefaults,
  type GenerateOptions,
} from "./commands/generate.js";
import { createLogger } from "./sheetforge/utils/logColors.js";

const config = loadConfig();
const defaults = generateDefaults(config);
const log = createLogger();

const program = new Command();

program
  .name("sheetforge")
  .description("Spreadsheet schemas to SQLite databases and TypeScript models")
  .version("0.1.0");

program
  .command("generate")
  .description("Read workbooks and run the exporters")
  .option("-d, --input-dir <dir>", "directory searched for .xlsx/.xls files")
  .option("-f, --input-files <files>", "comma separated workbook files")
  .option("-o, --output <dir>", "output directory", defaults.output)
  .option("-l, --lang <languages>", "comma separated languages, or all", defaults.lang)
  .option("-p, --package <name>", "package name for generated code", defaults.package)
  .option("--db-name <file>", "sqlite database file name", defaults.dbName)
  .option("-w, --workers <n>", "files read in parallel", defaults.workers)
  .action(async (opts: GenerateOptions) => {
    const ok = await generateCommand(opts);
    if (!ok) process.exitCode = 1;
  });

program
  .command("serve")
  .description("Start the HTTP API")
  .option("--port <port>", "port to listen on", String(config.port))
  .action((opts: { port: string }) => {
    const port = Number(opts.port);
    createApp(config).listen(port, () => {
      log.section("SHEETFORGE");
      log.action("success", "Listening", `port ${port}`);
    });
  });

program.parseAsync().catch((err: unknown) => {
  log.section("SHEETFORGE");
  log.action("error", "Failed", err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
