// exporters/index.ts

import { ExporterRegistry } from "./registry.js";
import { SqliteExporter } from "./sqliteExporter.js";
import { TypescriptExporter } from "./typescriptExporter.js";

export * from "./exporter.js";
export { ExporterRegistry, mergeOptions } from "./registry.js";
export { SqliteExporter } from "./sqliteExporter.js";
export { TypescriptExporter } from "./typescriptExporter.js";

export function createDefaultRegistry(packageName = "models"): ExporterRegistry {
  return new ExporterRegistry()
    .register("sqlite", () => new SqliteExporter(), { packageName })
    .register("typescript", () => new TypescriptExporter(), { packageName });
}
