// exporters/registry.ts

import type { Table } from "../model-types.js";
import type {
  ExportResult,
  Exporter,
  ExporterFactory,
  ExporterOptions,
} from "./exporter.js";

const BASE_OPTIONS: ExporterOptions = {
  outputDir: "generated",
  packageName: "models",
  dbName: "",
  silent: false,
  extra: {},
};

/**
 * Call options win over registered defaults when set; `extra` is merged key
 * by key.
 */
export function mergeOptions(
  defaults: Partial<ExporterOptions>,
  options: Partial<ExporterOptions>
): ExporterOptions {
  const pick = <K extends "outputDir" | "packageName" | "dbName">(key: K) =>
    options[key] || defaults[key] || BASE_OPTIONS[key];

  return {
    outputDir: pick("outputDir"),
    packageName: pick("packageName"),
    dbName: pick("dbName"),
    silent: options.silent ?? defaults.silent ?? BASE_OPTIONS.silent,
    extra: { ...defaults.extra, ...options.extra },
  };
}

interface Entry {
  factory: ExporterFactory;
  defaults: Partial<ExporterOptions>;
}

export class ExporterRegistry {
  private entries = new Map<string, Entry>();

  register(
    language: string,
    factory: ExporterFactory,
    defaults: Partial<ExporterOptions> = {}
  ): this {
    this.entries.set(language, { factory, defaults });
    return this;
  }

  /** A fresh exporter per call */
  get(language: string): Exporter {
    const entry = this.entries.get(language);
    if (!entry) {
      throw new Error(`no exporter registered for language: ${language}`);
    }
    return entry.factory();
  }

  has(language: string): boolean {
    return this.entries.has(language);
  }

  languages(): string[] {
    return [...this.entries.keys()].sort();
  }

  async export(
    language: string,
    tables: readonly Table[],
    options: Partial<ExporterOptions> = {}
  ): Promise<ExportResult> {
    const exporter = this.get(language);
    const defaults = this.entries.get(language)?.defaults ?? {};
    return exporter.export(tables, mergeOptions(defaults, options));
  }
}
