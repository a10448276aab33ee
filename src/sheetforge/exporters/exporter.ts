// exporters/exporter.ts

import type { Table } from "../model-types.js";

export interface ExporterOptions {
  outputDir: string;
  packageName: string;
  /** sqlite only; defaults to `<packageName>.db` */
  dbName: string;
  silent: boolean;
  extra: Record<string, string | number | boolean>;
}

export interface ExportResult {
  language: string;
  /** paths written, relative to the working directory */
  files: string[];
}

export interface Exporter {
  readonly language: string;
  export(tables: readonly Table[], options: ExporterOptions): Promise<ExportResult>;
}

export type ExporterFactory = () => Exporter;
