import { describe, it, expect } from "vitest";
import { join } from "node:path";
import type { Table, WorkbookData } from "./model-types.js";
import { WorkbookReadError } from "./errors.js";
import type { ExportResult, Exporter, ExporterOptions } from "./exporters/exporter.js";
import { ExporterRegistry } from "./exporters/registry.js";
import { Sheetforge } from "./sheetforge.js";

const BLOG: WorkbookData = {
  sheets: [
    { name: "Post", rows: [["title", "userID"], ["", "index"], ["string", "int"], ["Hi", "1"]] },
    { name: "User", rows: [["name"], [""], ["string"], ["Ann"]] },
    {
      name: "#Relation",
      rows: [
        ["SourceTable", "TargetTable", "RelationType", "ForeignKey", "ReferenceKey"],
        ["Post", "User", "belongsTo", "UserID", ""],
      ],
    },
  ],
};

class RecordingExporter implements Exporter {
  readonly language = "recording";
  static calls: { tables: string[]; options: ExporterOptions }[] = [];

  async export(tables: readonly Table[], options: ExporterOptions): Promise<ExportResult> {
    RecordingExporter.calls.push({ tables: tables.map((t) => t.name), options });
    return { language: this.language, files: [] };
  }
}

function reader(files: Record<string, WorkbookData>) {
  return async (path: string): Promise<WorkbookData> => {
    const data = files[path];
    if (!data) throw new Error("no such file");
    return data;
  };
}

describe("Sheetforge", () => {
  it("orders loaded tables by their belongsTo relations", () => {
    const forge = new Sheetforge({ silent: true });
    forge.loadWorkbook("blog.xlsx", BLOG);

    const tables = forge.tables();
    expect(tables.map((t) => t.name)).toEqual(["User", "Post"]);
    expect(tables[1]?.relations).toEqual([
      {
        sourceTable: "Post",
        targetTable: "User",
        relationType: "belongsTo",
        foreignKey: "UserID",
        referenceKey: "ID",
      },
    ]);
    expect(forge.getErrors()).toEqual([]);
  });

  it("loads files on the pool and records the ones that fail", async () => {
    const forge = new Sheetforge({
      silent: true,
      workers: 2,
      reader: reader({ "blog.xlsx": BLOG }),
    });

    await forge.loadFiles(["blog.xlsx", "~$blog.xlsx", "gone.xlsx"]);

    expect(forge.tables().map((t) => t.name)).toEqual(["User", "Post"]);
    const errors = forge.getErrors();
    expect(errors).toHaveLength(1);
    expect(errors[0]?.source).toBe("gone.xlsx");
    expect(errors[0]?.error).toBeInstanceOf(WorkbookReadError);
    expect(errors[0]?.error.message).toBe(
      "failed to open workbook gone.xlsx: no such file"
    );
  });

  it("exports each language into its own directory", async () => {
    RecordingExporter.calls = [];
    const registry = new ExporterRegistry().register(
      "recording",
      () => new RecordingExporter(),
      { packageName: "blog" }
    );
    const forge = new Sheetforge({ silent: true, registry });
    forge.loadWorkbook("blog.xlsx", BLOG);

    const { results, failures } = await forge.export(["recording", "cobol"], {
      outputDir: "out",
    });

    expect(results).toEqual([{ language: "recording", files: [] }]);
    expect(failures.map((f) => [f.language, f.error.message])).toEqual([
      ["cobol", "no exporter registered for language: cobol"],
    ]);
    expect(RecordingExporter.calls).toEqual([
      {
        tables: ["User", "Post"],
        options: {
          outputDir: join("out", "recording"),
          packageName: "blog",
          dbName: "",
          silent: true,
          extra: {},
        },
      },
    ]);
  });
});
