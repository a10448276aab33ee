import { describe, it, expect } from "vitest";
import type { Table } from "../model-types.js";
import { buildColumns } from "../columnBuilder.js";
import { arrayFields, modelFields } from "./modelFields.js";
import {
  generateIndexSource,
  generateModelSource,
  modelFileName,
} from "./generateModelSource.js";

const hero: Table = {
  name: "Hero",
  sheetName: "hero",
  source: "heroes.xlsx",
  columns: buildColumns(
    ["name", "skills", "skills"],
    ["string", "array<string>", "array<string>"],
    ["unique", "", ""]
  ),
  relations: [
    {
      sourceTable: "Hero",
      targetTable: "Post",
      relationType: "hasMany",
      foreignKey: "HeroID",
      referenceKey: "ID",
    },
  ],
  rows: [],
};

describe("modelFields", () => {
  it("describes every column in order", () => {
    expect(modelFields(hero)).toEqual([
      { name: "Name", storageType: "TEXT", tsType: "string", tags: "unique" },
      { name: "Skills", storageType: "TEXT", tsType: "string[]", tags: "" },
      { name: "Skills_0", storageType: "TEXT", tsType: "string", tags: "" },
      { name: "Skills_1", storageType: "TEXT", tsType: "string", tags: "" },
    ]);
  });

  it("lists array fields with their length", () => {
    expect(arrayFields(hero)).toEqual([
      {
        name: "Skills",
        baseKind: "String",
        baseStorageType: "TEXT",
        tsType: "string",
        length: 2,
      },
    ]);
  });
});

describe("generateModelSource", () => {
  const lines = generateModelSource(hero).split("\n");

  it("declares the row interface", () => {
    const start = lines.indexOf("export interface Hero {");
    expect(lines.slice(start, start + 7)).toEqual([
      "export interface Hero {",
      "  id: number;",
      "  Name: string; // TEXT unique",
      "  Skills: string[]; // TEXT",
      "  Skills_0: string; // TEXT",
      "  Skills_1: string; // TEXT",
      "}",
    ]);
  });

  it("carries columns, relations and the insert statement", () => {
    expect(lines).toContain('  columns: ["Name", "Skills", "Skills_0", "Skills_1"],');
    expect(lines).toContain("    Skills: { length: 2 },");
    expect(lines).toContain(
      '    { type: "hasMany", target: "Post", foreignKey: "HeroID", referenceKey: "ID" },'
    );
    expect(lines).toContain(
      '  insert: "INSERT INTO Hero (Name, Skills, Skills_0, Skills_1) VALUES (?, ?, ?, ?)",'
    );
  });

  it("emits pack and unpack helpers for array fields", () => {
    expect(lines).toContain("export function packHeroSkills(");
    expect(lines).toContain('    throw new RangeError("Skills holds at most 2 values");');
    expect(lines).toContain("  const out: Record<string, unknown> = { Skills: JSON.stringify(kept) };");
    expect(lines).toContain("export function unpackHeroSkills(");
    expect(lines).toContain('    const stored = row["Skills_" + i];');
    expect(lines).toContain('    if (v === "") break;');
  });

  it("writes bigint arrays without JSON.stringify", () => {
    const ledger: Table = {
      ...hero,
      name: "Ledger",
      columns: buildColumns(["gold"], ["array<int64>"], []),
      relations: [],
    };
    expect(generateModelSource(ledger).split("\n")).toContain(
      '  const out: Record<string, unknown> = { Gold: `[${kept.map(String).join(",")}]` };'
    );
  });
});

describe("generateIndexSource", () => {
  it("re-exports each model", () => {
    expect(modelFileName(hero)).toBe("Hero.ts");
    expect(generateIndexSource([hero])).toBe(
      '// Code generated by sheetforge. DO NOT EDIT.\n\nexport * from "./Hero.js";\n'
    );
  });
});
