// sheet/workbook.ts

import { readdir, readFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import * as XLSX from "xlsx";

import type {
  Relation,
  SheetData,
  Table,
  WorkbookData,
} from "../model-types.js";
import { SheetforgeError, WorkbookReadError, type SourceError } from "../errors.js";
import { isMetadataSheet, parseSheet } from "./parseSheet.js";
import { parseRelationSheet, RELATION_SHEET } from "./relationSheet.js";

/** Office lock files such as `~$Items.xlsx` */
export function isLockFile(path: string): boolean {
  return basename(path).startsWith("~$");
}

/** Every cell as display text; missing cells become "" */
export function parseWorkbookBuffer(buffer: Buffer | Uint8Array): WorkbookData {
  const wb = XLSX.read(buffer, { type: "buffer" });

  const sheets: SheetData[] = wb.SheetNames.map((name) => {
    const ws = wb.Sheets[name];
    if (!ws) return { name, rows: [] };

    const raw = XLSX.utils.sheet_to_json<unknown[]>(ws, {
      header: 1,
      raw: false,
      defval: "",
      blankrows: true,
    });
    return {
      name,
      rows: raw.map((row) => row.map((cell) => String(cell ?? ""))),
    };
  });

  return { sheets };
}

/** @throws WorkbookReadError */
export async function readWorkbookFile(path: string): Promise<WorkbookData> {
  try {
    const buffer = await readFile(path);
    return parseWorkbookBuffer(buffer);
  } catch (err) {
    throw new WorkbookReadError(path, err);
  }
}

export interface ParsedWorkbook {
  tables: Table[];
  relations: Relation[];
  /** table-scope failures; sibling sheets are still parsed */
  errors: SourceError[];
  skippedRelations: { rowNumber: number; relationType: string }[];
}

/**
 * Parse every data sheet of a workbook. Sheets whose name starts with `#` are
 * metadata; `#Relation` is read as the relation sheet.
 */
export function parseWorkbook(source: string, data: WorkbookData): ParsedWorkbook {
  const out: ParsedWorkbook = {
    tables: [],
    relations: [],
    errors: [],
    skippedRelations: [],
  };

  for (const sheet of data.sheets) {
    try {
      if (sheet.name === RELATION_SHEET) {
        const res = parseRelationSheet(sheet);
        out.relations.push(...res.relations);
        out.skippedRelations.push(...res.skipped);
        continue;
      }
      if (isMetadataSheet(sheet.name)) continue;

      out.tables.push(parseSheet(sheet, source));
    } catch (err) {
      if (!(err instanceof SheetforgeError)) throw err;
      out.errors.push({ source, sheet: sheet.name, error: err });
    }
  }

  return out;
}

const WORKBOOK_EXTENSIONS = new Set([".xlsx", ".xls"]);

/** Workbook files under `dir`, recursively, lock files excluded, sorted */
export async function collectWorkbookFiles(dir: string): Promise<string[]> {
  const files: string[] = [];

  const walk = async (current: string) => {
    for (const entry of await readdir(current, { withFileTypes: true })) {
      const path = join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(path);
      } else if (
        WORKBOOK_EXTENSIONS.has(extname(entry.name).toLowerCase()) &&
        !isLockFile(path)
      ) {
        files.push(path);
      }
    }
  };

  await walk(dir);
  return files.sort();
}
