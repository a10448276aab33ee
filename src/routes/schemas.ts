import { Router, type Response } from "express";

import type { Config } from "../config.js";
import { HttpError, HttpStatus } from "../HttpError.js";
import type { SheetData, Table } from "../sheetforge/model-types.js";
import { Sheetforge } from "../sheetforge/sheetforge.js";
import { arrayFields, modelFields } from "../sheetforge/codegen/modelFields.js";
import { generateModelSource } from "../sheetforge/codegen/generateModelSource.js";
import {
  buildCreateTableSQL,
  buildIndexSQL,
  buildInsertSQL,
} from "../sheetforge/sql/buildTableSQL.js";
import { convertRows } from "../sheetforge/values/convertRows.js";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function toCell(v: unknown): string {
  if (v === null || v === undefined) return "";
  return String(v);
}

/** `{ sheets: [{ name, rows }] }`; cells may be any JSON scalar */
export function readSheets(body: unknown): SheetData[] {
  if (!isRecord(body) || !Array.isArray(body.sheets)) {
    throw new HttpError("sheets is missing", HttpStatus.BAD_REQUEST);
  }

  return body.sheets.map((sheet: unknown, i: number) => {
    if (!isRecord(sheet) || typeof sheet.name !== "string" || !sheet.name) {
      throw new HttpError(`sheets[${i}].name is missing`, HttpStatus.BAD_REQUEST);
    }
    const rows = sheet.rows;
    if (!Array.isArray(rows) || !rows.every((r) => Array.isArray(r))) {
      throw new HttpError(
        `sheets[${i}].rows must be an array of rows`,
        HttpStatus.BAD_REQUEST
      );
    }
    return {
      name: sheet.name,
      rows: rows.map((row: unknown[]) => row.map(toCell)),
    };
  });
}

function readStringList(v: unknown, field: string): string[] {
  if (!Array.isArray(v) || !v.every((x) => typeof x === "string")) {
    throw new HttpError(`${field} must be a list of strings`, HttpStatus.BAD_REQUEST);
  }
  return v;
}

function compileTable(table: Table) {
  const { errors } = convertRows(table);
  return {
    name: table.name,
    ddl: buildCreateTableSQL(table),
    indexes: buildIndexSQL(table),
    insert: buildInsertSQL(table),
    fields: modelFields(table),
    arrayFields: arrayFields(table),
    model: generateModelSource(table),
    cellErrors: errors.map((e) => ({
      row: e.rowNumber,
      column: e.column,
      message: e.message,
    })),
  };
}

function sendError(res: Response, err: unknown) {
  if (err instanceof HttpError) {
    return res.status(err.status).json({
      message: err.message,
      status_code: err.status,
    });
  }
  return res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
    message: err instanceof Error ? err.message : String(err),
    status_code: HttpStatus.INTERNAL_SERVER_ERROR,
  });
}

export function schemasRouter(config: Config, silent = false) {
  const router = Router();

  // COMPILE sheets sent in the body; nothing is written
  router.post("/compile", (req, res) => {
    try {
      const sheets = readSheets(req.body);
      const forge = new Sheetforge({ silent });
      forge.loadWorkbook("request", { sheets });

      res.status(HttpStatus.OK).json({
        tables: forge.tables().map(compileTable),
        errors: forge.getErrors().map((e) => ({
          sheet: e.sheet,
          message: e.error.message,
        })),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  // GENERATE from workbook files on the server into the output directory
  router.post("/generate", async (req, res) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        throw new HttpError("files is missing", HttpStatus.BAD_REQUEST);
      }
      const files = readStringList(body.files, "files");
      if (files.length === 0) {
        throw new HttpError("files is empty", HttpStatus.BAD_REQUEST);
      }
      const languages =
        body.languages === undefined || body.languages === "all"
          ? config.languages
          : readStringList(body.languages, "languages");

      const forge = new Sheetforge({ workers: config.workers, silent });
      for (const lang of languages === "all" ? [] : languages) {
        if (!forge.registry.has(lang)) {
          throw new HttpError(`unknown language: ${lang}`, HttpStatus.BAD_REQUEST);
        }
      }

      await forge.loadFiles(files);
      const { results, failures } = await forge.export(languages, {
        outputDir: config.outputDir,
        packageName: config.packageName,
        dbName: config.dbName,
      });

      res.status(HttpStatus.OK).json({
        results,
        failures: failures.map((f) => ({
          language: f.language,
          message: f.error.message,
        })),
        errors: forge.getErrors().map((e) => ({
          source: e.source,
          sheet: e.sheet,
          message: e.error.message,
        })),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
