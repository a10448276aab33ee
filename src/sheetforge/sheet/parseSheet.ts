// sheet/parseSheet.ts

import type { DataRow, SheetData, Table } from "../model-types.js";
import { buildColumns } from "../columnBuilder.js";
import { SheetLayoutError } from "../errors.js";
import { formatName } from "../utils/identifiers.js";

/** Rows 1-3 are names, tags and types */
export const HEADER_ROWS = 3;

export function isMetadataSheet(name: string): boolean {
  return name.startsWith("#");
}

function isEmptyRow(row: readonly string[]): boolean {
  return row.every((cell) => String(cell ?? "").trim() === "");
}

/**
 * Turn one data sheet into a table. Relations are attached later, once every
 * sheet is known.
 *
 * @throws SheetLayoutError when the sheet has no data row
 */
export function parseSheet(sheet: SheetData, source: string): Table {
  if (sheet.rows.length <= HEADER_ROWS) {
    throw new SheetLayoutError(
      sheet.name,
      `expected ${HEADER_ROWS} header rows and at least one data row, got ${sheet.rows.length} rows`
    );
  }

  const [names = [], tags = [], types = []] = sheet.rows;
  const columns = buildColumns(names, types, tags);

  const rows: DataRow[] = [];
  sheet.rows.forEach((cells, i) => {
    if (i < HEADER_ROWS || isEmptyRow(cells)) return;
    rows.push({ rowNumber: i + 1, cells });
  });

  return {
    name: formatName(sheet.name),
    sheetName: sheet.name,
    source,
    columns,
    relations: [],
    rows,
  };
}
