// values/convertRows.ts

import type { Table } from "../model-types.js";
import { CellParseError, ValueParseError } from "../errors.js";
import {
  ArrayParser,
  createParser,
  encodeArray,
  isZero,
  toStorageValue,
  type StorageValue,
  type ValueParser,
} from "./valueParser.js";

export interface ConvertedRow {
  rowNumber: number;
  /** aligned with table.columns */
  values: StorageValue[];
}

export interface ConvertResult {
  rows: ConvertedRow[];
  errors: CellParseError[];
}

/**
 * An aggregate is rebuilt from its slot cells, each parsed on its own, so it
 * always agrees with the `Name_i` columns written beside it.
 */
function convertCell(parser: ValueParser, cells: readonly string[]): StorageValue {
  if (parser instanceof ArrayParser) {
    const elements = cells
      .map((cell) => parser.parseElement(cell))
      .filter((v) => !isZero(v));
    return encodeArray(elements);
  }
  return toStorageValue(parser.parse(cells[0] ?? ""));
}

/**
 * Convert every data row of a table into storage values. A cell that fails to
 * parse is stored as NULL and reported; the rest of the row is kept.
 */
export function convertRows(table: Table): ConvertResult {
  const parsers = table.columns.map((col) => createParser(col));
  const rows: ConvertedRow[] = [];
  const errors: CellParseError[] = [];

  for (const row of table.rows) {
    const values = table.columns.map((col, i): StorageValue => {
      const parser = parsers[i];
      if (!parser) return null;

      const cells = col.cells.map((pos) => row.cells[pos] ?? "");
      try {
        return convertCell(parser, cells);
      } catch (err) {
        if (!(err instanceof ValueParseError)) throw err;
        errors.push(
          new CellParseError(table.name, col.name, row.rowNumber, err.value, err)
        );
        return null;
      }
    });

    rows.push({ rowNumber: row.rowNumber, values });
  }

  return { rows, errors };
}
