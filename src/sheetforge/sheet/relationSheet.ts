// sheet/relationSheet.ts

import type { Relation, SheetData } from "../model-types.js";
import { RelationSheetError } from "../errors.js";
import { normalizeRelationType } from "../utils/relationValidator.js";

export const RELATION_SHEET = "#Relation";

type RelationHeader =
  | "SourceTable"
  | "TargetTable"
  | "RelationType"
  | "ForeignKey"
  | "ReferenceKey";

export interface RelationParseResult {
  relations: Relation[];
  /** rows skipped for an unknown relation type */
  skipped: { rowNumber: number; relationType: string }[];
}

/**
 * Read the relation sheet. Header cells may come in any order; a blank
 * ForeignKey defaults to `<SourceTable>ID`, a blank ReferenceKey to `ID`.
 *
 * @throws RelationSheetError when a required header is missing
 */
export function parseRelationSheet(sheet: SheetData): RelationParseResult {
  const result: RelationParseResult = { relations: [], skipped: [] };
  const [header, ...body] = sheet.rows;
  if (!header) return result;

  const find = (name: RelationHeader): number => {
    const i = header.findIndex((cell) => String(cell ?? "").trim() === name);
    if (i === -1) {
      throw new RelationSheetError(
        `required column ${name} not found in relation sheet`
      );
    }
    return i;
  };

  const index: Record<RelationHeader, number> = {
    SourceTable: find("SourceTable"),
    TargetTable: find("TargetTable"),
    RelationType: find("RelationType"),
    ForeignKey: find("ForeignKey"),
    ReferenceKey: find("ReferenceKey"),
  };
  if (body.length === 0) return result;

  body.forEach((row, i) => {
    const cell = (name: RelationHeader) =>
      String(row[index[name]] ?? "").trim();

    const sourceTable = cell("SourceTable");
    if (!sourceTable && !cell("TargetTable")) return;

    const rawType = cell("RelationType");
    const relationType = normalizeRelationType(rawType);
    if (!relationType) {
      result.skipped.push({ rowNumber: i + 2, relationType: rawType });
      return;
    }

    result.relations.push({
      sourceTable,
      targetTable: cell("TargetTable"),
      relationType,
      foreignKey: cell("ForeignKey") || `${sourceTable}ID`,
      referenceKey: cell("ReferenceKey") || "ID",
    });
  });

  return result;
}
