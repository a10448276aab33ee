// columnBuilder.ts

import type {
  Column,
  ScalarColumnType,
  TagValue,
} from "./model-types.js";
import { arrayElementType, parseColumnType } from "./utils/canonicalType.js";
import { formatName, isReservedColumnName } from "./utils/identifiers.js";
import { hasTag, parseColumnTags } from "./utils/tags.js";
import { DuplicateColumnError, ReservedColumnError } from "./errors.js";

interface HeaderCell {
  position: number;
  name: string;
  typeStr: string;
  tags: TagValue[];
}

interface ArrayGroup {
  name: string;
  baseType: ScalarColumnType;
  tags: TagValue[];
  positions: number[];
}

function byName(a: Column, b: Column): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/** Read the three header rows into cells, dropping design-only columns */
function readHeader(
  fieldNames: readonly string[],
  types: readonly string[],
  tags: readonly string[]
): HeaderCell[] {
  const cells: HeaderCell[] = [];

  for (let i = 0; i < fieldNames.length; i++) {
    const raw = String(fieldNames[i] ?? "").trim();
    if (!raw || i >= types.length) continue;

    const parsedTags = parseColumnTags(tags[i]);
    if (hasTag(parsedTags, "design")) continue;

    const name = formatName(raw);
    if (isReservedColumnName(name)) {
      throw new ReservedColumnError(name);
    }

    cells.push({
      position: i,
      name,
      typeStr: String(types[i] ?? "").trim(),
      tags: parsedTags,
    });
  }

  return cells;
}

/**
 * Build the canonical column list of one sheet from its name, type and tag
 * rows.
 *
 * Every header occurrence of an `array<T>` field counts toward its length N:
 * the field becomes one aggregate column (JSON text) plus `Name_0 … Name_(N-1)`
 * of type T. The element type comes from the first occurrence.
 *
 * @throws ReservedColumnError when a name collides with a system column
 * @throws DuplicateColumnError when a non-array name repeats
 */
export function buildColumns(
  fieldNames: readonly string[],
  types: readonly string[],
  tags: readonly string[]
): Column[] {
  const cells = readHeader(fieldNames, types, tags);

  /* ---------- GROUP ARRAY FIELDS ---------- */
  const groups = new Map<string, ArrayGroup>();
  for (const cell of cells) {
    const inner = arrayElementType(cell.typeStr);
    if (inner === null) continue;

    const group = groups.get(cell.name);
    if (group) {
      group.positions.push(cell.position);
      continue;
    }

    const elem = parseColumnType(inner);
    groups.set(cell.name, {
      name: cell.name,
      baseType: elem.isArray ? elem.baseType : elem,
      tags: cell.tags,
      positions: [cell.position],
    });
  }

  const columns = new Map<string, Column>();
  const claim = (col: Column) => {
    if (columns.has(col.name)) throw new DuplicateColumnError(col.name);
    columns.set(col.name, col);
  };

  /* ---------- AGGREGATE + EXPANSION COLUMNS ---------- */
  for (const group of groups.values()) {
    claim({
      name: group.name,
      type: { isArray: true, baseType: group.baseType },
      constraints: group.tags,
      isUnique: hasTag(group.tags, "unique"),
      cells: group.positions,
      arrayLength: group.positions.length,
    });

    group.positions.forEach((position, index) => {
      claim({
        name: `${group.name}_${index}`,
        type: group.baseType,
        constraints: [],
        isUnique: false,
        cells: [position],
        element: { array: group.name, index },
      });
    });
  }

  /* ---------- SCALAR COLUMNS ---------- */
  for (const cell of cells) {
    // non-array occurrences of an array field are absorbed by the group
    if (groups.has(cell.name)) continue;

    claim({
      name: cell.name,
      type: parseColumnType(cell.typeStr),
      constraints: cell.tags,
      isUnique: hasTag(cell.tags, "unique"),
      cells: [cell.position],
    });
  }

  return [...columns.values()].sort(byName);
}

/** Aggregate columns of a column list, in list order */
export function arrayColumns(columns: readonly Column[]): Column[] {
  return columns.filter((c) => c.type.isArray);
}
