// codegen/modelFields.ts

import type { ScalarKind, StorageType, Table } from "../model-types.js";
import { sqlTypeString, tsTypeString } from "../utils/canonicalType.js";
import { formatTags } from "../utils/tags.js";

export interface ModelField {
  name: string;
  storageType: StorageType;
  tsType: string;
  /** canonical tag string, e.g. `unique,default:0` */
  tags: string;
}

export interface ArrayField {
  name: string;
  baseKind: ScalarKind;
  baseStorageType: StorageType;
  /** element type */
  tsType: string;
  length: number;
}

/** One field per column, in column order */
export function modelFields(table: Table): ModelField[] {
  return table.columns.map((col) => ({
    name: col.name,
    storageType: sqlTypeString(col.type),
    tsType: tsTypeString(col.type),
    tags: formatTags(col.constraints),
  }));
}

export function arrayFields(table: Table): ArrayField[] {
  const out: ArrayField[] = [];
  for (const col of table.columns) {
    if (!col.type.isArray) continue;
    const base = col.type.baseType;
    out.push({
      name: col.name,
      baseKind: base.kind,
      baseStorageType: sqlTypeString(base),
      tsType: tsTypeString(base),
      length: col.arrayLength ?? 0,
    });
  }
  return out;
}
