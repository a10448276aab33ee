// model-types.ts

/** Scalar kinds a declared type string can resolve to */
export type ScalarKind =
  | "Int32"
  | "Int64"
  | "Float64"
  | "Bool"
  | "String"
  | "DateTime"
  | "Bytes";

/** Storage type strings written into DDL */
export type StorageType =
  | "INTEGER"
  | "BIGINT"
  | "REAL"
  | "BOOLEAN"
  | "TEXT"
  | "DATETIME"
  | "BLOB";

export interface ScalarColumnType {
  isArray: false;
  kind: ScalarKind;
}

/** Arrays always bottom out at a scalar; array<array<x>> flattens to array<x> */
export interface ArrayColumnType {
  isArray: true;
  baseType: ScalarColumnType;
}

export type ColumnType = ScalarColumnType | ArrayColumnType;

export type Tag =
  | "unique"
  | "index"
  | "notNull"
  | "autoIncrement"
  | "primaryKey"
  | "default"
  | "foreignKey"
  | "size"
  | "design"
  | "ignore"
  | "readOnly"
  | "writeOnly"
  | "validate";

export interface TagValue {
  tag: Tag;
  value?: string;
}

export interface ArrayElementRef {
  /** name of the aggregate column */
  array: string;
  index: number;
}

export interface Column {
  readonly name: string;
  readonly type: ColumnType;
  readonly constraints: readonly TagValue[];
  readonly isUnique: boolean;
  /** header positions the column is read from */
  readonly cells: readonly number[];
  /** aggregate columns only: observed element count */
  readonly arrayLength?: number;
  /** scalar expansion columns only */
  readonly element?: ArrayElementRef;
}

export type RelationType = "hasOne" | "hasMany" | "belongsTo";

/*
| SourceTable | TargetTable | RelationType | ForeignKey | ReferenceKey |
|-------------|-------------|--------------|------------|--------------|
| User        | Post        | hasMany      | UserID     | ID           |
| Post        | User        | belongsTo    | UserID     | ID           |
*/
export interface Relation {
  sourceTable: string;
  targetTable: string;
  relationType: RelationType;
  foreignKey: string;
  referenceKey: string;
}

export interface DataRow {
  /** 1-based row number in the sheet */
  rowNumber: number;
  cells: readonly string[];
}

export interface Table {
  name: string;
  sheetName: string;
  source: string;
  columns: readonly Column[];
  relations: readonly Relation[];
  rows: readonly DataRow[];
}

export interface SheetData {
  name: string;
  rows: string[][];
}

export interface WorkbookData {
  sheets: SheetData[];
}
