// sheetforge/index.ts

export * from "./model-types.js";
export * from "./errors.js";
export { buildColumns, arrayColumns } from "./columnBuilder.js";
export {
  parseColumnType,
  sqlTypeString,
  tsTypeString,
  describeType,
} from "./utils/canonicalType.js";
export { parseColumnTags, formatTags, hasTag, getTagValue } from "./utils/tags.js";
export { formatName, quoteIdentifier } from "./utils/identifiers.js";
export {
  createParser,
  toStorageValue,
  zeroValue,
  isZero,
  type Value,
  type ScalarValue,
  type ArrayValue,
  type StorageValue,
  type ValueParser,
} from "./values/valueParser.js";
export { packArray, unpackArray, encodeArray, slotName } from "./values/arrayCodec.js";
export { convertRows, type ConvertedRow } from "./values/convertRows.js";
export { buildColumnSQL, buildDefaultSQL } from "./sql/buildColumnSQL.js";
export {
  buildCreateTableSQL,
  buildIndexSQL,
  buildInsertSQL,
  buildSchemaSQL,
} from "./sql/buildTableSQL.js";
export { modelFields, arrayFields } from "./codegen/modelFields.js";
export { generateModelSource, generateIndexSource } from "./codegen/generateModelSource.js";
export { parseSheet } from "./sheet/parseSheet.js";
export { parseRelationSheet } from "./sheet/relationSheet.js";
export {
  parseWorkbook,
  parseWorkbookBuffer,
  readWorkbookFile,
  collectWorkbookFiles,
} from "./sheet/workbook.js";
export { SqliteStore } from "./store/sqliteStore.js";
export * from "./exporters/index.js";
export { Sheetforge, type SheetforgeOptions } from "./sheetforge.js";
