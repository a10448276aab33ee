// codegen/generateModelSource.ts

import type { ScalarKind, Table } from "../model-types.js";
import { buildInsertSQL } from "../sql/buildTableSQL.js";
import { arrayFields, modelFields, type ArrayField } from "./modelFields.js";

const ZERO_TIME = "0001-01-01T00:00:00.000Z";

/** Expression templates for one element kind; `v` is the variable name */
interface KindCodegen {
  isZero: (v: string) => string;
  toStored: (v: string) => string;
  /** narrows an `unknown` stored value */
  guard: (v: string) => string;
  fromStored: (v: string) => string;
  encode: (arr: string) => string;
}

const json = (arr: string) => `JSON.stringify(${arr})`;

const KINDS: Record<ScalarKind, KindCodegen> = {
  Int32: {
    isZero: (v) => `${v} === 0`,
    toStored: (v) => v,
    guard: (v) => `typeof ${v} === "number"`,
    fromStored: (v) => v,
    encode: json,
  },
  Float64: {
    isZero: (v) => `${v} === 0`,
    toStored: (v) => v,
    guard: (v) => `typeof ${v} === "number"`,
    fromStored: (v) => v,
    encode: json,
  },
  Int64: {
    isZero: (v) => `${v} === 0n`,
    toStored: (v) => v,
    guard: (v) => `(typeof ${v} === "bigint" || typeof ${v} === "number")`,
    fromStored: (v) => `BigInt(${v})`,
    encode: (arr) => "`[${" + arr + '.map(String).join(",")}]`',
  },
  Bool: {
    isZero: (v) => `!${v}`,
    toStored: (v) => `(${v} ? 1 : 0)`,
    guard: (v) => `typeof ${v} === "number"`,
    fromStored: (v) => `${v} !== 0`,
    encode: json,
  },
  String: {
    isZero: (v) => `${v} === ""`,
    toStored: (v) => v,
    guard: (v) => `typeof ${v} === "string"`,
    fromStored: (v) => v,
    encode: json,
  },
  DateTime: {
    isZero: (v) => `(${v} === "" || ${v} === ${JSON.stringify(ZERO_TIME)})`,
    toStored: (v) => v,
    guard: (v) => `typeof ${v} === "string"`,
    fromStored: (v) => v,
    encode: json,
  },
  Bytes: {
    isZero: (v) => `${v}.length === 0`,
    toStored: (v) => v,
    guard: (v) => `${v} instanceof Uint8Array`,
    fromStored: (v) => v,
    encode: (arr) =>
      `JSON.stringify(${arr}.map((b) => Buffer.from(b).toString("base64")))`,
  },
};

function toIdent(name: string): string {
  const id = name.replace(/[^A-Za-z0-9_$]/g, "_");
  return /^\d/.test(id) ? `_${id}` : id;
}

function propertyKey(name: string): string {
  return /^[A-Za-z_$][\w$]*$/.test(name) ? name : JSON.stringify(name);
}

export function modelTypeName(table: Table): string {
  return toIdent(table.name);
}

export function modelFileName(table: Table): string {
  return `${toIdent(table.name)}.ts`;
}

function packFunction(table: Table, field: ArrayField): string[] {
  const kind = KINDS[field.baseKind];
  const fn = `pack${toIdent(table.name)}${toIdent(field.name)}`;
  const slot = JSON.stringify(`${field.name}_`);

  return [
    `export function ${fn}(`,
    `  values: readonly ${field.tsType}[]`,
    `): Record<string, unknown> {`,
    `  if (values.length > ${field.length}) {`,
    `    throw new RangeError(${JSON.stringify(
      `${field.name} holds at most ${field.length} values`
    )});`,
    `  }`,
    `  const kept = values.filter((v) => !(${kind.isZero("v")}));`,
    `  const out: Record<string, unknown> = { ${propertyKey(
      field.name
    )}: ${kind.encode("kept")} };`,
    `  for (let i = 0; i < ${field.length}; i++) {`,
    `    const v = values[i];`,
    `    out[${slot} + i] = v === undefined ? null : ${kind.toStored("v")};`,
    `  }`,
    `  return out;`,
    `}`,
    "",
  ];
}

function unpackFunction(table: Table, field: ArrayField): string[] {
  const kind = KINDS[field.baseKind];
  const fn = `unpack${toIdent(table.name)}${toIdent(field.name)}`;
  const slot = JSON.stringify(`${field.name}_`);

  return [
    `export function ${fn}(`,
    `  row: Readonly<Record<string, unknown>>`,
    `): ${field.tsType}[] {`,
    `  const out: ${field.tsType}[] = [];`,
    `  for (let i = 0; i < ${field.length}; i++) {`,
    `    const stored = row[${slot} + i];`,
    `    if (!(${kind.guard("stored")})) break;`,
    `    const v = ${kind.fromStored("stored")};`,
    `    if (${kind.isZero("v")}) break;`,
    `    out.push(v);`,
    `  }`,
    `  return out;`,
    `}`,
    "",
  ];
}

/**
 * TypeScript module for one table: the row interface, a model constant with
 * column names, tags, insert statement and relations, and pack/unpack helpers
 * for every array field.
 */
export function generateModelSource(table: Table): string {
  const typeName = modelTypeName(table);
  const fields = modelFields(table);
  const arrays = arrayFields(table);

  const lines: string[] = [
    "// Code generated by sheetforge. DO NOT EDIT.",
    `// Source: ${table.source} (sheet ${table.sheetName})`,
    "",
  ];

  /* ---------- ROW INTERFACE ---------- */
  lines.push(`export interface ${typeName} {`);
  lines.push("  id: number;");
  for (const f of fields) {
    const comment = f.tags ? ` // ${f.storageType} ${f.tags}` : ` // ${f.storageType}`;
    lines.push(`  ${propertyKey(f.name)}: ${f.tsType};${comment}`);
  }
  lines.push("}");
  lines.push("");

  /* ---------- MODEL CONSTANT ---------- */
  lines.push(`export const ${typeName}Model = {`);
  lines.push(`  table: ${JSON.stringify(table.name)},`);
  lines.push(
    `  columns: [${fields.map((f) => JSON.stringify(f.name)).join(", ")}],`
  );
  lines.push("  tags: {");
  for (const f of fields) {
    if (f.tags) lines.push(`    ${propertyKey(f.name)}: ${JSON.stringify(f.tags)},`);
  }
  lines.push("  },");
  lines.push("  arrays: {");
  for (const a of arrays) {
    lines.push(`    ${propertyKey(a.name)}: { length: ${a.length} },`);
  }
  lines.push("  },");
  lines.push("  relations: [");
  for (const r of table.relations) {
    lines.push(
      `    { type: ${JSON.stringify(r.relationType)}, target: ${JSON.stringify(
        r.targetTable
      )}, foreignKey: ${JSON.stringify(
        r.foreignKey
      )}, referenceKey: ${JSON.stringify(r.referenceKey)} },`
    );
  }
  lines.push("  ],");
  lines.push(`  insert: ${JSON.stringify(buildInsertSQL(table))},`);
  lines.push("} as const;");
  lines.push("");

  /* ---------- ARRAY HELPERS ---------- */
  for (const a of arrays) {
    lines.push(...packFunction(table, a));
    lines.push(...unpackFunction(table, a));
  }

  return lines.join("\n");
}

/** Re-exports every model module */
export function generateIndexSource(tables: readonly Table[]): string {
  const lines = ["// Code generated by sheetforge. DO NOT EDIT.", ""];
  for (const table of tables) {
    lines.push(`export * from "./${toIdent(table.name)}.js";`);
  }
  lines.push("");
  return lines.join("\n");
}
