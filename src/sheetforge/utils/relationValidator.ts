// utils/relationValidator.ts

import type { Relation, RelationType, Table } from "../model-types.js";

/** Normalize user-written relation labels (case and separator insensitive) */
export function normalizeRelationType(
  input: string | undefined
): RelationType | null {
  if (!input) return null;
  const v = input.trim().toLowerCase().replace(/[-_\s]/g, "");

  if (v === "hasone") return "hasOne";
  if (v === "hasmany") return "hasMany";
  if (v === "belongsto") return "belongsTo";

  return null;
}

/**
 * Attach relations to the table whose name equals their source table.
 * Relations with no such table are dropped.
 */
export function assignRelations(
  tables: readonly Table[],
  relations: readonly Relation[]
): Table[] {
  return tables.map((table) => ({
    ...table,
    relations: relations.filter((r) => r.sourceTable === table.name),
  }));
}

/** Human readable problems; none of them stop generation */
export function validateRelations(tables: readonly Table[]): string[] {
  const warnings: string[] = [];
  const byName = new Map(tables.map((t) => [t.name, t]));

  for (const table of tables) {
    for (const rel of table.relations) {
      if (rel.relationType !== "belongsTo") continue;

      if (!byName.has(rel.targetTable)) {
        warnings.push(`${table.name}: table ${rel.targetTable} does not exist`);
        continue;
      }

      if (!table.columns.some((c) => c.name === rel.foreignKey)) {
        warnings.push(
          `${table.name}: foreign key column ${rel.foreignKey} does not exist`
        );
      }
    }
  }

  return warnings;
}

function byName(a: Table, b: Table): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Order tables so belongsTo targets come before the tables that reference
 * them; name order otherwise. `cyclic` is set when no such order exists, in
 * which case the tables come back in name order.
 */
export function sortTables(tables: readonly Table[]): {
  sorted: Table[];
  cyclic: boolean;
} {
  const byNameSorted = [...tables].sort(byName);

  /* ---------- GRAPH ---------- */
  const graph = new Map<string, Set<string>>();
  const inDegree = new Map<string, number>();
  for (const t of byNameSorted) {
    graph.set(t.name, new Set());
    inDegree.set(t.name, 0);
  }

  for (const t of byNameSorted) {
    for (const rel of t.relations) {
      if (rel.relationType !== "belongsTo") continue;
      if (!graph.has(rel.targetTable) || rel.targetTable === t.name) continue;

      const outs = graph.get(rel.targetTable);
      if (!outs || outs.has(t.name)) continue;
      outs.add(t.name);
      inDegree.set(t.name, (inDegree.get(t.name) ?? 0) + 1);
    }
  }

  /* ---------- TOPO SORT ---------- */
  const ready = [...graph.keys()].filter((n) => inDegree.get(n) === 0);
  const order: string[] = [];

  while (ready.length) {
    ready.sort();
    const n = ready.shift();
    if (n === undefined) break;
    order.push(n);

    for (const v of graph.get(n) ?? []) {
      const d = (inDegree.get(v) ?? 0) - 1;
      inDegree.set(v, d);
      if (d === 0) ready.push(v);
    }
  }

  if (order.length !== graph.size) {
    return { sorted: byNameSorted, cyclic: true };
  }

  const sorted = order.flatMap((name) =>
    byNameSorted.filter((t) => t.name === name)
  );
  return { sorted, cyclic: false };
}
