import { describe, it, expect } from "vitest";
import type { Column, Relation, Table } from "../model-types.js";
import { buildColumns } from "../columnBuilder.js";
import { buildColumnSQL, buildDefaultSQL } from "./buildColumnSQL.js";
import {
  SCHEMA_HEADER,
  buildCreateTableSQL,
  buildIndexSQL,
  buildInsertSQL,
  buildSchemaSQL,
} from "./buildTableSQL.js";

function makeTable(
  name: string,
  columns: Column[],
  relations: Relation[] = []
): Table {
  return { name, sheetName: name, source: "test.xlsx", columns, relations, rows: [] };
}

const postBelongsToUser: Relation = {
  sourceTable: "Post",
  targetTable: "User",
  relationType: "belongsTo",
  foreignKey: "PostID",
  referenceKey: "ID",
};

describe("buildColumnSQL", () => {
  it("ends a unique defaulted column with UNIQUE DEFAULT 0", () => {
    const [level] = buildColumns(["level"], ["int"], ["unique,default:0"]);
    expect(level && buildColumnSQL(level)).toBe("Level INTEGER UNIQUE DEFAULT 0");
  });

  it("emits constraints in a fixed order", () => {
    const [hp] = buildColumns(["hp"], ["int"], ["default:5,unique,pk,notnull"]);
    expect(hp && buildColumnSQL(hp)).toBe("Hp INTEGER NOT NULL PRIMARY KEY UNIQUE DEFAULT 5");
  });

  it("skips an empty default", () => {
    const [name] = buildColumns(["name"], ["string"], ["default:"]);
    expect(name && buildColumnSQL(name)).toBe("Name TEXT");
  });

  it("stores arrays as TEXT", () => {
    const [tags] = buildColumns(["tags"], ["array<int>"], []);
    expect(tags && buildColumnSQL(tags)).toBe("Tags TEXT");
  });
});

describe("buildDefaultSQL", () => {
  const [text] = buildColumns(["note"], ["string"], []);
  const [flag] = buildColumns(["flag"], ["bool"], []);
  const [at] = buildColumns(["at"], ["datetime"], []);

  it("quotes text and escapes quotes", () => {
    expect(text && buildDefaultSQL(text, "abc")).toBe("'abc'");
    expect(text && buildDefaultSQL(text, "it's")).toBe("'it''s'");
    expect(text && buildDefaultSQL(text, "'kept'")).toBe("'kept'");
  });

  it("stores booleans as 0/1", () => {
    expect(flag && buildDefaultSQL(flag, "true")).toBe("1");
    expect(flag && buildDefaultSQL(flag, "F")).toBe("0");
  });

  it("passes keywords and wraps function calls", () => {
    expect(at && buildDefaultSQL(at, "current_timestamp")).toBe("CURRENT_TIMESTAMP");
    expect(at && buildDefaultSQL(at, "datetime('now')")).toBe("(datetime('now'))");
  });
});

describe("table statements", () => {
  const post = makeTable(
    "Post",
    buildColumns(["title"], ["string"], []),
    [postBelongsToUser]
  );

  it("adds the implicit id and belongsTo foreign keys", () => {
    expect(buildCreateTableSQL(post)).toBe(
      [
        "CREATE TABLE IF NOT EXISTS Post (",
        "  id INTEGER PRIMARY KEY AUTOINCREMENT,",
        "  Title TEXT,",
        "  FOREIGN KEY(PostID) REFERENCES User(id)",
        ");",
      ].join("\n")
    );
  });

  it("indexes the foreign key", () => {
    expect(buildIndexSQL(post)).toEqual([
      "CREATE INDEX IF NOT EXISTS idx_Post_PostID ON Post(PostID);",
    ]);
  });

  it("ignores hasOne and hasMany in DDL", () => {
    const user = makeTable("User", buildColumns(["name"], ["string"], []), [
      { ...postBelongsToUser, sourceTable: "User", targetTable: "Post", relationType: "hasMany" },
    ]);
    expect(buildCreateTableSQL(user)).not.toContain("FOREIGN KEY");
    expect(buildIndexSQL(user)).toEqual([]);
  });

  it("quotes keywords the same way in every statement", () => {
    const order = makeTable(
      "Order",
      buildColumns(["index", "group"], ["int", "string"], ["index", ""])
    );

    expect(buildCreateTableSQL(order)).toBe(
      [
        'CREATE TABLE IF NOT EXISTS "Order" (',
        "  id INTEGER PRIMARY KEY AUTOINCREMENT,",
        '  "Group" TEXT,',
        '  "Index" INTEGER',
        ");",
      ].join("\n")
    );
    expect(buildIndexSQL(order)).toEqual([
      'CREATE INDEX IF NOT EXISTS idx_Order_Index ON "Order"("Index");',
    ]);
    expect(buildInsertSQL(order)).toBe('INSERT INTO "Order" ("Group", "Index") VALUES (?, ?)');
  });

  it("lists insert columns in DDL order", () => {
    const t = makeTable(
      "Hero",
      buildColumns(["skills", "name", "skills"], ["array<string>", "string", "array<string>"], [])
    );
    expect(buildInsertSQL(t)).toBe(
      "INSERT INTO Hero (Name, Skills, Skills_0, Skills_1) VALUES (?, ?, ?, ?)"
    );
  });

  it("handles a table without columns", () => {
    const empty = makeTable("Empty", []);
    expect(buildCreateTableSQL(empty)).toBe(
      "CREATE TABLE IF NOT EXISTS Empty (\n  id INTEGER PRIMARY KEY AUTOINCREMENT\n);"
    );
    expect(buildInsertSQL(empty)).toBe("INSERT INTO Empty DEFAULT VALUES");
  });

  it("writes the schema file", () => {
    expect(buildSchemaSQL([post])).toBe(
      SCHEMA_HEADER +
        buildCreateTableSQL(post) +
        "\n" +
        "CREATE INDEX IF NOT EXISTS idx_Post_PostID ON Post(PostID);\n" +
        "\n"
    );
    expect(SCHEMA_HEADER).toBe("-- Schema generated by sheetforge\n\nPRAGMA foreign_keys=ON;\n\n");
  });
});
