import { describe, it, expect } from "vitest";
import {
  arrayElementType,
  describeType,
  parseColumnType,
  sqlTypeString,
  tsTypeString,
} from "./canonicalType.js";

describe("parseColumnType", () => {
  it("maps synonyms case-insensitively", () => {
    expect(parseColumnType("INT")).toEqual({ isArray: false, kind: "Int32" });
    expect(parseColumnType(" bigint ")).toEqual({ isArray: false, kind: "Int64" });
    expect(parseColumnType("double")).toEqual({ isArray: false, kind: "Float64" });
    expect(parseColumnType("Boolean")).toEqual({ isArray: false, kind: "Bool" });
    expect(parseColumnType("timestamp")).toEqual({ isArray: false, kind: "DateTime" });
    expect(parseColumnType("[]byte")).toEqual({ isArray: false, kind: "Bytes" });
    expect(parseColumnType("varchar")).toEqual({ isArray: false, kind: "String" });
  });

  it("degrades unknown tokens to String", () => {
    expect(parseColumnType("decimal(10,2)")).toEqual({ isArray: false, kind: "String" });
    expect(parseColumnType("")).toEqual({ isArray: false, kind: "String" });
  });

  it("flattens nested arrays to a scalar base", () => {
    expect(parseColumnType("array<array<int>>")).toEqual({
      isArray: true,
      baseType: { isArray: false, kind: "Int32" },
    });
  });
});

describe("arrayElementType", () => {
  it("returns the inner declaration", () => {
    expect(arrayElementType("Array<String>")).toBe("string");
    expect(arrayElementType("array<int")).toBe("int");
    expect(arrayElementType("string")).toBeNull();
  });
});

describe("type strings", () => {
  it("stores arrays as TEXT", () => {
    expect(sqlTypeString(parseColumnType("array<int64>"))).toBe("TEXT");
    expect(sqlTypeString(parseColumnType("bool"))).toBe("BOOLEAN");
    expect(sqlTypeString(parseColumnType("blob"))).toBe("BLOB");
  });

  it("renders TypeScript and readable forms", () => {
    expect(tsTypeString(parseColumnType("array<int64>"))).toBe("bigint[]");
    expect(tsTypeString(parseColumnType("date"))).toBe("string");
    expect(describeType(parseColumnType("array<float>"))).toBe("array<Float64>");
  });
});
