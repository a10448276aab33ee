import { afterAll, beforeAll, describe, it, expect } from "vitest";
import type { Server } from "node:http";

import { createApp } from "./app.js";
import { loadConfig } from "./config.js";

describe("HTTP API", () => {
  let server: Server;
  let base = "";

  beforeAll(async () => {
    const app = createApp(loadConfig({}), { silent: true });
    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, () => resolve(s));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("server is not listening on a TCP port");
    }
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve()))
    );
  });

  const post = (path: string, body: unknown) =>
    fetch(`${base}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });

  it("reports health", async () => {
    const res = await fetch(`${base}/health`);
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ status: "ok" });
  });

  it("compiles sheets sent in the body", async () => {
    const res = await post("/schemas/compile", {
      sheets: [
        {
          name: "items",
          rows: [
            ["name", "level"],
            ["unique", ""],
            ["string", "int"],
            ["Ann", 3],
            ["Bo", "x"],
          ],
        },
      ],
    });

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      tables: [
        {
          name: "Items",
          insert: "INSERT INTO Items (Level, Name) VALUES (?, ?)",
          indexes: [],
          cellErrors: [
            {
              row: 5,
              column: "Level",
              message: "Items row 5: column Level: invalid integer 'x'",
            },
          ],
        },
      ],
      errors: [],
    });
  });

  it("rejects a body without sheets", async () => {
    const res = await post("/schemas/compile", { rows: [] });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ message: "sheets is missing", status_code: 400 });
  });

  it("rejects an unknown language before reading files", async () => {
    const res = await post("/schemas/generate", {
      files: ["items.xlsx"],
      languages: ["cobol"],
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      message: "unknown language: cobol",
      status_code: 400,
    });
  });
});
