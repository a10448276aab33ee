import express from "express";
import cors from "cors";

import type { Config } from "./config.js";
import router from "./routes/index.js";

export function createApp(config: Config, options: { silent?: boolean } = {}) {
  const app = express();
  app.use(cors(config.corsOrigin ? { origin: config.corsOrigin } : undefined));
  app.use(express.json({ limit: "10mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.use("/schemas", router.schemasRouter(config, options.silent));

  return app;
}
