import "dotenv/config";

import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./sheetforge/utils/logColors.js";

const config = loadConfig();
const app = createApp(config);
const log = createLogger();

app.listen(config.port, () => {
  log.section("SHEETFORGE");
  log.action("success", "Listening", `port ${config.port}`);
});
