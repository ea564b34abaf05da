import { loadConfig } from "./config.js";
import { buildApp } from "./app.js";
import { logger } from "./lib/logger.js";

const config = loadConfig(process.env);
logger.level = config.LOG_LEVEL;

const app = buildApp({ config });
app.listen(config.PORT, () => {
  logger.info({ port: config.PORT, version: config.VERSION }, `Nessus report API listening on ${config.BASE_URL}`);
});
