import { loadConfig } from "./config.js";
import { createToolkit } from "./bootstrap.js";
import { startServer } from "./server.js";
import { errorMessage } from "./errors.js";
import { logger } from "./utils/logger.js";

const cfg = loadConfig();
const toolkit = await createToolkit(cfg);

// Surface config problems at startup; the tools still report them per call.
try {
  await toolkit.sensorConfig.load();
} catch (err) {
  logger.error({ err: errorMessage(err) }, "Sensor config not loaded at startup");
}

const server = startServer({
  port: cfg.PORT,
  tools: toolkit.tools,
  sensorConfig: toolkit.sensorConfig,
  stores: toolkit.stores
});

logger.info(
  { query_timeout_ms: cfg.QUERY_TIMEOUT_MS, topology_limit: cfg.TOPOLOGY_RESULT_LIMIT },
  "Building insight toolkit started"
);

async function shutdown(signal: string) {
  logger.info({ signal }, "Shutting down");
  server.close();
  try {
    await toolkit.close();
  } catch (err) {
    logger.error({ err: errorMessage(err) }, "Error while closing store clients");
  }
  process.exit(0);
}

process.once("SIGTERM", () => void shutdown("SIGTERM"));
process.once("SIGINT", () => void shutdown("SIGINT"));
