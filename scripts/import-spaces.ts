import fs from "node:fs/promises";
import { parseArgs } from "node:util";
import { loadConfig } from "../src/config.js";
import { openTopologyStore } from "../src/adapters/capabilities.js";
import { ImportedSpacesFileSchema, importSpaces } from "../src/import/importSpaces.js";
import { candidatePaths, loadSensorConfig } from "../src/sensorConfig.js";
import { logger } from "../src/utils/logger.js";

const { values } = parseArgs({
  options: {
    spaces: { type: "string" },
    config: { type: "string" }
  }
});

if (!values.spaces) {
  // eslint-disable-next-line no-console
  console.error("Usage: import-spaces --spaces <spaces.json> [--config <sensor_config.json>]");
  process.exit(2);
}

const cfg = loadConfig();
const sensorConfig = await loadSensorConfig(candidatePaths(values.config ?? cfg.SENSOR_CONFIG_PATH));
const { spaces } = ImportedSpacesFileSchema.parse(JSON.parse(await fs.readFile(values.spaces, "utf-8")));
logger.info({ spaces: spaces.length, roomKeys: Object.keys(sensorConfig.mapping).length }, "Importing spaces");

const topology = await openTopologyStore(cfg);
if (!topology.available) {
  logger.error({ reason: topology.reason }, "Topology store unavailable");
  process.exit(1);
}

try {
  const summary = await importSpaces(topology.store, spaces, sensorConfig);
  logger.info(
    { upserted: summary.upserted, matched: summary.matched.length, placeholders: summary.placeholders.length },
    "Space import complete"
  );
} finally {
  await topology.store.close();
}
