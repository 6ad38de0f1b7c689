import { AppConfig } from "./config.js";
import { openTimeSeriesStore, openTopologyStore, reportAvailability } from "./adapters/capabilities.js";
import type { StoreHandle, TimeSeriesStore } from "./adapters/stores.js";
import type { Neo4jTopologyStore } from "./adapters/topology/neo4jStore.js";
import { InspectorContext } from "./inspector/context.js";
import { SensorConfigCache, candidatePaths } from "./sensorConfig.js";
import { BuildingTools, createBuildingTools } from "./tools.js";
import { logger } from "./utils/logger.js";

export interface Toolkit {
  tools: BuildingTools;
  context: InspectorContext;
  sensorConfig: SensorConfigCache;
  stores: { topology: StoreHandle<Neo4jTopologyStore>; timeseries: StoreHandle<TimeSeriesStore> };
  close(): Promise<void>;
}

export async function createToolkit(cfg: AppConfig): Promise<Toolkit> {
  const topology = await openTopologyStore(cfg);
  const timeseries = await openTimeSeriesStore(cfg);
  reportAvailability("topology", topology);
  reportAvailability("timeseries", timeseries);

  const sensorConfig = new SensorConfigCache(candidatePaths(cfg.SENSOR_CONFIG_PATH));
  const context: InspectorContext = {
    topology,
    timeseries,
    sensorConfig,
    topologyLimit: cfg.TOPOLOGY_RESULT_LIMIT,
    timeoutMs: cfg.QUERY_TIMEOUT_MS,
    logger
  };

  return {
    tools: createBuildingTools(context),
    context,
    sensorConfig,
    stores: { topology, timeseries },
    async close() {
      if (topology.available) await topology.store.close();
      if (timeseries.available) await timeseries.store.close();
    }
  };
}
