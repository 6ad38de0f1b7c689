import type { AppConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";
import type { StoreHandle, TimeSeriesStore } from "./stores.js";
import type { Neo4jTopologyStore } from "./topology/neo4jStore.js";

/**
 * Store adapters are imported lazily so that a missing driver package turns
 * into an unavailable handle instead of a crash at module load.
 */
export async function openTopologyStore(cfg: AppConfig): Promise<StoreHandle<Neo4jTopologyStore>> {
  try {
    const { Neo4jTopologyStore } = await import("./topology/neo4jStore.js");
    const store = new Neo4jTopologyStore({
      uri: cfg.NEO4J_URI,
      user: cfg.NEO4J_USER,
      password: cfg.NEO4J_PASSWORD,
      database: cfg.NEO4J_DATABASE,
      timeoutMs: cfg.QUERY_TIMEOUT_MS
    });
    return { available: true, store };
  } catch (err) {
    return { available: false, reason: `neo4j driver could not be loaded: ${errorMessage(err)}` };
  }
}

export async function openTimeSeriesStore(cfg: AppConfig): Promise<StoreHandle<TimeSeriesStore>> {
  const { INFLUX_HOST: url, INFLUX_TOKEN: token, INFLUX_ORG: org, INFLUX_BUCKET: bucket } = cfg;
  if (!url || !token || !org || !bucket) {
    const missing = (["INFLUX_HOST", "INFLUX_TOKEN", "INFLUX_ORG", "INFLUX_BUCKET"] as const).filter((key) => !cfg[key]);
    return { available: false, reason: `InfluxDB not configured (missing ${missing.join(", ")})` };
  }
  try {
    const { InfluxTimeSeriesStore } = await import("./timeseries/influxStore.js");
    const store = new InfluxTimeSeriesStore({
      url,
      token,
      org,
      target: { bucket, sensorTag: cfg.INFLUX_SENSOR_TAG, field: cfg.INFLUX_FIELD },
      timeoutMs: cfg.QUERY_TIMEOUT_MS
    });
    return { available: true, store };
  } catch (err) {
    return { available: false, reason: `influxdb client could not be loaded: ${errorMessage(err)}` };
  }
}

/** Reported once at startup; calls needing the store answer DependencyUnavailable. */
export function reportAvailability(name: string, handle: StoreHandle<unknown>): void {
  if (handle.available) {
    logger.info({ store: name }, "Store client ready");
  } else {
    logger.warn({ store: name, reason: handle.reason }, "Store unavailable; dependent operations will report it");
  }
}
