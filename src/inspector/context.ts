import type { Logger } from "pino";
import { StoreHandle, TimeSeriesStore, TopologyStore } from "../adapters/stores.js";
import { DependencyUnavailableError, QueryStage } from "../errors.js";
import { SensorConfigCache } from "../sensorConfig.js";

export interface InspectorContext {
  topology: StoreHandle<TopologyStore>;
  timeseries: StoreHandle<TimeSeriesStore>;
  sensorConfig: SensorConfigCache;
  topologyLimit: number;
  timeoutMs: number;
  logger: Logger;
}

export interface CallOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export function requireStore<T>(handle: StoreHandle<T>, stage: QueryStage): T {
  if (!handle.available) throw new DependencyUnavailableError(stage, handle.reason);
  return handle.store;
}

export function deadlineFor(ctx: InspectorContext, opts: CallOptions): { timeoutMs: number; signal?: AbortSignal } {
  return { timeoutMs: opts.timeoutMs ?? ctx.timeoutMs, signal: opts.signal };
}
