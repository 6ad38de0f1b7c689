import { InfluxDB, type Cancellable, type QueryApi } from "@influxdata/influxdb-client";
import { BatchQuery, FluxTarget } from "../../query/flux.js";
import { Reading } from "../../types.js";
import { logger } from "../../utils/logger.js";
import { StoreCallOptions, TimeSeriesStore } from "../stores.js";

export interface InfluxStoreConfig {
  url: string;
  token: string;
  org: string;
  target: FluxTarget;
  timeoutMs: number;
}

function coerceNumber(v: unknown): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v === "string" && v.trim()) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return null;
}

function coerceTime(v: unknown): string | null {
  if (typeof v === "string" && v) return v;
  if (v instanceof Date) return v.toISOString();
  return null;
}

/**
 * One reading per sensor id. Where several rows carry the same id (several
 * fields on one sensor) the most recent timestamp wins, else the first row.
 */
export function rowsToReadings(rows: Record<string, unknown>[], sensorTag: string): Reading[] {
  const bySensor = new Map<string, Reading>();
  for (const row of rows) {
    const sensorId = row[sensorTag];
    if (typeof sensorId !== "string" || !sensorId) continue;

    const value = coerceNumber(row._value);
    if (value === null && row._value !== null && row._value !== undefined) {
      logger.warn({ sensorId, value: row._value }, "Non-numeric sensor value; treating sensor as silent");
    }
    const reading: Reading = { sensorId, value, time: coerceTime(row._time) };

    const seen = bySensor.get(sensorId);
    if (!seen || (reading.time && seen.time && reading.time > seen.time)) {
      bySensor.set(sensorId, reading);
    }
  }
  return Array.from(bySensor.values());
}

export class InfluxTimeSeriesStore implements TimeSeriesStore {
  readonly target: FluxTarget;

  constructor(
    cfg: InfluxStoreConfig,
    private readonly queryApi: Pick<QueryApi, "queryRows"> = new InfluxDB({
      url: cfg.url,
      token: cfg.token,
      timeout: cfg.timeoutMs
    }).getQueryApi(cfg.org)
  ) {
    this.target = cfg.target;
  }

  readReadings(query: BatchQuery, opts: StoreCallOptions): Promise<Reading[]> {
    const sensorTag = this.target.sensorTag;
    return new Promise((resolve, reject) => {
      const rows: Record<string, unknown>[] = [];
      let cancellable: Cancellable | undefined;
      const onAbort = () => {
        cancellable?.cancel();
        reject(new Error("query cancelled"));
      };
      opts.signal.addEventListener("abort", onAbort, { once: true });

      this.queryApi.queryRows(query.text, {
        next(row, tableMeta) {
          rows.push(tableMeta.toObject(row));
        },
        error(err) {
          opts.signal.removeEventListener("abort", onAbort);
          reject(err);
        },
        complete() {
          opts.signal.removeEventListener("abort", onAbort);
          resolve(rowsToReadings(rows, sensorTag));
        },
        useCancellable(c) {
          cancellable = c;
        }
      });
    });
  }

  async close(): Promise<void> {
    // The query API holds no pooled connections.
  }
}
