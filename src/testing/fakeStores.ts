/**
 * In-process stand-ins for the topology and time-series stores. The topology
 * fake evaluates the structured predicates of a room query with the same
 * semantics as the generated Cypher.
 */

import pino from "pino";
import {
  RoomUpsert,
  StoreCallOptions,
  StoreHandle,
  TimeSeriesStore,
  TopologyPage,
  TopologyStore,
  TopologyWriter
} from "../adapters/stores.js";
import { InspectorContext } from "../inspector/context.js";
import { GraphQuery, RoomPredicate } from "../query/cypher.js";
import { BatchQuery, FluxTarget } from "../query/flux.js";
import { SensorConfigCache, parseSensorConfig } from "../sensorConfig.js";
import { Element, Reading } from "../types.js";

function lower(v: string | null): string | null {
  return v === null ? null : v.toLowerCase();
}

function categoryMatches(e: Element, value: string): boolean {
  const wanted = value.toLowerCase();
  return lower(e.category_it) === wanted || lower(e.category_en) === wanted;
}

function storeyMatches(e: Element, value: string): boolean {
  return e.storey !== null && e.storey.trim() === value;
}

export function roomMatches(e: Element, p: RoomPredicate): boolean {
  switch (p.kind) {
    case "category":
      return categoryMatches(e, p.value.raw);
    case "storey":
      return storeyMatches(e, p.value.raw);
    case "nameContains": {
      const wanted = p.value.raw.toLowerCase();
      return Boolean(lower(e.name)?.includes(wanted) || lower(e.longName)?.includes(wanted));
    }
    case "zone":
      return categoryMatches(e, p.value.raw) || storeyMatches(e, p.value.raw);
  }
}

/** Resolves after `ms`, or rejects when `signal` aborts first. */
function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(new Error("aborted"));
      },
      { once: true }
    );
  });
}

export class FakeTopologyStore implements TopologyStore, TopologyWriter {
  readonly queries: GraphQuery[] = [];
  readonly upserts: RoomUpsert[] = [];
  readonly placeholders: string[] = [];
  failWith: Error | null = null;
  delayMs = 0;

  constructor(public elements: Element[] = []) {}

  get calls(): number {
    return this.queries.length;
  }

  async findRooms(query: GraphQuery, opts: StoreCallOptions): Promise<TopologyPage> {
    this.queries.push(query);
    if (this.delayMs > 0) await delay(this.delayMs, opts.signal);
    if (this.failWith) throw this.failWith;
    const matching = this.elements.filter((e) => query.predicates.every((p) => roomMatches(e, p)));
    return { total: matching.length, elements: matching.slice(0, query.limit) };
  }

  async upsertRoom(room: RoomUpsert): Promise<void> {
    this.upserts.push(room);
  }

  async ensurePlaceholder(roomKey: string): Promise<void> {
    this.placeholders.push(roomKey);
  }

  async close(): Promise<void> {}
}

export class FakeTimeSeriesStore implements TimeSeriesStore {
  readonly target: FluxTarget = { bucket: "test-bucket", sensorTag: "sensor_id" };
  readonly queries: BatchQuery[] = [];
  /** Signal of each call, in call order. */
  readonly signals: AbortSignal[] = [];
  failWith: Error | null = null;
  delayMs = 0;

  /** Sensor id to value; ids not listed stay silent. */
  constructor(public values: Record<string, number> = {}) {}

  get calls(): number {
    return this.queries.length;
  }

  async readReadings(query: BatchQuery, opts: StoreCallOptions): Promise<Reading[]> {
    this.queries.push(query);
    this.signals.push(opts.signal);
    if (this.delayMs > 0) await delay(this.delayMs, opts.signal);
    if (this.failWith) throw this.failWith;
    return query.sensorIds
      .filter((id) => id in this.values)
      .map((id) => ({ sensorId: id, value: this.values[id] ?? null, time: "2024-01-01T12:00:00Z" }));
  }

  async close(): Promise<void> {}
}

export function element(id: string, overrides: Partial<Omit<Element, "id">> = {}): Element {
  return {
    id,
    name: null,
    longName: null,
    storey: null,
    category_it: null,
    category_en: null,
    area: null,
    properties: {},
    ...overrides
  };
}

/** Cache preloaded from an in-memory document instead of the filesystem. */
export function configCache(document: unknown): SensorConfigCache {
  return new SensorConfigCache(["memory://sensor_config.json"], async ([source]) =>
    parseSensorConfig(source ?? "memory", document)
  );
}

export const silentLogger = pino({ level: "silent" });

export function available<T>(store: T): StoreHandle<T> {
  return { available: true, store };
}

export function unavailable<T>(reason: string): StoreHandle<T> {
  return { available: false, reason };
}

export function testContext(params: {
  topology?: StoreHandle<TopologyStore>;
  timeseries?: StoreHandle<TimeSeriesStore>;
  config: unknown;
  topologyLimit?: number;
  timeoutMs?: number;
}): InspectorContext {
  return {
    topology: params.topology ?? unavailable<TopologyStore>("topology not provided"),
    timeseries: params.timeseries ?? unavailable<TimeSeriesStore>("timeseries not provided"),
    sensorConfig: configCache(params.config),
    topologyLimit: params.topologyLimit ?? 500,
    timeoutMs: params.timeoutMs ?? 1_000,
    logger: silentLogger
  };
}
