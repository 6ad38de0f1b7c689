import { GraphQuery } from "../query/cypher.js";
import { BatchQuery, FluxTarget } from "../query/flux.js";
import { Element, Reading } from "../types.js";

export interface StoreCallOptions {
  /** Aborted on timeout or caller cancellation. */
  signal: AbortSignal;
  /** Server-side budget, where the store supports one. */
  timeoutMs: number;
}

export interface TopologyPage {
  total: number;
  elements: Element[];
}

export interface TopologyStore {
  findRooms(query: GraphQuery, opts: StoreCallOptions): Promise<TopologyPage>;
  close(): Promise<void>;
}

export interface RoomUpsert {
  room_key: string;
  name: string | null;
  long_name: string | null;
  globalid: string | null;
  type: string | null;
  storey: string | null;
  area: number | null;
  is_external: boolean | null;
  category_it: string | null;
  category_en: string | null;
  all_props: string;
}

export interface TopologyWriter {
  upsertRoom(room: RoomUpsert): Promise<void>;
  ensurePlaceholder(roomKey: string): Promise<void>;
}

export interface TimeSeriesStore {
  readonly target: FluxTarget;
  readReadings(query: BatchQuery, opts: StoreCallOptions): Promise<Reading[]>;
  close(): Promise<void>;
}

export type StoreHandle<T> = { available: true; store: T } | { available: false; reason: string };
