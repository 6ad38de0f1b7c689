export interface Element {
  /** Stable `room_key`; the join key into the sensor mapping. */
  id: string;
  name: string | null;
  longName: string | null;
  storey: string | null;
  category_it: string | null;
  category_en: string | null;
  area: number | null;
  properties: Record<string, unknown>;
}

/** Sensor type name (`temperature`, `co2`, `default`, `extra_1`, ...) to sensor id. */
export type CanonicalSensors = Record<string, string>;

export type CanonicalMapping = Record<string, CanonicalSensors>;

export interface Thresholds {
  low?: number;
  high?: number;
}

export interface ThresholdLabels {
  low?: string;
  high?: string;
  ok?: string;
}

export interface SensorTypeInfo {
  unit: string;
  thresholds?: Thresholds;
  labels?: ThresholdLabels;
}

export interface SensorConfig {
  sourcePath: string;
  mapping: CanonicalMapping;
  sensorTypes: Record<string, SensorTypeInfo>;
}

export interface Reading {
  sensorId: string;
  value: number | null;
  time: string | null;
}

export type Goal = "report" | "max" | "min" | "avg";
export type ReduceMode = "last" | "mean";

export interface TopologyFilter {
  category?: string;
  floor?: string | number;
  nameContains?: string;
}

export interface TopologyResult {
  count: number;
  items: Element[];
  truncated: boolean;
}

export interface SensorLookup {
  element: Element;
  sensors: CanonicalSensors;
  units: Record<string, string>;
  ambiguous: boolean;
  matches: number;
}

export interface SensorSlot {
  roomId: string;
  roomName: string | null;
  sensorType: string;
  sensorId: string;
}

export interface ReportRow extends SensorSlot {
  value: number | null;
  unit: string | null;
  time: string | null;
  label?: string;
}

export type Coverage = "complete" | "partial" | "none";

export interface AggregateResult {
  goal: Goal;
  configured: number;
  contributing: number;
  silent: string[];
  coverage: Coverage;
  rows?: ReportRow[];
  /** `max`/`min`: the selected row. */
  extreme?: ReportRow | null;
  /** `avg`: mean of contributing values. */
  value?: number | null;
  unit?: string | null;
  label?: string;
}

export interface ZoneMetricsResult extends AggregateResult {
  zone: string;
  sensorType: string | null;
  timeRange: string;
  reduce: ReduceMode;
  rooms: number;
  roomsTruncated: boolean;
}

export interface RoomInspection {
  room: Element;
  ambiguous: boolean;
  matches: number;
  timeRange: string;
  configured: number;
  contributing: number;
  coverage: Coverage;
  rows: ReportRow[];
}
