import { ReduceMode } from "../types.js";
import { SafeString, parseTimeRange, sanitize } from "./sanitize.js";

export interface FluxTarget {
  bucket: string;
  sensorTag: string;
  field?: string;
}

export interface BatchQuery {
  text: string;
  sensorIds: string[];
  timeRange: string;
  reduce: ReduceMode;
}

function fluxString(value: string): string {
  return `"${sanitize(value, "fluxString").escaped}"`;
}

/** `^(?:a|b|c)$` over literal-escaped ids. */
export function sensorIdPattern(ids: SafeString<"regexFragment">[]): string {
  return `/^(?:${ids.map((id) => id.escaped).join("|")})$/`;
}

/**
 * Builds one Flux query covering every sensor id: a regex alternation on the
 * sensor tag, grouped per sensor, reduced to the latest value or the window mean.
 */
export function buildBatchQuery(params: {
  target: FluxTarget;
  sensorIds: string[];
  timeRange: string;
  reduce?: ReduceMode;
}): BatchQuery {
  const reduce = params.reduce ?? "last";
  const sensorIds = Array.from(new Set(params.sensorIds));
  if (sensorIds.length === 0) {
    throw new RangeError("A batch query needs at least one sensor id");
  }
  const range = parseTimeRange(params.timeRange);
  const pattern = sensorIdPattern(sensorIds.map((id) => sanitize(id, "regexFragment")));
  const tag = fluxString(params.target.sensorTag);

  const lines = [
    `from(bucket: ${fluxString(params.target.bucket)})`,
    `  |> range(start: ${range})`,
    `  |> filter(fn: (r) => r[${tag}] =~ ${pattern})`
  ];
  if (params.target.field) {
    lines.push(`  |> filter(fn: (r) => r["_field"] == ${fluxString(params.target.field)})`);
  }
  lines.push(`  |> group(columns: [${tag}])`);
  if (reduce === "last") {
    lines.push(`  |> sort(columns: ["_time"])`, "  |> last()");
    lines.push(`  |> keep(columns: [${tag}, "_time", "_value"])`);
  } else {
    lines.push("  |> mean()");
    lines.push(`  |> keep(columns: [${tag}, "_value"])`);
  }

  return { text: lines.join("\n"), sensorIds, timeRange: range, reduce };
}
