import { InvalidInputError } from "../errors.js";
import {
  AggregateResult,
  Coverage,
  Goal,
  Reading,
  ReportRow,
  SensorConfig,
  SensorSlot,
  SensorTypeInfo
} from "../types.js";
import { sensorTypeInfo } from "./sensors.js";

export const DEFAULT_LABELS = {
  low: "below range",
  high: "above range",
  ok: "within range"
} as const;

function round2(n: number): number {
  return Number(n.toFixed(2));
}

/** Qualitative label, only for types that declare thresholds. */
export function labelFor(value: number | null, info: SensorTypeInfo | undefined): string | undefined {
  if (value === null || !info?.thresholds) return undefined;
  const { low, high } = info.thresholds;
  if (low === undefined && high === undefined) return undefined;
  if (high !== undefined && value > high) return info.labels?.high ?? DEFAULT_LABELS.high;
  if (low !== undefined && value < low) return info.labels?.low ?? DEFAULT_LABELS.low;
  return info.labels?.ok ?? DEFAULT_LABELS.ok;
}

export function coverageOf(contributing: number, configured: number): Coverage {
  if (contributing === 0) return "none";
  return contributing === configured ? "complete" : "partial";
}

export function buildReportRows(
  slots: SensorSlot[],
  readings: Map<string, Reading>,
  config: SensorConfig
): ReportRow[] {
  return slots.map((slot) => {
    const reading = readings.get(slot.sensorId);
    const info = sensorTypeInfo(config, slot.sensorType);
    const value = reading?.value ?? null;
    const label = labelFor(value, info);
    return {
      ...slot,
      value,
      unit: info?.unit ?? null,
      time: reading?.time ?? null,
      ...(label ? { label } : {})
    };
  });
}

function singleType(slots: SensorSlot[], goal: Goal): string | undefined {
  const types = Array.from(new Set(slots.map((s) => s.sensorType.toLowerCase())));
  if (types.length > 1) {
    throw new InvalidInputError(
      `Cannot compute ${goal} across different sensor types (${types.join(", ")}); specify a sensor type`,
      { sensorTypes: types }
    );
  }
  return slots[0]?.sensorType;
}

/**
 * Reduces readings to the requested statistic. Silent sensors never fail the
 * call: they are left out of the statistic and reported in `silent`.
 */
export function aggregate(
  goal: Goal,
  slots: SensorSlot[],
  readings: Map<string, Reading>,
  config: SensorConfig
): AggregateResult {
  const type = goal === "report" ? undefined : singleType(slots, goal);
  const rows = buildReportRows(slots, readings, config);
  const contributingRows = rows.filter((r) => r.value !== null);
  const silent = Array.from(new Set(rows.filter((r) => r.value === null).map((r) => r.sensorId)));

  const base = {
    goal,
    configured: rows.length,
    contributing: contributingRows.length,
    silent,
    coverage: coverageOf(contributingRows.length, rows.length)
  };

  switch (goal) {
    case "report":
      return { ...base, rows };
    case "max":
    case "min": {
      let extreme: ReportRow | null = null;
      for (const row of contributingRows) {
        if (row.value === null) continue;
        if (
          extreme === null ||
          extreme.value === null ||
          (goal === "max" ? row.value > extreme.value : row.value < extreme.value)
        ) {
          extreme = row;
        }
      }
      return { ...base, extreme };
    }
    case "avg": {
      const values = contributingRows.map((r) => r.value).filter((v): v is number => v !== null);
      const info = type ? sensorTypeInfo(config, type) : undefined;
      const value = values.length > 0 ? round2(values.reduce((acc, n) => acc + n, 0) / values.length) : null;
      const label = labelFor(value, info);
      return { ...base, value, unit: info?.unit ?? null, ...(label ? { label } : {}) };
    }
  }
}
