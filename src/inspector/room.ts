import { NoSensorsConfiguredError } from "../errors.js";
import { parseTimeRange } from "../query/sanitize.js";
import { RoomInspection } from "../types.js";
import { buildReportRows, coverageOf } from "./aggregate.js";
import { CallOptions, InspectorContext, requireStore } from "./context.js";
import { fetchReadings } from "./readings.js";
import { resolveSensors } from "./sensors.js";
import { collectSlots } from "./zoneMetrics.js";

export interface RoomInspectionParams {
  roomName: string;
  sensorType?: string;
  timeRange: string;
}

/** Latest reading of every sensor in one room, labelled against its thresholds. */
export async function inspectRoom(
  ctx: InspectorContext,
  params: RoomInspectionParams,
  opts: CallOptions = {}
): Promise<RoomInspection> {
  const timeRange = parseTimeRange(params.timeRange);
  requireStore(ctx.timeseries, "timeseries");

  const lookup = await resolveSensors(ctx, params.roomName, opts);
  const config = await ctx.sensorConfig.load();
  const slots = collectSlots([lookup.element], { [lookup.element.id]: lookup.sensors }, params.sensorType);
  if (slots.length === 0) {
    throw new NoSensorsConfiguredError(`room '${lookup.element.name ?? lookup.element.id}'`, {
      roomId: lookup.element.id
    });
  }

  const readings = await fetchReadings(ctx, slots, { timeRange, reduce: "last" }, opts);
  const rows = buildReportRows(slots, readings, config);
  const contributing = rows.filter((r) => r.value !== null).length;

  return {
    room: lookup.element,
    ambiguous: lookup.ambiguous,
    matches: lookup.matches,
    timeRange,
    configured: rows.length,
    contributing,
    coverage: coverageOf(contributing, rows.length),
    rows
  };
}
