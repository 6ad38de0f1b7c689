import { NoSensorsConfiguredError } from "../errors.js";
import { RoomPredicate } from "../query/cypher.js";
import { parseTimeRange, sanitize } from "../query/sanitize.js";
import { ownEntry } from "../sensorConfig.js";
import { CanonicalMapping, Element, Goal, ReduceMode, SensorSlot, ZoneMetricsResult } from "../types.js";
import { aggregate } from "./aggregate.js";
import { CallOptions, InspectorContext, requireStore } from "./context.js";
import { fetchReadings } from "./readings.js";
import { runRoomQuery } from "./topology.js";

export const WHOLE_BUILDING_ZONES = ["whole building", "building", "all", "edificio", "intero edificio"];

const STOREY_PREFIX = /^(?:floor|storey|level|piano)\s+(.+)$/i;

export interface ZoneMetricsParams {
  zone: string;
  sensorType?: string;
  goal: Goal;
  timeRange: string;
  reduce?: ReduceMode;
}

/**
 * `whole building` (and aliases) selects every room; `floor 2` selects a
 * storey; anything else matches a category in either language or a storey.
 */
export function zonePredicates(zone: string): RoomPredicate[] {
  const value = sanitize(zone, "graphLiteral");
  if (WHOLE_BUILDING_ZONES.includes(value.raw.toLowerCase().replace(/\s+/g, " "))) return [];
  const storey = STOREY_PREFIX.exec(value.raw);
  if (storey?.[1]) return [{ kind: "storey", value: sanitize(storey[1], "graphLiteral") }];
  return [{ kind: "zone", value }];
}

/** Slots in room order, then in the order types appear in each room's mapping. */
export function collectSlots(elements: Element[], mapping: CanonicalMapping, sensorType?: string): SensorSlot[] {
  const wanted = sensorType?.trim().toLowerCase() || undefined;
  const slots: SensorSlot[] = [];
  for (const element of elements) {
    const sensors = ownEntry(mapping, element.id);
    if (!sensors) continue;
    for (const [type, sensorId] of Object.entries(sensors)) {
      if (wanted && type.toLowerCase() !== wanted) continue;
      slots.push({ roomId: element.id, roomName: element.name, sensorType: type, sensorId });
    }
  }
  return slots;
}

export async function inspectZoneMetrics(
  ctx: InspectorContext,
  params: ZoneMetricsParams,
  opts: CallOptions = {}
): Promise<ZoneMetricsResult> {
  const timeRange = parseTimeRange(params.timeRange);
  const reduce = params.reduce ?? "last";
  const predicates = zonePredicates(params.zone);
  requireStore(ctx.timeseries, "timeseries");

  const config = await ctx.sensorConfig.load();
  const rooms = await runRoomQuery(ctx, predicates, opts);

  const slots = collectSlots(rooms.items, config.mapping, params.sensorType);
  if (slots.length === 0) {
    const scope = params.sensorType ? `'${params.sensorType}' in zone '${params.zone}'` : `zone '${params.zone}'`;
    throw new NoSensorsConfiguredError(scope, { rooms: rooms.count });
  }

  const readings = await fetchReadings(ctx, slots, { timeRange, reduce }, opts);
  const result = aggregate(params.goal, slots, readings, config);

  if (result.coverage !== "complete") {
    ctx.logger.info(
      { zone: params.zone, configured: result.configured, contributing: result.contributing },
      "Zone metrics based on incomplete sensor coverage"
    );
  }

  return {
    zone: params.zone,
    sensorType: params.sensorType?.trim() || null,
    timeRange,
    reduce,
    rooms: rooms.count,
    roomsTruncated: rooms.truncated,
    ...result
  };
}
