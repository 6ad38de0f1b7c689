import { RoomNotFoundError } from "../errors.js";
import { sanitize } from "../query/sanitize.js";
import { ownEntry } from "../sensorConfig.js";
import { CanonicalSensors, SensorConfig, SensorLookup, SensorTypeInfo } from "../types.js";
import { CallOptions, InspectorContext } from "./context.js";
import { runRoomQuery } from "./topology.js";

export function sensorTypeInfo(config: SensorConfig, sensorType: string): SensorTypeInfo | undefined {
  const direct = ownEntry(config.sensorTypes, sensorType);
  if (direct) return direct;
  const wanted = sensorType.toLowerCase();
  const key = Object.keys(config.sensorTypes).find((k) => k.toLowerCase() === wanted);
  return key ? ownEntry(config.sensorTypes, key) : undefined;
}

export function unitsFor(config: SensorConfig, sensors: CanonicalSensors): Record<string, string> {
  const units: Record<string, string> = {};
  for (const type of Object.keys(sensors)) {
    const info = sensorTypeInfo(config, type);
    if (info) units[type] = info.unit;
  }
  return units;
}

/**
 * Resolves a room by name fragment and returns its configured sensors. Several
 * matches are not an error: the first one is used and `ambiguous` is set.
 */
export async function resolveSensors(
  ctx: InspectorContext,
  roomName: string,
  opts: CallOptions = {}
): Promise<SensorLookup> {
  const config = await ctx.sensorConfig.load();
  const name = sanitize(roomName, "graphLiteral");
  const result = await runRoomQuery(ctx, [{ kind: "nameContains", value: name }], opts);

  const element = result.items[0];
  if (!element) throw new RoomNotFoundError(name.raw);

  const ambiguous = result.count > 1;
  if (ambiguous) {
    ctx.logger.info({ roomName: name.raw, matches: result.count, chosen: element.id }, "Room name is ambiguous");
  }

  const sensors = { ...(ownEntry(config.mapping, element.id) ?? {}) };
  return {
    element,
    sensors,
    units: unitsFor(config, sensors),
    ambiguous,
    matches: result.count
  };
}
