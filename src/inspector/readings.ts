import { buildBatchQuery } from "../query/flux.js";
import { Reading, ReduceMode, SensorSlot } from "../types.js";
import { withDeadline } from "../utils/deadline.js";
import { CallOptions, InspectorContext, deadlineFor, requireStore } from "./context.js";

/**
 * Fetches every slot's reading in one time-series round trip. Sensors absent
 * from the answer are simply missing from the returned map.
 */
export async function fetchReadings(
  ctx: InspectorContext,
  slots: SensorSlot[],
  params: { timeRange: string; reduce: ReduceMode },
  opts: CallOptions = {}
): Promise<Map<string, Reading>> {
  const store = requireStore(ctx.timeseries, "timeseries");
  const query = buildBatchQuery({
    target: store.target,
    sensorIds: slots.map((s) => s.sensorId),
    timeRange: params.timeRange,
    reduce: params.reduce
  });
  const deadline = deadlineFor(ctx, opts);

  ctx.logger.debug({ flux: query.text, sensors: query.sensorIds.length }, "Batched time-series query");
  const readings = await withDeadline(
    "timeseries",
    (signal) => store.readReadings(query, { signal, timeoutMs: deadline.timeoutMs }),
    deadline
  );

  const wanted = new Set(query.sensorIds);
  return new Map(readings.filter((r) => wanted.has(r.sensorId)).map((r): [string, Reading] => [r.sensorId, r]));
}
