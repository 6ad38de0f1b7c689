import { z } from "zod";
import { InvalidInputError, ToolResult, toToolError } from "./errors.js";
import { CallOptions, InspectorContext } from "./inspector/context.js";
import { inspectRoom } from "./inspector/room.js";
import { resolveSensors } from "./inspector/sensors.js";
import { queryTopology } from "./inspector/topology.js";
import { inspectZoneMetrics } from "./inspector/zoneMetrics.js";
import { RoomInspection, SensorLookup, TopologyResult, ZoneMetricsResult } from "./types.js";

export const QueryTopologyParamsSchema = z.object({
  category: z.string().optional(),
  floor: z.union([z.string(), z.number()]).optional(),
  nameContains: z.string().optional()
});

export const CheckSensorConfigParamsSchema = z.object({
  roomName: z.string()
});

export const InspectZoneMetricsParamsSchema = z.object({
  zone: z.string(),
  sensorType: z.string().optional(),
  goal: z.enum(["report", "max", "min", "avg"]).default("report"),
  timeRange: z.string().default("-1h"),
  reduce: z.enum(["last", "mean"]).default("last")
});

export const InspectRoomParamsSchema = z.object({
  roomName: z.string(),
  sensorType: z.string().optional(),
  timeRange: z.string().default("-24h")
});

export type QueryTopologyParams = z.input<typeof QueryTopologyParamsSchema>;
export type CheckSensorConfigParams = z.input<typeof CheckSensorConfigParamsSchema>;
export type InspectZoneMetricsParams = z.input<typeof InspectZoneMetricsParamsSchema>;
export type InspectRoomParams = z.input<typeof InspectRoomParamsSchema>;

export interface BuildingTools {
  queryTopology(params: QueryTopologyParams, opts?: CallOptions): Promise<ToolResult<TopologyResult>>;
  checkSensorConfig(params: CheckSensorConfigParams, opts?: CallOptions): Promise<ToolResult<SensorLookup>>;
  inspectZoneMetrics(params: InspectZoneMetricsParams, opts?: CallOptions): Promise<ToolResult<ZoneMetricsResult>>;
  inspectRoom(params: InspectRoomParams, opts?: CallOptions): Promise<ToolResult<RoomInspection>>;
}

export type ToolName = keyof BuildingTools;

function invalidParams(err: z.ZodError): InvalidInputError {
  const issue = err.issues[0];
  const where = issue?.path.join(".") || "params";
  return new InvalidInputError(`Invalid ${where}: ${issue?.message ?? "validation failed"}`);
}

function parseParams<S extends z.ZodTypeAny>(schema: S, params: unknown): z.output<S> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) throw invalidParams(parsed.error);
  return parsed.data;
}

/**
 * The public operation surface. Every call resolves to a result envelope;
 * nothing thrown inside an operation escapes it.
 */
export function createBuildingTools(ctx: InspectorContext): BuildingTools {
  async function run<T>(op: ToolName, params: unknown, work: () => Promise<T>): Promise<ToolResult<T>> {
    const log = ctx.logger.child({ op });
    const started = Date.now();
    try {
      const data = await work();
      log.info({ duration_ms: Date.now() - started }, "Tool call complete");
      return { ok: true, data };
    } catch (err) {
      const error = toToolError(err);
      log.warn({ params, error, duration_ms: Date.now() - started }, "Tool call failed");
      return { ok: false, error };
    }
  }

  return {
    queryTopology: (params, opts = {}) =>
      run("queryTopology", params, () => queryTopology(ctx, parseParams(QueryTopologyParamsSchema, params), opts)),

    checkSensorConfig: (params, opts = {}) =>
      run("checkSensorConfig", params, () =>
        resolveSensors(ctx, parseParams(CheckSensorConfigParamsSchema, params).roomName, opts)
      ),

    inspectZoneMetrics: (params, opts = {}) =>
      run("inspectZoneMetrics", params, () =>
        inspectZoneMetrics(ctx, parseParams(InspectZoneMetricsParamsSchema, params), opts)
      ),

    inspectRoom: (params, opts = {}) =>
      run("inspectRoom", params, () => inspectRoom(ctx, parseParams(InspectRoomParamsSchema, params), opts))
  };
}

/** Calls a tool by name with untyped params, as received over HTTP or the CLI. */
export async function callTool(
  tools: BuildingTools,
  name: ToolName,
  params: unknown,
  opts: CallOptions = {}
): Promise<ToolResult<unknown>> {
  const invalid = (err: z.ZodError): ToolResult<never> => ({ ok: false, error: toToolError(invalidParams(err)) });
  switch (name) {
    case "queryTopology": {
      const parsed = QueryTopologyParamsSchema.safeParse(params);
      return parsed.success ? tools.queryTopology(parsed.data, opts) : invalid(parsed.error);
    }
    case "checkSensorConfig": {
      const parsed = CheckSensorConfigParamsSchema.safeParse(params);
      return parsed.success ? tools.checkSensorConfig(parsed.data, opts) : invalid(parsed.error);
    }
    case "inspectZoneMetrics": {
      const parsed = InspectZoneMetricsParamsSchema.safeParse(params);
      return parsed.success ? tools.inspectZoneMetrics(parsed.data, opts) : invalid(parsed.error);
    }
    case "inspectRoom": {
      const parsed = InspectRoomParamsSchema.safeParse(params);
      return parsed.success ? tools.inspectRoom(parsed.data, opts) : invalid(parsed.error);
    }
  }
}

export const TOOL_NAMES: ToolName[] = ["queryTopology", "checkSensorConfig", "inspectZoneMetrics", "inspectRoom"];

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}
