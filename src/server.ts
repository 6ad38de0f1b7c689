import express from "express";
import type { StoreHandle } from "./adapters/stores.js";
import { SensorConfigCache } from "./sensorConfig.js";
import { InvalidInputError, ToolError, ToolResult, errorMessage, toToolError } from "./errors.js";
import { BuildingTools, ToolName, callTool } from "./tools.js";
import { logger } from "./utils/logger.js";

export function statusFor(error: ToolError): number {
  switch (error.kind) {
    case "InvalidInput":
      return 400;
    case "RoomNotFound":
      return 404;
    case "NoSensorsConfigured":
      return 422;
    case "DependencyUnavailable":
      return 503;
    case "QueryExecutionError":
      return error.reason === "timeout" ? 504 : 502;
    case "ConfigNotFound":
    case "ConfigMalformed":
      return 500;
  }
}

const routes: Record<string, ToolName> = {
  "/tools/query-topology": "queryTopology",
  "/tools/check-sensor-config": "checkSensorConfig",
  "/tools/inspect-zone-metrics": "inspectZoneMetrics",
  "/tools/inspect-room": "inspectRoom"
};

function respond(res: express.Response, result: ToolResult<unknown>) {
  if (result.ok) return res.json(result);
  return res.status(statusFor(result.error)).json(result);
}

function isClientError(err: unknown): boolean {
  if (!err || typeof err !== "object" || !("status" in err)) return false;
  return typeof err.status === "number" && err.status >= 400 && err.status < 500;
}

/** Body-parser failures (malformed JSON, oversized bodies) answer in the envelope. */
const bodyErrors: express.ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent || !isClientError(err)) {
    next(err);
    return;
  }
  respond(res, { ok: false, error: toToolError(new InvalidInputError(`Malformed request body: ${errorMessage(err)}`)) });
};

export function createApp(params: {
  tools: BuildingTools;
  sensorConfig: SensorConfigCache;
  stores: { topology: StoreHandle<unknown>; timeseries: StoreHandle<unknown> };
}) {
  const app = express();
  app.use(express.json({ limit: "64kb" }));

  app.get("/healthz", (_req, res) => {
    const describe = (h: StoreHandle<unknown>) => (h.available ? { available: true } : { available: false, reason: h.reason });
    res.json({
      ok: true,
      topology: describe(params.stores.topology),
      timeseries: describe(params.stores.timeseries)
    });
  });

  app.post("/admin/reload-config", async (_req, res) => {
    try {
      const config = await params.sensorConfig.reload();
      res.json({ ok: true, sourcePath: config.sourcePath, rooms: Object.keys(config.mapping).length });
    } catch (err) {
      logger.error({ err }, "Sensor config reload failed");
      respond(res, { ok: false, error: toToolError(err) });
    }
  });

  for (const [path, name] of Object.entries(routes)) {
    app.post(path, async (req, res) => {
      // Abandon store calls when the client goes away before the answer.
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableFinished) controller.abort();
      });
      const body: unknown = req.body ?? {};
      const result = await callTool(params.tools, name, body, { signal: controller.signal });
      if (!controller.signal.aborted) respond(res, result);
    });
  }

  app.use(bodyErrors);

  return app;
}

export function startServer(params: Parameters<typeof createApp>[0] & { port: number }) {
  const app = createApp(params);
  const server = app.listen(params.port, () => {
    logger.info({ port: params.port }, "HTTP server listening");
  });
  return server;
}
