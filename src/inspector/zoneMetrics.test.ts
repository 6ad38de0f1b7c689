import assert from "node:assert/strict";
import { test } from "node:test";
import { DependencyUnavailableError, InvalidInputError, NoSensorsConfiguredError } from "../errors.js";
import { BUILDING, BUILDING_CONFIG } from "../testing/building.js";
import { FakeTimeSeriesStore, FakeTopologyStore, available, element, testContext } from "../testing/fakeStores.js";
import { collectSlots, inspectZoneMetrics, zonePredicates } from "./zoneMetrics.js";

function setup(values: Record<string, number>) {
  const topology = new FakeTopologyStore(BUILDING);
  const timeseries = new FakeTimeSeriesStore(values);
  const ctx = testContext({
    topology: available(topology),
    timeseries: available(timeseries),
    config: BUILDING_CONFIG
  });
  return { ctx, topology, timeseries };
}

test("zone names resolve to building, storey or category predicates", () => {
  assert.deepEqual(zonePredicates("whole building"), []);
  assert.deepEqual(zonePredicates("  Whole   Building "), []);
  assert.deepEqual(zonePredicates("edificio"), []);
  assert.deepEqual(
    zonePredicates("Floor 2").map((p) => [p.kind, p.value.raw]),
    [["storey", "2"]]
  );
  assert.deepEqual(
    zonePredicates("Office").map((p) => [p.kind, p.value.raw]),
    [["zone", "Office"]]
  );
  assert.throws(() => zonePredicates("x'; DROP"), InvalidInputError);
});

test("slots follow room order then mapping order, filtered by type", () => {
  const mapping = { a: { temperature: "ta", co2: "ca" }, b: { co2: "cb" } };
  const rooms = [element("b"), element("unmapped"), element("a")];

  assert.deepEqual(
    collectSlots(rooms, mapping).map((s) => s.sensorId),
    ["cb", "ta", "ca"]
  );
  assert.deepEqual(
    collectSlots(rooms, mapping, "CO2").map((s) => s.sensorId),
    ["cb", "ca"]
  );
});

test("rooms whose ids name object builtins have no slots unless mapped", () => {
  const mapping = { constructor: { co2: "c0" } };
  assert.deepEqual(collectSlots([element("toString"), element("hasOwnProperty")], mapping), []);
  assert.deepEqual(
    collectSlots([element("constructor")], mapping).map((s) => s.sensorId),
    ["c0"]
  );
});

test("whole building co2 max returns the worst room in two round trips", async () => {
  const { ctx, topology, timeseries } = setup({ sensor_001_co2: 120, sensor_002_co2: 1850, sensor_101_co2: 400 });

  const result = await inspectZoneMetrics(ctx, {
    zone: "whole building",
    sensorType: "co2",
    goal: "max",
    timeRange: "-1h"
  });

  assert.equal(result.extreme?.value, 1850);
  assert.equal(result.extreme?.roomId, "ifc_room_002");
  assert.equal(result.extreme?.label, "poor air quality");
  assert.equal(result.rooms, 4);
  assert.equal(result.configured, 3);
  assert.equal(result.coverage, "complete");
  assert.equal(topology.calls, 1);
  assert.equal(timeseries.calls, 1);
  assert.deepEqual(timeseries.queries[0]?.sensorIds, ["sensor_001_co2", "sensor_002_co2", "sensor_101_co2"]);
});

test("avg over a zone with one silent sensor counts contributing and configured", async () => {
  const { ctx } = setup({ sensor_001_temp: 20, sensor_002_temp: 22 });

  const result = await inspectZoneMetrics(ctx, {
    zone: "whole building",
    sensorType: "temperature",
    goal: "avg",
    timeRange: "-1h"
  });

  assert.equal(result.value, 21);
  assert.equal(result.contributing, 2);
  assert.equal(result.configured, 3);
  assert.deepEqual(result.silent, ["sensor_101_temp"]);
  assert.equal(result.coverage, "partial");
});

test("category zones and storey zones select their rooms", async () => {
  const { ctx, timeseries } = setup({ sensor_001_temp: 18, sensor_002_temp: 19.5, sensor_101_temp: 23 });

  const offices = await inspectZoneMetrics(ctx, { zone: "Office", sensorType: "temperature", goal: "min", timeRange: "-1h" });
  assert.equal(offices.rooms, 2);
  assert.equal(offices.extreme?.roomId, "ifc_room_001");
  assert.equal(offices.extreme?.label, "too cold");

  const upstairs = await inspectZoneMetrics(ctx, { zone: "floor 2", goal: "report", timeRange: "-1h" });
  assert.equal(upstairs.rooms, 2);
  assert.deepEqual(
    upstairs.rows?.map((r) => [r.sensorId, r.value, r.label ?? null]),
    [
      ["sensor_101_temp", 23, "wasteful"],
      ["sensor_101_co2", null, null]
    ]
  );
  assert.equal(timeseries.queries[1]?.reduce, "last");
});

test("a zone without configured sensors never reaches the time-series store", async () => {
  const { ctx, topology, timeseries } = setup({});

  await assert.rejects(
    inspectZoneMetrics(ctx, { zone: "Storage", goal: "report", timeRange: "-1h" }),
    (err: unknown) => err instanceof NoSensorsConfiguredError && err.details?.rooms === 1
  );
  assert.equal(topology.calls, 1);
  assert.equal(timeseries.calls, 0);
});

test("mixing sensor types in a statistic is invalid input", async () => {
  const { ctx } = setup({ sensor_001_temp: 20, sensor_001_co2: 600 });
  await assert.rejects(
    inspectZoneMetrics(ctx, { zone: "whole building", goal: "max", timeRange: "-1h" }),
    InvalidInputError
  );
});

test("an unavailable time-series store fails before any topology query", async () => {
  const topology = new FakeTopologyStore(BUILDING);
  const ctx = testContext({ topology: available(topology), config: BUILDING_CONFIG });

  await assert.rejects(
    inspectZoneMetrics(ctx, { zone: "whole building", goal: "report", timeRange: "-1h" }),
    DependencyUnavailableError
  );
  assert.equal(topology.calls, 0);
});

test("a bad time range is refused up front", async () => {
  const { ctx, topology } = setup({});
  await assert.rejects(
    inspectZoneMetrics(ctx, { zone: "whole building", goal: "report", timeRange: "yesterday" }),
    InvalidInputError
  );
  assert.equal(topology.calls, 0);
});

test("mean reduction is passed to the batch query", async () => {
  const { ctx, timeseries } = setup({ sensor_001_co2: 700 });
  const result = await inspectZoneMetrics(ctx, {
    zone: "Office",
    sensorType: "co2",
    goal: "avg",
    timeRange: "-6h",
    reduce: "mean"
  });
  assert.equal(result.reduce, "mean");
  assert.equal(result.timeRange, "-6h");
  assert.equal(timeseries.queries[0]?.reduce, "mean");
  assert.equal(result.value, 700);
});
