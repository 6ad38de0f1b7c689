import assert from "node:assert/strict";
import { test } from "node:test";
import { InvalidInputError } from "../errors.js";
import { parseSensorConfig } from "../sensorConfig.js";
import { Reading, SensorSlot } from "../types.js";
import { aggregate, buildReportRows, coverageOf, labelFor } from "./aggregate.js";

const config = parseSensorConfig("memory", {
  room_to_sensor_map: {},
  sensor_types: {
    temperature: {
      unit: "°C",
      thresholds: { low: 19, high: 21 },
      labels: { low: "too cold", high: "wasteful", ok: "acceptable" }
    },
    co2: { unit: "ppm", thresholds: { high: 1000 }, labels: { high: "poor air quality", ok: "good air quality" } },
    humidity: { unit: "%", thresholds: { low: 30, high: 60 } },
    lux: { unit: "lx" }
  }
});

const slot = (roomId: string, sensorType: string, sensorId: string): SensorSlot => ({
  roomId,
  roomName: roomId.toUpperCase(),
  sensorType,
  sensorId
});

function readings(values: Record<string, number>): Map<string, Reading> {
  return new Map(
    Object.entries(values).map(([sensorId, value]): [string, Reading] => [
      sensorId,
      { sensorId, value, time: "2024-01-01T12:00:00Z" }
    ])
  );
}

test("labels follow thresholds with configured or default wording", () => {
  assert.equal(labelFor(18.5, config.sensorTypes.temperature), "too cold");
  assert.equal(labelFor(22, config.sensorTypes.temperature), "wasteful");
  assert.equal(labelFor(21, config.sensorTypes.temperature), "acceptable");
  assert.equal(labelFor(1000, config.sensorTypes.co2), "good air quality");
  assert.equal(labelFor(70, config.sensorTypes.humidity), "above range");
  assert.equal(labelFor(20, config.sensorTypes.humidity), "below range");
  assert.equal(labelFor(300, config.sensorTypes.lux), undefined);
  assert.equal(labelFor(null, config.sensorTypes.temperature), undefined);
});

test("coverage compares contributing and configured sensors", () => {
  assert.equal(coverageOf(3, 3), "complete");
  assert.equal(coverageOf(2, 3), "partial");
  assert.equal(coverageOf(0, 3), "none");
});

test("max picks the extreme reading with its room and label", () => {
  const slots = [slot("r1", "co2", "c1"), slot("r2", "co2", "c2"), slot("r3", "co2", "c3")];
  const result = aggregate("max", slots, readings({ c1: 120, c2: 1850, c3: 400 }), config);

  assert.equal(result.configured, 3);
  assert.equal(result.contributing, 3);
  assert.equal(result.coverage, "complete");
  assert.deepEqual(result.extreme, {
    roomId: "r2",
    roomName: "R2",
    sensorType: "co2",
    sensorId: "c2",
    value: 1850,
    unit: "ppm",
    time: "2024-01-01T12:00:00Z",
    label: "poor air quality"
  });
});

test("min ties go to the first room encountered", () => {
  const slots = [slot("r1", "co2", "c1"), slot("r2", "co2", "c2"), slot("r3", "co2", "c3")];
  const result = aggregate("min", slots, readings({ c1: 500, c2: 400, c3: 400 }), config);
  assert.equal(result.extreme?.roomId, "r2");
});

test("avg ignores silent sensors and reports them", () => {
  const slots = [slot("r1", "temperature", "t1"), slot("r2", "temperature", "t2"), slot("r3", "temperature", "t3")];
  const result = aggregate("avg", slots, readings({ t1: 20, t2: 22 }), config);

  assert.equal(result.value, 21);
  assert.equal(result.unit, "°C");
  assert.equal(result.label, "acceptable");
  assert.equal(result.contributing, 2);
  assert.equal(result.configured, 3);
  assert.deepEqual(result.silent, ["t3"]);
  assert.equal(result.coverage, "partial");
});

test("avg is rounded to two decimals", () => {
  const slots = [slot("r1", "temperature", "t1"), slot("r2", "temperature", "t2"), slot("r3", "temperature", "t3")];
  assert.equal(aggregate("avg", slots, readings({ t1: 20, t2: 21, t3: 21 }), config).value, 20.67);
});

test("no contributing sensors gives an empty statistic, not an error", () => {
  const slots = [slot("r1", "co2", "c1")];
  const max = aggregate("max", slots, new Map(), config);
  assert.equal(max.extreme, null);
  assert.equal(max.coverage, "none");
  const avg = aggregate("avg", slots, new Map(), config);
  assert.equal(avg.value, null);
  assert.equal(avg.label, undefined);
});

test("statistics across sensor types are refused, reports are not", () => {
  const slots = [slot("r1", "temperature", "t1"), slot("r1", "co2", "c1")];
  assert.throws(() => aggregate("max", slots, readings({ t1: 20, c1: 500 }), config), InvalidInputError);

  const report = aggregate("report", slots, readings({ t1: 20, c1: 500 }), config);
  assert.deepEqual(
    report.rows?.map((r) => [r.sensorId, r.value, r.unit, r.label]),
    [
      ["t1", 20, "°C", "acceptable"],
      ["c1", 500, "ppm", "good air quality"]
    ]
  );
});

test("report rows for silent sensors carry no value, time or label", () => {
  const [row] = buildReportRows([slot("r1", "temperature", "t1")], new Map(), config);
  assert.deepEqual(row, {
    roomId: "r1",
    roomName: "R1",
    sensorType: "temperature",
    sensorId: "t1",
    value: null,
    unit: "°C",
    time: null
  });
});
