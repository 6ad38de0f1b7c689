import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ConfigMalformedError, ConfigNotFoundError, errorMessage } from "./errors.js";
import { CanonicalMapping, CanonicalSensors, SensorConfig } from "./types.js";
import { logger } from "./utils/logger.js";

export const DEFAULT_CANDIDATE_PATHS = [
  "./sensor_config.json",
  "./config/sensor_config.json",
  "/app/backend/data/sensor_config.json"
];

const SensorIdSchema = z.string().trim().min(1);
const RawEntrySchema = z.union([SensorIdSchema, z.array(SensorIdSchema), z.record(SensorIdSchema)]);

const SensorTypeSchema = z.object({
  unit: z.string(),
  thresholds: z
    .object({
      low: z.number().optional(),
      high: z.number().optional()
    })
    .optional(),
  labels: z
    .object({
      low: z.string().optional(),
      high: z.string().optional(),
      ok: z.string().optional()
    })
    .optional()
});

const SensorConfigFileSchema = z.object({
  room_to_sensor_map: z.record(RawEntrySchema),
  sensor_types: z.record(SensorTypeSchema).default({})
});

export type RawSensorEntry =
  | { kind: "single"; sensorId: string }
  | { kind: "list"; sensorIds: string[] }
  | { kind: "typed"; sensors: Record<string, string> };

export function classifyEntry(raw: z.infer<typeof RawEntrySchema>): RawSensorEntry {
  if (typeof raw === "string") return { kind: "single", sensorId: raw };
  if (Array.isArray(raw)) return { kind: "list", sensorIds: raw };
  return { kind: "typed", sensors: raw };
}

/**
 * Untyped values become `default`; further list values become `extra_1`,
 * `extra_2`, ... in list order. Typed dictionaries are kept as written.
 */
export function normalizeEntry(entry: RawSensorEntry): CanonicalSensors {
  switch (entry.kind) {
    case "single":
      return { default: entry.sensorId };
    case "list":
      return Object.fromEntries(
        entry.sensorIds.map((sensorId, i): [string, string] => [i === 0 ? "default" : `extra_${i}`, sensorId])
      );
    case "typed":
      return Object.fromEntries(Object.entries(entry.sensors));
  }
}

export function normalizeMapping(raw: Record<string, z.infer<typeof RawEntrySchema>>): CanonicalMapping {
  return Object.fromEntries(
    Object.entries(raw).map(([elementId, value]): [string, CanonicalSensors] => [
      elementId,
      normalizeEntry(classifyEntry(value))
    ])
  );
}

function describeIssue(err: z.ZodError): string {
  const issue = err.issues[0];
  if (!issue) return "validation failed";
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${where}: ${issue.message}`;
}

export function parseSensorConfig(sourcePath: string, parsed: unknown): SensorConfig {
  const result = SensorConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigMalformedError(sourcePath, describeIssue(result.error));
  }
  return {
    sourcePath,
    mapping: normalizeMapping(result.data.room_to_sensor_map),
    sensorTypes: result.data.sensor_types
  };
}

async function readCandidate(candidate: string): Promise<unknown | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(candidate, "utf-8");
  } catch (err) {
    logger.debug({ candidate, err: errorMessage(err) }, "Sensor config candidate not readable");
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    logger.warn({ candidate, err: errorMessage(err) }, "Sensor config candidate is not valid JSON; skipping");
    return undefined;
  }
}

/** Reads the first candidate holding well-formed JSON. */
export async function loadSensorConfig(candidates: string[]): Promise<SensorConfig> {
  const resolved = candidates.map((c) => path.resolve(c));
  for (const candidate of resolved) {
    const parsed = await readCandidate(candidate);
    if (parsed === undefined) continue;
    const config = parseSensorConfig(candidate, parsed);
    logger.info(
      { sourcePath: candidate, rooms: Object.keys(config.mapping).length, sensorTypes: Object.keys(config.sensorTypes) },
      "Loaded sensor config"
    );
    return config;
  }
  throw new ConfigNotFoundError(resolved);
}

export function candidatePaths(explicitPath?: string): string[] {
  return explicitPath ? [explicitPath, ...DEFAULT_CANDIDATE_PATHS] : [...DEFAULT_CANDIDATE_PATHS];
}

/**
 * Process-lifetime holder for the sensor config. The first `load()` publishes
 * its promise; concurrent callers await the same load. A rejected load is not
 * kept, so the next call reads the files again.
 */
export class SensorConfigCache {
  private published: Promise<SensorConfig> | null = null;

  constructor(
    private readonly candidates: string[],
    private readonly loader: (candidates: string[]) => Promise<SensorConfig> = loadSensorConfig
  ) {}

  load(): Promise<SensorConfig> {
    if (this.published) return this.published;
    const pending = this.loader(this.candidates);
    this.published = pending;
    void pending.catch(() => {
      if (this.published === pending) this.published = null;
    });
    return pending;
  }

  /** Re-reads the file; readers keep the previous value until the new one is ready. */
  async reload(): Promise<SensorConfig> {
    const next = await this.loader(this.candidates);
    this.published = Promise.resolve(next);
    return next;
  }

  invalidate(): void {
    this.published = null;
  }
}

/** Own-property lookup; keys such as `constructor` never resolve through the prototype. */
export function ownEntry<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
