import { z } from "zod";
import { RoomUpsert, TopologyWriter } from "../adapters/stores.js";
import { SensorConfig } from "../types.js";
import { logger } from "../utils/logger.js";
import { translateCategory } from "./categories.js";

const PropertySetsSchema = z.record(z.record(z.unknown()));

export const ImportedSpaceSchema = z.object({
  globalId: z.string().min(1),
  name: z.string().nullish(),
  longName: z.string().nullish(),
  objectType: z.string().nullish(),
  storey: z.union([z.string(), z.number()]).nullish(),
  area: z.union([z.number(), z.string()]).nullish(),
  isExternal: z.boolean().nullish(),
  properties: PropertySetsSchema.default({})
});

export const ImportedSpacesFileSchema = z.object({ spaces: z.array(ImportedSpaceSchema) });

export type ImportedSpace = z.infer<typeof ImportedSpaceSchema>;

export interface ImportSummary {
  upserted: number;
  matched: string[];
  placeholders: string[];
}

export function normalizeKey(text: unknown): string {
  if (text === null || text === undefined || text === "") return "";
  return String(text)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
}

function pick(psets: Record<string, Record<string, unknown>>, set: string, key: string): unknown {
  return psets[set]?.[key];
}

function textOrNull(v: unknown): string | null {
  if (typeof v === "string") return v.trim() || null;
  if (typeof v === "number") return String(v);
  return null;
}

function numberOrNull(v: unknown): number | null {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim()) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return null;
}

/**
 * Finds the mapping key for a space: exact match on name, long name, global id
 * or their combinations, else a key contained in (or containing) a combination.
 */
export function matchRoomKey(space: ImportedSpace, roomKeys: string[]): string | undefined {
  const name = normalizeKey(space.name);
  const long = normalizeKey(space.longName);
  const global = normalizeKey(space.globalId);
  const combined1 = normalizeKey(`${space.longName ?? ""} ${space.name ?? ""}`);
  const combined2 = normalizeKey(`${space.name ?? ""} ${space.longName ?? ""}`);
  const exact = [global, name, long, combined1, combined2].filter(Boolean);

  for (const key of roomKeys) {
    const k = normalizeKey(key);
    if (!k) continue;
    if (exact.includes(k)) return key;
    if ((combined1 && combined1.includes(k)) || (combined2 && combined2.includes(k))) return key;
    if ((combined1 && k.includes(combined1)) || (combined2 && k.includes(combined2))) return key;
  }
  return undefined;
}

export function toRoomUpsert(space: ImportedSpace, roomKey: string): RoomUpsert {
  const psets = space.properties;
  const customStorey = textOrNull(pick(psets, "IFC_Locali", "PBSs_III_PIANO"));
  const categoryIt = textOrNull(pick(psets, "IFC_Locali", "SBSm_CATEGORIA_DESCRIZIONE"));
  const area =
    numberOrNull(pick(psets, "Pset_SpaceCommon", "GrossPlannedArea")) ??
    numberOrNull(pick(psets, "Pset_SpaceCommon", "NetPlannedArea")) ??
    numberOrNull(pick(psets, "Pset_SpaceCommon", "Area")) ??
    numberOrNull(space.area);
  const psetExternal = pick(psets, "Pset_SpaceCommon", "IsExternal");
  const isExternal = typeof psetExternal === "boolean" ? psetExternal : space.isExternal ?? null;

  return {
    room_key: roomKey,
    name: textOrNull(space.name),
    long_name: textOrNull(space.longName),
    globalid: space.globalId,
    type: textOrNull(space.objectType),
    storey: customStorey ?? textOrNull(space.storey),
    area,
    is_external: isExternal,
    category_it: categoryIt,
    category_en: translateCategory(categoryIt),
    all_props: JSON.stringify(psets)
  };
}

/**
 * Upserts one `:Room` per space and placeholder rooms for mapping keys that no
 * space matched, so every configured key is resolvable in the graph.
 */
export async function importSpaces(
  writer: TopologyWriter,
  spaces: ImportedSpace[],
  sensorConfig: Pick<SensorConfig, "mapping">
): Promise<ImportSummary> {
  const roomKeys = Object.keys(sensorConfig.mapping);
  const matched = new Set<string>();
  let upserted = 0;

  for (const space of spaces) {
    const found = matchRoomKey(space, roomKeys);
    const roomKey = found ?? `ifc_auto_${space.globalId}`;
    if (found) matched.add(found);

    const room = toRoomUpsert(space, roomKey);
    await writer.upsertRoom(room);
    upserted += 1;
    logger.info(
      { room_key: roomKey, storey: room.storey, category_it: room.category_it, category_en: room.category_en },
      "Upserted room"
    );
  }

  const placeholders = roomKeys.filter((key) => !matched.has(key));
  for (const key of placeholders) {
    await writer.ensurePlaceholder(key);
  }
  if (placeholders.length > 0) {
    logger.warn({ placeholders }, "Mapping keys without a matching space were created as placeholders");
  }

  return { upserted, matched: Array.from(matched), placeholders };
}
