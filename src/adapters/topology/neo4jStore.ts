/**
 * Neo4j-backed topology store.
 *
 * Graph schema: one `:Room` node per building space, keyed by `room_key`, with
 * `name`, `long_name`, `storey`, `category_it`, `category_en`, `area` and the
 * source model's property sets serialized into `all_properties`.
 */

import { auth, driver as createDriver, isInt, isNode, type Driver } from "neo4j-driver";
import { GraphQuery } from "../../query/cypher.js";
import { Element } from "../../types.js";
import { errorMessage } from "../../errors.js";
import { logger } from "../../utils/logger.js";
import { RoomUpsert, StoreCallOptions, TopologyPage, TopologyStore, TopologyWriter } from "../stores.js";

export interface Neo4jStoreConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
  timeoutMs: number;
}

const CORE_KEYS = new Set([
  "room_key",
  "name",
  "long_name",
  "storey",
  "category_it",
  "category_en",
  "area",
  "all_properties"
]);

function toPlain(value: unknown): unknown {
  return isInt(value) ? value.toNumber() : value;
}

function optionalText(value: unknown): string | null {
  const plain = toPlain(value);
  if (typeof plain === "string") return plain.trim() || null;
  if (typeof plain === "number" && Number.isFinite(plain)) return String(plain);
  return null;
}

function optionalNumber(value: unknown): number | null {
  const plain = toPlain(value);
  if (typeof plain === "number" && Number.isFinite(plain)) return plain;
  if (typeof plain === "string" && plain.trim()) {
    const n = Number(plain);
    if (Number.isFinite(n)) return n;
  }
  return null;
}

function decodePropertySets(value: unknown): Record<string, unknown> | undefined {
  if (typeof value !== "string" || !value) return undefined;
  try {
    const parsed: unknown = JSON.parse(value);
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) return { ...parsed };
  } catch (err) {
    logger.debug({ err: errorMessage(err) }, "Room all_properties is not valid JSON; ignoring");
  }
  return undefined;
}

/** Returns null for nodes without a usable `room_key`. */
export function elementFromProperties(props: Record<string, unknown>): Element | null {
  const id = optionalText(props.room_key);
  if (!id) return null;

  const properties: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(props)) {
    if (!CORE_KEYS.has(key)) properties[key] = toPlain(value);
  }
  const psets = decodePropertySets(props.all_properties);
  if (psets) properties.psets = psets;

  return {
    id,
    name: optionalText(props.name),
    longName: optionalText(props.long_name),
    storey: optionalText(props.storey),
    category_it: optionalText(props.category_it),
    category_en: optionalText(props.category_en),
    area: optionalNumber(props.area),
    properties
  };
}

function nodeProperties(item: unknown): Record<string, unknown> | null {
  if (!item || typeof item !== "object") return null;
  if (isNode(item)) return item.properties;
  return null;
}

export interface GraphRecord {
  get(key: string): unknown;
}

/** The slice of a neo4j session the store uses: auto-commit queries only. */
export interface GraphSession {
  run(text: string, params: Record<string, unknown>, config: { timeout?: number }): Promise<{ records: GraphRecord[] }>;
  close(): Promise<void>;
}

export interface GraphDriver {
  session(config: { database?: string }): GraphSession;
  close(): Promise<void>;
}

/** Wraps a driver; every statement runs once as an auto-commit query. */
export function fromDriver(driver: Driver): GraphDriver {
  return {
    session(config) {
      const session = driver.session(config);
      return {
        async run(text, params, txConfig) {
          const result = await session.run(text, params, txConfig);
          return { records: result.records.map((record) => ({ get: (key: string): unknown => record.get(key) })) };
        },
        close: () => session.close()
      };
    },
    close: () => driver.close()
  };
}

function connect(cfg: Neo4jStoreConfig): GraphDriver {
  return fromDriver(
    createDriver(cfg.uri, auth.basic(cfg.user, cfg.password), {
      maxConnectionPoolSize: 50,
      connectionTimeout: cfg.timeoutMs,
      connectionAcquisitionTimeout: cfg.timeoutMs
    })
  );
}

const UPSERT_ROOM = `
  MERGE (r:Room {room_key: $room_key})
  SET r.name = $name,
      r.long_name = $long_name,
      r.globalid = $globalid,
      r.type = $type,
      r.storey = $storey,
      r.area = $area,
      r.is_external = $is_external,
      r.category_it = $category_it,
      r.category_en = $category_en,
      r.all_properties = $all_props
`;

export class Neo4jTopologyStore implements TopologyStore, TopologyWriter {
  constructor(
    private readonly cfg: Neo4jStoreConfig,
    private readonly driver: GraphDriver = connect(cfg)
  ) {}

  async findRooms(query: GraphQuery, opts: StoreCallOptions): Promise<TopologyPage> {
    const session = this.driver.session({ database: this.cfg.database });
    const onAbort = () => {
      session.close().catch((err: unknown) => logger.debug({ err: errorMessage(err) }, "Neo4j session close failed"));
    };
    opts.signal.addEventListener("abort", onAbort, { once: true });

    try {
      const { records } = await session.run(query.text, {}, { timeout: opts.timeoutMs });

      const record = records[0];
      if (!record) return { total: 0, elements: [] };

      const total = record.get("total");
      const items = record.get("items");
      const elements: Element[] = [];
      for (const item of Array.isArray(items) ? items : []) {
        const props = nodeProperties(item);
        const element = props ? elementFromProperties(props) : null;
        if (element) elements.push(element);
        else logger.warn("Room node without room_key skipped");
      }
      return { total: optionalNumber(total) ?? elements.length, elements };
    } finally {
      opts.signal.removeEventListener("abort", onAbort);
      if (!opts.signal.aborted) await session.close();
    }
  }

  async upsertRoom(room: RoomUpsert): Promise<void> {
    await this.write(UPSERT_ROOM, { ...room });
  }

  async ensurePlaceholder(roomKey: string): Promise<void> {
    await this.write("MERGE (r:Room {room_key: $room_key}) ON CREATE SET r.type = 'Placeholder'", {
      room_key: roomKey
    });
  }

  private async write(text: string, params: Record<string, unknown>): Promise<void> {
    const session = this.driver.session({ database: this.cfg.database });
    try {
      await session.run(text, params, { timeout: this.cfg.timeoutMs });
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}
