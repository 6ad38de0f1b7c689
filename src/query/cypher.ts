import { SafeString } from "./sanitize.js";

type GraphLiteral = SafeString<"graphLiteral">;

export type RoomPredicate =
  | { kind: "category"; value: GraphLiteral }
  | { kind: "storey"; value: GraphLiteral }
  | { kind: "nameContains"; value: GraphLiteral }
  /** Category (either language) or storey. */
  | { kind: "zone"; value: GraphLiteral };

export interface GraphQuery {
  text: string;
  predicates: RoomPredicate[];
  limit: number;
}

export const ROOM_LABEL = "Room";

function lowered(value: GraphLiteral): string {
  return `'${value.escaped.toLowerCase()}'`;
}

function exact(value: GraphLiteral): string {
  return `'${value.escaped}'`;
}

const categoryClause = (v: GraphLiteral) =>
  `toLower(r.category_it) = ${lowered(v)} OR toLower(r.category_en) = ${lowered(v)}`;

const storeyClause = (v: GraphLiteral) => `trim(toString(r.storey)) = ${exact(v)}`;

function predicateClause(p: RoomPredicate): string {
  switch (p.kind) {
    case "category":
      return `(${categoryClause(p.value)})`;
    case "storey":
      return storeyClause(p.value);
    case "nameContains":
      return `(toLower(r.name) CONTAINS ${lowered(p.value)} OR toLower(r.long_name) CONTAINS ${lowered(p.value)})`;
    case "zone":
      return `(${categoryClause(p.value)} OR ${storeyClause(p.value)})`;
  }
}

/**
 * One statement returning the total match count and at most `limit` room
 * nodes, so a lookup costs a single round trip whatever the result size.
 */
export function buildRoomQuery(predicates: RoomPredicate[], limit: number): GraphQuery {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new RangeError(`Room query limit must be a positive integer, got ${limit}`);
  }
  const lines = [`MATCH (r:${ROOM_LABEL})`];
  predicates.forEach((p, i) => {
    lines.push(`${i === 0 ? "WHERE" : "  AND"} ${predicateClause(p)}`);
  });
  lines.push("WITH collect(r) AS rooms");
  lines.push(`RETURN size(rooms) AS total, rooms[0..${limit}] AS items`);
  return { text: lines.join("\n"), predicates, limit };
}
