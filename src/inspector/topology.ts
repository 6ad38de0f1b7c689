import { RoomPredicate, buildRoomQuery } from "../query/cypher.js";
import { sanitizeOptional } from "../query/sanitize.js";
import { TopologyFilter, TopologyResult } from "../types.js";
import { withDeadline } from "../utils/deadline.js";
import { CallOptions, InspectorContext, deadlineFor, requireStore } from "./context.js";

export function topologyPredicates(filter: TopologyFilter): RoomPredicate[] {
  const predicates: RoomPredicate[] = [];
  const category = sanitizeOptional(filter.category, "graphLiteral");
  const floor = sanitizeOptional(filter.floor, "graphLiteral");
  const name = sanitizeOptional(filter.nameContains, "graphLiteral");
  if (category) predicates.push({ kind: "category", value: category });
  if (floor) predicates.push({ kind: "storey", value: floor });
  if (name) predicates.push({ kind: "nameContains", value: name });
  return predicates;
}

/** Single round trip to the topology store. */
export async function runRoomQuery(
  ctx: InspectorContext,
  predicates: RoomPredicate[],
  opts: CallOptions = {}
): Promise<TopologyResult> {
  const store = requireStore(ctx.topology, "topology");
  const query = buildRoomQuery(predicates, ctx.topologyLimit);
  const deadline = deadlineFor(ctx, opts);

  ctx.logger.debug({ cypher: query.text }, "Topology query");
  const page = await withDeadline(
    "topology",
    (signal) => store.findRooms(query, { signal, timeoutMs: deadline.timeoutMs }),
    deadline
  );

  const items = page.elements.slice(0, query.limit);
  const count = Math.max(page.total, items.length);
  return { count, items, truncated: count > items.length };
}

export async function queryTopology(
  ctx: InspectorContext,
  filter: TopologyFilter,
  opts: CallOptions = {}
): Promise<TopologyResult> {
  return runRoomQuery(ctx, topologyPredicates(filter), opts);
}
