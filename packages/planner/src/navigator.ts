import type { ConnectivityGraph } from "@wayfinder/mapping";
import type { AreaConnection, AreaId, Coordinate, Direction, PathfinderConfig } from "@wayfinder/schemas";
import { findPath } from "./pathfinder.js";
import type { PathResult, TraversalView } from "./pathfinder.js";

export type AreaRoute =
  | { status: "arrived"; areas: AreaId[] }
  | { status: "no-route"; reason: string }
  | { status: "exit-unreachable"; areas: AreaId[]; reason: string }
  | {
      status: "found";
      /** Every area on the route, both ends included. */
      areas: AreaId[];
      /** The exit taken out of the current area. */
      exit: AreaConnection;
      /** Walking plan to the exit tile. */
      plan: Extract<PathResult, { status: "found" }>;
    };

export interface RouteRequest {
  graph: ConnectivityGraph;
  /** Traversal of the area the agent stands in. */
  grid: TraversalView;
  fromArea: AreaId;
  toArea: AreaId;
  position: Coordinate;
  facing: Direction;
  pathfinder?: Partial<PathfinderConfig>;
}

/**
 * Plans the first leg of a trip to another area: the hop sequence comes
 * from the connectivity graph, then A* picks the cheapest reachable exit
 * into the next area on that sequence.
 */
export function routeToArea(request: RouteRequest): AreaRoute {
  const { graph, grid, fromArea, toArea, position, facing } = request;
  const areas = graph.shortestAreaPath(fromArea, toArea);
  if (!areas) return { status: "no-route", reason: `no known connection path from ${fromArea} to ${toArea}` };
  const next = areas[1];
  if (next === undefined) return { status: "arrived", areas };

  let best: { exit: AreaConnection; plan: Extract<PathResult, { status: "found" }> } | null = null;
  const failures: string[] = [];
  for (const exit of graph.exitsTo(fromArea, next)) {
    const plan = findPath(grid, position, exit.fromCoord, facing, request.pathfinder);
    if (plan.status !== "found") {
      failures.push(`(${exit.fromCoord.x},${exit.fromCoord.y}): ${plan.reason}`);
      continue;
    }
    if (!best || plan.cost < best.plan.cost) best = { exit, plan };
  }

  if (!best) {
    return { status: "exit-unreachable", areas, reason: `no exit to ${next} is reachable; ${failures.join("; ")}` };
  }
  return { status: "found", areas, exit: best.exit, plan: best.plan };
}
