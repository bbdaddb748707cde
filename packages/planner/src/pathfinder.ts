/**
 * A* over one area's traversal grid.
 *
 * The grid is always partly unknown, so unknown tiles stay enterable at a
 * small surcharge and the search is confined to the known bounds plus a
 * margin. Output is a list of turn/move steps: the character must face a
 * direction before a step in that direction moves it.
 */

import { DIRECTION_DELTAS, coordKey, directionBetween, manhattan, sameCoord } from "@wayfinder/grid";
import type { CoordinateGrid } from "@wayfinder/grid";
import { DIRECTIONS } from "@wayfinder/schemas";
import type { Bounds, Coordinate, Direction, PathfinderConfig, TraversalStatus } from "@wayfinder/schemas";

/** The parts of a traversal grid the planner reads. */
export type TraversalView = Pick<CoordinateGrid<TraversalStatus>, "get" | "bounds">;

export interface PlanStep {
  kind: "turn" | "move";
  direction: Direction;
}

export type PathResult =
  | { status: "found"; steps: PlanStep[]; path: Coordinate[]; cost: number; expanded: number }
  | { status: "goal-unreachable"; reason: string }
  | { status: "no-path"; reason: string; expanded: number };

export const DEFAULT_PATHFINDER_CONFIG: PathfinderConfig = {
  unknownPenalty: 0.1,
  searchMargin: 1,
  maxExpansions: 10_000,
};

/** Neighbour statuses that let the goal be approached at all. */
const APPROACHABLE: ReadonlySet<TraversalStatus> = new Set<TraversalStatus>([
  "walkable", "unknown", "transition", "player",
]);

function fmt(c: Coordinate): string {
  return `(${c.x},${c.y})`;
}

/** Cost of stepping onto a tile, or null when it cannot be entered. */
function entryCost(status: TraversalStatus, isGoal: boolean, unknownPenalty: number): number | null {
  switch (status) {
    case "walkable":
    case "transition":
    case "player":
    case "ledge":
      return 1;
    case "unknown":
      return 1 + unknownPenalty;
    case "interactable":
      return isGoal ? 1 : null;
    case "blocked":
      return null;
  }
}

function searchRegion(grid: TraversalView, start: Coordinate, goal: Coordinate, margin: number): Bounds {
  const known = grid.bounds();
  const minX = Math.min(start.x, goal.x, known?.minX ?? start.x);
  const minY = Math.min(start.y, goal.y, known?.minY ?? start.y);
  const maxX = Math.max(start.x, goal.x, known?.maxX ?? start.x);
  const maxY = Math.max(start.y, goal.y, known?.maxY ?? start.y);
  return { minX: minX - margin, minY: minY - margin, maxX: maxX + margin, maxY: maxY + margin };
}

function inside(b: Bounds, c: Coordinate): boolean {
  return c.x >= b.minX && c.x <= b.maxX && c.y >= b.minY && c.y <= b.maxY;
}

/**
 * Turns a tile path into steps, inserting a turn before every move whose
 * direction differs from the simulated facing.
 */
export function stepsForPath(path: Coordinate[], facing: Direction): PlanStep[] {
  const steps: PlanStep[] = [];
  let current = facing;
  for (let i = 1; i < path.length; i++) {
    const direction = directionBetween(path[i - 1]!, path[i]!);
    if (!direction) throw new Error(`Path hop ${fmt(path[i - 1]!)} -> ${fmt(path[i]!)} is not a single step`);
    if (direction !== current) {
      steps.push({ kind: "turn", direction });
      current = direction;
    }
    steps.push({ kind: "move", direction });
  }
  return steps;
}

interface OpenNode {
  coord: Coordinate;
  g: number;
  f: number;
  h: number;
  seq: number;
}

function before(a: OpenNode, b: OpenNode): boolean {
  if (a.f !== b.f) return a.f < b.f;
  if (a.h !== b.h) return a.h < b.h;
  return a.seq < b.seq;
}

class OpenSet {
  private heap: OpenNode[] = [];

  get size(): number {
    return this.heap.length;
  }

  push(node: OpenNode): void {
    const heap = this.heap;
    heap.push(node);
    let i = heap.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(heap[i]!, heap[parent]!)) break;
      [heap[i], heap[parent]] = [heap[parent]!, heap[i]!];
      i = parent;
    }
  }

  pop(): OpenNode | undefined {
    const heap = this.heap;
    const top = heap[0];
    const last = heap.pop();
    if (heap.length === 0 || !last) return top;
    heap[0] = last;
    let i = 0;
    for (;;) {
      const l = 2 * i + 1;
      const r = l + 1;
      let best = i;
      if (l < heap.length && before(heap[l]!, heap[best]!)) best = l;
      if (r < heap.length && before(heap[r]!, heap[best]!)) best = r;
      if (best === i) break;
      [heap[i], heap[best]] = [heap[best]!, heap[i]!];
      i = best;
    }
    return top;
  }
}

/**
 * Plans a route from `start` to `goal` for a character facing `facing`.
 * Never throws; every failure is a typed result.
 */
export function findPath(
  grid: TraversalView,
  start: Coordinate,
  goal: Coordinate,
  facing: Direction,
  options: Partial<PathfinderConfig> = {},
): PathResult {
  const config: PathfinderConfig = { ...DEFAULT_PATHFINDER_CONFIG, ...options };

  if (sameCoord(start, goal)) {
    return { status: "found", steps: [], path: [{ ...start }], cost: 0, expanded: 0 };
  }

  if (grid.get(goal) === "blocked") {
    return { status: "goal-unreachable", reason: `goal ${fmt(goal)} is blocked` };
  }
  const approachable = DIRECTIONS.some((d) => {
    const delta = DIRECTION_DELTAS[d];
    const n = { x: goal.x + delta.x, y: goal.y + delta.y };
    return sameCoord(n, start) || APPROACHABLE.has(grid.get(n));
  });
  if (!approachable) {
    return { status: "goal-unreachable", reason: `goal ${fmt(goal)} has no open neighbour` };
  }

  const region = searchRegion(grid, start, goal, config.searchMargin);
  const open = new OpenSet();
  const bestCost = new Map<string, number>([[coordKey(start), 0]]);
  const cameFrom = new Map<string, Coordinate>();
  const closed = new Set<string>();
  let seq = 0;
  let expanded = 0;

  const h0 = manhattan(start, goal);
  open.push({ coord: { ...start }, g: 0, f: h0, h: h0, seq: seq++ });

  while (open.size > 0) {
    const node = open.pop();
    if (!node) break;
    const key = coordKey(node.coord);
    if (closed.has(key)) continue;

    if (sameCoord(node.coord, goal)) {
      const path = [node.coord];
      let cursor = cameFrom.get(key);
      while (cursor) {
        path.push(cursor);
        cursor = cameFrom.get(coordKey(cursor));
      }
      path.reverse();
      return { status: "found", steps: stepsForPath(path, facing), path, cost: node.g, expanded };
    }

    if (expanded >= config.maxExpansions) {
      return { status: "no-path", reason: `search gave up after ${expanded} expansions`, expanded };
    }
    closed.add(key);
    expanded++;

    for (const direction of DIRECTIONS) {
      const delta = DIRECTION_DELTAS[direction];
      const next = { x: node.coord.x + delta.x, y: node.coord.y + delta.y };
      if (!inside(region, next)) continue;
      const nextKey = coordKey(next);
      if (closed.has(nextKey)) continue;
      const step = entryCost(grid.get(next), sameCoord(next, goal), config.unknownPenalty);
      if (step === null) continue;
      const g = node.g + step;
      const known = bestCost.get(nextKey);
      if (known !== undefined && known <= g) continue;
      bestCost.set(nextKey, g);
      cameFrom.set(nextKey, node.coord);
      const h = manhattan(next, goal);
      open.push({ coord: next, g, f: g + h, h, seq: seq++ });
    }
  }

  return { status: "no-path", reason: `no route from ${fmt(start)} to ${fmt(goal)}`, expanded };
}
