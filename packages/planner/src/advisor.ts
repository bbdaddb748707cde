import { coordKey, step } from "@wayfinder/grid";
import { DIRECTIONS } from "@wayfinder/schemas";
import type { AreaId, Bounds, Coordinate, Direction, StuckConfig } from "@wayfinder/schemas";
import type { TraversalView } from "./pathfinder.js";

export interface PositionSample {
  areaId: AreaId;
  x: number;
  y: number;
}

export const DEFAULT_STUCK_CONFIG: StuckConfig = {
  historySize: 20,
  window: 10,
  distinctThreshold: 3,
  stuckThreshold: 3,
  minSamples: 8,
};

/**
 * Recent positions, used only to notice the agent pacing in a small
 * pocket. The counter rises while the recent window holds few distinct
 * tiles and decays by one otherwise; it never exceeds the stuck threshold,
 * so recovery takes as many open samples as getting stuck did.
 */
export class PositionHistory {
  private config: StuckConfig;
  private samples: PositionSample[] = [];
  private visited = new Map<AreaId, Set<string>>();
  private counter = 0;

  constructor(config?: Partial<StuckConfig>) {
    this.config = { ...DEFAULT_STUCK_CONFIG, ...config };
  }

  record(areaId: AreaId, position: Coordinate): void {
    this.samples.push({ areaId, x: position.x, y: position.y });
    if (this.samples.length > this.config.historySize) this.samples.shift();

    let tiles = this.visited.get(areaId);
    if (!tiles) {
      tiles = new Set();
      this.visited.set(areaId, tiles);
    }
    tiles.add(coordKey(position));

    if (this.samples.length < this.config.minSamples) return;
    const recent = this.samples.slice(-this.config.window);
    const distinct = new Set(recent.map((s) => `${s.areaId}:${s.x},${s.y}`)).size;
    if (distinct <= this.config.distinctThreshold) {
      this.counter = Math.min(this.counter + 1, this.config.stuckThreshold);
    } else {
      this.counter = Math.max(0, this.counter - 1);
    }
  }

  isStuck(): boolean {
    return this.counter >= this.config.stuckThreshold;
  }

  get stuckCounter(): number {
    return this.counter;
  }

  get length(): number {
    return this.samples.length;
  }

  recent(n = this.config.window): PositionSample[] {
    return this.samples.slice(-n).map((s) => ({ ...s }));
  }

  visitedCount(areaId: AreaId): number {
    return this.visited.get(areaId)?.size ?? 0;
  }

  hasVisited(areaId: AreaId, position: Coordinate): boolean {
    return this.visited.get(areaId)?.has(coordKey(position)) ?? false;
  }

  reset(): void {
    this.samples = [];
    this.visited.clear();
    this.counter = 0;
  }
}

export interface DirectionHit {
  direction: Direction;
  distance: number;
}

export interface ExplorationAdvice {
  /** Directions leading into unexplored tiles, nearest first. */
  unexplored: DirectionHit[];
  /** Directions with a known transition tile, nearest first. */
  transitions: DirectionHit[];
  /** Directions whose adjacent tile is confirmed walkable. */
  walkable: Direction[];
  suggested: Direction | null;
  stuck: boolean;
}

export interface AdvisorOptions {
  /** Farthest tile checked along each direction. */
  maxRadius?: number;
}

function within(b: Bounds | null, c: Coordinate): boolean {
  return b !== null && c.x >= b.minX && c.x <= b.maxX && c.y >= b.minY && c.y <= b.maxY;
}

export class ExplorationAdvisor {
  private maxRadius: number;

  constructor(options: AdvisorOptions = {}) {
    this.maxRadius = options.maxRadius ?? 4;
  }

  advise(grid: TraversalView, position: Coordinate, stuck: boolean): ExplorationAdvice {
    const unexplored: DirectionHit[] = [];
    const transitions: DirectionHit[] = [];
    const walkable: Direction[] = [];

    for (const direction of DIRECTIONS) {
      const status = grid.get(step(position, direction));
      if (status === "unknown") unexplored.push({ direction, distance: 1 });
      else if (status === "transition") transitions.push({ direction, distance: 1 });
      else if (status === "walkable") walkable.push(direction);
    }

    // Farther tiles only count inside the area's recorded bounds
    const bounds = grid.bounds();
    for (let distance = 2; distance <= this.maxRadius; distance++) {
      for (const direction of DIRECTIONS) {
        const target = step(position, direction, distance);
        if (!within(bounds, target)) continue;
        const status = grid.get(target);
        if (status === "transition" && !transitions.some((t) => t.direction === direction)) {
          transitions.push({ direction, distance });
        } else if (status === "unknown" && !unexplored.some((u) => u.direction === direction)) {
          unexplored.push({ direction, distance });
        }
      }
    }

    let suggested: Direction | null = null;
    if (unexplored.length > 0 && !stuck) suggested = unexplored[0]!.direction;
    else if (transitions.length > 0) suggested = transitions[0]!.direction;
    else if (walkable.length > 0) suggested = walkable[0]!;

    return { unexplored, transitions, walkable, suggested, stuck };
  }
}
