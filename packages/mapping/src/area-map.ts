import { CoordinateGrid, sameCoord } from "@wayfinder/grid";
import { TRAVERSAL_CODES, traversalFromCode } from "@wayfinder/schemas";
import type {
  AreaId,
  AreaRecord,
  AreaRef,
  Bounds,
  Coordinate,
  TileLabel,
  TraversalStatus,
} from "@wayfinder/schemas";

export const UNKNOWN_LABEL: TileLabel = "unknown";

/** Markers the transient player marker never overwrites. */
export const STRUCTURAL_STATUSES: ReadonlySet<TraversalStatus> = new Set<TraversalStatus>([
  "transition",
  "interactable",
  "ledge",
]);

export interface AreaSummary {
  areaId: AreaId;
  displayName: string;
  bounds: Bounds | null;
  explored: number;
  visitCount: number;
  counts: Record<TraversalStatus, number>;
}

export class AreaRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AreaRecordError";
  }
}

function unionBounds(a: Bounds | null, b: Bounds | null): Bounds | null {
  if (!a) return b;
  if (!b) return a;
  return {
    minX: Math.min(a.minX, b.minX),
    minY: Math.min(a.minY, b.minY),
    maxX: Math.max(a.maxX, b.maxX),
    maxY: Math.max(a.maxY, b.maxY),
  };
}

/**
 * Everything known about one area: the last classifier label of every
 * observed tile and the traversal overlay learned from movement attempts.
 */
export class AreaMap {
  readonly id: AreaId;
  readonly group: number;
  readonly number: number;
  displayName: string;
  readonly terrain = new CoordinateGrid<TileLabel>(UNKNOWN_LABEL);
  readonly traversal = new CoordinateGrid<TraversalStatus>("unknown");
  visitCount = 0;
  readonly createdAt: string;
  updatedAt: string;
  private player: Coordinate | null = null;

  constructor(id: AreaId, ref: AreaRef, now: Date = new Date()) {
    this.id = id;
    this.group = ref.group;
    this.number = ref.number;
    this.displayName = ref.name ?? id;
    this.createdAt = now.toISOString();
    this.updatedAt = this.createdAt;
  }

  statusAt(c: Coordinate): TraversalStatus {
    return this.traversal.get(c);
  }

  setStatus(c: Coordinate, status: TraversalStatus): void {
    if (status === "player") {
      this.markPlayer(c);
      return;
    }
    if (this.player && sameCoord(this.player, c)) this.player = null;
    this.traversal.set(c, status);
  }

  labelAt(c: Coordinate): TileLabel {
    return this.terrain.get(c);
  }

  setLabel(c: Coordinate, label: TileLabel): void {
    this.terrain.set(c, label);
  }

  playerPosition(): Coordinate | null {
    return this.player ? { ...this.player } : null;
  }

  /**
   * Moves the player marker to `c`. The previous marker is cleared first,
   * so at most one tile ever holds it. A structural marker at `c` is left
   * in place; the position is still remembered.
   */
  markPlayer(c: Coordinate): void {
    this.clearPlayer();
    this.player = { x: c.x, y: c.y };
    if (STRUCTURAL_STATUSES.has(this.traversal.get(c))) return;
    this.traversal.set(c, "player");
  }

  /** Clears the player marker; the tile the agent stood on is walkable. */
  clearPlayer(): void {
    if (this.player && this.traversal.get(this.player) === "player") {
      this.traversal.set(this.player, "walkable");
    }
    this.player = null;
  }

  recordVisit(now: Date = new Date()): void {
    this.visitCount++;
    this.touch(now);
  }

  touch(now: Date = new Date()): void {
    this.updatedAt = now.toISOString();
  }

  bounds(): Bounds | null {
    return unionBounds(this.terrain.bounds(), this.traversal.bounds());
  }

  summary(): AreaSummary {
    const counts: Record<TraversalStatus, number> = {
      unknown: 0, walkable: 0, blocked: 0, player: 0, transition: 0, interactable: 0, ledge: 0,
    };
    for (const { value } of this.traversal.cells()) counts[value]++;
    return {
      areaId: this.id,
      displayName: this.displayName,
      bounds: this.bounds(),
      explored: this.traversal.count((s) => s !== "unknown"),
      visitCount: this.visitCount,
      counts,
    };
  }

  toRecord(): AreaRecord {
    const traversal = this.traversal.toJSON();
    return {
      areaId: this.id,
      displayName: this.displayName,
      group: this.group,
      number: this.number,
      terrain: this.terrain.toJSON(),
      traversal: {
        origin: traversal.origin,
        width: traversal.width,
        height: traversal.height,
        rows: traversal.rows.map((row) => row.map((s) => TRAVERSAL_CODES[s]).join("")),
      },
      bounds: this.bounds(),
      visitCount: this.visitCount,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }

  static fromRecord(record: AreaRecord): AreaMap {
    const map = new AreaMap(
      record.areaId,
      { group: record.group, number: record.number, name: record.displayName },
      new Date(record.createdAt),
    );
    map.updatedAt = record.updatedAt;
    map.visitCount = record.visitCount;
    const terrain = CoordinateGrid.fromJSON(record.terrain, UNKNOWN_LABEL);
    for (const cell of terrain.cells()) map.terrain.set(cell.coord, cell.value);

    const rows: TraversalStatus[][] = record.traversal.rows.map((line, r) =>
      [...line].map((code, c) => {
        const status = traversalFromCode(code);
        if (!status) {
          throw new AreaRecordError(`Unknown traversal code "${code}" at row ${r}, column ${c} of ${record.areaId}`);
        }
        return status;
      }),
    );
    const traversal = CoordinateGrid.fromJSON<TraversalStatus>(
      { origin: record.traversal.origin, width: record.traversal.width, height: record.traversal.height, rows },
      "unknown",
    );
    for (const cell of traversal.cells()) {
      if (cell.value === "player") {
        // A stored player marker is stale by the next session
        map.traversal.set(cell.coord, "walkable");
      } else {
        map.traversal.set(cell.coord, cell.value);
      }
    }
    return map;
  }
}
