import { coordKey, manhattan } from "@wayfinder/grid";
import { silentLogger } from "@wayfinder/schemas";
import type { ActionOutcome, AreaConnection, Coordinate, Logger, TraversalStatus } from "@wayfinder/schemas";
import type { AreaMap } from "./area-map.js";
import type { AreaCatalog } from "./area-catalog.js";

/**
 * Handle on the map the agent currently stands in. Only the traversal
 * updater swaps it, and only on an area change.
 */
export class ActiveArea {
  private current: AreaMap;

  constructor(map: AreaMap) {
    this.current = map;
  }

  get map(): AreaMap {
    return this.current;
  }

  /** @internal used by TraversalUpdater */
  swap(next: AreaMap): AreaMap {
    const previous = this.current;
    this.current = next;
    return previous;
  }
}

export interface TileEdit {
  coord: Coordinate;
  from: TraversalStatus;
  to: TraversalStatus;
}

export type TransitionResult =
  | { kind: "edited"; edits: TileEdit[] }
  | { kind: "area-switched"; edits: TileEdit[]; previousArea: string; newArea: string; createdArea: boolean; connection: AreaConnection }
  | { kind: "no-op"; reason: string };

export interface TraversalUpdaterOptions {
  catalog: AreaCatalog;
  active: ActiveArea;
  logger?: Logger;
}

/**
 * Applies the edits implied by one classified outcome. A tile marked as a
 * transition keeps that marker through every later outcome.
 */
export class TraversalUpdater {
  private catalog: AreaCatalog;
  private active: ActiveArea;
  private logger: Logger;
  private lastBlocked: string | null = null;

  constructor(options: TraversalUpdaterOptions) {
    this.catalog = options.catalog;
    this.active = options.active;
    this.logger = options.logger ?? silentLogger;
  }

  get activeArea(): ActiveArea {
    return this.active;
  }

  async apply(outcome: ActionOutcome): Promise<TransitionResult> {
    const map = this.active.map;
    if (outcome.kind !== "blocked") this.lastBlocked = null;

    switch (outcome.kind) {
      case "moved": {
        const edits = this.applyMove(map, outcome.from, outcome.to);
        map.touch();
        return { kind: "edited", edits };
      }

      case "turned": {
        const edits: TileEdit[] = [];
        this.edit(map, outcome.position, "player", edits);
        return { kind: "edited", edits };
      }

      case "blocked": {
        const edits: TileEdit[] = [];
        const key = `${map.id}:${coordKey(outcome.target)}`;
        if (key !== this.lastBlocked) {
          this.logger.info("Movement blocked", { areaId: map.id, target: outcome.target, direction: outcome.direction });
        }
        this.lastBlocked = key;
        this.edit(map, outcome.target, "blocked", edits);
        map.touch();
        return { kind: "edited", edits };
      }

      case "interacted": {
        if (!outcome.dialogue) return { kind: "no-op", reason: "interaction opened no dialogue" };
        const edits: TileEdit[] = [];
        this.edit(map, outcome.target, "interactable", edits);
        map.touch();
        return { kind: "edited", edits };
      }

      case "auto-dialogue": {
        const edits = this.applyMove(map, outcome.from, outcome.to);
        this.edit(map, outcome.trigger, "interactable", edits);
        map.touch();
        this.logger.info("Walk-on dialogue triggered", { areaId: map.id, trigger: outcome.trigger });
        return { kind: "edited", edits };
      }

      case "area-changed":
        return this.switchArea(outcome);

      case "waited":
        return { kind: "no-op", reason: "waited" };

      case "unknown":
        return { kind: "no-op", reason: outcome.reason };
    }
  }

  private applyMove(map: AreaMap, from: Coordinate, to: Coordinate): TileEdit[] {
    const edits: TileEdit[] = [];
    if (manhattan(from, to) > 1) {
      this.edit(map, from, "ledge", edits);
      this.logger.debug("Ledge hop", { areaId: map.id, from, to });
    } else {
      this.edit(map, from, "walkable", edits);
    }
    this.edit(map, to, "player", edits);
    return edits;
  }

  private async switchArea(
    outcome: Extract<ActionOutcome, { kind: "area-changed" }>,
  ): Promise<TransitionResult> {
    const oldMap = this.active.map;
    const edits: TileEdit[] = [];
    if (oldMap.id !== outcome.fromArea) {
      this.logger.warn("Area change reported from an area that is not active", {
        active: oldMap.id, reported: outcome.fromArea,
      });
    }

    oldMap.clearPlayer();
    this.edit(oldMap, outcome.exit, "transition", edits);
    this.edit(oldMap, outcome.vacated, "walkable", edits);
    oldMap.touch();
    this.catalog.persistInBackground(oldMap);

    const { map: newMap, origin } = await this.catalog.resolve(outcome.toAreaRef);
    const createdArea = origin === "created";
    this.active.swap(newMap);
    newMap.recordVisit();
    this.edit(newMap, outcome.entry, "transition", edits);
    newMap.markPlayer(outcome.entry);

    const connection: AreaConnection = {
      fromArea: oldMap.id,
      fromCoord: { ...outcome.exit },
      toArea: newMap.id,
      toCoord: { ...outcome.entry },
      direction: outcome.direction,
    };
    const upsert = this.catalog.graph.connect(connection);
    if (upsert.forward !== "unchanged" || upsert.reverse !== "unchanged") {
      this.catalog.persistConnectionsInBackground();
    }
    this.logger.info("Entered area", {
      from: oldMap.id, to: newMap.id, exit: outcome.exit, entry: outcome.entry, created: createdArea,
    });
    return { kind: "area-switched", edits, previousArea: oldMap.id, newArea: newMap.id, createdArea, connection };
  }

  /**
   * Writes `status` unless the tile is a transition. Player markers go
   * through AreaMap.markPlayer so at most one exists.
   */
  private edit(map: AreaMap, coord: Coordinate, status: TraversalStatus, edits: TileEdit[]): void {
    const before = map.statusAt(coord);
    if (before === "transition") {
      if (status === "player") map.markPlayer(coord);
      return;
    }
    if (status === "player") map.markPlayer(coord);
    else map.setStatus(coord, status);
    const after = map.statusAt(coord);
    if (after !== before) edits.push({ coord: { ...coord }, from: before, to: after });
  }
}
