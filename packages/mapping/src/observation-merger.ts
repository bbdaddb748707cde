import { isObservation, silentLogger } from "@wayfinder/schemas";
import type { Coordinate, Logger, Observation, WindowConfig } from "@wayfinder/schemas";
import type { AreaMap } from "./area-map.js";

export interface ObservationMergerConfig {
  window: WindowConfig;
  /** Labels that mark an unexplored tile as blocked on sight. */
  solidLabels: Iterable<string>;
  /**
   * Keep observed tiles whose resolved coordinate is negative. When false,
   * those tiles are dropped, matching maps that treat (0,0) as a hard edge.
   */
  preserveNegativeCoordinates?: boolean;
  logger?: Logger;
}

export type MergeResult =
  | { status: "merged"; written: number; blockedInferred: number; skipped: number }
  | { status: "rejected"; reason: string };

/**
 * Folds fixed-size classifier windows into an AreaMap.
 *
 * Terrain is last-writer-wins. Traversal learns only one thing from labels:
 * an unexplored tile showing a solid label becomes blocked. Walkability is
 * left to movement attempts.
 */
export class ObservationMerger {
  private window: WindowConfig;
  private solid: Set<string>;
  private preserveNegative: boolean;
  private logger: Logger;

  constructor(config: ObservationMergerConfig) {
    this.window = { ...config.window };
    this.solid = new Set(config.solidLabels);
    this.preserveNegative = config.preserveNegativeCoordinates ?? true;
    this.logger = config.logger ?? silentLogger;
  }

  merge(map: AreaMap, agent: Coordinate, observation: Observation): MergeResult {
    const problem = this.check(observation);
    if (problem) {
      this.logger.warn("Rejected observation", { areaId: map.id, reason: problem });
      return { status: "rejected", reason: problem };
    }

    const originX = agent.x - observation.agentCol;
    const originY = agent.y - observation.agentRow;

    map.clearPlayer();

    let written = 0;
    let blockedInferred = 0;
    let skipped = 0;
    for (const cell of observation.cells) {
      const coord = { x: originX + cell.col, y: originY + cell.row };
      if (!this.preserveNegative && (coord.x < 0 || coord.y < 0)) {
        skipped++;
        continue;
      }
      map.setLabel(coord, cell.label);
      written++;
      if (map.statusAt(coord) === "unknown" && this.solid.has(cell.label)) {
        map.setStatus(coord, "blocked");
        blockedInferred++;
      }
    }

    map.markPlayer(agent);
    map.touch();
    this.logger.debug("Merged observation", { areaId: map.id, written, blockedInferred, skipped });
    return { status: "merged", written, blockedInferred, skipped };
  }

  private check(observation: Observation): string | null {
    if (!isObservation(observation)) return "observation does not match the observation schema";
    const w = this.window;
    if (observation.rows !== w.rows || observation.cols !== w.cols) {
      return `expected a ${w.rows}x${w.cols} window, got ${observation.rows}x${observation.cols}`;
    }
    if (observation.agentRow !== w.agentRow || observation.agentCol !== w.agentCol) {
      return `expected the agent at (${w.agentRow},${w.agentCol}), got (${observation.agentRow},${observation.agentCol})`;
    }
    if (observation.cells.length !== w.rows * w.cols) {
      return `expected ${w.rows * w.cols} cells, got ${observation.cells.length}`;
    }
    const seen = new Set<number>();
    for (const cell of observation.cells) {
      if (cell.row >= w.rows || cell.col >= w.cols) {
        return `cell (${cell.row},${cell.col}) lies outside the window`;
      }
      const key = cell.row * w.cols + cell.col;
      if (seen.has(key)) return `cell (${cell.row},${cell.col}) appears twice`;
      seen.add(key);
    }
    return null;
  }
}

/** Builds an observation from a row-major label matrix. */
export function observationFromRows(labels: string[][], agentRow: number, agentCol: number): Observation {
  const cells = labels.flatMap((row, r) => row.map((label, c) => ({ row: r, col: c, label })));
  return {
    rows: labels.length,
    cols: labels[0]?.length ?? 0,
    agentRow,
    agentCol,
    cells,
  };
}
