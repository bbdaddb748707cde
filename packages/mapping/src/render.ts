import { TRAVERSAL_CODES, TRAVERSAL_STATUSES } from "@wayfinder/schemas";
import type { Bounds, Coordinate, TileLabel, TraversalStatus } from "@wayfinder/schemas";
import type { AreaMap } from "./area-map.js";

/** Square slice of a map centred on one tile, row-major from the top-left. */
export interface MapWindow {
  origin: Coordinate;
  center: Coordinate;
  radius: number;
  traversal: TraversalStatus[][];
  terrain: TileLabel[][];
}

export function windowAround(map: AreaMap, center: Coordinate, radius: number): MapWindow {
  const r = Math.max(0, Math.floor(radius));
  const traversal: TraversalStatus[][] = [];
  const terrain: TileLabel[][] = [];
  for (let y = center.y - r; y <= center.y + r; y++) {
    const statusRow: TraversalStatus[] = [];
    const labelRow: TileLabel[] = [];
    for (let x = center.x - r; x <= center.x + r; x++) {
      statusRow.push(map.statusAt({ x, y }));
      labelRow.push(map.labelAt({ x, y }));
    }
    traversal.push(statusRow);
    terrain.push(labelRow);
  }
  return {
    origin: { x: center.x - r, y: center.y - r },
    center: { ...center },
    radius: r,
    traversal,
    terrain,
  };
}

/** One line per row of traversal codes. */
export function windowToText(window: MapWindow): string[] {
  return window.traversal.map((row) => row.map((s) => TRAVERSAL_CODES[s]).join(""));
}

export const LEGEND = TRAVERSAL_STATUSES.map((s) => `${TRAVERSAL_CODES[s]}=${s}`).join(" ");

function formatBounds(b: Bounds): string {
  return `(${b.minX},${b.minY})..(${b.maxX},${b.maxY})`;
}

export interface RenderOptions {
  /** Show classifier labels instead of traversal codes (first letter of each label). */
  terrain?: boolean;
}

/**
 * ASCII view of an area for the terminal: a header, the grid over the
 * map's bounds, the legend and per-status counts.
 */
export function renderArea(map: AreaMap, options: RenderOptions = {}): string[] {
  const summary = map.summary();
  const lines: string[] = [`${map.id} "${map.displayName}" visits=${map.visitCount}`];
  const bounds = summary.bounds;
  if (!bounds) {
    lines.push("(no tiles recorded)");
    return lines;
  }
  lines.push(`bounds ${formatBounds(bounds)}`);
  for (let y = bounds.minY; y <= bounds.maxY; y++) {
    let row = "";
    for (let x = bounds.minX; x <= bounds.maxX; x++) {
      if (options.terrain) {
        const label = map.labelAt({ x, y });
        row += label === "unknown" ? "?" : (label[0] ?? "?");
      } else {
        row += TRAVERSAL_CODES[map.statusAt({ x, y })];
      }
    }
    lines.push(row);
  }
  if (!options.terrain) lines.push(`legend: ${LEGEND}`);
  const counts = TRAVERSAL_STATUSES
    .filter((s) => summary.counts[s] > 0)
    .map((s) => `${s}=${summary.counts[s]}`)
    .join(" ");
  lines.push(`explored=${summary.explored} ${counts}`.trimEnd());
  return lines;
}
