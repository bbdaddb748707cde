import type { Coordinate, Direction } from "@wayfinder/schemas";

export const DIRECTION_DELTAS: Record<Direction, Coordinate> = {
  Up: { x: 0, y: -1 },
  Down: { x: 0, y: 1 },
  Left: { x: -1, y: 0 },
  Right: { x: 1, y: 0 },
};

const OPPOSITES: Record<Direction, Direction> = {
  Up: "Down",
  Down: "Up",
  Left: "Right",
  Right: "Left",
};

export function opposite(direction: Direction): Direction {
  return OPPOSITES[direction];
}

export function step(from: Coordinate, direction: Direction, distance = 1): Coordinate {
  const d = DIRECTION_DELTAS[direction];
  return { x: from.x + d.x * distance, y: from.y + d.y * distance };
}

export function manhattan(a: Coordinate, b: Coordinate): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function sameCoord(a: Coordinate, b: Coordinate): boolean {
  return a.x === b.x && a.y === b.y;
}

export function coordKey(c: Coordinate): string {
  return `${c.x},${c.y}`;
}

/**
 * Cardinal direction of a straight-line hop from `from` to `to`, or null
 * when the two coordinates are equal or not on a shared row or column.
 */
export function directionBetween(from: Coordinate, to: Coordinate): Direction | null {
  if (from.x === to.x && to.y < from.y) return "Up";
  if (from.x === to.x && to.y > from.y) return "Down";
  if (from.y === to.y && to.x < from.x) return "Left";
  if (from.y === to.y && to.x > from.x) return "Right";
  return null;
}

/** Parses "x,y" as typed on a command line. */
export function parseCoord(text: string): Coordinate | null {
  const match = /^\s*(-?\d+)\s*,\s*(-?\d+)\s*$/.exec(text);
  if (!match) return null;
  return { x: Number(match[1]), y: Number(match[2]) };
}
