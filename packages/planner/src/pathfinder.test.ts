import { describe, it, expect } from "vitest";
import { CoordinateGrid, step } from "@wayfinder/grid";
import { traversalFromCode } from "@wayfinder/schemas";
import type { Coordinate, Direction, TraversalStatus } from "@wayfinder/schemas";
import { findPath, stepsForPath } from "./pathfinder.js";
import type { PlanStep } from "./pathfinder.js";

/** Builds a traversal grid from rows of status codes, top-left at (0,0). */
function gridOf(rows: string[]): CoordinateGrid<TraversalStatus> {
  const grid = new CoordinateGrid<TraversalStatus>("unknown");
  rows.forEach((line, y) => {
    [...line].forEach((code, x) => {
      grid.set({ x, y }, traversalFromCode(code) ?? "unknown");
    });
  });
  return grid;
}

/** Replays steps the way the game does: a move only moves when facing its direction. */
function simulate(start: Coordinate, facing: Direction, steps: PlanStep[]): { position: Coordinate; facing: Direction } {
  let position = start;
  let current = facing;
  for (const s of steps) {
    if (s.kind === "turn") {
      current = s.direction;
    } else {
      if (current !== s.direction) throw new Error(`moved ${s.direction} while facing ${current}`);
      position = step(position, s.direction);
    }
  }
  return { position, facing: current };
}

describe("findPath", () => {
  it("crosses an open 5x5 grid corner to corner with a turn before every change of heading", () => {
    const grid = gridOf(["WWWWW", "WWWWW", "WWWWW", "WWWWW", "WWWWW"]);
    const result = findPath(grid, { x: 0, y: 0 }, { x: 4, y: 4 }, "Up");

    expect(result.status).toBe("found");
    if (result.status !== "found") return;
    expect(result.cost).toBe(8);
    expect(result.path).toHaveLength(9);
    expect(result.steps.filter((s) => s.kind === "move")).toHaveLength(8);
    expect(simulate({ x: 0, y: 0 }, "Up", result.steps).position).toEqual({ x: 4, y: 4 });

    let facing: Direction = "Up";
    result.steps.forEach((s, i) => {
      if (s.kind === "move" && i > 0 && result.steps[i - 1]?.kind === "move") {
        expect(s.direction).toBe(facing);
      }
      if (s.kind === "move" && s.direction !== facing) {
        throw new Error(`move ${i} changes heading without a turn`);
      }
      if (s.kind === "turn") {
        expect(result.steps[i + 1]).toEqual({ kind: "move", direction: s.direction });
        facing = s.direction;
      }
    });
  });

  it("returns an empty plan when already at the goal", () => {
    const result = findPath(gridOf(["P"]), { x: 0, y: 0 }, { x: 0, y: 0 }, "Down");
    expect(result).toEqual({ status: "found", steps: [], path: [{ x: 0, y: 0 }], cost: 0, expanded: 0 });
  });

  it("prefers confirmed tiles over unknown ones of equal length", () => {
    const grid = gridOf(["P?", "WW"]);
    const result = findPath(grid, { x: 0, y: 0 }, { x: 1, y: 1 }, "Down");
    expect(result).toMatchObject({
      status: "found",
      path: [{ x: 0, y: 0 }, { x: 0, y: 1 }, { x: 1, y: 1 }],
      cost: 2,
      steps: [
        { kind: "move", direction: "Down" },
        { kind: "turn", direction: "Right" },
        { kind: "move", direction: "Right" },
      ],
    });
  });

  it("fails fast when the goal and all its neighbours are blocked", () => {
    const grid = gridOf(["WWWWW", "WWNWW", "WNNNW", "WWNWW", "WWWWW"]);
    expect(findPath(grid, { x: 0, y: 0 }, { x: 2, y: 2 }, "Right")).toEqual({
      status: "goal-unreachable",
      reason: "goal (2,2) is blocked",
    });
  });

  it("fails fast on a blocked goal even when its neighbours are open", () => {
    const grid = gridOf(["WWWWW", "WWWWW", "WWWWW", "WWWWW", "WWWWN"]);
    expect(findPath(grid, { x: 0, y: 0 }, { x: 4, y: 4 }, "Down")).toEqual({
      status: "goal-unreachable",
      reason: "goal (4,4) is blocked",
    });
  });

  it("fails fast when an open goal has no open neighbour", () => {
    const grid = gridOf(["WWWWW", "WWNWW", "WNWNW", "WWNWW", "WWWWW"]);
    expect(findPath(grid, { x: 0, y: 0 }, { x: 2, y: 2 }, "Right")).toEqual({
      status: "goal-unreachable",
      reason: "goal (2,2) has no open neighbour",
    });
  });

  it("searches normally once one neighbour of the goal is walkable", () => {
    const grid = gridOf(["WWWWW", "WWWWW", "WNWNW", "WWNWW", "WWWWW"]);
    const result = findPath(grid, { x: 0, y: 0 }, { x: 2, y: 2 }, "Right");
    expect(result.status).toBe("found");
    if (result.status !== "found") return;
    expect(result.cost).toBe(4);
    expect(result.path.at(-2)).toEqual({ x: 2, y: 1 });
    expect(result.expanded).toBeGreaterThan(0);
  });

  it("enters an interactable tile only as the goal", () => {
    const grid = gridOf(["NNN", "PIW", "WWW"]);
    const around = findPath(grid, { x: 0, y: 1 }, { x: 2, y: 1 }, "Right");
    expect(around).toMatchObject({
      status: "found",
      cost: 4,
      path: [{ x: 0, y: 1 }, { x: 0, y: 2 }, { x: 1, y: 2 }, { x: 2, y: 2 }, { x: 2, y: 1 }],
      steps: [
        { kind: "turn", direction: "Down" },
        { kind: "move", direction: "Down" },
        { kind: "turn", direction: "Right" },
        { kind: "move", direction: "Right" },
        { kind: "move", direction: "Right" },
        { kind: "turn", direction: "Up" },
        { kind: "move", direction: "Up" },
      ],
    });

    const onto = findPath(grid, { x: 0, y: 1 }, { x: 1, y: 1 }, "Right");
    expect(onto).toMatchObject({ status: "found", cost: 1, steps: [{ kind: "move", direction: "Right" }] });
  });

  it("reports no path between sealed-off components", () => {
    const grid = gridOf(["WWNW", "WNWN", "WNWN", "WWNW"]);
    const result = findPath(grid, { x: 0, y: 0 }, { x: 2, y: 2 }, "Down");
    expect(result.status).toBe("no-path");
    if (result.status !== "no-path") return;
    expect(result.reason).toBe("no route from (0,0) to (2,2)");
    expect(result.expanded).toBeGreaterThan(0);
  });

  it("explores through unknown tiles only within the search margin", () => {
    const grid = gridOf(["WNW", "NNN"]);
    const wide = findPath(grid, { x: 0, y: 0 }, { x: 2, y: 0 }, "Up");
    expect(wide.status).toBe("found");
    if (wide.status === "found") {
      expect(wide.path).toEqual([{ x: 0, y: 0 }, { x: 0, y: -1 }, { x: 1, y: -1 }, { x: 2, y: -1 }, { x: 2, y: 0 }]);
      expect(wide.cost).toBeCloseTo(4.3);
    }

    const tight = findPath(grid, { x: 0, y: 0 }, { x: 2, y: 0 }, "Up", { searchMargin: 0 });
    expect(tight).toMatchObject({ status: "no-path", reason: "no route from (0,0) to (2,0)" });
  });

  it("gives up after the expansion cap", () => {
    const grid = new CoordinateGrid<TraversalStatus>("unknown");
    grid.set({ x: 0, y: 0 }, "walkable");
    grid.set({ x: 6, y: 0 }, "walkable");
    expect(findPath(grid, { x: 0, y: 0 }, { x: 6, y: 0 }, "Right", { maxExpansions: 3 })).toEqual({
      status: "no-path",
      reason: "search gave up after 3 expansions",
      expanded: 3,
    });
  });
});

describe("stepsForPath", () => {
  it("does not turn when already facing the first move", () => {
    expect(stepsForPath([{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }], "Right")).toEqual([
      { kind: "move", direction: "Right" },
      { kind: "move", direction: "Right" },
    ]);
  });

  it("rejects hops longer than one tile", () => {
    expect(() => stepsForPath([{ x: 0, y: 0 }, { x: 2, y: 0 }], "Right")).toThrow("Path hop (0,0) -> (2,0) is not a single step");
  });
});
