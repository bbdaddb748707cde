import { describe, it, expect } from "vitest";
import { AreaMap, AreaRecordError } from "./area-map.js";

function makeMap(): AreaMap {
  return new AreaMap("area_1_2", { group: 1, number: 2, name: "Route 1" }, new Date("2026-01-01T00:00:00Z"));
}

describe("AreaMap", () => {
  it("reads unknown everywhere before anything is recorded", () => {
    const map = makeMap();
    expect(map.statusAt({ x: -40, y: 900 })).toBe("unknown");
    expect(map.labelAt({ x: 0, y: 0 })).toBe("unknown");
    expect(map.bounds()).toBeNull();
    expect(map.playerPosition()).toBeNull();
  });

  it("keeps at most one player marker", () => {
    const map = makeMap();
    map.markPlayer({ x: 2, y: 3 });
    map.markPlayer({ x: 3, y: 3 });

    expect(map.statusAt({ x: 2, y: 3 })).toBe("walkable");
    expect(map.statusAt({ x: 3, y: 3 })).toBe("player");
    expect(map.traversal.count((s) => s === "player")).toBe(1);
    expect(map.playerPosition()).toEqual({ x: 3, y: 3 });
  });

  it("never paints the player over a structural marker", () => {
    const map = makeMap();
    map.setStatus({ x: 0, y: 0 }, "transition");
    map.markPlayer({ x: 0, y: 0 });

    expect(map.statusAt({ x: 0, y: 0 })).toBe("transition");
    expect(map.playerPosition()).toEqual({ x: 0, y: 0 });

    map.markPlayer({ x: 1, y: 0 });
    expect(map.statusAt({ x: 0, y: 0 })).toBe("transition");
    expect(map.statusAt({ x: 1, y: 0 })).toBe("player");
  });

  it("keeps learned interactables and ledges under the player", () => {
    const map = makeMap();
    map.setStatus({ x: 2, y: 1 }, "interactable");
    map.setStatus({ x: 3, y: 1 }, "ledge");
    map.markPlayer({ x: 2, y: 1 });
    expect(map.statusAt({ x: 2, y: 1 })).toBe("interactable");

    map.markPlayer({ x: 3, y: 1 });
    map.markPlayer({ x: 4, y: 1 });
    expect(map.statusAt({ x: 2, y: 1 })).toBe("interactable");
    expect(map.statusAt({ x: 3, y: 1 })).toBe("ledge");
    expect(map.statusAt({ x: 4, y: 1 })).toBe("player");
  });

  it("routes setStatus(player) through markPlayer", () => {
    const map = makeMap();
    map.setStatus({ x: 5, y: 5 }, "player");
    map.setStatus({ x: 6, y: 5 }, "player");
    expect(map.statusAt({ x: 5, y: 5 })).toBe("walkable");
    expect(map.playerPosition()).toEqual({ x: 6, y: 5 });
  });

  it("forgets the player when its tile is overwritten", () => {
    const map = makeMap();
    map.markPlayer({ x: 1, y: 1 });
    map.setStatus({ x: 1, y: 1 }, "ledge");
    expect(map.playerPosition()).toBeNull();
    map.clearPlayer();
    expect(map.statusAt({ x: 1, y: 1 })).toBe("ledge");
  });

  it("summarizes explored tiles and status counts", () => {
    const map = makeMap();
    map.setStatus({ x: 0, y: 0 }, "walkable");
    map.setStatus({ x: 2, y: 0 }, "blocked");
    map.markPlayer({ x: 1, y: 1 });
    map.setLabel({ x: -1, y: 0 }, "grass");

    const summary = map.summary();
    expect(summary.areaId).toBe("area_1_2");
    expect(summary.displayName).toBe("Route 1");
    // Traversal storage spans x 0..2, y 0..1: six tiles, three known
    expect(summary.explored).toBe(3);
    expect(summary.counts.walkable).toBe(1);
    expect(summary.counts.blocked).toBe(1);
    expect(summary.counts.player).toBe(1);
    expect(summary.counts.unknown).toBe(3);
    expect(summary.bounds).toEqual({ minX: -1, minY: 0, maxX: 2, maxY: 1 });
  });

  it("round-trips through its record and drops the stale player marker", () => {
    const map = makeMap();
    map.setLabel({ x: 0, y: 0 }, "path");
    map.setLabel({ x: 1, y: 0 }, "tree");
    map.setStatus({ x: 1, y: 0 }, "blocked");
    map.setStatus({ x: 0, y: 1 }, "transition");
    map.markPlayer({ x: 0, y: 0 });
    map.recordVisit(new Date("2026-01-02T00:00:00Z"));

    const record = map.toRecord();
    expect(record.traversal.rows).toEqual(["PN", "T?"]);
    expect(record.visitCount).toBe(1);
    expect(record.updatedAt).toBe("2026-01-02T00:00:00.000Z");

    const restored = AreaMap.fromRecord(record);
    expect(restored.id).toBe("area_1_2");
    expect(restored.group).toBe(1);
    expect(restored.number).toBe(2);
    expect(restored.displayName).toBe("Route 1");
    expect(restored.visitCount).toBe(1);
    expect(restored.createdAt).toBe("2026-01-01T00:00:00.000Z");
    expect(restored.labelAt({ x: 1, y: 0 })).toBe("tree");
    expect(restored.statusAt({ x: 0, y: 0 })).toBe("walkable");
    expect(restored.statusAt({ x: 1, y: 0 })).toBe("blocked");
    expect(restored.statusAt({ x: 0, y: 1 })).toBe("transition");
    expect(restored.playerPosition()).toBeNull();
  });

  it("rejects records with unknown traversal codes", () => {
    const record = makeMap().toRecord();
    record.traversal = { origin: { x: 0, y: 0 }, width: 2, height: 1, rows: ["WX"] };
    expect(() => AreaMap.fromRecord(record)).toThrow(AreaRecordError);
    expect(() => AreaMap.fromRecord(record)).toThrow('Unknown traversal code "X" at row 0, column 1 of area_1_2');
  });
});
