import { describe, it, expect } from "vitest";
import { ConnectivityGraph } from "./connectivity-graph.js";

function door(fromArea: string, toArea: string, fx: number, tx: number) {
  return {
    fromArea,
    fromCoord: { x: fx, y: 0 },
    toArea,
    toCoord: { x: tx, y: 9 },
    direction: "Up" as const,
  };
}

describe("ConnectivityGraph", () => {
  it("stores every connection with its reciprocal", () => {
    const graph = new ConnectivityGraph();
    const result = graph.connect(door("area_0_1", "area_0_2", 4, 7));

    expect(result).toEqual({ forward: "added", reverse: "added" });
    expect(graph.size).toBe(2);
    expect(graph.connectionsFrom("area_0_2")).toEqual([
      { fromArea: "area_0_2", fromCoord: { x: 7, y: 9 }, toArea: "area_0_1", toCoord: { x: 4, y: 0 }, direction: "Down" },
    ]);
  });

  it("keeps a null direction on both edges of a warp", () => {
    const graph = new ConnectivityGraph();
    graph.connect({ fromArea: "a", fromCoord: { x: 1, y: 1 }, toArea: "b", toCoord: { x: 2, y: 2 }, direction: null });
    expect(graph.connectionsFrom("b")[0]?.direction).toBeNull();
  });

  it("deduplicates by source area, source tile and target area", () => {
    const graph = new ConnectivityGraph();
    graph.connect(door("area_0_1", "area_0_2", 4, 7));
    expect(graph.connect(door("area_0_1", "area_0_2", 4, 7))).toEqual({ forward: "unchanged", reverse: "unchanged" });

    // Same door, new landing tile: forward edge updated, a second reverse edge appears
    expect(graph.connect(door("area_0_1", "area_0_2", 4, 8))).toEqual({ forward: "updated", reverse: "added" });
    expect(graph.exitsTo("area_0_1", "area_0_2")).toHaveLength(1);
    expect(graph.exitsTo("area_0_2", "area_0_1")).toHaveLength(2);

    // A second door between the same areas is its own edge
    graph.connect(door("area_0_1", "area_0_2", 5, 8));
    expect(graph.exitsTo("area_0_1", "area_0_2")).toHaveLength(2);
  });

  it("returns copies so callers cannot edit the graph", () => {
    const graph = new ConnectivityGraph();
    graph.connect(door("a", "b", 1, 1));
    const [edge] = graph.connectionsFrom("a");
    if (edge) edge.fromCoord.x = 99;
    expect(graph.connectionsFrom("a")[0]?.fromCoord.x).toBe(1);
  });

  it("finds the shortest area path by hop count", () => {
    const graph = new ConnectivityGraph();
    graph.connect(door("a", "b", 0, 0));
    graph.connect(door("b", "c", 0, 0));
    graph.connect(door("c", "d", 0, 0));
    graph.connect(door("a", "e", 1, 0));
    graph.connect(door("e", "d", 1, 0));

    expect(graph.shortestAreaPath("a", "d")).toEqual(["a", "e", "d"]);
    expect(graph.shortestAreaPath("d", "b")).toEqual(["d", "c", "b"]);
    expect(graph.shortestAreaPath("a", "a")).toEqual(["a"]);
    expect(graph.shortestAreaPath("a", "zzz")).toBeNull();
    expect(graph.areas()).toEqual(["a", "b", "c", "d", "e"]);
  });

  it("reports the exit taken at each hop", () => {
    const graph = new ConnectivityGraph();
    graph.connect(door("a", "b", 3, 6));
    graph.connect(door("b", "c", 2, 5));

    const steps = graph.routeSteps("a", "c");
    expect(steps?.map((s) => [s.fromArea, s.fromCoord.x, s.toArea])).toEqual([
      ["a", 3, "b"],
      ["b", 2, "c"],
    ]);
    expect(graph.routeSteps("c", "c")).toEqual([]);
  });

  it("rebuilds an equal graph from its record", () => {
    const graph = new ConnectivityGraph();
    graph.connect(door("area_0_1", "area_0_2", 4, 7));
    graph.connect(door("area_0_2", "area_3_0", 1, 1));

    const record = graph.toRecord(new Date("2026-03-01T00:00:00Z"));
    expect(record.version).toBe(1);
    expect(record.updatedAt).toBe("2026-03-01T00:00:00.000Z");
    expect(Object.keys(record.adjacency)).toEqual(["area_0_1", "area_0_2", "area_3_0"]);

    const restored = ConnectivityGraph.fromRecord(record);
    expect(restored.size).toBe(4);
    expect(restored.toRecord(new Date("2026-03-01T00:00:00Z"))).toEqual(record);
  });
});
