import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, mkdir, writeFile, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { AreaMap, AreaRecordError } from "./area-map.js";
import { AreaStore } from "./area-store.js";
import { ConnectivityGraph } from "./connectivity-graph.js";

describe("AreaStore", () => {
  let dataDir: string;
  let store: AreaStore;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), "wayfinder-store-"));
    store = new AreaStore(dataDir);
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it("treats a missing file as never visited", async () => {
    expect(await store.loadArea("area_9_9")).toBeNull();
    expect(await store.listAreas()).toEqual([]);
    expect((await store.loadConnections()).size).toBe(0);
  });

  it("saves and reloads an area under areas/<id>.json", async () => {
    const map = new AreaMap("area_1_4", { group: 1, number: 4, name: "Cave" });
    map.setLabel({ x: 0, y: 0 }, "rock");
    map.setStatus({ x: 0, y: 0 }, "blocked");
    map.setStatus({ x: 1, y: 0 }, "transition");
    await store.saveArea(map);

    expect(store.areaPath("area_1_4")).toBe(join(dataDir, "areas", "area_1_4.json"));
    const raw = JSON.parse(await readFile(store.areaPath("area_1_4"), "utf-8"));
    expect(raw.traversal.rows).toEqual(["NT"]);

    const loaded = await store.loadArea("area_1_4");
    expect(loaded?.displayName).toBe("Cave");
    expect(loaded?.statusAt({ x: 1, y: 0 })).toBe("transition");
    expect(loaded?.labelAt({ x: 0, y: 0 })).toBe("rock");
    expect(await store.listAreas()).toEqual(["area_1_4"]);
  });

  it("lists areas in sorted order and ignores other files", async () => {
    await store.saveArea(new AreaMap("area_2_0", { group: 2, number: 0 }));
    await store.saveArea(new AreaMap("area_0_3", { group: 0, number: 3 }));
    await writeFile(join(dataDir, "areas", "notes.txt"), "hello");
    expect(await store.listAreas()).toEqual(["area_0_3", "area_2_0"]);
  });

  it("serializes concurrent writes to the same file", async () => {
    const map = new AreaMap("area_0_0", { group: 0, number: 0 });
    const writes: Promise<void>[] = [];
    for (let i = 0; i < 5; i++) {
      map.setStatus({ x: i, y: 0 }, "walkable");
      writes.push(store.saveArea(map));
    }
    await Promise.all(writes);
    const loaded = await store.loadArea("area_0_0");
    expect(loaded?.traversal.toJSON().rows).toEqual([["walkable", "walkable", "walkable", "walkable", "walkable"]]);
  });

  it("rejects corrupt JSON", async () => {
    await mkdir(join(dataDir, "areas"), { recursive: true });
    await writeFile(store.areaPath("area_0_1"), "{ not json");
    await expect(store.loadArea("area_0_1")).rejects.toThrow(AreaRecordError);
  });

  it("rejects records that fail the schema", async () => {
    await mkdir(join(dataDir, "areas"), { recursive: true });
    await writeFile(store.areaPath("area_0_1"), JSON.stringify({ areaId: "area_0_1" }));
    await expect(store.loadArea("area_0_1")).rejects.toThrow(/^Invalid area record area_0_1: /);
  });

  it("rejects a record stored under another id", async () => {
    const map = new AreaMap("area_0_2", { group: 0, number: 2 });
    await store.saveArea(map);
    await writeFile(store.areaPath("area_0_5"), await readFile(store.areaPath("area_0_2"), "utf-8"));
    await expect(store.loadArea("area_0_5")).rejects.toThrow("Area record area_0_5 is labelled area_0_2");
  });

  it("round-trips the connections adjacency list", async () => {
    const graph = new ConnectivityGraph();
    graph.connect({ fromArea: "area_0_1", fromCoord: { x: 3, y: 0 }, toArea: "area_0_2", toCoord: { x: 3, y: 9 }, direction: "Up" });
    await store.saveConnections(graph);

    expect(store.connectionsPath).toBe(join(dataDir, "connections.json"));
    const loaded = await store.loadConnections();
    expect(loaded.shortestAreaPath("area_0_2", "area_0_1")).toEqual(["area_0_2", "area_0_1"]);
    expect(loaded.connectionsFrom("area_0_2")[0]?.direction).toBe("Down");
  });

  it("rejects an invalid connections file", async () => {
    await mkdir(dataDir, { recursive: true });
    await writeFile(store.connectionsPath, JSON.stringify({ version: 2, adjacency: {} }));
    await expect(store.loadConnections()).rejects.toThrow(AreaRecordError);
  });
});
