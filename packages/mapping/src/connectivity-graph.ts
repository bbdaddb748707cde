import { opposite, sameCoord } from "@wayfinder/grid";
import type { AreaConnection, AreaId, ConnectionsRecord } from "@wayfinder/schemas";

export interface UpsertResult {
  forward: "added" | "updated" | "unchanged";
  reverse: "added" | "updated" | "unchanged";
}

function reverseOf(conn: AreaConnection): AreaConnection {
  return {
    fromArea: conn.toArea,
    fromCoord: { ...conn.toCoord },
    toArea: conn.fromArea,
    toCoord: { ...conn.fromCoord },
    direction: conn.direction === null ? null : opposite(conn.direction),
  };
}

function sameConnection(a: AreaConnection, b: AreaConnection): boolean {
  return a.fromArea === b.fromArea
    && a.toArea === b.toArea
    && sameCoord(a.fromCoord, b.fromCoord)
    && sameCoord(a.toCoord, b.toCoord)
    && a.direction === b.direction;
}

/**
 * Graph of areas linked by transition tiles. Edges are always stored in
 * reciprocal pairs and keyed by (fromArea, fromCoord, toArea).
 */
export class ConnectivityGraph {
  private adjacency = new Map<AreaId, AreaConnection[]>();

  connect(conn: AreaConnection): UpsertResult {
    return {
      forward: this.upsert(conn),
      reverse: this.upsert(reverseOf(conn)),
    };
  }

  connectionsFrom(area: AreaId): AreaConnection[] {
    return (this.adjacency.get(area) ?? []).map((c) => ({ ...c }));
  }

  exitsTo(from: AreaId, to: AreaId): AreaConnection[] {
    return this.connectionsFrom(from).filter((c) => c.toArea === to);
  }

  areas(): AreaId[] {
    const all = new Set<AreaId>();
    for (const [area, conns] of this.adjacency) {
      all.add(area);
      for (const c of conns) all.add(c.toArea);
    }
    return [...all].sort();
  }

  get size(): number {
    let n = 0;
    for (const conns of this.adjacency.values()) n += conns.length;
    return n;
  }

  /**
   * Shortest area-to-area route by hop count.
   *
   * @returns the areas visited including both ends, `[start]` when start and
   *   target are equal, or null if the target is unreachable
   */
  shortestAreaPath(start: AreaId, target: AreaId): AreaId[] | null {
    const steps = this.routeSteps(start, target);
    if (!steps) return null;
    return [start, ...steps.map((s) => s.toArea)];
  }

  /** Same search as shortestAreaPath, returning the connection taken at each hop. */
  routeSteps(start: AreaId, target: AreaId): AreaConnection[] | null {
    if (start === target) return [];
    const queue: Array<{ area: AreaId; path: AreaConnection[] }> = [{ area: start, path: [] }];
    const visited = new Set<AreaId>([start]);
    while (queue.length > 0) {
      const { area, path } = queue.shift()!;
      for (const conn of this.adjacency.get(area) ?? []) {
        if (visited.has(conn.toArea)) continue;
        const newPath = [...path, { ...conn }];
        if (conn.toArea === target) return newPath;
        visited.add(conn.toArea);
        queue.push({ area: conn.toArea, path: newPath });
      }
    }
    return null;
  }

  toRecord(now: Date = new Date()): ConnectionsRecord {
    const adjacency: Record<AreaId, AreaConnection[]> = {};
    for (const area of [...this.adjacency.keys()].sort()) {
      adjacency[area] = this.connectionsFrom(area);
    }
    return { version: 1, updatedAt: now.toISOString(), adjacency };
  }

  static fromRecord(record: ConnectionsRecord): ConnectivityGraph {
    const graph = new ConnectivityGraph();
    for (const conns of Object.values(record.adjacency)) {
      for (const conn of conns) graph.upsert(conn);
    }
    return graph;
  }

  private upsert(conn: AreaConnection): "added" | "updated" | "unchanged" {
    let list = this.adjacency.get(conn.fromArea);
    if (!list) {
      list = [];
      this.adjacency.set(conn.fromArea, list);
    }
    const index = list.findIndex((c) => c.toArea === conn.toArea && sameCoord(c.fromCoord, conn.fromCoord));
    const copy: AreaConnection = { ...conn, fromCoord: { ...conn.fromCoord }, toCoord: { ...conn.toCoord } };
    if (index === -1) {
      list.push(copy);
      return "added";
    }
    if (sameConnection(list[index]!, copy)) return "unchanged";
    list[index] = copy;
    return "updated";
  }
}
