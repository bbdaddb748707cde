import { readFile, readdir, mkdir, open, rename } from "node:fs/promises";
import { dirname, join } from "node:path";
import { isAreaRecord, isConnectionsRecord, validateAreaRecordData, validateConnectionsRecordData } from "@wayfinder/schemas";
import type { AreaId } from "@wayfinder/schemas";
import { AreaMap, AreaRecordError } from "./area-map.js";
import { ConnectivityGraph } from "./connectivity-graph.js";

const AREA_FILE = /^(.+)\.json$/;

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * On-disk layout: one JSON record per area under `areas/`, plus a single
 * `connections.json` adjacency list. A missing file means never visited.
 */
export class AreaStore {
  readonly dataDir: string;
  private writeLock: Promise<void> = Promise.resolve();

  constructor(dataDir: string) {
    this.dataDir = dataDir;
  }

  areaPath(areaId: AreaId): string {
    return join(this.dataDir, "areas", `${areaId}.json`);
  }

  get connectionsPath(): string {
    return join(this.dataDir, "connections.json");
  }

  /** @throws AreaRecordError when the stored record is unreadable */
  async loadArea(areaId: AreaId): Promise<AreaMap | null> {
    const data = await this.readJson(this.areaPath(areaId));
    if (data === undefined) return null;
    if (!isAreaRecord(data)) {
      const { errors } = validateAreaRecordData(data);
      throw new AreaRecordError(`Invalid area record ${areaId}: ${errors.join(", ")}`);
    }
    if (data.areaId !== areaId) {
      throw new AreaRecordError(`Area record ${areaId} is labelled ${data.areaId}`);
    }
    return AreaMap.fromRecord(data);
  }

  async saveArea(map: AreaMap): Promise<void> {
    await this.writeJson(this.areaPath(map.id), map.toRecord());
  }

  async listAreas(): Promise<AreaId[]> {
    let entries: string[];
    try {
      entries = await readdir(join(this.dataDir, "areas"));
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    const ids: AreaId[] = [];
    for (const name of entries) {
      const match = AREA_FILE.exec(name);
      if (match?.[1]) ids.push(match[1]);
    }
    return ids.sort();
  }

  /** @throws AreaRecordError when the stored adjacency list is unreadable */
  async loadConnections(): Promise<ConnectivityGraph> {
    const data = await this.readJson(this.connectionsPath);
    if (data === undefined) return new ConnectivityGraph();
    if (!isConnectionsRecord(data)) {
      const { errors } = validateConnectionsRecordData(data);
      throw new AreaRecordError(`Invalid connections record: ${errors.join(", ")}`);
    }
    return ConnectivityGraph.fromRecord(data);
  }

  async saveConnections(graph: ConnectivityGraph): Promise<void> {
    await this.writeJson(this.connectionsPath, graph.toRecord());
  }

  private async readJson(path: string): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(path, "utf-8");
    } catch (err) {
      if (isMissing(err)) return undefined;
      throw err;
    }
    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (err) {
      throw new AreaRecordError(`Corrupt JSON in ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  private async writeJson(path: string, value: unknown): Promise<void> {
    let releaseLock: () => void;
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      await mkdir(dirname(path), { recursive: true });
      const tmpPath = path + ".tmp";
      const fh = await open(tmpPath, "w");
      try {
        await fh.writeFile(JSON.stringify(value, null, 2) + "\n", "utf-8");
        await fh.sync();
      } finally {
        await fh.close();
      }
      await rename(tmpPath, path);
    } finally {
      releaseLock!();
    }
  }
}
