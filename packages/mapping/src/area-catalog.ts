import { areaIdOf, silentLogger } from "@wayfinder/schemas";
import type { AreaId, AreaRef, Logger } from "@wayfinder/schemas";
import { AreaMap } from "./area-map.js";
import type { AreaStore } from "./area-store.js";
import { ConnectivityGraph } from "./connectivity-graph.js";

export type PersistTarget = { kind: "area"; areaId: AreaId } | { kind: "connections" };

/** Where `resolve` found a map: already in memory, read from the store, or new. */
export type MapOrigin = "memory" | "store" | "created";

export type PersistListener = (target: PersistTarget, error: Error | null) => void;

export interface AreaCatalogOptions {
  /** Omit to keep maps in memory only. */
  store?: AreaStore;
  logger?: Logger;
  onPersist?: PersistListener;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Session-wide owner of every AreaMap and the connectivity graph. Maps are
 * created lazily on first arrival and never dropped while the process runs.
 * Writes to the store are fire-and-forget: failures are logged and the next
 * save retries with whatever is in memory then.
 */
export class AreaCatalog {
  private maps = new Map<AreaId, AreaMap>();
  private connectivity = new ConnectivityGraph();
  private pending = new Set<Promise<void>>();
  private store?: AreaStore;
  private logger: Logger;
  private onPersist?: PersistListener;

  constructor(options: AreaCatalogOptions = {}) {
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
    this.onPersist = options.onPersist;
  }

  get graph(): ConnectivityGraph {
    return this.connectivity;
  }

  /** Loads the stored adjacency list. A corrupt file leaves the graph empty. */
  async init(): Promise<void> {
    if (!this.store) return;
    try {
      this.connectivity = await this.store.loadConnections();
      this.logger.info("Loaded area connections", { connections: this.connectivity.size });
    } catch (err) {
      this.logger.error("Could not load area connections, starting empty", { error: toError(err).message });
    }
  }

  get(areaId: AreaId): AreaMap | undefined {
    return this.maps.get(areaId);
  }

  all(): AreaMap[] {
    return [...this.maps.values()];
  }

  /** Returns the map for `ref`, loading it from the store or creating it on first visit. */
  async open(ref: AreaRef): Promise<AreaMap> {
    return (await this.resolve(ref)).map;
  }

  async resolve(ref: AreaRef): Promise<{ map: AreaMap; origin: MapOrigin }> {
    const areaId = areaIdOf(ref);
    const cached = this.maps.get(areaId);
    if (cached) {
      if (ref.name && cached.displayName === cached.id) cached.displayName = ref.name;
      return { map: cached, origin: "memory" };
    }
    let map: AreaMap | null = null;
    if (this.store) {
      try {
        map = await this.store.loadArea(areaId);
        if (map) this.logger.info("Loaded area map", { areaId, name: map.displayName });
      } catch (err) {
        this.logger.error("Stored area map is unreadable, starting fresh", { areaId, error: toError(err).message });
      }
    }
    const origin: MapOrigin = map ? "store" : "created";
    if (!map) {
      map = new AreaMap(areaId, ref);
      this.logger.info("Created area map", { areaId, name: map.displayName });
    }
    this.maps.set(areaId, map);
    return { map, origin };
  }

  persistInBackground(map: AreaMap): void {
    const store = this.store;
    if (!store) return;
    this.track(store.saveArea(map), { kind: "area", areaId: map.id });
  }

  persistConnectionsInBackground(): void {
    const store = this.store;
    if (!store) return;
    this.track(store.saveConnections(this.connectivity), { kind: "connections" });
  }

  /** Periodic save of every map and the graph. Never rejects. */
  async saveAll(): Promise<void> {
    for (const map of this.maps.values()) this.persistInBackground(map);
    this.persistConnectionsInBackground();
    await this.flush();
  }

  /** Waits for every write started so far. Never rejects. */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private track(write: Promise<void>, target: PersistTarget): void {
    const settled = write.then(
      () => {
        this.logger.debug("Persisted", { ...target });
        this.notify(target, null);
      },
      (err: unknown) => {
        const error = toError(err);
        this.logger.error("Persistence failed", { ...target, error: error.message });
        this.notify(target, error);
      },
    ).finally(() => {
      this.pending.delete(settled);
    });
    this.pending.add(settled);
  }

  private notify(target: PersistTarget, error: Error | null): void {
    try {
      this.onPersist?.(target, error);
    } catch (err) {
      this.logger.warn("Persist listener threw", { ...target, error: toError(err).message });
    }
  }
}
