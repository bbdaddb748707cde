import { v4 as uuid } from "uuid";
import { areaIdOf, isAgentSnapshot, isDirection, isGameAction, silentLogger, systemClock, withTimeout } from "@wayfinder/schemas";
import type {
  ActionOutcome,
  AgentSnapshot,
  Clock,
  EngineConfig,
  GameAction,
  JournalEventType,
  Logger,
  Scene,
} from "@wayfinder/schemas";
import type { Journal } from "@wayfinder/journal";
import { ActiveArea, AreaCatalog, ObservationMerger, TraversalUpdater, windowAround } from "@wayfinder/mapping";
import type { AreaMap, AreaStore, PersistTarget, TransitionResult } from "@wayfinder/mapping";
import { ExplorationAdvisor, PositionHistory } from "@wayfinder/planner";
import type { ExplorationAdvice } from "@wayfinder/planner";
import type { ActionExecutor, DecisionContext, DecisionSource, GameStateProbe, VisionSource } from "./collaborators.js";
import { classifyOutcome } from "./outcome-classifier.js";
import { waitForSettle, watchForDialogue } from "./settle.js";
import type { SettleStatus } from "./settle.js";

export interface NavigationEngineOptions {
  config: EngineConfig;
  vision: VisionSource;
  probe: GameStateProbe;
  executor: ActionExecutor;
  decider: DecisionSource;
  /** Omit to keep maps in memory only. */
  store?: AreaStore;
  journal?: Journal;
  clock?: Clock;
  logger?: Logger;
  sessionId?: string;
}

export type CycleResult =
  | {
      status: "completed";
      cycle: number;
      action: GameAction;
      outcome: ActionOutcome;
      transition: TransitionResult;
      settle: SettleStatus;
      stuck: boolean;
    }
  | { status: "aborted"; cycle: number; reason: string; action?: GameAction }
  | { status: "execution-failed"; cycle: number; action: GameAction; reason: string };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs the observe, decide, act, settle, classify and update loop, one
 * cycle per call. Cycles must not overlap; the engine owns the only
 * mutable handle on the active area.
 */
export class NavigationEngine {
  readonly sessionId: string;
  readonly catalog: AreaCatalog;
  readonly history: PositionHistory;
  private config: EngineConfig;
  private vision: VisionSource;
  private probe: GameStateProbe;
  private executor: ActionExecutor;
  private decider: DecisionSource;
  private journal?: Journal;
  private clock: Clock;
  private logger: Logger;
  private merger: ObservationMerger;
  private advisor = new ExplorationAdvisor();
  private updater: TraversalUpdater | null = null;
  private cycles = 0;
  private running = false;
  private pendingJournal = new Set<Promise<unknown>>();

  constructor(options: NavigationEngineOptions) {
    this.config = options.config;
    this.vision = options.vision;
    this.probe = options.probe;
    this.executor = options.executor;
    this.decider = options.decider;
    this.journal = options.journal;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.sessionId = options.sessionId ?? uuid();
    this.catalog = new AreaCatalog({
      store: options.store,
      logger: this.logger,
      onPersist: (target, error) => this.recordPersist(target, error),
    });
    this.merger = new ObservationMerger({
      window: this.config.window,
      solidLabels: this.config.solidLabels,
      preserveNegativeCoordinates: this.config.preserveNegativeCoordinates,
      logger: this.logger,
    });
    this.history = new PositionHistory(this.config.stuck);
  }

  get cycleCount(): number {
    return this.cycles;
  }

  get activeArea(): ActiveArea | null {
    return this.updater?.activeArea ?? null;
  }

  /** Loads stored connections and opens the map the agent starts in. */
  async start(): Promise<void> {
    if (this.running) throw new Error("Engine already started");
    await this.catalog.init();
    const snapshot: unknown = await this.probe.readSnapshot();
    if (!isAgentSnapshot(snapshot)) {
      throw new Error("Initial snapshot failed validation");
    }
    const map = await this.catalog.open(snapshot.area);
    map.recordVisit(new Date(this.clock.now()));
    map.markPlayer({ x: snapshot.x, y: snapshot.y });
    this.updater = new TraversalUpdater({
      catalog: this.catalog,
      active: new ActiveArea(map),
      logger: this.logger,
    });
    this.running = true;
    this.logger.info("Session started", { sessionId: this.sessionId, areaId: map.id, x: snapshot.x, y: snapshot.y });
    await this.emit("session.started", { areaId: map.id, position: { x: snapshot.x, y: snapshot.y } });
  }

  async runCycle(): Promise<CycleResult> {
    const updater = this.updater;
    if (!this.running || !updater) throw new Error("Engine not started");
    const cycle = ++this.cycles;

    let sceneBefore: Scene;
    let before: unknown;
    try {
      sceneBefore = await this.probe.readScene();
      before = await this.probe.readSnapshot();
    } catch (err) {
      this.logger.warn("State probe failed", { cycle, error: errorMessage(err) });
      return this.abort(cycle, `probe failed: ${errorMessage(err)}`);
    }
    if (!isAgentSnapshot(before)) {
      return this.abort(cycle, "snapshot failed validation");
    }
    await this.followUnseenAreaChange(updater, before);

    const map = updater.activeArea.map;
    const position = { x: before.x, y: before.y };
    if (sceneBefore === "overworld") await this.mergeObservation(position);

    const stuck = this.history.isStuck();
    const advice = this.advisor.advise(map.traversal, position, stuck);
    let action: GameAction;
    try {
      action = await this.decider.decide(this.buildContext(cycle, before, advice));
    } catch (err) {
      this.logger.error("Decision source failed", { cycle, error: errorMessage(err) });
      return this.abort(cycle, `decision failed: ${errorMessage(err)}`);
    }
    if (!isGameAction(action)) {
      return this.abort(cycle, `decision source returned an unsupported action: ${String(action)}`);
    }

    const failure = await this.execute(action);
    if (failure) {
      this.logger.warn("Action failed", { cycle, action, reason: failure });
      await this.emit("action.failed", { cycle, action, reason: failure });
      await this.maybeSave();
      return { status: "execution-failed", cycle, action, reason: failure };
    }

    const settle = await waitForSettle({
      probe: this.probe,
      before,
      sceneBefore,
      config: this.config.settle,
      clock: this.clock,
    });
    if (settle.status === "aborted") {
      return this.abort(cycle, settle.reason ?? "settle aborted", action);
    }

    let dialogue = settle.dialogueBecameActive;
    if (
      !dialogue
      && settle.status === "stabilized"
      && isDirection(action)
      && isAgentSnapshot(settle.snapshot)
      && (settle.snapshot.x !== before.x || settle.snapshot.y !== before.y)
      && this.config.settle.dialogueWatchMs > 0
    ) {
      try {
        dialogue = await watchForDialogue(this.probe, this.clock, this.config.settle);
      } catch (err) {
        this.logger.warn("Dialogue watch failed", { cycle, error: errorMessage(err) });
      }
    }

    const outcome = classifyOutcome({ action, before, after: settle.snapshot, dialogueBecameActive: dialogue });
    const transition = await updater.apply(outcome);
    if (transition.kind === "area-switched") {
      await this.emit("area.entered", {
        cycle,
        from: transition.previousArea,
        to: transition.newArea,
        created: transition.createdArea,
        connection: transition.connection,
      });
    }

    if (isAgentSnapshot(settle.snapshot)) {
      this.history.record(updater.activeArea.map.id, { x: settle.snapshot.x, y: settle.snapshot.y });
    }
    const stuckAfter = this.history.isStuck();
    if (stuckAfter && !stuck) this.logger.warn("Agent looks stuck", { cycle, areaId: updater.activeArea.map.id });

    this.logger.debug("Cycle completed", { cycle, action, outcome: outcome.kind, settle: settle.status });
    await this.emit("cycle.completed", {
      cycle,
      action,
      outcome,
      settle: settle.status,
      settleMs: settle.elapsedMs,
      stuck: stuckAfter,
    });
    await this.maybeSave();
    return { status: "completed", cycle, action, outcome, transition, settle: settle.status, stuck: stuckAfter };
  }

  /** Saves every map and waits for pending writes. Safe to call twice. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await this.catalog.saveAll();
    await this.emit("session.ended", { cycles: this.cycles, areas: this.catalog.all().length });
    await Promise.all([...this.pendingJournal]);
    await this.journal?.close();
    this.logger.info("Session ended", { sessionId: this.sessionId, cycles: this.cycles });
  }

  private buildContext(cycle: number, snapshot: AgentSnapshot, advice: ExplorationAdvice): DecisionContext {
    const map = this.activeMapOrThrow();
    const position = { x: snapshot.x, y: snapshot.y };
    return {
      cycle,
      areaId: map.id,
      areaName: map.displayName,
      position,
      facing: snapshot.facing,
      window: windowAround(map, position, this.config.contextRadius),
      advice,
      connections: this.catalog.graph.connectionsFrom(map.id),
    };
  }

  private activeMapOrThrow(): AreaMap {
    const active = this.updater?.activeArea;
    if (!active) throw new Error("Engine not started");
    return active.map;
  }

  /**
   * Warps, cutscenes and dialogue-driven moves can change the area between
   * cycles. Record the hop with the last known tile as the exit.
   */
  private async followUnseenAreaChange(updater: TraversalUpdater, snapshot: AgentSnapshot): Promise<void> {
    const map = updater.activeArea.map;
    const areaId = areaIdOf(snapshot.area);
    if (areaId === map.id) return;
    const last = map.playerPosition() ?? { x: snapshot.x, y: snapshot.y };
    this.logger.warn("Area changed outside a cycle", { from: map.id, to: areaId });
    const transition = await updater.apply({
      kind: "area-changed",
      fromArea: map.id,
      exit: last,
      vacated: last,
      toArea: areaId,
      toAreaRef: { ...snapshot.area },
      entry: { x: snapshot.x, y: snapshot.y },
      direction: null,
    });
    if (transition.kind === "area-switched") {
      await this.emit("area.entered", {
        cycle: this.cycles,
        from: transition.previousArea,
        to: transition.newArea,
        created: transition.createdArea,
        connection: transition.connection,
      });
    }
  }

  private async mergeObservation(position: { x: number; y: number }): Promise<void> {
    const map = this.activeMapOrThrow();
    let reason: string;
    try {
      const observation = await this.vision.observe();
      const merged = this.merger.merge(map, position, observation);
      if (merged.status === "merged") return;
      reason = merged.reason;
    } catch (err) {
      reason = `vision failed: ${errorMessage(err)}`;
      this.logger.warn("Vision source failed", { areaId: map.id, error: errorMessage(err) });
    }
    await this.emit("observation.rejected", { cycle: this.cycles, areaId: map.id, reason });
  }

  /** Returns the failure reason, or null when the input was delivered. */
  private async execute(action: GameAction): Promise<string | null> {
    try {
      const ok = await withTimeout(this.executor.execute(action), this.config.settle.timeoutMs, "Action execution");
      return ok ? null : "executor reported failure";
    } catch (err) {
      return errorMessage(err);
    }
  }

  private async abort(cycle: number, reason: string, action?: GameAction): Promise<CycleResult> {
    this.logger.info("Cycle aborted", { cycle, reason });
    await this.emit("cycle.aborted", { cycle, reason, ...(action ? { action } : {}) });
    await this.maybeSave();
    return { status: "aborted", cycle, reason, ...(action ? { action } : {}) };
  }

  private async maybeSave(): Promise<void> {
    if (this.cycles % this.config.persistence.saveEveryCycles !== 0) return;
    this.logger.debug("Periodic save", { cycle: this.cycles });
    await this.catalog.saveAll();
  }

  private recordPersist(target: PersistTarget, error: Error | null): void {
    if (!this.journal) return;
    const type: JournalEventType = error ? "map.persist_failed" : "map.persisted";
    const payload = {
      target: target.kind === "area" ? target.areaId : "connections",
      ...(error ? { error: error.message } : {}),
    };
    const pending = this.journal.tryEmit(this.sessionId, type, payload);
    this.pendingJournal.add(pending);
    void pending.finally(() => this.pendingJournal.delete(pending));
  }

  private async emit(type: JournalEventType, payload: Record<string, unknown>): Promise<void> {
    await this.journal?.tryEmit(this.sessionId, type, payload);
  }
}
