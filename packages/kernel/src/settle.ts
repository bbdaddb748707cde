import { isAgentSnapshot } from "@wayfinder/schemas";
import type { AgentSnapshot, Clock, Scene, SettleConfig } from "@wayfinder/schemas";
import type { GameStateProbe } from "./collaborators.js";

export type SettleStatus = "stabilized" | "timed-out" | "area-changed" | "aborted";

export interface SettleResult {
  status: SettleStatus;
  /** Last snapshot read; unvalidated, since the probe may return anything. */
  snapshot: unknown;
  scene: Scene;
  dialogueBecameActive: boolean;
  elapsedMs: number;
  polls: number;
  reason?: string;
}

export interface SettleOptions {
  probe: GameStateProbe;
  before: AgentSnapshot;
  sceneBefore: Scene;
  config: SettleConfig;
  clock: Clock;
}

function sameSnapshot(a: AgentSnapshot, b: AgentSnapshot): boolean {
  return a.area.group === b.area.group
    && a.area.number === b.area.number
    && a.x === b.x
    && a.y === b.y
    && a.facing === b.facing;
}

function sameArea(a: AgentSnapshot, b: AgentSnapshot): boolean {
  return a.area.group === b.area.group && a.area.number === b.area.number;
}

/**
 * Polls the probe after an action until the agent stops changing. The
 * wait never ends before `minSettleMs` and gives up at `timeoutMs`.
 * Settling means two consecutive identical snapshots, or a dialogue
 * that opened after the action. Menus, battles and a failing probe abort.
 */
export async function waitForSettle(options: SettleOptions): Promise<SettleResult> {
  const { probe, before, sceneBefore, config, clock } = options;
  if (sceneBefore !== "overworld") {
    return {
      status: "aborted",
      snapshot: before,
      scene: sceneBefore,
      dialogueBecameActive: false,
      elapsedMs: 0,
      polls: 0,
      reason: `scene was ${sceneBefore} before the action`,
    };
  }

  const start = clock.now();
  let polls = 0;
  let dialogue = false;
  let previous: AgentSnapshot | null = null;
  let lastScene: Scene = sceneBefore;

  for (;;) {
    await clock.sleep(config.pollIntervalMs);
    polls++;
    let scene: Scene;
    let snapshot: unknown;
    try {
      scene = await probe.readScene();
      lastScene = scene;
      snapshot = await probe.readSnapshot();
    } catch (err) {
      return {
        status: "aborted",
        snapshot: previous,
        scene: lastScene,
        dialogueBecameActive: dialogue,
        elapsedMs: clock.now() - start,
        polls,
        reason: `probe failed: ${err instanceof Error ? err.message : String(err)}`,
      };
    }
    const elapsedMs = clock.now() - start;
    const result = (status: SettleStatus, reason?: string): SettleResult => ({
      status, snapshot, scene, dialogueBecameActive: dialogue, elapsedMs, polls,
      ...(reason !== undefined ? { reason } : {}),
    });

    if (scene === "menu" || scene === "battle") {
      return result("aborted", `${scene} opened`);
    }
    const valid = isAgentSnapshot(snapshot) ? snapshot : null;
    const settled = elapsedMs >= config.minSettleMs;
    if (scene === "dialogue") dialogue = true;

    if (settled && (dialogue || (valid && previous && sameSnapshot(previous, valid)))) {
      return result(valid && !sameArea(before, valid) ? "area-changed" : "stabilized");
    }
    if (elapsedMs >= config.timeoutMs) {
      return result("timed-out", `no stable snapshot within ${config.timeoutMs}ms`);
    }
    previous = valid;
  }
}

/**
 * Keeps polling the scene after a settled move, for walk-on triggers that
 * open a dialogue a moment after the step lands.
 */
export async function watchForDialogue(
  probe: GameStateProbe,
  clock: Clock,
  config: SettleConfig,
): Promise<boolean> {
  const start = clock.now();
  while (clock.now() - start < config.dialogueWatchMs) {
    await clock.sleep(config.pollIntervalMs);
    if ((await probe.readScene()) === "dialogue") return true;
  }
  return false;
}
