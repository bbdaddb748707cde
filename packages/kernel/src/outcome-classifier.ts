import { step } from "@wayfinder/grid";
import { areaIdOf, isAgentSnapshot, isDirection } from "@wayfinder/schemas";
import type { ActionOutcome, GameAction } from "@wayfinder/schemas";

export interface ClassifyInput {
  action: GameAction;
  /** Snapshot read before the action; validated here, so raw probe output is fine. */
  before: unknown;
  after: unknown;
  dialogueBecameActive: boolean;
}

/**
 * Decides what an action did to the world by comparing the snapshots taken
 * around it. Pure: no I/O, and never throws.
 */
export function classifyOutcome(input: ClassifyInput): ActionOutcome {
  const { action, before, after, dialogueBecameActive } = input;
  if (!isAgentSnapshot(before) || !isAgentSnapshot(after)) {
    return { kind: "unknown", reason: "snapshot failed validation" };
  }

  const from = { x: before.x, y: before.y };
  const to = { x: after.x, y: after.y };
  const fromArea = areaIdOf(before.area);
  const toArea = areaIdOf(after.area);

  if (fromArea !== toArea) {
    const direction = isDirection(action) ? action : null;
    return {
      kind: "area-changed",
      fromArea,
      exit: direction ? step(from, direction) : { ...from },
      vacated: from,
      toArea,
      toAreaRef: { ...after.area },
      entry: to,
      direction,
    };
  }

  if (isDirection(action)) {
    if (from.x !== to.x || from.y !== to.y) {
      if (dialogueBecameActive) {
        return { kind: "auto-dialogue", from, to, trigger: { ...to }, direction: action };
      }
      return { kind: "moved", from, to, direction: action };
    }
    if (before.facing !== after.facing) {
      return { kind: "turned", position: to, fromFacing: before.facing, toFacing: after.facing };
    }
    return { kind: "blocked", position: from, target: step(from, action), direction: action };
  }

  switch (action) {
    case "A":
      return { kind: "interacted", target: step(to, after.facing), dialogue: dialogueBecameActive };
    case "Wait":
      return { kind: "waited" };
    default:
      return { kind: "unknown", reason: `${action} has no map effect` };
  }
}
