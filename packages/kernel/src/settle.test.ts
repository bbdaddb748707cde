import { describe, it, expect } from "vitest";
import { ManualClock } from "@wayfinder/schemas";
import type { AgentSnapshot, Scene, SettleConfig } from "@wayfinder/schemas";
import type { GameStateProbe } from "./collaborators.js";
import { waitForSettle, watchForDialogue } from "./settle.js";

const config: SettleConfig = { minSettleMs: 150, timeoutMs: 1500, pollIntervalMs: 50, dialogueWatchMs: 400 };

function snap(x: number, y: number, number = 1): AgentSnapshot {
  return { area: { group: 0, number }, x, y, facing: "Up" };
}

/** Replays scripted reads; the last entry repeats once the script runs out. */
class ScriptedProbe implements GameStateProbe {
  sceneReads = 0;
  constructor(private scenes: Scene[], private snapshots: (() => AgentSnapshot)[]) {}

  async readScene(): Promise<Scene> {
    this.sceneReads++;
    return this.scenes.length > 1 ? this.scenes.shift()! : this.scenes[0]!;
  }

  async readSnapshot(): Promise<AgentSnapshot> {
    const next = this.snapshots.length > 1 ? this.snapshots.shift()! : this.snapshots[0]!;
    return next();
  }
}

describe("waitForSettle", () => {
  it("waits for two identical snapshots after the minimum settle time", async () => {
    const probe = new ScriptedProbe(["overworld"], [() => snap(3, 2), () => snap(3, 1)]);
    const result = await waitForSettle({ probe, before: snap(3, 3), sceneBefore: "overworld", config, clock: new ManualClock() });
    expect(result).toEqual({
      status: "stabilized",
      snapshot: snap(3, 1),
      scene: "overworld",
      dialogueBecameActive: false,
      elapsedMs: 150,
      polls: 3,
    });
  });

  it("never returns before the minimum settle time", async () => {
    const probe = new ScriptedProbe(["overworld"], [() => snap(3, 3)]);
    const clock = new ManualClock(1000);
    const result = await waitForSettle({ probe, before: snap(3, 3), sceneBefore: "overworld", config: { ...config, minSettleMs: 260 }, clock });
    expect(result.status).toBe("stabilized");
    expect(result.elapsedMs).toBe(300);
    expect(result.polls).toBe(6);
  });

  it("reports an area change once the new area is stable", async () => {
    const probe = new ScriptedProbe(["overworld"], [() => snap(4, 9, 2)]);
    const result = await waitForSettle({ probe, before: snap(4, 0), sceneBefore: "overworld", config, clock: new ManualClock() });
    expect(result.status).toBe("area-changed");
    expect(result.snapshot).toEqual(snap(4, 9, 2));
  });

  it("ends on a dialogue that opened after the action", async () => {
    const probe = new ScriptedProbe(["overworld", "dialogue"], [() => snap(3, 2)]);
    const result = await waitForSettle({ probe, before: snap(3, 3), sceneBefore: "overworld", config, clock: new ManualClock() });
    expect(result.status).toBe("stabilized");
    expect(result.dialogueBecameActive).toBe(true);
    expect(result.scene).toBe("dialogue");
    expect(result.polls).toBe(3);
  });

  it("aborts when a battle starts", async () => {
    const probe = new ScriptedProbe(["overworld", "battle"], [() => snap(3, 2)]);
    const result = await waitForSettle({ probe, before: snap(3, 3), sceneBefore: "overworld", config, clock: new ManualClock() });
    expect(result.status).toBe("aborted");
    expect(result.reason).toBe("battle opened");
    expect(result.polls).toBe(2);
  });

  it("aborts when the probe throws mid-wait", async () => {
    const probe = new ScriptedProbe(["overworld"], [
      () => snap(3, 2),
      () => { throw new Error("memory read failed"); },
    ]);
    const result = await waitForSettle({ probe, before: snap(3, 3), sceneBefore: "overworld", config, clock: new ManualClock() });
    expect(result).toEqual({
      status: "aborted",
      snapshot: snap(3, 2),
      scene: "overworld",
      dialogueBecameActive: false,
      elapsedMs: 100,
      polls: 2,
      reason: "probe failed: memory read failed",
    });
  });

  it("aborts without polling when the action started outside the overworld", async () => {
    const probe = new ScriptedProbe(["overworld"], [() => snap(3, 3)]);
    const result = await waitForSettle({ probe, before: snap(3, 3), sceneBefore: "dialogue", config, clock: new ManualClock() });
    expect(result).toEqual({
      status: "aborted",
      snapshot: snap(3, 3),
      scene: "dialogue",
      dialogueBecameActive: false,
      elapsedMs: 0,
      polls: 0,
      reason: "scene was dialogue before the action",
    });
    expect(probe.sceneReads).toBe(0);
  });

  it("gives up at the timeout while the agent keeps moving", async () => {
    let x = 0;
    const probe = new ScriptedProbe(["overworld"], [() => snap(x++, 0)]);
    const result = await waitForSettle({
      probe, before: snap(0, 0), sceneBefore: "overworld", config: { ...config, timeoutMs: 300 }, clock: new ManualClock(),
    });
    expect(result.status).toBe("timed-out");
    expect(result.polls).toBe(6);
    expect(result.reason).toBe("no stable snapshot within 300ms");
    expect(result.snapshot).toEqual(snap(5, 0));
  });
});

describe("watchForDialogue", () => {
  it("spots a dialogue that opens shortly after a step", async () => {
    const probe = new ScriptedProbe(["overworld", "overworld", "overworld", "dialogue"], [() => snap(0, 0)]);
    const clock = new ManualClock();
    expect(await watchForDialogue(probe, clock, config)).toBe(true);
    expect(clock.now()).toBe(200);
  });

  it("stops watching after the configured window", async () => {
    const probe = new ScriptedProbe(["overworld"], [() => snap(0, 0)]);
    const clock = new ManualClock();
    expect(await watchForDialogue(probe, clock, config)).toBe(false);
    expect(clock.now()).toBe(400);
    expect(probe.sceneReads).toBe(8);
  });
});
