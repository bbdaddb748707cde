import { describe, it, expect } from "vitest";
import { ManualClock, TimeoutError, withTimeout } from "./timing.js";

describe("ManualClock", () => {
  it("advances only when slept on or advanced explicitly", async () => {
    const clock = new ManualClock(100);
    expect(clock.now()).toBe(100);
    await clock.sleep(25);
    expect(clock.now()).toBe(125);
    clock.advance(5);
    expect(clock.now()).toBe(130);
  });

  it("ignores negative sleeps", async () => {
    const clock = new ManualClock();
    await clock.sleep(-10);
    expect(clock.now()).toBe(0);
  });
});

describe("withTimeout", () => {
  it("resolves when the promise completes before the timeout", async () => {
    await expect(withTimeout(Promise.resolve(true), 1000)).resolves.toBe(true);
  });

  it("rejects with TimeoutError naming the label", async () => {
    const never = new Promise<boolean>(() => {});
    await expect(withTimeout(never, 10, "Action execution")).rejects.toThrow(
      new TimeoutError("Action execution timed out after 10ms"),
    );
  });

  it("returns the original promise when ms <= 0", async () => {
    const p = Promise.resolve("x");
    expect(withTimeout(p, 0)).toBe(p);
  });
});
