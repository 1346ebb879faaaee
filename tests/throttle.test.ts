import { describe, expect, it } from "vitest";

import { CommandThrottle } from "../src/relay/throttle.js";
import type { Clock } from "../src/relay/timing.js";

class ManualClock implements Clock {
  current = 1_000;
  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

describe("CommandThrottle", () => {
  it("lets the first dispatch through immediately", async () => {
    const clock = new ManualClock();
    const throttle = new CommandThrottle({ cooldownMs: 100, clock });
    await expect(throttle.acquire()).resolves.toBe(1_000);
    expect(clock.sleeps).toEqual([]);
  });

  it("waits out the remainder of the cooldown", async () => {
    const clock = new ManualClock();
    const throttle = new CommandThrottle({ cooldownMs: 100, clock });
    await throttle.acquire();
    clock.current += 30;
    await expect(throttle.acquire()).resolves.toBe(1_100);
    expect(clock.sleeps).toEqual([70]);
  });

  it("does not wait once the cooldown has passed", async () => {
    const clock = new ManualClock();
    const throttle = new CommandThrottle({ cooldownMs: 100, clock });
    await throttle.acquire();
    clock.current += 250;
    await expect(throttle.acquire()).resolves.toBe(1_250);
    expect(clock.sleeps).toEqual([]);
  });

  it("serializes concurrent callers one cooldown apart", async () => {
    const clock = new ManualClock();
    const throttle = new CommandThrottle({ cooldownMs: 100, clock });
    const granted = await Promise.all([throttle.acquire(), throttle.acquire(), throttle.acquire()]);
    expect(granted).toEqual([1_000, 1_100, 1_200]);
    expect(throttle.lastDispatch).toBe(1_200);
  });

  it("spaces real dispatches by at least the cooldown", async () => {
    const throttle = new CommandThrottle({ cooldownMs: 100 });
    const first = await throttle.acquire();
    const second = await throttle.acquire();
    expect(second - first).toBeGreaterThanOrEqual(100);
  });

  it("rejects an aborted wait and keeps serving later callers", async () => {
    const throttle = new CommandThrottle({ cooldownMs: 100 });
    await throttle.acquire();
    const controller = new AbortController();
    const pending = throttle.acquire(controller.signal);
    controller.abort();
    await expect(pending).rejects.toThrow("operation aborted");
    await expect(throttle.acquire()).resolves.toBeTypeOf("number");
  });
});
