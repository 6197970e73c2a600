// Tests for Future settlement and joining.

import { describe, expect, it, vi } from "vitest";

import { Future } from "./future.ts";
import { EventLoop } from "./loop.ts";

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe("Future", () => {
  it("starts pending", () => {
    const future = new Future<number>({ loop: null, timeout: 0 });
    expect(future.state).toBe("pending");
    expect(future.settled).toBe(false);
    expect(future.result).toBeUndefined();
    expect(future.error).toBeUndefined();
  });

  it("keeps the first result", () => {
    const future = new Future<number>({ loop: null, timeout: 0 });
    expect(future.setResult(1)).toBe(true);
    expect(future.setResult(2)).toBe(false);
    expect(future.setError(new Error("late"))).toBe(false);

    expect(future.state).toBe("resolved");
    expect(future.result).toBe(1);
    expect(future.error).toBeUndefined();
  });

  it("keeps the first error", () => {
    const error = new Error("boom");
    const future = new Future<number>({ loop: null, timeout: 0 });
    expect(future.setError(error)).toBe(true);
    expect(future.setResult(3)).toBe(false);

    expect(future.state).toBe("failed");
    expect(future.error).toBe(error);
  });

  describe("get", () => {
    it("returns the value", async () => {
      const future = new Future<string>({ loop: null, timeout: 0 });
      future.setResult("done");
      await expect(future.get()).resolves.toBe("done");
    });

    it("throws the error", async () => {
      const error = new Error("boom");
      const future = new Future<string>({ loop: null, timeout: 0 });
      future.setError(error);
      await expect(future.get()).rejects.toBe(error);
    });

    it("waits for a later settlement", async () => {
      const future = new Future<number>({ loop: null, timeout: 0 });
      const value = future.get();
      setTimeout(() => future.setResult(42), 0);
      await expect(value).resolves.toBe(42);
    });
  });

  describe("stepTimeout", () => {
    it("expires once the deadline is reached", () => {
      let now = 5_000;
      const future = new Future({ loop: null, timeout: 2, clock: () => now });

      expect(future.stepTimeout()).toBe(false);
      now = 6_999;
      expect(future.stepTimeout()).toBe(false);
      now = 7_000;
      expect(future.stepTimeout()).toBe(true);
      expect(future.stepTimeout(8_000)).toBe(true);
    });

    it("never expires without a timeout", () => {
      const future = new Future({ loop: null, timeout: 0, clock: () => 0 });
      expect(future.stepTimeout(Number.MAX_SAFE_INTEGER)).toBe(false);
    });

    it("never expires once settled", () => {
      const future = new Future({ loop: null, timeout: 1, clock: () => 0 });
      future.setResult(null);
      expect(future.stepTimeout(60_000)).toBe(false);
    });

    it("does not settle the future by itself", () => {
      const future = new Future({ loop: null, timeout: 1, clock: () => 0 });
      expect(future.stepTimeout(60_000)).toBe(true);
      expect(future.state).toBe("pending");
    });
  });

  describe("attachCallback", () => {
    it("runs callbacks on settlement, in order", () => {
      const future = new Future<number>({ loop: null, timeout: 0 });
      const calls: string[] = [];
      future.attachCallback((f) => calls.push(`first:${f.result}`));
      future.attachCallback((f) => calls.push(`second:${f.result}`));
      expect(calls).toEqual([]);

      future.setResult(7);
      future.setResult(8);

      expect(calls).toEqual(["first:7", "second:7"]);
    });

    it("runs every callback when one throws", () => {
      const future = new Future<number>({ loop: null, timeout: 0 });
      const after = vi.fn();
      future.attachCallback(() => {
        throw new Error("callback bug");
      });
      future.attachCallback(after);

      expect(future.setResult(1)).toBe(true);
      expect(after).toHaveBeenCalledTimes(1);
      expect(() =>
        future.attachCallback(() => {
          throw new Error("late callback bug");
        }),
      ).not.toThrow();
    });

    it("runs immediately on a settled future", () => {
      const future = new Future<number>({ loop: null, timeout: 0 });
      future.setError(new Error("boom"));
      const callback = vi.fn();

      future.attachCallback(callback);

      expect(callback).toHaveBeenCalledTimes(1);
      expect(callback).toHaveBeenCalledWith(future);
    });
  });

  describe("join", () => {
    it("starts the loop while waiting", async () => {
      const loop = new EventLoop();
      const future = new Future<number>({ loop, timeout: 0 });

      const joined = future.join();
      expect(loop.running).toBe(true);

      future.setResult(1);
      loop.stop();
      await joined;
      expect(loop.running).toBe(false);
    });

    it("restarts the loop after a stop meant for someone else", async () => {
      const loop = new EventLoop();
      const future = new Future<number>({ loop, timeout: 0 });
      let joined = false;
      const join = future.join().then(() => {
        joined = true;
      });

      loop.stop();
      await tick();
      expect(joined).toBe(false);
      expect(loop.running).toBe(true);

      future.setResult(1);
      await join;
      expect(joined).toBe(true);
    });

    it("returns at once when already settled", async () => {
      const loop = new EventLoop();
      const future = new Future<number>({ loop, timeout: 0 });
      future.setResult(1);

      await future.join();
      expect(loop.running).toBe(false);
    });
  });
});
