import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { sleep, withRetry } from "../retry.js";
import { isScoringError } from "../errors.js";
import { KeyedMutex } from "../keyed-mutex.js";

describe("withRetry", () => {
  it("returns the first success", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("flaky")).mockResolvedValueOnce("ok");
    await expect(withRetry(fn, { retries: 2, delayMs: 0 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("throws the last error once retries are exhausted", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("first")).mockRejectedValueOnce(new Error("second"));
    await expect(withRetry(fn, { retries: 1, delayMs: 0 })).rejects.toThrow("second");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("rethrows immediately when shouldRetry declines", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("fatal"));
    await expect(withRetry(fn, { retries: 3, delayMs: 0, shouldRetry: () => false })).rejects.toThrow("fatal");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("backs off linearly", async () => {
    const log = pino({ level: "silent" });
    const warn = vi.spyOn(log, "warn");
    const fn = vi.fn().mockRejectedValueOnce(new Error("a")).mockRejectedValueOnce(new Error("b")).mockResolvedValue(1);

    await expect(withRetry(fn, { retries: 2, delayMs: 2, label: "fetch", log })).resolves.toBe(1);

    expect(warn.mock.calls.map((c) => c[0])).toEqual([
      { attempt: 1, wait: 2, err: "a" },
      { attempt: 2, wait: 4, err: "b" },
    ]);
  });

  it("stops waiting when cancelled", async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockRejectedValue(new Error("flaky"));
    const pending = withRetry(fn, { retries: 3, delayMs: 10_000, signal: controller.signal });
    setTimeout(() => controller.abort(), 5);

    let caught: unknown;
    try {
      await pending;
    } catch (e) {
      caught = e;
    }
    expect(isScoringError(caught, "Cancelled")).toBe(true);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("sleep", () => {
  it("rejects at once for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(10, controller.signal)).rejects.toThrow("operation cancelled");
  });
});

describe("KeyedMutex", () => {
  it("runs callers for one key in arrival order", async () => {
    const mutex = new KeyedMutex<number>();
    const order: string[] = [];

    const first = mutex.runExclusive(1, async () => {
      order.push("first:start");
      await new Promise((r) => setTimeout(r, 10));
      order.push("first:end");
    });
    const second = mutex.runExclusive(1, async () => {
      order.push("second");
    });

    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.size).toBe(0);
  });

  it("does not block other keys", async () => {
    const mutex = new KeyedMutex<number>();
    const order: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((r) => {
      release = r;
    });

    const slow = mutex.runExclusive(1, async () => {
      await gate;
      order.push("key1");
    });
    await mutex.runExclusive(2, async () => {
      order.push("key2");
    });
    release();
    await slow;

    expect(order).toEqual(["key2", "key1"]);
  });

  it("releases the lock when the callback throws", async () => {
    const mutex = new KeyedMutex<string>();
    await expect(mutex.runExclusive("a", async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(mutex.runExclusive("a", async () => "next")).resolves.toBe("next");
  });
});
