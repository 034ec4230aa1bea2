import { afterEach, describe, expect, it, vi } from "vitest";
import { AsyncQueue, TimeoutError, delay, withTimeout } from "./async.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("delay", () => {
  it("resolves early when the signal aborts", async () => {
    const abort = new AbortController();
    const started = Date.now();
    const wait = delay(10_000, abort.signal);
    abort.abort();
    await wait;
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it("resolves immediately for an already aborted signal", async () => {
    const abort = new AbortController();
    abort.abort();
    await expect(delay(10_000, abort.signal)).resolves.toBeUndefined();
  });
});

describe("withTimeout", () => {
  it("passes the value through when the promise wins", async () => {
    await expect(withTimeout(Promise.resolve(7), 1000)).resolves.toBe(7);
  });

  it("rejects with TimeoutError when the timer wins", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => {}), 250);
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await vi.advanceTimersByTimeAsync(250);
    await assertion;
  });
});

describe("AsyncQueue", () => {
  it("hands items out in FIFO order", async () => {
    const q = new AsyncQueue<number>();
    q.push(1);
    q.push(2);
    expect(q.size).toBe(2);
    expect(await q.pop(10)).toBe(1);
    expect(await q.pop(10)).toBe(2);
    expect(q.size).toBe(0);
  });

  it("wakes a waiting consumer on push", async () => {
    const q = new AsyncQueue<string>();
    const next = q.pop(10_000);
    q.push("a");
    expect(await next).toBe("a");
    expect(q.size).toBe(0);
  });

  it("returns undefined when nothing arrives in time", async () => {
    vi.useFakeTimers();
    const q = new AsyncQueue<string>();
    const next = q.pop(100);
    await vi.advanceTimersByTimeAsync(100);
    expect(await next).toBeUndefined();
    q.push("late");
    expect(q.size).toBe(1);
  });

  it("drain empties the queue and releases waiters", async () => {
    const q = new AsyncQueue<number>();
    q.push(1);
    q.push(2);
    expect(q.drain()).toEqual([1, 2]);
    const waiting = q.pop(10_000);
    expect(q.drain()).toEqual([]);
    expect(await waiting).toBeUndefined();
  });
});
