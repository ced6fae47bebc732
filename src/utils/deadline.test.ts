import { afterEach, describe, it, expect, vi } from "vitest";
import { DeadlineError, linkSignals, sleep, withDeadline } from "./deadline";

const never = () => new Promise<never>(() => {});

afterEach(() => {
  vi.useRealTimers();
});

describe("withDeadline", () => {
  it("settles with the task", async () => {
    await expect(withDeadline(Promise.resolve(42), { timeout: 100 })).resolves.toBe(42);
  });

  it("passes task rejections through", async () => {
    await expect(
      withDeadline(Promise.reject(new Error("boom")), { timeout: 100 }),
    ).rejects.toThrow("boom");
  });

  it("rejects with a timeout once the deadline passes", async () => {
    vi.useFakeTimers();
    const pending = withDeadline(never(), { timeout: 50 });
    const assertion = expect(pending).rejects.toMatchObject({
      reason: "timeout",
      message: "Timed out after 50ms",
    });
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it("rejects immediately when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      withDeadline(Promise.resolve(1), { signal: controller.signal }),
    ).rejects.toMatchObject({ reason: "aborted", message: "Cancelled before start" });
  });

  it("rejects when the signal aborts mid-flight", async () => {
    const controller = new AbortController();
    const pending = withDeadline(never(), { signal: controller.signal });
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(DeadlineError);
    await expect(pending).rejects.toMatchObject({ reason: "aborted", message: "Cancelled" });
  });

  it("treats a zero timeout as no timeout", async () => {
    vi.useFakeTimers();
    let settled = false;
    const pending = withDeadline(
      new Promise<string>((resolve) => setTimeout(() => resolve("late"), 10_000)),
      { timeout: 0 },
    ).then((value) => {
      settled = true;
      return value;
    });
    await vi.advanceTimersByTimeAsync(9_999);
    expect(settled).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await expect(pending).resolves.toBe("late");
  });
});

describe("sleep", () => {
  it("resolves after the delay", async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(1000).then(() => {
      done = true;
    });
    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it("rejects as soon as the signal aborts", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(4000, controller.signal);
    const assertion = expect(pending).rejects.toMatchObject({ reason: "aborted" });
    await vi.advanceTimersByTimeAsync(10);
    controller.abort();
    await assertion;
    expect(vi.getTimerCount()).toBe(0);
  });

  it("rejects immediately on an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(4000, controller.signal)).rejects.toBeInstanceOf(DeadlineError);
  });
});

describe("linkSignals", () => {
  it("aborts when any source aborts", () => {
    const a = new AbortController();
    const b = new AbortController();
    const linked = linkSignals([a.signal, undefined, b.signal]);
    expect(linked.signal.aborted).toBe(false);
    b.abort("stop");
    expect(linked.signal.aborted).toBe(true);
    expect(linked.signal.reason).toBe("stop");
    linked.dispose();
  });

  it("starts aborted when a source already is", () => {
    const a = new AbortController();
    a.abort();
    expect(linkSignals([a.signal], 1000).signal.aborted).toBe(true);
  });

  it("aborts with a DeadlineError when the timeout elapses", async () => {
    vi.useFakeTimers();
    const linked = linkSignals([], 25);
    await vi.advanceTimersByTimeAsync(25);
    expect(linked.signal.aborted).toBe(true);
    expect(linked.signal.reason).toBeInstanceOf(DeadlineError);
    expect(linked.signal.reason).toMatchObject({ reason: "timeout" });
  });

  it("stops listening after dispose", async () => {
    vi.useFakeTimers();
    const source = new AbortController();
    const linked = linkSignals([source.signal], 25);
    linked.dispose();
    source.abort();
    await vi.advanceTimersByTimeAsync(50);
    expect(linked.signal.aborted).toBe(false);
  });
});
