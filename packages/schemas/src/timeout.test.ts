import { describe, it, expect, vi, afterEach } from "vitest";
import { TimeoutError, withTimeout } from "./timeout.js";

describe("TimeoutError", () => {
  it("builds its message from the label and limit", () => {
    const err = new TimeoutError("mock backend for agent1", 250);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("TimeoutError");
    expect(err.message).toBe("mock backend for agent1 timed out after 250ms");
    expect(err.label).toBe("mock backend for agent1");
    expect(err.timeoutMs).toBe(250);
  });
});

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves when the task settles first", async () => {
    await expect(withTimeout(Promise.resolve(42), 1000)).resolves.toBe(42);
    await expect(withTimeout(async () => "from factory", 1000)).resolves.toBe("from factory");
  });

  it("rejects with TimeoutError once the deadline passes", async () => {
    vi.useFakeTimers();
    const never = new Promise<void>(() => {});
    const raced = withTimeout(never, 50, "Backend call");
    vi.advanceTimersByTime(50);
    await expect(raced).rejects.toThrow(TimeoutError);
    await expect(raced).rejects.toThrow("Backend call timed out after 50ms");
  });

  it("uses the default label", async () => {
    vi.useFakeTimers();
    const raced = withTimeout(new Promise<void>(() => {}), 10);
    vi.advanceTimersByTime(10);
    await expect(raced).rejects.toThrow("Operation timed out after 10ms");
  });

  it("passes rejections through", async () => {
    await expect(withTimeout(Promise.reject(new Error("original error")), 1000)).rejects.toThrow("original error");
  });

  it("turns a synchronous throw from the factory into a rejection", async () => {
    const task = (): Promise<string> => {
      throw new Error("thrown before any promise");
    };
    await expect(withTimeout(task, 1000)).rejects.toThrow("thrown before any promise");
  });

  it("returns the promise itself when the limit is disabled", async () => {
    const p = Promise.resolve("fast");
    expect(withTimeout(p, 0)).toBe(p);
    expect(withTimeout(p, Number.POSITIVE_INFINITY)).toBe(p);
    await expect(p).resolves.toBe("fast");
  });
});
