import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NodeTimerService } from "./timers";

const DAY_MS = 24 * 60 * 60 * 1000;

describe("NodeTimerService", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs the callback after the delay", () => {
    const timers = new NodeTimerService();
    const callback = vi.fn();

    timers.runOnce(callback, 10);
    vi.advanceTimersByTime(9_999);
    expect(callback).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it("chains chunks for delays longer than a day", () => {
    const timers = new NodeTimerService();
    const callback = vi.fn();

    timers.runOnce(callback, (3 * DAY_MS) / 1000);
    vi.advanceTimersByTime(3 * DAY_MS - 1);
    expect(callback).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it("runs right away for negative delays", () => {
    const timers = new NodeTimerService();
    const callback = vi.fn();

    timers.runOnce(callback, -5);
    vi.advanceTimersByTime(0);

    expect(callback).toHaveBeenCalledTimes(1);
  });

  it("does not run a cancelled callback", () => {
    const timers = new NodeTimerService();
    const callback = vi.fn();

    const handle = timers.runOnce(callback, (2 * DAY_MS) / 1000);
    vi.advanceTimersByTime(DAY_MS + 1);
    handle.cancel();
    handle.cancel();
    vi.advanceTimersByTime(3 * DAY_MS);

    expect(callback).not.toHaveBeenCalled();
  });

  it("logs a rejected callback", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const timers = new NodeTimerService();

    timers.runOnce(() => Promise.reject(new Error("boom")), 1);
    await vi.advanceTimersByTimeAsync(1_000);

    await vi.waitFor(() => {
      expect(error).toHaveBeenCalledWith("[Timers] Callback failed: Error: boom");
    });
  });
});
