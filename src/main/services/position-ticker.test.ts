import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { PositionTicker } from "./position-ticker.js";

describe("PositionTicker", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("ticks fast while playing and slowly while paused", () => {
    const onTick = vi.fn();
    const ticker = new PositionTicker({ intervals: { playingMs: 100, pausedMs: 500 }, onTick });

    ticker.update("playing");
    vi.advanceTimersByTime(1000);
    expect(onTick).toHaveBeenCalledTimes(10);

    onTick.mockClear();
    ticker.update("paused");
    vi.advanceTimersByTime(1000);
    expect(onTick).toHaveBeenCalledTimes(2);
  });

  it("keeps a single timer when the cadence changes", () => {
    const ticker = new PositionTicker({ intervals: { playingMs: 100, pausedMs: 500 }, onTick: vi.fn() });

    ticker.update("playing");
    ticker.update("paused");
    ticker.update("playing");

    expect(vi.getTimerCount()).toBe(1);
    expect(ticker.mode).toBe("playing");
  });

  it("does not restart the timer for the same mode", () => {
    const onTick = vi.fn();
    const ticker = new PositionTicker({ intervals: { playingMs: 100, pausedMs: 500 }, onTick });

    ticker.update("paused");
    vi.advanceTimersByTime(400);
    ticker.update("paused");
    vi.advanceTimersByTime(100);

    expect(onTick).toHaveBeenCalledTimes(1);
  });

  it("arms nothing while idle", () => {
    const onTick = vi.fn();
    const ticker = new PositionTicker({ intervals: { playingMs: 100, pausedMs: 500 }, onTick });

    ticker.update("playing");
    ticker.stop();
    vi.advanceTimersByTime(1000);

    expect(onTick).not.toHaveBeenCalled();
    expect(ticker.active).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });
});
