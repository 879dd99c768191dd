import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { startGameLoop } from "./loop.js";

const now = () => Date.now();

describe("startGameLoop", () => {
  beforeEach(() => {
    vi.useFakeTimers({ now: 0 });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("waits the returned interval between ticks", () => {
    const calls: Array<[number, number]> = [];
    const stop = startGameLoop(
      (nowMs, tick) => {
        calls.push([nowMs, tick]);
        return 100;
      },
      { initialDelayMs: 50, now },
    );

    vi.advanceTimersByTime(49);
    expect(calls).toEqual([]);
    vi.advanceTimersByTime(301);
    expect(calls).toEqual([
      [50, 0],
      [150, 1],
      [250, 2],
      [350, 3],
    ]);
    stop();
  });

  it("lets each tick choose the next interval", () => {
    const times: number[] = [];
    const stop = startGameLoop(
      (nowMs, tick) => {
        times.push(nowMs);
        return tick === 0 ? 500 : 100;
      },
      { now },
    );

    vi.advanceTimersByTime(700);
    expect(times).toEqual([0, 500, 600, 700]);
    stop();
  });

  it("backs off after a failing tick", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const times: number[] = [];
    const stop = startGameLoop(
      (nowMs, tick) => {
        times.push(nowMs);
        if (tick === 0) throw new Error("boom");
        return 100;
      },
      { now },
    );

    vi.advanceTimersByTime(350);
    expect(times).toEqual([0, 250, 350]);
    expect(error).toHaveBeenCalledTimes(1);
    stop();
  });

  it("stops ticking once stopped", () => {
    const onTick = vi.fn(() => 100);
    const stop = startGameLoop(onTick, { now });
    vi.advanceTimersByTime(1);
    expect(onTick).toHaveBeenCalledTimes(1);
    stop();
    vi.advanceTimersByTime(1000);
    expect(onTick).toHaveBeenCalledTimes(1);
  });
});
