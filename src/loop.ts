import { performance } from "node:perf_hooks";
import { LOOP } from "./config.js";

export type StopLoop = () => void;

export type LoopOptions = {
  initialDelayMs?: number;
  now?: () => number;
};

/**
 * Cooperative tick loop with a per-tick interval: `onTick` returns how long
 * to wait before the next call. The next target is measured from the
 * previous target, not from when the tick finished.
 */
export function startGameLoop(onTick: (nowMs: number, tick: number) => number, options: LoopOptions = {}): StopLoop {
  const now = options.now ?? (() => performance.now());
  let running = true;
  let tick = 0;
  let timer: NodeJS.Timeout | null = null;
  let nextTarget = now() + (options.initialDelayMs ?? 0);

  function loop() {
    timer = null;
    if (!running) return;
    const current = now();

    let delay: number;
    try {
      delay = onTick(current, tick++);
    } catch (err) {
      // keep ticking; a throwing tick backs off instead of spinning
      console.error("[LOOP] Tick error:", err);
      delay = LOOP.errorBackoffMs;
    }
    if (!running) return;

    nextTarget += delay;
    // fell far behind: skip forward instead of replaying missed ticks
    if (current - nextTarget > delay * 5) {
      nextTarget = current + delay;
    }
    timer = setTimeout(loop, Math.max(0, nextTarget - now()));
  }

  timer = setTimeout(loop, Math.max(0, nextTarget - now()));

  return () => {
    running = false;
    if (timer) clearTimeout(timer);
    timer = null;
  };
}
