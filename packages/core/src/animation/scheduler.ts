/**
 * packages/core/src/animation/scheduler.ts — Fixed-rate animation loop.
 *
 * Why: Every running animation advances on one shared tick. The loop starts on
 * the first `add`, parks itself while the list is empty, and sleeps for the
 * remainder of each frame interval. A throwing animation is dropped without
 * stopping the loop.
 *
 * Value writes never happen here: animations post them through the host, which
 * the App points at its frame's update queue. A write that throws there drops
 * its animation the same way a throwing tick does.
 */

import { type DevWarnings, defaultDevWarnings } from "../debug/devWarnings.js";
import { describeThrown } from "../errors.js";
import type { Animation } from "./animation.js";
import type { AnimationHost } from "./types.js";

export const DEFAULT_FPS = 60;
export const LOW_REFRESH_FPS = 10;

/** Cancels a pending timer. */
export type CancelTimer = () => void;

export type SchedulerClock = Readonly<{
  now: () => number;
  setTimer: (callback: () => void, delayMs: number) => CancelTimer;
}>;

export type AnimationSchedulerOptions = Readonly<{
  fps?: number;
  host?: AnimationHost;
  warnings?: DevWarnings;
  clock?: SchedulerClock;
}>;

export const systemClock: SchedulerClock = Object.freeze({
  now: () => performance.now(),
  setTimer: (callback: () => void, delayMs: number): CancelTimer => {
    const handle = setTimeout(callback, delayMs);
    return () => clearTimeout(handle);
  },
});

function sanitizeFps(fps: number | undefined): number {
  if (fps === undefined || !Number.isFinite(fps) || fps <= 0) return DEFAULT_FPS;
  return Math.max(1, Math.floor(fps));
}

export class AnimationScheduler {
  readonly fps: number;
  readonly frameIntervalMs: number;
  private readonly animations: Animation[] = [];
  private readonly host: AnimationHost | null;
  private readonly warnings: DevWarnings;
  private readonly clock: SchedulerClock;
  private running = false;
  private cancelTimer: CancelTimer | null = null;
  private lastTickAt = 0;

  constructor(opts: AnimationSchedulerOptions = {}) {
    this.fps = sanitizeFps(opts.fps);
    this.frameIntervalMs = 1000 / this.fps;
    this.host = opts.host ?? null;
    this.warnings = opts.warnings ?? defaultDevWarnings;
    this.clock = opts.clock ?? systemClock;
  }

  /** Idempotent. Starts the loop if it is not running. */
  add(animation: Animation): void {
    if (!this.animations.includes(animation)) {
      animation.attachHost(this.hostFor(animation));
      this.animations.push(animation);
    }
    if (!this.running) this.start();
  }

  /** Returns false when the animation was not registered. */
  remove(animation: Animation): boolean {
    const index = this.animations.indexOf(animation);
    if (index < 0) return false;
    this.animations.splice(index, 1);
    return true;
  }

  /** Cancel and drop every registered animation. */
  clear(): void {
    for (const animation of this.animations) {
      animation.cancel();
    }
    this.animations.length = 0;
  }

  get animationCount(): number {
    return this.animations.length;
  }

  isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.lastTickAt = this.clock.now();
    this.schedule(this.frameIntervalMs);
  }

  stop(): void {
    this.running = false;
    if (this.cancelTimer !== null) {
      this.cancelTimer();
      this.cancelTimer = null;
    }
  }

  /**
   * Advance every registered animation by `dtMs`.
   *
   * Iterates a snapshot; cancelled animations are dropped silently, finished ones
   * are dropped and then completed, throwing ones are dropped without completion.
   */
  tick(dtMs: number): void {
    const snapshot = this.animations.slice();
    const finished: Animation[] = [];
    const dropped: Animation[] = [];

    for (const animation of snapshot) {
      if (animation.cancelled) {
        dropped.push(animation);
        continue;
      }
      try {
        if (animation.tick(dtMs)) finished.push(animation);
      } catch (error) {
        dropped.push(animation);
        this.warnings.warn("animation", `tick failed, animation removed: ${describeThrown(error)}`);
      }
    }

    for (const animation of dropped) this.remove(animation);
    for (const animation of finished) {
      this.remove(animation);
      if (!animation.cancelled) animation.complete();
    }
  }

  private hostFor(animation: Animation): AnimationHost | null {
    const host = this.host;
    if (host === null) return null;
    return {
      post: (run) => host.post(run),
      fail: (error) => {
        this.remove(animation);
        this.warnings.warn("animation", `update failed, animation removed: ${describeThrown(error)}`);
      },
    };
  }

  private schedule(delayMs: number): void {
    this.cancelTimer = this.clock.setTimer(this.loop, Math.max(0, delayMs));
  }

  private readonly loop = (): void => {
    this.cancelTimer = null;
    if (!this.running) return;
    const startedAt = this.clock.now();
    const dtMs = startedAt - this.lastTickAt;
    this.lastTickAt = startedAt;
    this.tick(dtMs);

    if (this.animations.length === 0) {
      // Park until the next add().
      this.running = false;
      return;
    }
    const spentMs = this.clock.now() - startedAt;
    this.schedule(this.frameIntervalMs - spentMs);
  };
}
