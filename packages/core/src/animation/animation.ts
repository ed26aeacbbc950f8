/**
 * packages/core/src/animation/animation.ts — Base class for scheduler-driven animations.
 */

import type { AnimationCallbacks, AnimationHost } from "./types.js";

export abstract class Animation {
  private isCancelled = false;
  private host: AnimationHost | null = null;
  protected readonly onCompleteCallback: (() => void) | undefined;
  protected readonly onUpdateCallback: ((value: number) => void) | undefined;

  constructor(callbacks: AnimationCallbacks = {}) {
    this.onCompleteCallback = callbacks.onComplete;
    this.onUpdateCallback = callbacks.onUpdate;
  }

  /**
   * Advance by `dtMs` milliseconds. Returns true when the animation is finished
   * and should be removed.
   */
  abstract tick(dtMs: number): boolean;

  get cancelled(): boolean {
    return this.isCancelled;
  }

  /** Cooperative: the scheduler drops the animation on its next tick, without onComplete. */
  cancel(): void {
    this.isCancelled = true;
  }

  /** Route side effects through `host` (set by the scheduler on add). */
  attachHost(host: AnimationHost | null): void {
    this.host = host;
  }

  /** Called by the scheduler after `tick` reported completion. */
  complete(): void {
    const onComplete = this.onCompleteCallback;
    if (onComplete === undefined) return;
    this.post(onComplete);
  }

  /**
   * Run `fn` on the host's update queue, or immediately without a host.
   *
   * Queued work is skipped once the animation is cancelled. A queued `fn` that
   * throws cancels the animation and is reported through `host.fail`.
   */
  protected post(fn: () => void): void {
    const host = this.host;
    if (host === null) {
      fn();
      return;
    }
    host.post(() => {
      if (this.isCancelled) return;
      try {
        fn();
      } catch (error) {
        this.cancel();
        if (host.fail === undefined) throw error;
        host.fail(error);
      }
    });
  }
}
