/**
 * packages/core/src/animation/animatedState.ts — Observable number that animates towards new values.
 *
 * Observers are notified for every intermediate value. Without a scheduler,
 * `set` behaves like `setImmediate`.
 */

import { ObservableBase } from "../state/observable.js";
import { ValueTween } from "./tween.js";
import type { AnimationScheduler } from "./scheduler.js";
import type { TransitionConfig } from "./types.js";

export type AnimatedStateOptions = TransitionConfig &
  Readonly<{
    scheduler?: AnimationScheduler;
    /** Round every intermediate value. */
    integer?: boolean;
  }>;

export class AnimatedState extends ObservableBase {
  private current: number;
  private goal: number;
  private tween: ValueTween | null = null;
  private readonly options: AnimatedStateOptions;

  constructor(initial: number, options: AnimatedStateOptions = {}) {
    super();
    this.options = options;
    this.current = this.normalize(initial);
    this.goal = this.current;
  }

  value(): number {
    return this.current;
  }

  /** Value the current animation is heading to. */
  target(): number {
    return this.goal;
  }

  isAnimating(): boolean {
    return this.tween !== null;
  }

  set(value: number): void {
    const scheduler = this.options.scheduler;
    if (scheduler === undefined) {
      this.setImmediate(value);
      return;
    }

    this.cancelTween();
    this.goal = this.normalize(value);
    if (this.goal === this.current) {
      this.notify();
      return;
    }

    const tween: ValueTween = new ValueTween({
      from: this.current,
      to: this.goal,
      ...(this.options.durationMs !== undefined ? { durationMs: this.options.durationMs } : {}),
      ...(this.options.easing !== undefined ? { easing: this.options.easing } : {}),
      onUpdate: (v) => {
        if (this.tween !== tween) return;
        this.current = this.normalize(v);
        this.notify();
      },
      onComplete: () => {
        if (this.tween === tween) this.tween = null;
      },
    });
    this.tween = tween;
    scheduler.add(tween);
  }

  /** Jump to `value` without animating. */
  setImmediate(value: number): void {
    this.cancelTween();
    this.current = this.normalize(value);
    this.goal = this.current;
    this.notify();
  }

  /** Freeze at the current intermediate value. */
  stop(): void {
    this.cancelTween();
    this.goal = this.current;
  }

  /** Jump to the target of the running animation. */
  finish(): void {
    if (this.tween === null) return;
    this.setImmediate(this.goal);
  }

  private cancelTween(): void {
    if (this.tween === null) return;
    this.tween.cancel();
    this.tween = null;
  }

  private normalize(value: number): number {
    return this.options.integer === true ? Math.round(value) : value;
  }
}
