/**
 * packages/core/src/runtime/buildOwner.ts — Batched rebuild scheduler.
 *
 * Why: Several state writes inside one event handler should rebuild each
 * affected component once, parents before children. Components notified inside
 * a build scope are queued (deduplicated); the outermost scope exit flushes the
 * queue in depth order.
 */

/** Anything the owner can rebuild. */
export interface Buildable {
  getDepth(): number;
  performRebuild(): void;
}

export class BuildOwner {
  private readonly dirty = new Set<Buildable>();
  private scopeDepth = 0;
  private flushing = false;

  /**
   * Queue a rebuild. Outside a scope (and outside a flush) the queue is flushed
   * immediately.
   */
  scheduleBuildFor(target: Buildable): void {
    this.dirty.add(target);
    if (this.scopeDepth === 0 && !this.flushing) {
      this.flush();
    }
  }

  /** Reentrant; only the outermost exit flushes, including when `fn` throws. */
  buildScope<T>(fn: () => T): T {
    this.scopeDepth++;
    try {
      return fn();
    } finally {
      this.scopeDepth--;
      if (this.scopeDepth === 0) {
        this.flush();
      }
    }
  }

  isInBuildScope(): boolean {
    return this.scopeDepth > 0;
  }

  get pendingCount(): number {
    return this.dirty.size;
  }

  /**
   * Rebuild until the queue stays empty. Rebuilds may schedule further builds;
   * each round is sorted by depth ascending (ties keep scheduling order).
   */
  flush(): void {
    if (this.flushing) return;
    this.flushing = true;
    try {
      while (this.dirty.size > 0) {
        const round = Array.from(this.dirty).sort((a, b) => a.getDepth() - b.getDepth());
        this.dirty.clear();
        for (const target of round) {
          target.performRebuild();
        }
      }
    } finally {
      this.flushing = false;
    }
  }

  /** Drop queued rebuilds without running them. */
  clear(): void {
    this.dirty.clear();
  }
}

/** Run `fn` inside one build scope so every rebuild it triggers is coalesced. */
export function batchUpdates<T>(owner: BuildOwner, fn: () => T): T {
  return owner.buildScope(fn);
}
