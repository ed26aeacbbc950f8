import { assert, describe, test } from "@lattice-ui/testkit";
import { createDevWarnings } from "../../debug/devWarnings.js";
import { createManualClock } from "../../testing/manualClock.js";
import { Animation } from "../animation.js";
import { AnimationScheduler, DEFAULT_FPS } from "../scheduler.js";
import { ValueTween } from "../tween.js";

class ScriptedAnimation extends Animation {
  readonly ticks: number[] = [];
  private readonly script: (tickIndex: number) => boolean;

  constructor(script: (tickIndex: number) => boolean, onComplete?: () => void) {
    super(onComplete ? { onComplete } : {});
    this.script = script;
  }

  tick(dtMs: number): boolean {
    this.ticks.push(dtMs);
    return this.script(this.ticks.length - 1);
  }
}

describe("AnimationScheduler", () => {
  test("defaults to 60 fps", () => {
    const scheduler = new AnimationScheduler();
    assert.equal(scheduler.fps, DEFAULT_FPS);
    assert.equal(scheduler.isRunning(), false);
  });

  test("completed animations are removed and then completed", () => {
    const scheduler = new AnimationScheduler();
    const log: string[] = [];
    const a = new ScriptedAnimation((i) => i === 1, () => {
      log.push(`complete, remaining=${String(scheduler.animationCount)}`);
    });
    scheduler.add(a);
    scheduler.stop();

    scheduler.tick(16);
    assert.equal(scheduler.animationCount, 1);
    scheduler.tick(16);
    assert.deepEqual(log, ["complete, remaining=0"]);
  });

  test("a throwing animation is dropped without completion and the others keep running", () => {
    const warnings: string[] = [];
    const scheduler = new AnimationScheduler({
      warnings: createDevWarnings({ devMode: true, warn: (m) => warnings.push(m) }),
    });
    let completed = 0;
    const bad = new ScriptedAnimation(
      () => {
        throw new Error("boom");
      },
      () => {
        completed++;
      },
    );
    const good = new ScriptedAnimation(() => false);
    scheduler.add(bad);
    scheduler.add(good);
    scheduler.stop();

    scheduler.tick(10);
    scheduler.tick(10);
    assert.equal(completed, 0);
    assert.equal(scheduler.animationCount, 1);
    assert.deepEqual(good.ticks, [10, 10]);
    assert.deepEqual(bad.ticks, [10]);
    assert.deepEqual(warnings, ["[lattice][animation] tick failed, animation removed: Error: boom"]);
  });

  test("cancelled animations are removed without ticking or completion", () => {
    const scheduler = new AnimationScheduler();
    let completed = 0;
    const a = new ScriptedAnimation(
      () => true,
      () => {
        completed++;
      },
    );
    scheduler.add(a);
    scheduler.stop();
    a.cancel();
    scheduler.tick(10);
    assert.deepEqual(a.ticks, []);
    assert.equal(completed, 0);
    assert.equal(scheduler.animationCount, 0);
  });

  test("add is idempotent; remove reports membership", () => {
    const scheduler = new AnimationScheduler();
    const a = new ScriptedAnimation(() => false);
    scheduler.add(a);
    scheduler.add(a);
    scheduler.stop();
    assert.equal(scheduler.animationCount, 1);
    assert.equal(scheduler.remove(a), true);
    assert.equal(scheduler.remove(a), false);
  });

  test("clear cancels every animation", () => {
    const scheduler = new AnimationScheduler();
    const a = new ScriptedAnimation(() => false);
    const b = new ScriptedAnimation(() => false);
    scheduler.add(a);
    scheduler.add(b);
    scheduler.stop();
    scheduler.clear();
    assert.equal(scheduler.animationCount, 0);
    assert.equal(a.cancelled, true);
    assert.equal(b.cancelled, true);
  });

  test("animations added during a tick start on the next tick", () => {
    const scheduler = new AnimationScheduler();
    const late = new ScriptedAnimation(() => false);
    const spawner = new ScriptedAnimation((i) => {
      if (i === 0) scheduler.add(late);
      return false;
    });
    scheduler.add(spawner);
    scheduler.stop();
    scheduler.tick(5);
    assert.deepEqual(late.ticks, []);
    scheduler.tick(5);
    assert.deepEqual(late.ticks, [5]);
  });

  test("the loop starts lazily, ticks at the frame interval and parks when empty", () => {
    const clock = createManualClock();
    const scheduler = new AnimationScheduler({ fps: 10, clock });
    assert.equal(scheduler.frameIntervalMs, 100);

    const values: number[] = [];
    const tween = new ValueTween({ from: 0, to: 400, durationMs: 400, onUpdate: (v) => values.push(v) });
    assert.equal(clock.pendingTimers(), 0);
    scheduler.add(tween);
    assert.equal(scheduler.isRunning(), true);
    assert.equal(clock.pendingTimers(), 1);

    clock.advance(100);
    clock.advance(100);
    assert.deepEqual(values, [100, 200]);
    clock.advance(200);
    assert.deepEqual(values, [100, 200, 300, 400]);
    assert.equal(scheduler.animationCount, 0);
    assert.equal(scheduler.isRunning(), false);
    assert.equal(clock.pendingTimers(), 0);
  });

  test("stop cancels the pending frame", () => {
    const clock = createManualClock();
    const scheduler = new AnimationScheduler({ clock });
    const a = new ScriptedAnimation(() => false);
    scheduler.add(a);
    scheduler.stop();
    assert.equal(clock.pendingTimers(), 0);
    clock.advance(1000);
    assert.deepEqual(a.ticks, []);
  });

  test("value writes are posted through the host", () => {
    const queued: Array<() => void> = [];
    const scheduler = new AnimationScheduler({ host: { post: (run) => queued.push(run) } });
    const values: number[] = [];
    let completed = false;
    const tween = new ValueTween({
      from: 0,
      to: 1,
      durationMs: 10,
      onUpdate: (v) => values.push(v),
      onComplete: () => {
        completed = true;
      },
    });
    scheduler.add(tween);
    scheduler.stop();
    scheduler.tick(10);
    assert.deepEqual(values, []);
    assert.equal(completed, false);
    assert.equal(queued.length, 2);
    for (const run of queued) run();
    assert.deepEqual(values, [1]);
    assert.equal(completed, true);
  });

  test("a posted write that throws drops the animation and skips its queued completion", () => {
    const queued: Array<() => void> = [];
    const messages: string[] = [];
    const scheduler = new AnimationScheduler({
      host: { post: (run) => queued.push(run) },
      warnings: createDevWarnings({ devMode: true, warn: (m) => messages.push(m) }),
    });
    let completed = false;
    const tween = new ValueTween({
      from: 0,
      to: 1,
      durationMs: 10,
      onUpdate: () => {
        throw new Error("bad write");
      },
      onComplete: () => {
        completed = true;
      },
    });
    scheduler.add(tween);
    scheduler.stop();
    scheduler.tick(4);
    scheduler.tick(6);
    assert.equal(queued.length, 3);

    for (const run of queued) run();
    assert.equal(tween.cancelled, true);
    assert.equal(completed, false);
    assert.deepEqual(messages, [
      "[lattice][animation] update failed, animation removed: Error: bad write",
    ]);
  });
});
