import { assert, describe, test } from "@lattice-ui/testkit";
import { Tween, type TweenableWidget, ValueTween } from "../tween.js";

function approx(actual: number, expected: number): void {
  assert.ok(Math.abs(actual - expected) < 1e-9, `expected ${String(expected)}, got ${String(actual)}`);
}

class FakeWidget implements TweenableWidget {
  x = 0;
  y = 0;
  w = 0;
  h = 0;
  updates = 0;

  moveX(x: number): this {
    this.x = x;
    return this;
  }

  moveY(y: number): this {
    this.y = y;
    return this;
  }

  setWidth(w: number): this {
    this.w = w;
    return this;
  }

  setHeight(h: number): this {
    this.h = h;
    return this;
  }

  update(): void {
    this.updates++;
  }
}

describe("Tween", () => {
  test("0 → 100 over 1000 ms advances 0.3, 0.6, 0.9, 1.0 and finishes on the last tick", () => {
    const values: number[] = [];
    const tween = new Tween((v) => values.push(v), { from: 0, to: 100, durationMs: 1000 });

    const results: boolean[] = [];
    const progress: number[] = [];
    for (let i = 0; i < 4; i++) {
      results.push(tween.tick(300));
      progress.push(tween.progress);
    }

    assert.deepEqual(results, [false, false, false, true]);
    assert.deepEqual(progress, [0.3, 0.6, 0.9, 1]);
    assert.equal(values.length, 4);
    approx(values[0] ?? Number.NaN, 30);
    approx(values[1] ?? Number.NaN, 60);
    approx(values[2] ?? Number.NaN, 90);
    assert.equal(values[3], 100);
  });

  test("progress is monotonic and capped at 1", () => {
    const tween = new ValueTween({ from: 5, to: -5, durationMs: 100, easing: "easeInOut" });
    let last = -1;
    for (const dt of [10, 0, 25, 5, 80, 40]) {
      tween.tick(dt);
      assert.ok(tween.progress >= last);
      assert.ok(tween.progress <= 1);
      last = tween.progress;
    }
    assert.equal(tween.currentValue, -5);
  });

  test("negative and non-finite dt do not move time backwards", () => {
    const tween = new ValueTween({ from: 0, to: 10, durationMs: 100 });
    tween.tick(50);
    tween.tick(-30);
    tween.tick(Number.NaN);
    assert.equal(tween.elapsedMs, 50);
  });

  test("durations below 1 ms are clamped and finish on the first positive tick", () => {
    const tween = new ValueTween({ from: 0, to: 1, durationMs: 0 });
    assert.equal(tween.durationMs, 1);
    assert.equal(tween.tick(1), true);
    assert.equal(tween.currentValue, 1);
  });

  test("writes widget properties and requests an update", () => {
    const widget = new FakeWidget();
    const tween = new Tween({ widget, property: "width" }, { from: 10, to: 20, durationMs: 100 });
    tween.tick(50);
    assert.equal(widget.w, 15);
    assert.equal(widget.updates, 1);

    new Tween({ widget, property: "y" }, { from: 0, to: 8, durationMs: 10 }).tick(10);
    assert.equal(widget.y, 8);
  });

  test("onUpdate receives every applied value", () => {
    const seen: number[] = [];
    const tween = new ValueTween({
      from: 0,
      to: 4,
      durationMs: 4,
      onUpdate: (v) => seen.push(v),
    });
    tween.tick(1);
    tween.tick(3);
    assert.deepEqual(seen, [1, 4]);
  });

  test("a cancelled tween reports done without applying", () => {
    const values: number[] = [];
    const tween = new Tween((v) => values.push(v), { from: 0, to: 1, durationMs: 100 });
    tween.cancel();
    assert.equal(tween.tick(10), true);
    assert.deepEqual(values, []);
  });

  test("value writes go through the attached host", () => {
    const queued: Array<() => void> = [];
    const values: number[] = [];
    const tween = new Tween((v) => values.push(v), { from: 0, to: 10, durationMs: 10 });
    tween.attachHost({ post: (run) => queued.push(run) });

    tween.tick(5);
    assert.deepEqual(values, []);
    assert.equal(queued.length, 1);
    for (const run of queued) run();
    assert.deepEqual(values, [5]);
  });
});
