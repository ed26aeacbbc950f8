import { assert, describe, test } from "@lattice-ui/testkit";
import { EASING_NAMES, resolveEasing } from "../easing.js";
import {
  clamp01,
  interpolateInt,
  interpolateNumber,
  interpolatePoint,
  interpolateSize,
  normalizeDurationMs,
} from "../interpolate.js";

describe("animation/interpolate", () => {
  test("clamp01 clamps non-finite and out-of-range values", () => {
    assert.equal(clamp01(Number.NaN), 0);
    assert.equal(clamp01(Number.POSITIVE_INFINITY), 0);
    assert.equal(clamp01(Number.NEGATIVE_INFINITY), 0);
    assert.equal(clamp01(-0.5), 0);
    assert.equal(clamp01(0.25), 0.25);
    assert.equal(clamp01(2), 1);
  });

  test("normalizeDurationMs applies fallback and a 1 ms floor", () => {
    assert.equal(normalizeDurationMs(undefined, 120), 120);
    assert.equal(normalizeDurationMs(Number.NaN, 120), 120);
    assert.equal(normalizeDurationMs(Number.POSITIVE_INFINITY, 120), 120);
    assert.equal(normalizeDurationMs(-10, 120), 1);
    assert.equal(normalizeDurationMs(0, 120), 1);
    assert.equal(normalizeDurationMs(48.5, 120), 48.5);
  });

  test("interpolateNumber clamps progress before interpolating", () => {
    assert.equal(interpolateNumber(10, 30, -1), 10);
    assert.equal(interpolateNumber(10, 30, 0.5), 20);
    assert.equal(interpolateNumber(10, 30, 2), 30);
  });

  test("interpolateInt rounds", () => {
    assert.equal(interpolateInt(0, 10, 0.26), 3);
    assert.equal(interpolateInt(0, 10, 0.24), 2);
  });

  test("point and size interpolate per component", () => {
    assert.deepEqual(interpolatePoint({ x: 0, y: 10 }, { x: 10, y: 30 }, 0.5), { x: 5, y: 20 });
    assert.deepEqual(interpolateSize({ w: 4, h: 8 }, { w: 8, h: 0 }, 0.25), { w: 5, h: 6 });
  });
});

describe("animation/easing", () => {
  test("undefined easing resolves to linear", () => {
    const easing = resolveEasing(undefined);
    assert.equal(easing(0), 0);
    assert.equal(easing(0.5), 0.5);
    assert.equal(easing(1), 1);
  });

  test("named easing presets resolve deterministically", () => {
    assert.equal(resolveEasing("easeIn")(0.5), 0.25);
    assert.equal(resolveEasing("easeOut")(0.5), 0.75);
    assert.equal(resolveEasing("easeInOut")(0.25), 0.125);
    assert.equal(resolveEasing("easeInCubic")(0.5), 0.125);
    assert.equal(resolveEasing("easeOutCubic")(0.5), 0.875);
    assert.equal(resolveEasing("easeInOutCubic")(0), 0);
    assert.equal(resolveEasing("easeInOutCubic")(1), 1);
    assert.equal(resolveEasing("bounce")(0), 0);
  });

  test("every preset maps the endpoints and stays inside [0, 1]", () => {
    for (const name of EASING_NAMES) {
      const easing = resolveEasing(name);
      assert.equal(easing(0), 0, name);
      assert.ok(Math.abs(easing(1) - 1) < 1e-9, name);
      for (let i = 0; i <= 20; i++) {
        const v = easing(i / 20);
        assert.ok(v >= 0 && v <= 1, `${name}(${String(i / 20)}) = ${String(v)}`);
      }
    }
  });

  test("preset inputs are clamped", () => {
    assert.equal(resolveEasing("easeIn")(-1), 0);
    assert.equal(resolveEasing("easeIn")(3), 1);
  });

  test("custom easing receives clamped input and produces clamped output", () => {
    const seenInputs: number[] = [];
    const easing = resolveEasing((t) => {
      seenInputs.push(t);
      return t * 2 - 0.25;
    });

    assert.equal(easing(-3), 0);
    assert.equal(easing(0.5), 0.75);
    assert.equal(easing(10), 1);
    assert.deepEqual(seenInputs, [0, 0.5, 1]);
  });
});
