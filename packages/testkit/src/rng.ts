/**
 * packages/testkit/src/rng.ts — Seeded PRNG for property-style tests.
 *
 * Why: Randomized layout/scheduling checks must replay exactly from a seed so a
 * failing case can be reported and reproduced.
 */

export type Rng = Readonly<{
  seed: number;
  /** Next unsigned 32-bit integer. */
  u32: () => number;
  /** Next float in [0, 1). */
  float: () => number;
  /** Next integer in [min, max] (inclusive). */
  int: (min: number, max: number) => number;
  pick: <T>(values: readonly T[]) => T;
}>;

/** Mulberry32. */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;

  const u32 = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  };

  const float = (): number => u32() / 4294967296;

  const int = (min: number, max: number): number => {
    const lo = Math.ceil(Math.min(min, max));
    const hi = Math.floor(Math.max(min, max));
    return lo + (u32() % (hi - lo + 1));
  };

  const pick = <T>(values: readonly T[]): T => {
    if (values.length === 0) throw new Error("createRng.pick: empty input");
    const value = values[u32() % values.length];
    if (value === undefined) throw new Error("createRng.pick: index out of range");
    return value;
  };

  return Object.freeze({ seed: seed >>> 0, u32, float, int, pick });
}
