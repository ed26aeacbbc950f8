import type { SizePolicy } from "../types.js";
import { distributeInteger } from "./distributeInteger.js";

/**
 * One child along a container's main axis.
 *
 * `size` is the child's contribution when it is not flexible: its fixed size,
 * or its measured size for `content`. It is ignored for `expanding` slots.
 */
export type FlexSlot = Readonly<{
  policy: SizePolicy;
  size: number;
  flex: number;
}>;

export type FlexResolution = Readonly<{
  /** Main-axis size per slot, in slot order. */
  sizes: readonly number[];
  /** Space left for flexible slots after fixed contributions. May be negative. */
  remaining: number;
}>;

/**
 * Resolve main-axis sizes for a row/column.
 *
 * Fixed and content slots keep their contribution; the space they leave is split
 * between expanding slots by flex weight. When nothing remains (or no weight is
 * positive), expanding slots get 0.
 */
export function resolveFlexSizes(containerMain: number, slots: readonly FlexSlot[]): FlexResolution {
  let remaining = containerMain;
  const weights = new Array<number>(slots.length).fill(0);

  for (let i = 0; i < slots.length; i++) {
    const slot = slots[i];
    if (slot === undefined) continue;
    if (slot.policy === "expanding") {
      weights[i] = slot.flex;
    } else {
      remaining -= slot.size;
    }
  }

  const shares = distributeInteger(remaining, weights);
  const sizes = new Array<number>(slots.length).fill(0);
  for (let i = 0; i < slots.length; i++) {
    const slot = slots[i];
    if (slot === undefined) continue;
    sizes[i] = slot.policy === "expanding" ? (shares[i] ?? 0) : slot.size;
  }

  return Object.freeze({ sizes: Object.freeze(sizes), remaining });
}
