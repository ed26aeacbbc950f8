/**
 * Distribute an integer total across weighted slots deterministically.
 *
 * - Uses floor division for base shares.
 * - Hands leftover cells out one at a time to positive-weight slots in slot
 *   order, cycling until none remain.
 * - Non-finite or non-positive weights receive 0.
 *
 * The result always sums to `max(0, floor(total))` when any weight is positive.
 */
export function distributeInteger(total: number, weights: readonly number[]): number[] {
  const slotCount = weights.length;
  const out = new Array<number>(slotCount).fill(0);
  if (slotCount === 0) return out;

  const target = Number.isFinite(total) ? Math.max(0, Math.floor(total)) : 0;
  if (target <= 0) return out;

  const normalizedWeights = new Array<number>(slotCount).fill(0);
  let totalWeight = 0;
  for (let i = 0; i < slotCount; i++) {
    const raw = weights[i];
    const w = typeof raw === "number" && Number.isFinite(raw) && raw > 0 ? raw : 0;
    normalizedWeights[i] = w;
    totalWeight += w;
  }
  if (totalWeight <= 0) return out;

  let baseSum = 0;
  for (let i = 0; i < slotCount; i++) {
    const w = normalizedWeights[i] ?? 0;
    if (w <= 0) continue;
    const base = Math.floor((target * w) / totalWeight);
    out[i] = base;
    baseSum += base;
  }

  let remainder = target - baseSum;
  while (remainder > 0) {
    for (let i = 0; i < slotCount && remainder > 0; i++) {
      if ((normalizedWeights[i] ?? 0) <= 0) continue;
      out[i] = (out[i] ?? 0) + 1;
      remainder--;
    }
  }

  return out;
}
