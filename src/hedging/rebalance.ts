import type { RebalanceAction, StrategyConfig } from "./types.js";

type Thresholds = Pick<StrategyConfig, "ratioThreshold" | "deltaThreshold">;

/**
 * Threshold rule: act only when ratio > n and |delta| > m (both strict).
 *
 * A positive delta means the LP holds more base than the short covers, so the
 * short is increased. A negative delta reduces the short with a reduce-only order.
 * Negative ratios never pass `ratio > n` for a positive n; this is kept as is.
 */
export function decide(ratio: number, delta: number, cfg: Thresholds): RebalanceAction {
  const n = cfg.ratioThreshold;
  const m = cfg.deltaThreshold;

  if (!(ratio > n) || !(Math.abs(delta) > m)) {
    return { kind: "none" };
  }
  if (delta === 0) {
    return { kind: "none" };
  }

  const quantity = formatQuantity(roundToStep(Math.abs(delta), m), m);
  return delta > 0 ? { kind: "increase", quantity } : { kind: "decrease", quantity };
}

/** Nearest multiple of `step`. A non-positive step leaves the value untouched. */
export function roundToStep(value: number, step: number): number {
  if (step <= 0) return value;
  return Math.round(value / step) * step;
}

/** Decimal places implied by the step: 1 → 0, 0.1 → 1, 0.01 → 2. */
export function quantityPrecision(step: number): number {
  if (step >= 1) return 0;
  return Math.max(0, Math.ceil(Math.log10(1 / step)));
}

export function formatQuantity(quantity: number, step: number): string {
  // no precision without a step; HedgeStrategy rejects such configs up front
  if (step <= 0) return String(quantity);
  return quantity.toFixed(quantityPrecision(step));
}
