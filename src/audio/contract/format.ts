/**
 * Fixed-decimal text for wire fields.
 * Number.prototype.toFixed always uses "." so the output is locale-independent.
 */

/** Decimal places used for every weight sent to the backend. */
export const WEIGHT_DECIMALS = 4;

/** Decimal places used for loop_weight. */
export const LOOP_WEIGHT_DECIMALS = 3;

export function formatFixed(value: number, decimals: number = WEIGHT_DECIMALS): string {
  return value.toFixed(decimals);
}

/** Weights as fixed 4-decimal text, comma-joined in order. */
export function formatWeightsCSV(weights: readonly number[]): string {
  return weights.map((w) => formatFixed(w)).join(",");
}
