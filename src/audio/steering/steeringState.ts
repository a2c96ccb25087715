/**
 * Pure operations on SteeringState.
 * Every operation returns a new state, or the same reference when nothing changed.
 * Invariants held after each call:
 * - centroidWeights.length === centroidCount when the count is a positive integer, else 0
 * - 0 <= compactCentroidIndex <= max(centroidCount - 1, 0)
 * - a count change zero-fills the vector; an unchanged count keeps existing values
 */

import { clampIndex, isPositiveInteger } from "@/audio/params/ranges";
import { MEAN_SPEC } from "@/audio/params/defaults";
import { formatWeightsCSV } from "@/audio/contract/format";
import type { AssetsStatus, SteeringState } from "./types";

const DEV =
  typeof process !== "undefined" &&
  process.env?.NODE_ENV !== "production";

export function createSteeringState(): SteeringState {
  return {
    mean: MEAN_SPEC.default,
    centroidWeights: [],
    centroidCount: null,
    assetsRepo: null,
    meanAvailable: false,
    compactCentroidIndex: 0,
    compactCentroidIntensity: 0,
    showAdvancedCentroids: false,
  };
}

function zeros(count: number): number[] {
  return new Array<number>(count).fill(0);
}

function warnIfDiscarding(weights: readonly number[], count: number): void {
  if (DEV && weights.some((w) => w !== 0)) {
    console.warn(
      `[Steering] Centroid count changed (${weights.length} -> ${count}); discarding all centroid weights.`
    );
  }
}

/** Same vector when its length already matches, otherwise `count` zeros. */
function reconcileWeights(weights: readonly number[], count: number): readonly number[] {
  if (weights.length === count) return weights;
  warnIfDiscarding(weights, count);
  return zeros(count);
}

function sameState(a: SteeringState, b: SteeringState): boolean {
  return (
    Object.is(a.mean, b.mean) &&
    a.centroidWeights === b.centroidWeights &&
    Object.is(a.centroidCount, b.centroidCount) &&
    a.assetsRepo === b.assetsRepo &&
    a.meanAvailable === b.meanAvailable &&
    Object.is(a.compactCentroidIndex, b.compactCentroidIndex) &&
    Object.is(a.compactCentroidIntensity, b.compactCentroidIntensity) &&
    a.showAdvancedCentroids === b.showAdvancedCentroids
  );
}

function withChanges(state: SteeringState, changes: Partial<SteeringState>): SteeringState {
  const next = { ...state, ...changes };
  return sameState(state, next) ? state : next;
}

/**
 * Set the centroid count.
 * k <= 0 is a full reset (weights, index and intensity). For k > 0 the vector is
 * zero-filled on a length change and the compact index is clamped.
 * The compact intensity is not refreshed; call selectCompactCentroid for that.
 * Fractional counts are truncated; non-finite counts are treated as 0.
 */
export function setCentroidCount(state: SteeringState, k: number): SteeringState {
  const count = Number.isFinite(k) ? Math.trunc(k) : 0;
  if (count <= 0) {
    if (state.centroidWeights.length > 0) warnIfDiscarding(state.centroidWeights, 0);
    return withChanges(state, {
      centroidCount: count,
      centroidWeights: state.centroidWeights.length === 0 ? state.centroidWeights : [],
      compactCentroidIndex: 0,
      compactCentroidIntensity: 0,
    });
  }
  return withChanges(state, {
    centroidCount: count,
    centroidWeights: reconcileWeights(state.centroidWeights, count),
    compactCentroidIndex: clampIndex(state.compactCentroidIndex, count),
  });
}

/**
 * Apply a backend status snapshot. This is how backend reports change centroidCount.
 */
export function applyAssetsStatus(state: SteeringState, status: AssetsStatus): SteeringState {
  const next = withChanges(state, {
    assetsRepo: status.repoId,
    meanAvailable: status.meanLoaded,
  });
  const count =
    status.centroidsLoaded && isPositiveInteger(status.centroidCount) ? status.centroidCount : 0;
  return setCentroidCount(next, count);
}

/**
 * Push the compact intensity into centroidWeights[compactCentroidIndex].
 * Length is reconciled before the write; no other index is touched.
 */
export function applyCompactMixer(state: SteeringState): SteeringState {
  const k = state.centroidCount;
  if (!isPositiveInteger(k)) return state;

  const index = state.compactCentroidIndex;
  const weights = reconcileWeights(state.centroidWeights, k);
  if (weights[index] === state.compactCentroidIntensity) {
    return withChanges(state, { centroidWeights: weights });
  }
  const nextWeights = weights.slice();
  nextWeights[index] = state.compactCentroidIntensity;
  return { ...state, centroidWeights: nextWeights };
}

/**
 * Select the compact centroid (clamped) and pull its weight into the compact intensity.
 * A pending length mismatch is reconciled first, which zeroes the vector.
 */
export function selectCompactCentroid(state: SteeringState, idx: number): SteeringState {
  const k = state.centroidCount;
  if (!isPositiveInteger(k)) return state;

  const index = clampIndex(idx, k);
  const weights = reconcileWeights(state.centroidWeights, k);
  return withChanges(state, {
    compactCentroidIndex: index,
    centroidWeights: weights,
    compactCentroidIntensity: weights[index],
  });
}

export function setCompactIntensity(state: SteeringState, value: number): SteeringState {
  return withChanges(state, { compactCentroidIntensity: value });
}

/** Compact slider gesture: set the intensity, then push it into the vector. */
export function adjustCompactIntensity(state: SteeringState, value: number): SteeringState {
  return applyCompactMixer(setCompactIntensity(state, value));
}

/**
 * Advanced per-centroid edit. Mirrors into the compact intensity when `idx`
 * is the selected centroid. Out-of-range indices are ignored.
 */
export function setCentroidWeight(state: SteeringState, idx: number, value: number): SteeringState {
  const k = state.centroidCount;
  if (!isPositiveInteger(k) || !Number.isInteger(idx) || idx < 0 || idx >= k) return state;

  const weights = reconcileWeights(state.centroidWeights, k).slice();
  weights[idx] = value;
  return {
    ...state,
    centroidWeights: weights,
    compactCentroidIntensity:
      idx === state.compactCentroidIndex ? value : state.compactCentroidIntensity,
  };
}

export function setMean(state: SteeringState, value: number): SteeringState {
  return withChanges(state, { mean: value });
}

export function setShowAdvancedCentroids(state: SteeringState, show: boolean): SteeringState {
  return withChanges(state, { showAdvancedCentroids: show });
}

/** True when either a centroid set or a mean vector is usable. */
export function isAssetsAvailable(state: SteeringState): boolean {
  return (state.centroidCount ?? 0) > 0 || state.meanAvailable;
}

/** Weights as fixed 4-decimal text, comma-joined. Empty vector gives "". */
export function centroidWeightsCSV(state: SteeringState): string {
  return formatWeightsCSV(state.centroidWeights);
}
