/**
 * Steering state: centroid weight vector, mean scalar and the compact
 * "one centroid + intensity" projection used by small UIs.
 */

/** Raw status payload as sent by the backend. Shape fixed for compatibility. */
export interface AssetsStatusPayload {
  repo_id: string | null;
  mean_loaded: boolean;
  centroids_loaded: boolean;
  centroid_count: number | null;
  embedding_dim: number | null;
}

/** Decoded assets status. Absent fields are already "unavailable". */
export interface AssetsStatus {
  repoId: string | null;
  meanLoaded: boolean;
  centroidsLoaded: boolean;
  centroidCount: number | null;
  embeddingDim: number | null;
}

export interface SteeringState {
  /** Global steering scalar, [0, 2]. Present even with no centroids loaded. */
  mean: number;
  /** Index i is centroid i as reported by the backend. */
  centroidWeights: readonly number[];
  /** null until the first status arrives; 0 and null both mean "no centroids". */
  centroidCount: number | null;
  assetsRepo: string | null;
  meanAvailable: boolean;
  compactCentroidIndex: number;
  /** Mirrors centroidWeights[compactCentroidIndex]; synced only by select/apply. */
  compactCentroidIntensity: number;
  showAdvancedCentroids: boolean;
}
