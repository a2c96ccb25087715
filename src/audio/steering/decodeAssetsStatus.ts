/**
 * Decode a backend assets-status payload into AssetsStatus.
 * Permissive: missing, null or mistyped fields decode to "unavailable". Never throws.
 */

import type { AssetsStatus, AssetsStatusPayload } from "./types";

/** Any object, read field by field against the payload's key names. */
type RawAssetsStatus = { [K in keyof AssetsStatusPayload]?: unknown } & { assets_repo?: unknown };

export const UNAVAILABLE_ASSETS_STATUS: AssetsStatus = {
  repoId: null,
  meanLoaded: false,
  centroidsLoaded: false,
  centroidCount: null,
  embeddingDim: null,
};

function isRecord(value: unknown): value is RawAssetsStatus {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function readCount(value: unknown): number | null {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : null;
}

/**
 * Accepts the status payload, or the full model-config response which carries
 * the repo id under `assets_repo` instead of `repo_id`.
 */
export function decodeAssetsStatus(payload: unknown): AssetsStatus {
  if (!isRecord(payload)) return { ...UNAVAILABLE_ASSETS_STATUS };

  return {
    repoId: readString(payload.repo_id) ?? readString(payload.assets_repo),
    meanLoaded: payload.mean_loaded === true,
    centroidsLoaded: payload.centroids_loaded === true,
    centroidCount: readCount(payload.centroid_count),
    embeddingDim: readCount(payload.embedding_dim),
  };
}

