/**
 * Build the multipart fields for the jam endpoints from session and steering state.
 * Single path from in-memory state to wire text.
 */

import type { PendingJamRequest, SessionParameters } from "@/audio/session/types";
import { styleWeightsCSV, stylesCSV } from "@/audio/session/sessionParameters";
import type { SteeringState } from "@/audio/steering/types";
import { centroidWeightsCSV } from "@/audio/steering/steeringState";
import { isPositiveInteger } from "@/audio/params/ranges";
import { LOOP_WEIGHT_DECIMALS, formatFixed, formatWeightsCSV } from "./format";
import {
  BEATS_PER_BAR,
  LOOP_INFLUENCE_THRESHOLD,
  type JamReseedFields,
  type JamReseedOptions,
  type JamStartFields,
  type JamUpdateFields,
  type JamUpdateOptions,
} from "./types";

export function buildJamStartFields(req: PendingJamRequest): JamStartFields {
  return {
    bpm: String(Math.round(req.bpm)),
    bars_per_chunk: String(req.barsPerChunk),
    beats_per_bar: String(BEATS_PER_BAR),
    styles: req.styles.join(","),
    style_weights: formatWeightsCSV(req.styleWeights),
    loop_weight: formatFixed(req.loopWeight, LOOP_WEIGHT_DECIMALS),
    guidance_weight: formatFixed(req.guidanceWeight),
    temperature: formatFixed(req.temperature),
    topk: String(Math.round(req.topK)),
  };
}

/**
 * Fields for a live update of a running session.
 * `mean` is sent only when the backend has a mean vector; `centroid_weights` only with centroids loaded.
 */
export function buildJamUpdateFields(
  params: SessionParameters,
  steering: SteeringState,
  options: JamUpdateOptions
): JamUpdateFields {
  const useCurrentMix =
    options.useCurrentMixAsStyle ?? params.loopWeight > LOOP_INFLUENCE_THRESHOLD;
  const fields: JamUpdateFields = {
    session_id: options.sessionId,
    guidance_weight: formatFixed(params.guidanceWeight),
    temperature: formatFixed(params.temperature),
    topk: String(Math.round(params.topK)),
    styles: stylesCSV(params),
    style_weights: styleWeightsCSV(params),
    use_current_mix_as_style: useCurrentMix ? "true" : "false",
    loop_weight: formatFixed(params.loopWeight, LOOP_WEIGHT_DECIMALS),
  };

  if (steering.meanAvailable) {
    fields.mean = formatFixed(steering.mean);
  }
  if (isPositiveInteger(steering.centroidCount)) {
    fields.centroid_weights = centroidWeightsCSV(steering);
  }
  return fields;
}

export function buildJamReseedFields({
  sessionId,
  anchorBars = 2,
}: JamReseedOptions): JamReseedFields {
  return {
    session_id: sessionId,
    anchor_bars: formatFixed(anchorBars, 2),
  };
}

/** Flatten fields into FormData entries, skipping absent optional fields. */
export function toFormData(
  fields: JamStartFields | JamUpdateFields | JamReseedFields
): FormData {
  const form = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    if (typeof value === "string") form.append(name, value);
  }
  return form;
}
