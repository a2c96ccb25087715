/**
 * Pure operations on SessionParameters, and conversion to/from PendingJamRequest.
 * Setters do not clamp: the documented ranges are the caller's contract.
 */

import {
  DEFAULT_BARS,
  GUIDANCE_WEIGHT_SPEC,
  LOOP_WEIGHT_SPEC,
  MAX_STYLES,
  STYLE_WEIGHT_SPEC,
  TEMPERATURE_SPEC,
  TOP_K_SPEC,
} from "@/audio/params/defaults";
import { formatWeightsCSV } from "@/audio/contract/format";
import type { PendingJamRequest, SessionParameters, StyleEntry, StylePatch } from "./types";

const DEV =
  typeof process !== "undefined" &&
  process.env?.NODE_ENV !== "production";

let styleIdCounter = 0;

function nextStyleId(): string {
  styleIdCounter += 1;
  return `style-${styleIdCounter}`;
}

export function createStyleEntry(text = "", weight = STYLE_WEIGHT_SPEC.default): StyleEntry {
  return { id: nextStyleId(), text, weight };
}

/** Fresh session: one empty style at weight 1.0 plus default scalars. */
export function createSessionParameters(): SessionParameters {
  return {
    styles: [createStyleEntry()],
    loopWeight: LOOP_WEIGHT_SPEC.default,
    bars: DEFAULT_BARS,
    temperature: TEMPERATURE_SPEC.default,
    topK: TOP_K_SPEC.default,
    guidanceWeight: GUIDANCE_WEIGHT_SPEC.default,
  };
}

/**
 * Rebuild session parameters from a prior request.
 * styles[i] pairs with styleWeights[i] up to the shorter sequence; scalars are copied verbatim.
 */
export function fromPendingRequest(req: PendingJamRequest): SessionParameters {
  const count = Math.min(req.styles.length, req.styleWeights.length);
  if (DEV && req.styles.length !== req.styleWeights.length) {
    console.warn(
      `[Session Params] styles (${req.styles.length}) and styleWeights (${req.styleWeights.length}) differ in length; keeping the first ${count}.`
    );
  }

  const styles: StyleEntry[] = [];
  for (let i = 0; i < count; i++) {
    styles.push(createStyleEntry(req.styles[i], req.styleWeights[i]));
  }

  return {
    styles,
    loopWeight: req.loopWeight,
    bars: req.barsPerChunk,
    temperature: req.temperature,
    topK: req.topK,
    guidanceWeight: req.guidanceWeight,
  };
}

export function toPendingRequest(params: SessionParameters, bpm: number): PendingJamRequest {
  return {
    bpm,
    barsPerChunk: params.bars,
    styles: params.styles.map((s) => s.text),
    styleWeights: params.styles.map((s) => s.weight),
    loopWeight: params.loopWeight,
    temperature: params.temperature,
    topK: params.topK,
    guidanceWeight: params.guidanceWeight,
  };
}

/** Style texts comma-joined, verbatim. Embedded commas are not escaped. */
export function stylesCSV(params: SessionParameters): string {
  return params.styles.map((s) => s.text).join(",");
}

export function styleWeightsCSV(params: SessionParameters): string {
  return formatWeightsCSV(params.styles.map((s) => s.weight));
}

/** Append an empty style slot. No-op at MAX_STYLES. */
export function addStyle(params: SessionParameters): SessionParameters {
  if (params.styles.length >= MAX_STYLES) return params;
  return { ...params, styles: [...params.styles, createStyleEntry()] };
}

/** Remove a style slot. The last remaining slot is kept. */
export function removeStyle(params: SessionParameters, id: string): SessionParameters {
  if (params.styles.length <= 1) return params;
  const styles = params.styles.filter((s) => s.id !== id);
  return styles.length === params.styles.length ? params : { ...params, styles };
}

export function updateStyle(params: SessionParameters, id: string, patch: StylePatch): SessionParameters {
  const index = params.styles.findIndex((s) => s.id === id);
  if (index < 0) return params;

  const current = params.styles[index];
  const text = patch.text ?? current.text;
  const weight = patch.weight ?? current.weight;
  if (text === current.text && Object.is(weight, current.weight)) return params;

  const styles = params.styles.slice();
  styles[index] = { id, text, weight };
  return { ...params, styles };
}

export function setLoopWeight(params: SessionParameters, loopWeight: number): SessionParameters {
  return Object.is(params.loopWeight, loopWeight) ? params : { ...params, loopWeight };
}

export function setBars(params: SessionParameters, bars: number): SessionParameters {
  return params.bars === bars ? params : { ...params, bars };
}

export function setTemperature(params: SessionParameters, temperature: number): SessionParameters {
  return Object.is(params.temperature, temperature) ? params : { ...params, temperature };
}

/** topK is an integer field; the value is rounded. */
export function setTopK(params: SessionParameters, topK: number): SessionParameters {
  const rounded = Math.round(topK);
  return params.topK === rounded ? params : { ...params, topK: rounded };
}

export function setGuidanceWeight(params: SessionParameters, guidanceWeight: number): SessionParameters {
  return Object.is(params.guidanceWeight, guidanceWeight) ? params : { ...params, guidanceWeight };
}
