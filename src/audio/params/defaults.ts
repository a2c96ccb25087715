/**
 * Single source of truth for session and steering slider ranges.
 * Used by the session panel, the steering panel and the session defaults.
 */

import type { ParamSpec } from "./types";

export const LOOP_WEIGHT_SPEC: ParamSpec = {
  id: "loop_weight",
  label: "Loop Influence",
  unit: "x",
  min: 0,
  max: 1,
  step: 0.01,
  default: 1.0,
};

export const TEMPERATURE_SPEC: ParamSpec = {
  id: "temperature",
  label: "Temperature",
  unit: "x",
  min: 0,
  max: 4,
  step: 0.05,
  default: 1.2,
};

export const TOP_K_SPEC: ParamSpec = {
  id: "top_k",
  label: "Top-K",
  unit: "int",
  min: 0,
  max: 1024,
  step: 1,
  default: 30,
};

export const GUIDANCE_WEIGHT_SPEC: ParamSpec = {
  id: "guidance_weight",
  label: "Guidance",
  unit: "x",
  min: 0,
  max: 10,
  step: 0.05,
  default: 1.5,
};

export const STYLE_WEIGHT_SPEC: ParamSpec = {
  id: "style_weight",
  label: "Weight",
  unit: "weight",
  min: 0,
  max: 1,
  step: 0.01,
  default: 1.0,
};

export const MEAN_SPEC: ParamSpec = {
  id: "mean",
  label: "Mean",
  unit: "weight",
  min: 0,
  max: 2,
  step: 0.01,
  default: 1.0,
};

export const CENTROID_INTENSITY_SPEC: ParamSpec = {
  id: "centroid_intensity",
  label: "Intensity",
  unit: "weight",
  min: 0,
  max: 2,
  step: 0.01,
  default: 0,
};

/** Allowed bars-per-chunk values. */
export const BARS_OPTIONS = [4, 8] as const;

export const DEFAULT_BARS = 4;

/** Upper bound on style slots offered by the editor. */
export const MAX_STYLES = 4;
