/**
 * Wire contract: multipart form fields sent to the jam endpoints.
 * Every value is already text; the transport only appends them.
 */

/** Fields for POST /jam/start (the loop audio file is attached separately). */
export interface JamStartFields {
  bpm: string;
  bars_per_chunk: string;
  beats_per_bar: string;
  styles: string;
  style_weights: string;
  loop_weight: string;
  guidance_weight: string;
  temperature: string;
  topk: string;
}

/** Fields for POST /jam/update. Steering fields are present only when the assets are loaded. */
export interface JamUpdateFields {
  session_id: string;
  guidance_weight: string;
  temperature: string;
  topk: string;
  styles: string;
  style_weights: string;
  use_current_mix_as_style: "true" | "false";
  loop_weight: string;
  mean?: string;
  centroid_weights?: string;
}

export interface JamUpdateOptions {
  sessionId: string;
  /** Defaults to whether the loop has any influence (loopWeight above LOOP_INFLUENCE_THRESHOLD). */
  useCurrentMixAsStyle?: boolean;
}

/** Fields for POST /jam/reseed_splice (the combined audio file is attached separately). */
export interface JamReseedFields {
  session_id: string;
  anchor_bars: string;
}

export interface JamReseedOptions {
  sessionId: string;
  /** Bars of the current mix kept as the splice anchor. Defaults to 2. */
  anchorBars?: number;
}

/** Loop weights at or below this count as "no loop influence". */
export const LOOP_INFLUENCE_THRESHOLD = 0.001;

/** Fixed by the backend's jam loop. */
export const BEATS_PER_BAR = 4;
