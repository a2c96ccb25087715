/**
 * Session parameters: style prompts and scalar generation controls.
 */

export interface StyleEntry {
  /** Process-unique; independent of text/weight. */
  id: string;
  text: string;
  weight: number;
}

export interface SessionParameters {
  /** Order defines prompt order and CSV column order. */
  styles: readonly StyleEntry[];
  /** [0, 1] */
  loopWeight: number;
  /** 4 or 8 */
  bars: number;
  /** [0, 4] */
  temperature: number;
  /** Integer in [0, 1024] */
  topK: number;
  /** [0, 10] */
  guidanceWeight: number;
}

/**
 * Session request exchanged with the jam session collaborator.
 * styles and styleWeights are parallel sequences.
 */
export interface PendingJamRequest {
  bpm: number;
  barsPerChunk: number;
  styles: string[];
  styleWeights: number[];
  loopWeight: number;
  temperature: number;
  topK: number;
  guidanceWeight: number;
}

export type StylePatch = Partial<Pick<StyleEntry, "text" | "weight">>;
