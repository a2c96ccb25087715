/**
 * Parameter range and formatting utilities.
 */

import type { ParamUnit, ParamFormatter } from "./types";

/**
 * Default formatters for each unit type.
 */
const DEFAULT_FORMATTERS: Record<ParamUnit, ParamFormatter> = {
    x: (v) => v.toFixed(2),
    int: (v) => v.toFixed(0),
    weight: (v) => v.toFixed(2),
};

/**
 * Get the default formatter for a unit type.
 */
export function getFormatter(unit: ParamUnit): ParamFormatter {
    return DEFAULT_FORMATTERS[unit];
}

/**
 * Clamp a value to a range.
 */
export function clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
}

/**
 * Clamp an index into [0, count - 1]. Non-integer input is truncated first.
 * Returns 0 when count is not positive.
 */
export function clampIndex(index: number, count: number): number {
    if (count <= 0 || !Number.isFinite(index)) return 0;
    return clamp(Math.trunc(index), 0, count - 1);
}

/**
 * True when `value` is a positive integer (a usable centroid count).
 */
export function isPositiveInteger(value: number | null | undefined): value is number {
    return typeof value === "number" && Number.isInteger(value) && value > 0;
}

/**
 * Snap a value onto a slider's step grid, then clamp to [min, max].
 */
export function snapToStep(value: number, min: number, max: number, step: number): number {
    if (step <= 0) return clamp(value, min, max);
    const snapped = min + Math.round((value - min) / step) * step;
    return clamp(Number(snapped.toFixed(6)), min, max);
}
