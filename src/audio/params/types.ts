/**
 * Slider specification types for session and steering controls.
 * Provides type-safe definitions for UI rendering.
 */

export type ParamUnit = "x" | "int" | "weight";

/**
 * Format function for displaying parameter values.
 */
export type ParamFormatter = (value: number) => string;

/**
 * Parameter specification for a single control.
 */
export interface ParamSpec {
    /** Unique identifier (e.g., "temperature", "top_k") */
    id: string;
    /** Display label (e.g., "Temperature", "Top-K") */
    label: string;
    /** Unit type for display */
    unit: ParamUnit;
    min: number;
    max: number;
    /** Step size for slider */
    step: number;
    default: number;
    /** Optional custom formatter (defaults to unit-based formatting) */
    format?: ParamFormatter;
}
