/**
 * Central export for parameter specifications.
 */

export * from "./types";
export * from "./ranges";
export * from "./defaults";
