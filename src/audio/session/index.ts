export * from "./types";
export * from "./sessionParameters";
export * from "./stylePrompts";
