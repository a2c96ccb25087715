/**
 * Request contract: exactly one path from session/steering state to wire fields.
 * SessionParameters + SteeringState -> buildJam*Fields -> toFormData -> transport.
 */

export * from "./types";
export * from "./format";
export * from "./jamFields";
