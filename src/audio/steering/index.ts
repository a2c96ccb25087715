export * from "./types";
export * from "./steeringState";
export * from "./decodeAssetsStatus";
