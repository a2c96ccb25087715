/**
 * Public entry: steering/session state, request contract, store, transport and React adapters.
 */

export * from "./audio/params";
export * from "./audio/steering";
export * from "./audio/session";
export * from "./audio/contract";
export * from "./audio/store/sessionStore";
export * from "./lib/api";
export { useSessionStore } from "./hooks/useSessionStore";
export { SteeringPanel } from "./components/steering/SteeringPanel";
export { SessionPanel } from "./components/session/SessionPanel";
export { ParamSlider } from "./components/params/ParamSlider";
export { ParamToggle } from "./components/params/ParamToggle";
