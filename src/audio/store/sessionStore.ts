/**
 * Session store: single owner of SessionParameters and SteeringState.
 * Each public operation runs synchronously and, if it changed anything,
 * emits exactly one "state changed" notification with the new snapshot.
 * Status deliveries go through applyAssetsStatus like any other operation,
 * so they never interleave with a compact-mixer edit.
 */

import type { PendingJamRequest, SessionParameters, StylePatch } from "@/audio/session/types";
import * as session from "@/audio/session/sessionParameters";
import type { AssetsStatus, SteeringState } from "@/audio/steering/types";
import * as steering from "@/audio/steering/steeringState";
import { buildJamUpdateFields } from "@/audio/contract/jamFields";
import type { JamUpdateFields, JamUpdateOptions } from "@/audio/contract/types";

export interface SessionSnapshot {
  session: SessionParameters;
  steering: SteeringState;
}

export type SessionListener = (snapshot: SessionSnapshot) => void;

export interface SessionStore {
  getSnapshot(): SessionSnapshot;
  /** Returns an unsubscribe function. */
  subscribe(listener: SessionListener): () => void;

  // Steering
  applyAssetsStatus(status: AssetsStatus): void;
  setCentroidCount(k: number): void;
  applyCompactMixer(): void;
  selectCompactCentroid(idx: number): void;
  setCompactIntensity(value: number): void;
  adjustCompactIntensity(value: number): void;
  setCentroidWeight(idx: number, value: number): void;
  setMean(value: number): void;
  setShowAdvancedCentroids(show: boolean): void;

  // Session parameters
  loadPendingRequest(req: PendingJamRequest): void;
  addStyle(): void;
  removeStyle(id: string): void;
  updateStyle(id: string, patch: StylePatch): void;
  setLoopWeight(value: number): void;
  setBars(bars: number): void;
  setTemperature(value: number): void;
  setTopK(value: number): void;
  setGuidanceWeight(value: number): void;

  // Serialization
  toPendingRequest(bpm: number): PendingJamRequest;
  jamUpdateFields(options: JamUpdateOptions): JamUpdateFields;
}

export function createSessionStore(initial?: Partial<SessionSnapshot>): SessionStore {
  let snapshot: SessionSnapshot = {
    session: initial?.session ?? session.createSessionParameters(),
    steering: initial?.steering ?? steering.createSteeringState(),
  };
  const listeners = new Set<SessionListener>();

  const commit = (next: SessionSnapshot) => {
    if (next.session === snapshot.session && next.steering === snapshot.steering) return;
    snapshot = next;
    for (const listener of Array.from(listeners)) {
      listener(snapshot);
    }
  };

  const updateSteering = (fn: (state: SteeringState) => SteeringState) => {
    commit({ ...snapshot, steering: fn(snapshot.steering) });
  };

  const updateSession = (fn: (params: SessionParameters) => SessionParameters) => {
    commit({ ...snapshot, session: fn(snapshot.session) });
  };

  return {
    getSnapshot: () => snapshot,
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    applyAssetsStatus: (status) => updateSteering((s) => steering.applyAssetsStatus(s, status)),
    setCentroidCount: (k) => updateSteering((s) => steering.setCentroidCount(s, k)),
    applyCompactMixer: () => updateSteering(steering.applyCompactMixer),
    selectCompactCentroid: (idx) => updateSteering((s) => steering.selectCompactCentroid(s, idx)),
    setCompactIntensity: (value) => updateSteering((s) => steering.setCompactIntensity(s, value)),
    adjustCompactIntensity: (value) =>
      updateSteering((s) => steering.adjustCompactIntensity(s, value)),
    setCentroidWeight: (idx, value) =>
      updateSteering((s) => steering.setCentroidWeight(s, idx, value)),
    setMean: (value) => updateSteering((s) => steering.setMean(s, value)),
    setShowAdvancedCentroids: (show) =>
      updateSteering((s) => steering.setShowAdvancedCentroids(s, show)),

    loadPendingRequest: (req) => updateSession(() => session.fromPendingRequest(req)),
    addStyle: () => updateSession(session.addStyle),
    removeStyle: (id) => updateSession((p) => session.removeStyle(p, id)),
    updateStyle: (id, patch) => updateSession((p) => session.updateStyle(p, id, patch)),
    setLoopWeight: (value) => updateSession((p) => session.setLoopWeight(p, value)),
    setBars: (bars) => updateSession((p) => session.setBars(p, bars)),
    setTemperature: (value) => updateSession((p) => session.setTemperature(p, value)),
    setTopK: (value) => updateSession((p) => session.setTopK(p, value)),
    setGuidanceWeight: (value) => updateSession((p) => session.setGuidanceWeight(p, value)),

    toPendingRequest: (bpm) => session.toPendingRequest(snapshot.session, bpm),
    jamUpdateFields: (options) =>
      buildJamUpdateFields(snapshot.session, snapshot.steering, options),
  };
}
