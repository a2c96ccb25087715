import { useSyncExternalStore } from "react";
import type { SessionSnapshot, SessionStore } from "@/audio/store/sessionStore";

/** Subscribe a component to the store; re-renders on every state change. */
export function useSessionStore(store: SessionStore): SessionSnapshot {
    return useSyncExternalStore(store.subscribe, store.getSnapshot, store.getSnapshot);
}
