import type { AssetsStatus } from "@/audio/steering/types";
import { decodeAssetsStatus } from "@/audio/steering/decodeAssetsStatus";
import type { JamReseedFields, JamStartFields, JamUpdateFields } from "@/audio/contract/types";
import { toFormData } from "@/audio/contract/jamFields";
import type { SessionStore } from "@/audio/store/sessionStore";

const DEFAULT_API_BASE = "http://localhost:8000";

export class ApiError extends Error {
    constructor(message: string, readonly status: number) {
        super(message);
        this.name = "ApiError";
    }
}

/** Backend base URL: NEXT_PUBLIC_API_BASE, else localhost. No trailing slash. */
export function resolveApiBase(override?: string): string {
    const envBase = typeof process !== "undefined" ? process.env?.NEXT_PUBLIC_API_BASE : undefined;
    const base = override || envBase || DEFAULT_API_BASE;
    return base.replace(/\/+$/, "");
}

async function ensureOk(response: Response, what: string): Promise<Response> {
    if (!response.ok) {
        throw new ApiError(`${what} failed: ${response.status} ${response.statusText}`, response.status);
    }
    return response;
}

export async function fetchAssetsStatus(baseUrl?: string): Promise<AssetsStatus> {
    const response = await fetch(`${resolveApiBase(baseUrl)}/model/assets/status`);
    await ensureOk(response, "Assets status");
    const body: unknown = await response.json();
    return decodeAssetsStatus(body);
}

/** Fetch the latest assets status and apply it to the store. */
export async function syncAssetsStatus(store: SessionStore, baseUrl?: string): Promise<AssetsStatus> {
    const status = await fetchAssetsStatus(baseUrl);
    store.applyAssetsStatus(status);
    return status;
}

/** Start a jam session. Returns the backend session id. */
export async function startJam(
    fields: JamStartFields,
    loopAudio: Blob,
    baseUrl?: string
): Promise<string> {
    const form = toFormData(fields);
    form.append("loop_audio", loopAudio, "combined_loop.wav");

    const response = await fetch(`${resolveApiBase(baseUrl)}/jam/start`, {
        method: "POST",
        body: form,
    });
    await ensureOk(response, "Jam start");

    const body: unknown = await response.json();
    if (typeof body === "object" && body !== null && "session_id" in body && typeof body.session_id === "string") {
        return body.session_id;
    }
    throw new Error("Jam start failed: response has no session_id");
}

export async function updateJam(fields: JamUpdateFields, baseUrl?: string): Promise<void> {
    const response = await fetch(`${resolveApiBase(baseUrl)}/jam/update`, {
        method: "POST",
        body: toFormData(fields),
    });
    await ensureOk(response, "Jam update");
}

/** Re-seed the running session from the current mix, spliced at the anchor. */
export async function reseedJam(
    fields: JamReseedFields,
    combinedAudio: Blob,
    baseUrl?: string
): Promise<void> {
    const form = toFormData(fields);
    form.append("combined_audio", combinedAudio, "combined_now.wav");

    const response = await fetch(`${resolveApiBase(baseUrl)}/jam/reseed_splice`, {
        method: "POST",
        body: form,
    });
    await ensureOk(response, "Jam reseed");
}
