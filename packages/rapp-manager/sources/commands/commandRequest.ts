import path from "node:path";

import { z } from "zod";

import { configLoad } from "../config/configLoad.js";
import { controlRequest, DEFAULT_TIMEOUT_MS, SocketTimeoutError } from "../engine/ipc/client.js";
import { appStopDeadlineMs } from "../engine/lifecycle/appManager.js";
import { DEFAULT_SETTINGS_PATH } from "../paths.js";

export type ClientOptions = {
    settings?: string;
    socket?: string;
};

const failureSchema = z.object({
    code: z.string().optional(),
    message: z.string()
});

export type CommandRequestOptions = {
    /** The request may wait for a running rapp to stop, so the reply deadline follows rapps.stopTimeoutMs. */
    waitsForStop?: boolean;
};

const STOP_REPLY_MARGIN_MS = 5_000;

/**
 * Sends one request to the running daemon. Throws with the daemon's message on a non-2xx reply.
 */
export async function commandRequest(
    options: ClientOptions,
    method: "GET" | "POST" | "PUT",
    pathname: string,
    payload?: unknown,
    requestOptions: CommandRequestOptions = {}
): Promise<unknown> {
    const config = await configLoad(
        options.settings ?? DEFAULT_SETTINGS_PATH,
        options.socket ? { socketPath: path.resolve(options.socket) } : {}
    );
    const socketPath = config.socketPath;
    const timeoutMs = commandReplyTimeoutMs(requestOptions.waitsForStop ? config.rapps.stopTimeoutMs : null);
    let response: Awaited<ReturnType<typeof controlRequest>>;
    try {
        response = await controlRequest(socketPath, method, pathname, payload, timeoutMs);
    } catch (error) {
        if (error instanceof SocketTimeoutError) {
            throw new Error(`Daemon at ${socketPath} did not reply within ${error.timeoutMs}ms.`, { cause: error });
        }
        const details = error instanceof Error ? error.message : String(error);
        throw new Error(`Daemon is not reachable at ${socketPath} (${details}). Is "rappman start" running?`, {
            cause: error
        });
    }
    if (response.statusCode >= 200 && response.statusCode < 300) {
        return response.data;
    }
    const failure = failureSchema.safeParse(response.data);
    if (failure.success) {
        const code = failure.data.code ? `${failure.data.code}: ` : "";
        throw new Error(`${code}${failure.data.message}`);
    }
    throw new Error(`Daemon replied with HTTP ${response.statusCode}.`);
}

/**
 * Reply deadline for one request. Requests that stop a rapp wait out its stop and kill windows.
 */
export function commandReplyTimeoutMs(stopTimeoutMs: number | null): number {
    if (stopTimeoutMs === null) {
        return DEFAULT_TIMEOUT_MS;
    }
    return Math.max(DEFAULT_TIMEOUT_MS, appStopDeadlineMs(stopTimeoutMs) + STOP_REPLY_MARGIN_MS);
}

/**
 * Runs a client command body, printing its error and setting a failing exit code instead of throwing.
 */
export async function commandRun(label: string, body: () => Promise<void>): Promise<void> {
    try {
        await body();
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        process.exitCode = 1;
        console.error(`${label} failed: ${message}`);
    }
}
