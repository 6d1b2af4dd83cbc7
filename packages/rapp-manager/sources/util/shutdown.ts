import { getLogger } from "../log.js";

type ShutdownHandler = () => void | Promise<void>;
export type ShutdownReason = NodeJS.Signals | "fatal" | "api";

type ShutdownEntry = {
    name: string;
    handler: ShutdownHandler;
};

const FORCE_EXIT_MS = 15_000;
const logger = getLogger("shutdown");
const entries: ShutdownEntry[] = [];

let requested: { reason: ShutdownReason; completion: Promise<void> } | null = null;
let waiters: Array<(reason: ShutdownReason) => void> = [];
let signalsAttached = false;

/**
 * Registers a named handler. Handlers run one at a time, newest first, so later
 * layers (control server) close before the ones they depend on (runtime, pid file).
 * Returns an unregister function.
 */
export function onShutdown(name: string, handler: ShutdownHandler): () => void {
    const entry: ShutdownEntry = { name, handler };
    entries.push(entry);
    return () => {
        const index = entries.indexOf(entry);
        if (index !== -1) {
            entries.splice(index, 1);
        }
    };
}

/**
 * Resolves with the reason once every handler has finished. Attaches SIGINT/SIGTERM on first call.
 */
export function awaitShutdown(): Promise<ShutdownReason> {
    if (!signalsAttached) {
        signalsAttached = true;
        process.once("SIGINT", requestShutdown);
        process.once("SIGTERM", requestShutdown);
    }
    return new Promise((resolve) => {
        if (requested) {
            const reason = requested.reason;
            void requested.completion.then(() => resolve(reason));
            return;
        }
        waiters.push(resolve);
    });
}

export function requestShutdown(reason: ShutdownReason = "SIGTERM"): void {
    if (requested) {
        logger.debug({ reason }, "skip: Shutdown already in progress");
        return;
    }
    const completion = runHandlers(reason);
    requested = { reason, completion };
    const pending = waiters;
    waiters = [];
    void completion.then(() => {
        for (const resolve of pending) {
            resolve(reason);
        }
    });
}

async function runHandlers(reason: ShutdownReason): Promise<void> {
    const forceExit = setTimeout(() => {
        logger.warn(`event: Shutdown: forcing exit after ${FORCE_EXIT_MS}ms`);
        process.exit(1);
    }, FORCE_EXIT_MS);
    forceExit.unref();

    const ordered = [...entries].reverse();
    logger.info({ reason }, `event: Shutdown: running ${ordered.length} handler${ordered.length === 1 ? "" : "s"}`);
    const startedAt = Date.now();
    for (const entry of ordered) {
        try {
            await entry.handler();
        } catch (error) {
            logger.warn({ error }, `event: Shutdown: handler ${entry.name} failed`);
        }
    }
    logger.info(`event: Shutdown: completed in ${Date.now() - startedAt}ms`);
    clearTimeout(forceExit);
}
