import { HubConnectionError } from "./hubTypes.js";

/**
 * Runs one hub operation under a deadline; the signal aborts when the deadline passes.
 * Errors that are not HubConnectionError are wrapped as `unreachable`.
 */
export async function hubDeadlineRun<T>(
    timeoutMs: number,
    label: string,
    operation: (signal: AbortSignal) => Promise<T>
): Promise<T> {
    const controller = new AbortController();
    const deadline = new Promise<never>((_, reject) => {
        controller.signal.addEventListener(
            "abort",
            () => reject(new HubConnectionError("timeout", `Hub ${label} timed out after ${timeoutMs}ms.`)),
            { once: true }
        );
    });
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
        return await Promise.race([operation(controller.signal), deadline]);
    } catch (error) {
        if (error instanceof HubConnectionError) {
            throw error;
        }
        const details = error instanceof Error ? error.message : String(error);
        throw new HubConnectionError("unreachable", `Hub ${label} failed: ${details}`, { cause: error });
    } finally {
        clearTimeout(timer);
    }
}
