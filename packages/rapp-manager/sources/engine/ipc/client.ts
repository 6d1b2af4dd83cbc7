import http from "node:http";

export type SocketResponse = {
    statusCode: number;
    body: string;
};

export type SocketRequestOptions = {
    socketPath: string;
    path: string;
    method?: "GET" | "POST" | "PUT";
    body?: string;
    headers?: Record<string, string>;
    timeoutMs?: number;
};

export type ControlResponse = {
    statusCode: number;
    data: unknown;
};

export const DEFAULT_TIMEOUT_MS = 30_000;

export class SocketTimeoutError extends Error {
    readonly timeoutMs: number;

    constructor(socketPath: string, timeoutMs: number) {
        super(`No reply from ${socketPath} within ${timeoutMs}ms`);
        this.name = "SocketTimeoutError";
        this.timeoutMs = timeoutMs;
    }
}

/**
 * One HTTP exchange over a Unix socket. Rejects on connection errors and when no reply
 * arrives within timeoutMs; stop requests can take as long as the rapp's stop timeout.
 */
export function requestSocket(options: SocketRequestOptions): Promise<SocketResponse> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    return new Promise((resolve, reject) => {
        const request = http.request(
            {
                socketPath: options.socketPath,
                path: options.path,
                method: options.method ?? "GET",
                headers: options.headers,
                timeout: timeoutMs
            },
            (response) => {
                let body = "";
                response.setEncoding("utf8");
                response.on("data", (chunk: string) => {
                    body += chunk;
                });
                response.on("error", reject);
                response.on("end", () => {
                    resolve({ statusCode: response.statusCode ?? 0, body });
                });
            }
        );

        request.on("timeout", () => {
            request.destroy(new SocketTimeoutError(options.socketPath, timeoutMs));
        });
        request.on("error", reject);
        request.end(options.body);
    });
}

/**
 * Sends one JSON request to the daemon's control socket and decodes the reply.
 * A reply that is not JSON comes back as its raw text.
 */
export async function controlRequest(
    socketPath: string,
    method: "GET" | "POST" | "PUT",
    pathname: string,
    payload?: unknown,
    timeoutMs?: number
): Promise<ControlResponse> {
    const response = await requestSocket({
        socketPath,
        path: pathname,
        method,
        timeoutMs,
        headers: payload === undefined ? undefined : { "Content-Type": "application/json" },
        body: payload === undefined ? undefined : JSON.stringify(payload)
    });
    return { statusCode: response.statusCode, data: bodyDecode(response.body) };
}

function bodyDecode(body: string): unknown {
    if (body.length === 0) {
        return null;
    }
    try {
        return JSON.parse(body);
    } catch {
        return body;
    }
}
