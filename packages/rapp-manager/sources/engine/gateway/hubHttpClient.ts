import { getLogger } from "../../log.js";
import {
    type HubClient,
    HubConnectionError,
    type HubConnectionLostListener,
    type HubEndpoint,
    type RobotIdentity
} from "./hubTypes.js";

const logger = getLogger("gateway.http");

export type HubHttpClientOptions = {
    url: string;
    fetch?: typeof fetch;
};

/**
 * Hub client speaking JSON over HTTP.
 * Withdrawing an unknown endpoint succeeds on the hub, so any 404 or transport failure
 * means the hub forgot this robot and the client reports connection loss.
 */
export class HubHttpClient implements HubClient {
    readonly kind = "http";
    private readonly baseUrl: string;
    private readonly fetchImpl: typeof fetch;
    private readonly listeners = new Set<HubConnectionLostListener>();
    private identity: RobotIdentity | null = null;

    constructor(options: HubHttpClientOptions) {
        this.baseUrl = options.url.replace(/\/+$/, "");
        this.fetchImpl = options.fetch ?? fetch;
    }

    async connect(identity: RobotIdentity, signal: AbortSignal): Promise<void> {
        const response = await this.request("POST", "/v1/robots", signal, {
            name: identity.effectiveName,
            baseName: identity.baseName
        });
        if (!response.ok) {
            throw new HubConnectionError(
                "rejected",
                `Hub rejected robot ${identity.effectiveName}: HTTP ${response.status} ${await responseText(response)}`
            );
        }
        this.identity = identity;
        logger.info({ hub: this.baseUrl, robot: identity.effectiveName }, "event: Robot registered on hub");
    }

    async disconnect(): Promise<void> {
        const identity = this.identity;
        if (!identity) {
            return;
        }
        this.identity = null;
        await this.request("DELETE", robotPath(identity), AbortSignal.timeout(2_000));
    }

    isConnected(): boolean {
        return this.identity !== null;
    }

    async ping(signal: AbortSignal): Promise<boolean> {
        const identity = this.identity;
        if (!identity) {
            return false;
        }
        const response = await this.requestConnected("GET", robotPath(identity), signal);
        return response.ok;
    }

    async advertise(endpoint: HubEndpoint, signal: AbortSignal): Promise<void> {
        const identity = this.identityRequire();
        const response = await this.requestConnected("PUT", `${robotPath(identity)}/endpoints`, signal, {
            name: endpoint.name,
            remotes: endpoint.remotes
        });
        await responseAssert(response, `advertise ${endpoint.name}`);
    }

    async withdraw(name: string, signal: AbortSignal): Promise<void> {
        const identity = this.identityRequire();
        const response = await this.requestConnected(
            "DELETE",
            `${robotPath(identity)}/endpoints?name=${encodeURIComponent(name)}`,
            signal
        );
        await responseAssert(response, `withdraw ${name}`);
    }

    onConnectionLost(listener: HubConnectionLostListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private identityRequire(): RobotIdentity {
        if (!this.identity) {
            throw new HubConnectionError("rejected", "Robot is not registered on the hub.");
        }
        return this.identity;
    }

    /**
     * Request for an already registered robot; a missing robot or a transport failure drops the connection.
     */
    private async requestConnected(
        method: string,
        pathname: string,
        signal: AbortSignal,
        body?: unknown
    ): Promise<Response> {
        let response: Response;
        try {
            response = await this.request(method, pathname, signal, body);
        } catch (error) {
            this.connectionLost(error instanceof Error ? error.message : "transport failure");
            throw error;
        }
        if (response.status === 404) {
            this.connectionLost("robot unknown to hub");
            throw new HubConnectionError("rejected", "Hub no longer knows this robot.");
        }
        return response;
    }

    private async request(method: string, pathname: string, signal: AbortSignal, body?: unknown): Promise<Response> {
        try {
            return await this.fetchImpl(`${this.baseUrl}${pathname}`, {
                method,
                signal,
                headers: body === undefined ? undefined : { "Content-Type": "application/json" },
                body: body === undefined ? undefined : JSON.stringify(body)
            });
        } catch (error) {
            if (signal.aborted) {
                throw new HubConnectionError("timeout", `Hub request ${method} ${pathname} aborted.`, { cause: error });
            }
            const details = error instanceof Error ? error.message : String(error);
            throw new HubConnectionError("unreachable", `Hub request ${method} ${pathname} failed: ${details}`, {
                cause: error
            });
        }
    }

    private connectionLost(reason: string): void {
        if (!this.identity) {
            return;
        }
        this.identity = null;
        logger.warn({ hub: this.baseUrl, reason }, "event: Hub connection lost");
        for (const listener of [...this.listeners]) {
            listener(reason);
        }
    }
}

function robotPath(identity: RobotIdentity): string {
    return `/v1/robots/${encodeURIComponent(identity.effectiveName)}`;
}

async function responseAssert(response: Response, action: string): Promise<void> {
    if (response.ok) {
        return;
    }
    throw new HubConnectionError("rejected", `Hub refused ${action}: HTTP ${response.status} ${await responseText(response)}`);
}

async function responseText(response: Response): Promise<string> {
    try {
        return (await response.text()).slice(0, 200);
    } catch (error) {
        logger.debug({ error }, "skip: Hub response body unreadable");
        return "";
    }
}
