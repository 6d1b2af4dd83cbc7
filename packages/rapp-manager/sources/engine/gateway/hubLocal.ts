import { getLogger } from "../../log.js";
import {
    type HubClient,
    HubConnectionError,
    type HubConnectionLostListener,
    type HubEndpoint,
    type RobotIdentity
} from "./hubTypes.js";

const logger = getLogger("gateway.local");

export type HubLocalOptions = {
    latencyMs?: number;
};

/**
 * In-process hub used in standalone mode and in tests.
 * Keeps the flipped endpoints of the one connected robot; `connectionDrop` and `availabilitySet`
 * simulate hub outages.
 */
export class HubLocal implements HubClient {
    readonly kind = "local";
    private readonly latencyMs: number;
    private readonly listeners = new Set<HubConnectionLostListener>();
    private readonly table = new Map<string, string[]>();
    private identity: RobotIdentity | null = null;
    private available = true;
    private flipCount = 0;

    constructor(options: HubLocalOptions = {}) {
        this.latencyMs = options.latencyMs ?? 0;
    }

    async connect(identity: RobotIdentity, signal: AbortSignal): Promise<void> {
        await this.delay(signal);
        this.assertAvailable();
        this.identity = identity;
        this.table.clear();
        logger.debug({ robot: identity.effectiveName }, "event: Robot registered on local hub");
    }

    async disconnect(): Promise<void> {
        this.identity = null;
        this.table.clear();
    }

    isConnected(): boolean {
        return this.identity !== null;
    }

    async ping(signal: AbortSignal): Promise<boolean> {
        await this.delay(signal);
        return this.available && this.identity !== null;
    }

    async advertise(endpoint: HubEndpoint, signal: AbortSignal): Promise<void> {
        await this.delay(signal);
        this.assertConnected();
        this.table.set(endpoint.name, [...endpoint.remotes]);
        this.flipCount += 1;
    }

    async withdraw(name: string, signal: AbortSignal): Promise<void> {
        await this.delay(signal);
        this.assertConnected();
        if (this.table.delete(name)) {
            this.flipCount += 1;
        }
    }

    onConnectionLost(listener: HubConnectionLostListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Drops the robot's registration and forgets its endpoints, then notifies listeners.
     */
    connectionDrop(reason = "hub restarted"): void {
        if (!this.identity) {
            return;
        }
        this.identity = null;
        this.table.clear();
        for (const listener of [...this.listeners]) {
            listener(reason);
        }
    }

    availabilitySet(available: boolean): void {
        this.available = available;
    }

    endpoints(): Map<string, string[]> {
        return new Map(Array.from(this.table, ([name, remotes]) => [name, [...remotes]]));
    }

    flips(): number {
        return this.flipCount;
    }

    private assertAvailable(): void {
        if (!this.available) {
            throw new HubConnectionError("unreachable", "Local hub is unavailable.");
        }
    }

    private assertConnected(): void {
        this.assertAvailable();
        if (!this.identity) {
            throw new HubConnectionError("rejected", "Robot is not registered on the local hub.");
        }
    }

    private async delay(signal: AbortSignal): Promise<void> {
        if (this.latencyMs <= 0) {
            return;
        }
        await new Promise<void>((resolve, reject) => {
            const timer = setTimeout(() => {
                signal.removeEventListener("abort", onAbort);
                resolve();
            }, this.latencyMs);
            const onAbort = () => {
                clearTimeout(timer);
                reject(new HubConnectionError("timeout", "Local hub call aborted."));
            };
            signal.addEventListener("abort", onAbort, { once: true });
        });
    }
}
