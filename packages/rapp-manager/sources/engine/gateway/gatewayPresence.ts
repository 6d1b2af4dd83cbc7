import type { WhitelistPolicy } from "../access/accessTypes.js";
import type { EngineEventBus } from "../ipc/events.js";
import { getLogger } from "../../log.js";
import { AsyncLock } from "../../util/lock.js";
import { gatewayEndpointsBuild } from "./gatewayEndpointsBuild.js";
import { hubDeadlineRun } from "./hubDeadlineRun.js";
import type {
    HubClient,
    HubEndpoint,
    PresenceChangedEvent,
    PresenceReport,
    PresenceSource,
    PresenceTarget,
    RobotIdentity
} from "./hubTypes.js";

const logger = getLogger("gateway.presence");

export type GatewayPresenceOptions = {
    client: HubClient;
    identity: RobotIdentity;
    eventBus: EngineEventBus;
    policyGet: () => WhitelistPolicy;
    timeoutMs: number;
};

/**
 * Owns the advertised endpoint set and keeps the hub in line with it.
 * Failed flips stay pending until the next reconcile; connection loss moves every applied endpoint to pending.
 */
export class GatewayPresence {
    private readonly client: HubClient;
    private readonly identity: RobotIdentity;
    private readonly eventBus: EngineEventBus;
    private readonly policyGet: () => WhitelistPolicy;
    private readonly timeoutMs: number;
    private readonly lock = new AsyncLock();
    private readonly applied = new Map<string, string>();
    private readonly pending = new Set<string>();
    private readonly unsubscribe: () => void;
    private target: PresenceTarget | null = null;
    private connected = false;

    constructor(options: GatewayPresenceOptions) {
        this.client = options.client;
        this.identity = options.identity;
        this.eventBus = options.eventBus;
        this.policyGet = options.policyGet;
        this.timeoutMs = options.timeoutMs;
        this.unsubscribe = this.client.onConnectionLost((reason) => {
            this.connectionLostHandle(reason);
        });
    }

    isConnected(): boolean {
        return this.connected && this.client.isConnected();
    }

    /**
     * One connection attempt bounded by the deadline. Throws HubConnectionError; the caller owns retries.
     */
    async connect(): Promise<void> {
        await hubDeadlineRun(this.timeoutMs, "connect", (signal) => this.client.connect(this.identity, signal));
        this.connected = true;
        logger.info({ robot: this.identity.effectiveName, hub: this.client.kind }, "event: Hub connected");
    }

    /**
     * Checks the live connection; returns false when the hub no longer answers for this robot.
     */
    async verify(): Promise<boolean> {
        if (!this.isConnected()) {
            return false;
        }
        try {
            const alive = await hubDeadlineRun(this.timeoutMs, "ping", (signal) => this.client.ping(signal));
            if (!alive) {
                this.connectionLostHandle("ping failed");
            }
            return alive && this.isConnected();
        } catch (error) {
            logger.warn({ error }, "error: Hub ping failed");
            this.connectionLostHandle("ping failed");
            return false;
        }
    }

    async disconnect(): Promise<void> {
        this.unsubscribe();
        this.connected = false;
        await this.client.disconnect();
        this.applied.clear();
        this.pending.clear();
    }

    /**
     * Sets the rapp to expose (or none) and applies the delta against the current policy.
     * Same target twice flips nothing the second time.
     */
    async setAdvertised(target: PresenceTarget | null): Promise<PresenceReport> {
        return this.lock.inLock(async () => {
            this.target = target;
            return this.apply(target, this.policyGet(), "set");
        });
    }

    /**
     * Re-applies a snapshot of target and policy. Used by the watch loop; emits only when something flipped.
     */
    async reconcile(target: PresenceTarget | null, policy: WhitelistPolicy): Promise<PresenceReport> {
        return this.lock.inLock(async () => {
            this.target = target;
            return this.apply(target, policy, "reconcile");
        });
    }

    advertised(): string[] {
        return Array.from(this.applied.keys()).sort();
    }

    pendingList(): string[] {
        return Array.from(this.pending).sort();
    }

    private async apply(
        target: PresenceTarget | null,
        policy: WhitelistPolicy,
        source: PresenceSource
    ): Promise<PresenceReport> {
        const desired = new Map(
            gatewayEndpointsBuild(this.identity, target, policy).map((endpoint) => [endpoint.name, endpoint])
        );
        let flipped = 0;
        let withdrawn = 0;
        let failed = 0;

        for (const name of Array.from(this.pending)) {
            if (!desired.has(name) && !this.applied.has(name)) {
                this.pending.delete(name);
            }
        }

        const stale = Array.from(this.applied.keys()).filter((name) => !desired.has(name));
        const missing = Array.from(desired.values()).filter((endpoint) => {
            return this.applied.get(endpoint.name) !== remotesKey(endpoint) || this.pending.has(endpoint.name);
        });

        if (!this.isConnected()) {
            for (const name of stale) {
                this.pending.add(name);
            }
            for (const endpoint of missing) {
                this.pending.add(endpoint.name);
            }
        } else {
            for (const name of stale) {
                if (await this.flip("withdraw", name, (signal) => this.client.withdraw(name, signal))) {
                    this.applied.delete(name);
                    this.pending.delete(name);
                    withdrawn += 1;
                } else {
                    this.pending.add(name);
                    failed += 1;
                }
            }
            for (const endpoint of missing) {
                if (await this.flip("advertise", endpoint.name, (signal) => this.client.advertise(endpoint, signal))) {
                    this.applied.set(endpoint.name, remotesKey(endpoint));
                    this.pending.delete(endpoint.name);
                    flipped += 1;
                } else {
                    this.pending.add(endpoint.name);
                    failed += 1;
                }
            }
        }

        const report: PresenceReport = {
            connected: this.isConnected(),
            flipped,
            withdrawn,
            failed,
            pending: this.pendingList()
        };
        if (source === "set" || flipped + withdrawn + failed > 0) {
            this.changedEmit(source, target, flipped, withdrawn);
        }
        return report;
    }

    private async flip(
        action: "advertise" | "withdraw",
        name: string,
        operation: (signal: AbortSignal) => Promise<void>
    ): Promise<boolean> {
        try {
            await hubDeadlineRun(this.timeoutMs, `${action} ${name}`, operation);
            logger.debug({ endpoint: name }, `event: Endpoint ${action === "advertise" ? "advertised" : "withdrawn"}`);
            return true;
        } catch (error) {
            logger.warn({ endpoint: name, error }, `error: Flip ${action} failed; endpoint pending`);
            return false;
        }
    }

    private connectionLostHandle(reason: string): void {
        this.connected = false;
        if (this.applied.size === 0 && this.pending.size === 0 && !this.target) {
            logger.warn({ reason }, "event: Hub connection lost");
            return;
        }
        for (const name of this.applied.keys()) {
            this.pending.add(name);
        }
        this.applied.clear();
        logger.warn({ reason, pending: this.pending.size }, "event: Hub connection lost; endpoints pending");
        this.changedEmit("connection_lost", this.target, 0, 0);
    }

    private changedEmit(source: PresenceSource, target: PresenceTarget | null, flipped: number, withdrawn: number): void {
        const event: PresenceChangedEvent = {
            source,
            target: target?.rappId ?? null,
            advertised: this.advertised(),
            pending: this.pendingList(),
            flipped,
            withdrawn
        };
        this.eventBus.emit("presence.changed", event);
    }
}

function remotesKey(endpoint: HubEndpoint): string {
    return endpoint.remotes.join("\n");
}
