import type { EngineEventBus } from "../ipc/events.js";
import type { GatewayPresence } from "../gateway/gatewayPresence.js";
import { getLogger } from "../../log.js";
import type { WatchSnapshot, WatchTickResult } from "./watchTypes.js";

const logger = getLogger("watch.loop");

export type WatchLoopOptions = {
    presence: GatewayPresence;
    eventBus: EngineEventBus;
    intervalMs: number;
    snapshot: () => Promise<WatchSnapshot>;
};

/**
 * Fixed-period reconciliation of hub presence with lifecycle state and policy.
 * Ticks never overlap; a tick that finds another in flight is skipped.
 */
export class WatchLoop {
    private readonly presence: GatewayPresence;
    private readonly intervalMs: number;
    private readonly snapshot: () => Promise<WatchSnapshot>;
    private readonly unsubscribe: () => void;
    private timer: NodeJS.Timeout | null = null;
    private started = false;
    private stopped = false;
    private running = false;
    private changes = 0;
    private nextTickAt = 0;

    constructor(options: WatchLoopOptions) {
        this.presence = options.presence;
        this.intervalMs = options.intervalMs;
        this.snapshot = options.snapshot;
        this.unsubscribe = options.eventBus.onEvent((event) => {
            if (event.type === "presence.changed" && event.payload.source !== "reconcile") {
                this.changes += 1;
            }
        });
    }

    start(): void {
        if (this.started || this.stopped) {
            return;
        }
        this.started = true;
        logger.debug({ intervalMs: this.intervalMs }, "start: Watch loop started");
        this.scheduleNext();
    }

    stop(): void {
        if (this.stopped) {
            return;
        }
        this.stopped = true;
        this.unsubscribe();
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        logger.debug("stop: Watch loop stopped");
    }

    async runNow(): Promise<WatchTickResult> {
        return this.runOnce();
    }

    /**
     * Epoch ms of the next scheduled tick, or null when the loop is not scheduled.
     */
    nextRunAt(): number | null {
        return this.timer ? this.nextTickAt : null;
    }

    private scheduleNext(): void {
        if (this.stopped) {
            return;
        }
        if (this.timer) {
            clearTimeout(this.timer);
        }
        this.nextTickAt = Date.now() + this.intervalMs;
        this.timer = setTimeout(() => {
            this.timer = null;
            void this.tick();
        }, this.intervalMs);
        this.timer.unref();
    }

    private async tick(): Promise<void> {
        if (this.stopped) {
            return;
        }
        try {
            await this.runOnce();
        } catch (error) {
            logger.error({ error }, "error: Watch loop tick failed");
        } finally {
            this.scheduleNext();
        }
    }

    private async runOnce(): Promise<WatchTickResult> {
        if (this.running) {
            logger.debug("skip: Watch loop tick skipped (already running)");
            return {
                ran: false,
                connected: this.presence.isConnected(),
                reconnected: false,
                flipped: 0,
                withdrawn: 0,
                pending: this.presence.pendingList(),
                changesSinceLastTick: 0
            };
        }
        this.running = true;
        try {
            const changesSinceLastTick = this.changes;
            this.changes = 0;

            const reconnected = await this.connectionEnsure();
            const snapshot = await this.snapshot();
            const report = await this.presence.reconcile(snapshot.target, snapshot.policy);

            if (report.flipped + report.withdrawn + report.failed > 0) {
                logger.info(
                    {
                        target: snapshot.target?.rappId ?? null,
                        flipped: report.flipped,
                        withdrawn: report.withdrawn,
                        failed: report.failed,
                        pending: report.pending.length
                    },
                    "drift: Advertised endpoints reconciled"
                );
            }
            return {
                ran: true,
                connected: report.connected,
                reconnected,
                flipped: report.flipped,
                withdrawn: report.withdrawn,
                pending: report.pending,
                changesSinceLastTick
            };
        } finally {
            this.running = false;
        }
    }

    private async connectionEnsure(): Promise<boolean> {
        if (await this.presence.verify()) {
            return false;
        }
        try {
            await this.presence.connect();
            logger.info("event: Hub reconnected by watch loop");
            return true;
        } catch (error) {
            logger.warn({ error }, "error: Hub reconnect failed; retrying next tick");
            return false;
        }
    }
}
