import path from "node:path";

import type { Config, HubClient, LifecycleState, ProcessLauncher, RobotIdentity, WhitelistPolicy } from "@/types";
import { getLogger } from "../log.js";
import { AccessGate } from "./access/accessGate.js";
import { hubMatcherResolve } from "./access/hubMatcherResolve.js";
import { GatewayPresence } from "./gateway/gatewayPresence.js";
import { HubHttpClient } from "./gateway/hubHttpClient.js";
import { HubLocal } from "./gateway/hubLocal.js";
import { robotIdentityCreate } from "./gateway/robotIdentityCreate.js";
import { EngineEventBus } from "./ipc/events.js";
import { AppManager } from "./lifecycle/appManager.js";
import { ProcessLauncherNode } from "./lifecycle/processLauncherNode.js";
import { RappRegistry } from "./rapps/rappRegistry.js";
import { WatchLoop } from "./watch/watchLoop.js";

const logger = getLogger("runtime");

export type RappRuntimeOptions = {
    config: Config;
    launcher?: ProcessLauncher;
    hubClient?: HubClient;
    eventBus?: EngineEventBus;
};

export type RuntimeHealth = {
    ok: true;
    state: LifecycleState;
    rappId: string | null;
    robot: string;
    hub: string;
    hubConnected: boolean;
    pending: number;
    nextWatchAt: number | null;
    uptimeMs: number;
};

export type PolicyPatch = Partial<WhitelistPolicy>;

/**
 * Wires registry, gate, presence, lifecycle manager and watch loop for one robot.
 * create() loads the registry and fails on RegistryError; start() never fails on hub trouble.
 */
export class RappRuntime {
    readonly config: Config;
    readonly eventBus: EngineEventBus;
    readonly registry: RappRegistry;
    readonly gate: AccessGate;
    readonly identity: RobotIdentity;
    readonly presence: GatewayPresence;
    readonly manager: AppManager;
    readonly watch: WatchLoop;
    private readonly hubClient: HubClient;
    private readonly createdAt = Date.now();
    private started = false;
    private stopped = false;

    private constructor(options: RappRuntimeOptions, registry: RappRegistry) {
        const config = options.config;
        this.config = config;
        this.registry = registry;
        this.eventBus = options.eventBus ?? new EngineEventBus();
        this.gate = new AccessGate(
            {
                localOnly: config.access.localOnly,
                whitelist: [...config.access.whitelist],
                blacklist: [...config.access.blacklist]
            },
            hubMatcherResolve(config.access.matcher)
        );
        this.identity = robotIdentityCreate(config.robot.name, config.robot.uniqueName);
        this.hubClient = options.hubClient ?? (config.hub.url ? new HubHttpClient({ url: config.hub.url }) : new HubLocal());
        this.presence = new GatewayPresence({
            client: this.hubClient,
            identity: this.identity,
            eventBus: this.eventBus,
            policyGet: () => this.gate.policyGet(),
            timeoutMs: config.hub.connectTimeoutMs
        });
        this.manager = new AppManager({
            registry,
            gate: this.gate,
            presence: this.presence,
            launcher: options.launcher ?? new ProcessLauncherNode(),
            eventBus: this.eventBus,
            robot: {
                name: this.identity.effectiveName,
                type: config.robot.type,
                platform: config.robot.platform,
                icon: config.robot.icon
            },
            applicationNamespace: config.rapps.applicationNamespace,
            stopTimeoutMs: config.rapps.stopTimeoutMs,
            logDir: path.join(config.configDir, "logs")
        });
        this.watch = new WatchLoop({
            presence: this.presence,
            eventBus: this.eventBus,
            intervalMs: config.watch.intervalMs,
            snapshot: async () => ({
                target: await this.manager.presenceSnapshot(),
                policy: this.gate.policyGet()
            })
        });
    }

    static async create(options: RappRuntimeOptions): Promise<RappRuntime> {
        const registry = await RappRegistry.load([...options.config.rapps.catalogs], {
            platform: options.config.robot.platform,
            capabilities: options.config.robot.capabilities ? [...options.config.robot.capabilities] : null
        });
        return new RappRuntime(options, registry);
    }

    async start(): Promise<void> {
        if (this.started) {
            return;
        }
        this.started = true;
        logger.info(
            { robot: this.identity.effectiveName, hub: this.hubClient.kind, rapps: this.registry.list().length },
            "start: Rapp runtime starting"
        );

        try {
            await this.presence.connect();
        } catch (error) {
            logger.warn({ error }, "error: Hub connection failed; watch loop will retry");
        }
        this.watch.start();

        const autoStart = this.config.rapps.autoStart;
        if (autoStart) {
            const outcome = await this.manager.start(autoStart, { type: "local" });
            if (outcome.ok) {
                logger.info({ rappId: autoStart }, "start: Auto-started rapp");
            } else {
                logger.warn({ rappId: autoStart, code: outcome.code, reason: outcome.message }, "error: Auto-start failed");
            }
        }
    }

    async shutdown(): Promise<void> {
        if (this.stopped) {
            return;
        }
        this.stopped = true;
        this.watch.stop();

        const stopped = await this.manager.stop({ type: "local" });
        if (stopped.ok) {
            logger.info({ rappId: stopped.rappId, forced: stopped.forced }, "stop: Running rapp stopped for shutdown");
        }
        await this.presence.setAdvertised(null);
        try {
            await this.presence.disconnect();
        } catch (error) {
            logger.warn({ error }, "error: Hub disconnect failed");
        }
        logger.info("stop: Rapp runtime stopped");
    }

    health(): RuntimeHealth {
        const status = this.manager.status();
        return {
            ok: true,
            state: status.state,
            rappId: status.rappId,
            robot: this.identity.effectiveName,
            hub: this.hubClient.kind,
            hubConnected: this.presence.isConnected(),
            pending: this.presence.pendingList().length,
            nextWatchAt: this.watch.nextRunAt(),
            uptimeMs: Date.now() - this.createdAt
        };
    }

    /**
     * Replaces the access policy (unset fields keep their value) and re-applies advertisement under it.
     * Throws when a pattern is invalid for the configured matcher.
     */
    async policyUpdate(patch: PolicyPatch): Promise<WhitelistPolicy> {
        const current = this.gate.policyGet();
        this.gate.setPolicy({
            localOnly: patch.localOnly ?? current.localOnly,
            whitelist: [...(patch.whitelist ?? current.whitelist)],
            blacklist: [...(patch.blacklist ?? current.blacklist)]
        });
        const policy = this.gate.policyGet();
        logger.info({ policy }, "event: Access policy updated");
        await this.presence.reconcile(await this.manager.presenceSnapshot(), policy);
        return policy;
    }
}
