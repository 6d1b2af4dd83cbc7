import path from "node:path";

import { createId } from "@paralleldrive/cuid2";

import type { AccessCaller } from "../access/accessTypes.js";
import type { AccessGate } from "../access/accessGate.js";
import type { GatewayPresence } from "../gateway/gatewayPresence.js";
import type { PresenceTarget } from "../gateway/hubTypes.js";
import type { EngineEventBus } from "../ipc/events.js";
import { type RappRegistry, rappSummary } from "../rapps/rappRegistry.js";
import { type RappDescriptor, RegistryError, type RappSummary } from "../rapps/rappTypes.js";
import { getLogger } from "../../log.js";
import { AsyncLock } from "../../util/lock.js";
import type {
    InviteOutcome,
    LifecycleState,
    LifecycleStatus,
    LifecycleTransitionReason,
    ProcessExit,
    ProcessHandle,
    ProcessLauncher,
    StartOutcome,
    StopOutcome
} from "./lifecycleTypes.js";

const logger = getLogger("lifecycle.manager");
const KILL_WAIT_MS = 2_000;

/**
 * Longest a stop can take before it resolves: the graceful window plus the wait after the kill.
 */
export function appStopDeadlineMs(stopTimeoutMs: number): number {
    return stopTimeoutMs + KILL_WAIT_MS;
}

export type AppManagerOptions = {
    registry: RappRegistry;
    gate: AccessGate;
    presence: Pick<GatewayPresence, "setAdvertised">;
    launcher: ProcessLauncher;
    eventBus: EngineEventBus;
    robot: {
        name: string;
        type: string;
        platform: string;
        icon: string;
    };
    applicationNamespace: string;
    stopTimeoutMs: number;
    logDir: string | null;
};

export type RappListing = {
    installed: RappSummary[];
    runnable: RappSummary[];
    running: string | null;
};

export type PlatformInfo = {
    name: string;
    robotType: string;
    platform: string;
    icon: string;
};

export type InviteRequest = {
    hub: string;
    cancel: boolean;
    applicationNamespace: string | null;
};

type RunningRapp = {
    runId: string;
    descriptor: RappDescriptor;
    namespace: string;
    handle: ProcessHandle | null;
    startedAt: number;
};

/**
 * Single-tenant rapp lifecycle: at most one rapp runs at a time.
 * Every state transition happens inside one lock; process waits and hub flips happen outside it.
 */
export class AppManager {
    private readonly registry: RappRegistry;
    private readonly gate: AccessGate;
    private readonly presence: Pick<GatewayPresence, "setAdvertised">;
    private readonly launcher: ProcessLauncher;
    private readonly eventBus: EngineEventBus;
    private readonly robot: AppManagerOptions["robot"];
    private readonly defaultNamespace: string;
    private readonly stopTimeoutMs: number;
    private readonly logDir: string | null;
    private readonly lock = new AsyncLock();
    private state: LifecycleState = "idle";
    private current: RunningRapp | null = null;
    private starting: Promise<StartOutcome> | null = null;
    private stopping: Promise<StopOutcome> | null = null;
    private remoteController: string | null = null;
    private applicationNamespace: string;

    constructor(options: AppManagerOptions) {
        this.registry = options.registry;
        this.gate = options.gate;
        this.presence = options.presence;
        this.launcher = options.launcher;
        this.eventBus = options.eventBus;
        this.robot = options.robot;
        this.defaultNamespace = options.applicationNamespace;
        this.applicationNamespace = options.applicationNamespace;
        this.stopTimeoutMs = options.stopTimeoutMs;
        this.logDir = options.logDir;
    }

    async start(rappId: string, caller: AccessCaller, parameters: Record<string, string> = {}): Promise<StartOutcome> {
        const begin = await this.lock.inLock(() => {
            const denied = this.authorize(caller, `start ${rappId}`);
            if (denied) {
                return denied;
            }
            if (this.state !== "idle") {
                const runningId = this.current?.descriptor.id ?? "unknown";
                return failure("already_running", `Rapp ${runningId} is ${this.state}; stop it first.`);
            }

            let descriptor: RappDescriptor;
            try {
                descriptor = this.registry.lookup(rappId);
            } catch (error) {
                if (error instanceof RegistryError && error.kind === "not_found") {
                    return failure("not_found", error.message);
                }
                throw error;
            }
            const missingCapabilities = this.registry.missingCapabilities(descriptor);
            if (missingCapabilities.length > 0) {
                return failure(
                    "not_runnable",
                    `Rapp ${rappId} requires unavailable capabilities: ${missingCapabilities.join(", ")}`
                );
            }
            const missingParameters = descriptor.parameters.filter((name) => parameters[name] === undefined);
            if (missingParameters.length > 0) {
                return failure(
                    "launch_error",
                    `Rapp ${rappId} is missing required parameters: ${missingParameters.join(", ")}`
                );
            }

            const run: RunningRapp = {
                runId: createId(),
                descriptor,
                namespace: this.applicationNamespace,
                handle: null,
                startedAt: Date.now()
            };
            this.current = run;
            this.transition("starting", "start");
            const settled = this.launchSettle(run, parameters);
            this.starting = settled;
            return { ok: true as const, settled };
        });

        if (!begin.ok) {
            logger.info({ rappId, code: begin.code, caller: callerLabel(caller) }, `skip: Start refused (${begin.code})`);
            return begin;
        }
        return begin.settled;
    }

    async stop(caller: AccessCaller): Promise<StopOutcome> {
        for (;;) {
            const step = await this.lock.inLock((): StopStep => {
                const denied = this.authorize(caller, "stop");
                if (denied) {
                    return { kind: "done", outcome: denied };
                }
                if (this.state === "stopping" && this.stopping) {
                    return { kind: "done", pending: this.stopping };
                }
                if (this.state === "starting" && this.starting) {
                    return { kind: "wait", starting: this.starting };
                }
                const run = this.current;
                if (this.state !== "running" || !run || !run.handle) {
                    return { kind: "done", outcome: failure("not_running", "No rapp is running.") };
                }
                this.transition("stopping", "stop");
                const stopping = this.stopRun(run, run.handle);
                this.stopping = stopping;
                return { kind: "done", pending: stopping };
            });

            if (step.kind === "wait") {
                await step.starting;
                continue;
            }
            if ("pending" in step) {
                return step.pending;
            }
            return step.outcome;
        }
    }

    status(): LifecycleStatus {
        const run = this.current;
        return {
            state: this.state,
            rappId: run?.descriptor.id ?? null,
            pid: run?.handle?.pid ?? null,
            startedAt: run?.startedAt ?? null,
            remoteController: this.remoteController,
            applicationNamespace: this.applicationNamespace
        };
    }

    /**
     * Relays control to one remote hub, or releases it on cancel. Cancelling stops the running rapp.
     * Only the current controller can cancel; a repeated invite from it is accepted as is,
     * and invites from other hubs are refused while it holds control.
     */
    async invite(request: InviteRequest, caller: AccessCaller): Promise<InviteOutcome> {
        const decision = this.gate.evaluate({ type: "remote", hub: request.hub });
        if (!decision.allowed || (caller.type === "remote" && caller.hub !== request.hub)) {
            logger.warn({ hub: request.hub, reason: decision.reason }, "skip: Invitation refused");
            return failure("unauthorized", `Hub ${request.hub} may not control this robot.`);
        }

        const release = await this.lock.inLock((): InviteOutcome | "release" => {
            if (request.cancel && request.hub !== this.remoteController) {
                return failure("invalid", `Hub ${request.hub} is not the current remote controller.`);
            }
            if (!request.cancel && request.hub === this.remoteController) {
                return { ok: true, remoteController: this.remoteController };
            }
            if (!request.cancel && this.remoteController !== null) {
                return failure("unauthorized", `Robot is controlled by ${this.remoteController}.`);
            }
            this.applicationNamespace = request.applicationNamespace?.trim() || this.defaultNamespace;
            if (request.cancel) {
                return "release";
            }
            this.remoteController = request.hub;
            logger.info(
                { hub: request.hub, namespace: this.applicationNamespace },
                "event: Accepted invitation from remote controller"
            );
            return { ok: true, remoteController: this.remoteController };
        });
        if (release !== "release") {
            return release;
        }

        logger.info({ hub: request.hub }, "event: Remote controller released");
        const stopped = await this.stop({ type: "local" });
        if (!stopped.ok && stopped.code !== "not_running") {
            logger.warn({ code: stopped.code }, "error: Stop after release failed");
        }
        await this.lock.inLock(() => {
            if (this.remoteController === request.hub) {
                this.remoteController = null;
            }
        });
        return { ok: true, remoteController: null };
    }

    listRapps(): RappListing {
        return {
            installed: this.registry.list().map(rappSummary),
            runnable: this.registry.listRunnable().map(rappSummary),
            running: this.state === "running" ? (this.current?.descriptor.id ?? null) : null
        };
    }

    platformInfo(): PlatformInfo {
        return {
            name: this.robot.name,
            robotType: this.robot.type,
            platform: this.robot.platform,
            icon: this.robot.icon
        };
    }

    /**
     * Consistent snapshot of what should be advertised, for the watch loop.
     */
    async presenceSnapshot(): Promise<PresenceTarget | null> {
        return this.lock.inLock(() => this.presenceTarget());
    }

    private async launchSettle(run: RunningRapp, parameters: Record<string, string>): Promise<StartOutcome> {
        const descriptor = run.descriptor;
        let handle: ProcessHandle;
        try {
            handle = await this.launcher.launch({
                command: descriptor.entry.command,
                args: [...descriptor.entry.args],
                cwd: descriptor.entry.cwd,
                env: this.environmentBuild(run, parameters),
                logPath: this.logDir ? path.join(this.logDir, `${descriptor.id.replace(/[^A-Za-z0-9_.-]/g, "_")}.log`) : null
            });
        } catch (error) {
            logger.warn({ rappId: descriptor.id, error }, "error: Rapp launch failed");
            return this.lock.inLock(() => {
                this.starting = null;
                this.current = null;
                this.transition("failed", "launch_failed", descriptor.id);
                this.transition("idle", "cleanup");
                const details = error instanceof Error ? error.message : String(error);
                return failure("launch_error", `Failed to launch ${descriptor.id}: ${details}`);
            });
        }

        const outcome = await this.lock.inLock((): StartOutcome => {
            this.starting = null;
            run.handle = handle;
            void handle.exited
                .then((exit) => this.exitHandle(run.runId, exit))
                .catch((error) => {
                    logger.warn({ error, rappId: descriptor.id }, "error: Rapp exit handler failed");
                });
            this.transition("running", "launched");
            logger.info({ rappId: descriptor.id, pid: handle.pid, namespace: run.namespace }, "start: Rapp running");
            return { ok: true, rappId: descriptor.id, pid: handle.pid };
        });
        await this.presenceApply();
        return outcome;
    }

    private async stopRun(run: RunningRapp, handle: ProcessHandle): Promise<StopOutcome> {
        const rappId = run.descriptor.id;
        try {
            handle.terminate();
        } catch (error) {
            logger.warn({ rappId, error }, "error: Graceful termination signal failed");
        }

        let forced = false;
        if (!(await exitWait(handle, this.stopTimeoutMs))) {
            forced = true;
            logger.warn({ rappId, pid: handle.pid, timeoutMs: this.stopTimeoutMs }, "stop: Rapp ignored termination; killing");
            try {
                handle.kill();
            } catch (error) {
                logger.warn({ rappId, error }, "error: Force kill failed");
            }
            if (!(await exitWait(handle, KILL_WAIT_MS))) {
                logger.error({ rappId, pid: handle.pid }, "error: Rapp still alive after force kill");
            }
        }

        await this.lock.inLock(() => {
            this.current = null;
            this.stopping = null;
            this.transition("idle", "stopped", rappId);
        });
        logger.info({ rappId, forced }, "stop: Rapp stopped");
        await this.presenceApply();
        return { ok: true, rappId, forced };
    }

    private async exitHandle(runId: string, exit: ProcessExit): Promise<void> {
        const cleared = await this.lock.inLock(() => {
            const run = this.current;
            if (!run || run.runId !== runId || this.state !== "running") {
                return false;
            }
            logger.warn(
                { rappId: run.descriptor.id, code: exit.code, signal: exit.signal },
                "event: Rapp exited without stop"
            );
            this.current = null;
            this.transition("failed", "exited", run.descriptor.id);
            this.transition("idle", "cleanup");
            return true;
        });
        if (cleared) {
            await this.presenceApply();
        }
    }

    private environmentBuild(run: RunningRapp, parameters: Record<string, string>): Record<string, string> {
        const env: Record<string, string> = {
            RAPP_ID: run.descriptor.id,
            RAPP_NAMESPACE: run.namespace,
            RAPP_ROBOT_NAME: this.robot.name
        };
        for (const [name, value] of Object.entries(parameters)) {
            env[`RAPP_PARAM_${name.toUpperCase()}`] = value;
        }
        return env;
    }

    private presenceTarget(): PresenceTarget | null {
        const run = this.current;
        if (this.state !== "running" || !run) {
            return null;
        }
        return {
            rappId: run.descriptor.id,
            namespace: run.namespace,
            publicInterface: [...run.descriptor.publicInterface]
        };
    }

    private async presenceApply(): Promise<void> {
        const target = this.presenceTarget();
        try {
            await this.presence.setAdvertised(target);
        } catch (error) {
            logger.warn({ error, target: target?.rappId ?? null }, "error: Advertisement update failed");
        }
    }

    private authorize(caller: AccessCaller, action: string): Unauthorized | null {
        if (caller.type === "local") {
            return null;
        }
        const decision = this.gate.evaluate(caller);
        if (!decision.allowed) {
            return failure("unauthorized", `Hub ${caller.hub} may not ${action} (${decision.reason}).`);
        }
        if (this.remoteController && this.remoteController !== caller.hub) {
            return failure("unauthorized", `Hub ${caller.hub} may not ${action}: controlled by ${this.remoteController}.`);
        }
        return null;
    }

    private transition(next: LifecycleState, reason: LifecycleTransitionReason, rappId?: string): void {
        const previous = this.state;
        this.state = next;
        this.eventBus.emit("lifecycle.changed", {
            state: next,
            previous,
            rappId: rappId ?? this.current?.descriptor.id ?? null,
            reason
        });
    }
}

type Unauthorized = { ok: false; code: "unauthorized"; message: string };

type StopStep =
    | { kind: "done"; outcome: StopOutcome }
    | { kind: "done"; pending: Promise<StopOutcome> }
    | { kind: "wait"; starting: Promise<StartOutcome> };

function failure<TCode extends string>(code: TCode, message: string): { ok: false; code: TCode; message: string } {
    return { ok: false, code, message };
}

function callerLabel(caller: AccessCaller): string {
    return caller.type === "local" ? "local" : caller.hub;
}

async function exitWait(handle: ProcessHandle, timeoutMs: number): Promise<ProcessExit | null> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<null>((resolve) => {
        timer = setTimeout(() => resolve(null), timeoutMs);
    });
    try {
        return await Promise.race([handle.exited, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
