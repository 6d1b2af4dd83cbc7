export type LifecycleState = "idle" | "starting" | "running" | "stopping" | "failed";

export type LifecycleStatus = {
    state: LifecycleState;
    rappId: string | null;
    pid: number | null;
    startedAt: number | null;
    remoteController: string | null;
    applicationNamespace: string;
};

export type LifecycleFailureCode =
    | "unauthorized"
    | "already_running"
    | "not_found"
    | "not_runnable"
    | "launch_error"
    | "not_running"
    | "invalid";

type Failure<TCode extends LifecycleFailureCode> = { ok: false; code: TCode; message: string };

export type StartOutcome =
    | { ok: true; rappId: string; pid: number }
    | Failure<"unauthorized" | "already_running" | "not_found" | "not_runnable" | "launch_error">;

export type StopOutcome =
    | { ok: true; rappId: string; forced: boolean }
    | Failure<"unauthorized" | "not_running">;

export type InviteOutcome = { ok: true; remoteController: string | null } | Failure<"unauthorized" | "invalid">;

export type LifecycleTransitionReason =
    | "start"
    | "launched"
    | "launch_failed"
    | "stop"
    | "stopped"
    | "exited"
    | "cleanup";

export type LifecycleChangedEvent = {
    state: LifecycleState;
    previous: LifecycleState;
    rappId: string | null;
    reason: LifecycleTransitionReason;
};

export type ProcessExit = {
    code: number | null;
    signal: NodeJS.Signals | null;
};

export type ProcessLaunchRequest = {
    command: string;
    args: string[];
    env: Record<string, string>;
    cwd: string;
    logPath: string | null;
};

/**
 * Live child process. `exited` settles once; `onExit` listeners added after exit never fire.
 */
export interface ProcessHandle {
    readonly pid: number;
    readonly exited: Promise<ProcessExit>;
    isAlive(): boolean;
    terminate(): void;
    kill(): void;
    onExit(listener: (exit: ProcessExit) => void): () => void;
}

export interface ProcessLauncher {
    launch(request: ProcessLaunchRequest): Promise<ProcessHandle>;
}
