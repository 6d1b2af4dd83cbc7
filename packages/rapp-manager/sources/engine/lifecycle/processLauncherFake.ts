import type { ProcessExit, ProcessHandle, ProcessLaunchRequest, ProcessLauncher } from "./lifecycleTypes.js";

/**
 * In-memory launcher for tests. Handles exit on terminate unless marked stubborn.
 */
export class ProcessLauncherFake implements ProcessLauncher {
    readonly requests: ProcessLaunchRequest[] = [];
    readonly handles: ProcessHandleFake[] = [];
    stubborn = false;
    private nextPid = 1000;
    private failure: Error | null = null;
    private hold: Promise<void> | null = null;

    async launch(request: ProcessLaunchRequest): Promise<ProcessHandle> {
        this.requests.push(request);
        if (this.hold) {
            await this.hold;
        }
        if (this.failure) {
            const failure = this.failure;
            this.failure = null;
            throw failure;
        }
        this.nextPid += 1;
        const handle = new ProcessHandleFake(this.nextPid, this.stubborn);
        this.handles.push(handle);
        return handle;
    }

    failNext(error: Error): void {
        this.failure = error;
    }

    /**
     * Holds launches until the returned release function is called.
     */
    holdLaunches(): () => void {
        let release: () => void = () => undefined;
        this.hold = new Promise<void>((resolve) => {
            release = () => {
                this.hold = null;
                resolve();
            };
        });
        return release;
    }

    last(): ProcessHandleFake {
        const handle = this.handles[this.handles.length - 1];
        if (!handle) {
            throw new Error("No process launched.");
        }
        return handle;
    }
}

export class ProcessHandleFake implements ProcessHandle {
    readonly pid: number;
    readonly exited: Promise<ProcessExit>;
    terminateCalls = 0;
    killCalls = 0;
    private readonly stubborn: boolean;
    private readonly listeners = new Set<(exit: ProcessExit) => void>();
    private exit: ProcessExit | null = null;
    private resolveExit: (exit: ProcessExit) => void = () => undefined;

    constructor(pid: number, stubborn: boolean) {
        this.pid = pid;
        this.stubborn = stubborn;
        this.exited = new Promise((resolve) => {
            this.resolveExit = resolve;
        });
    }

    isAlive(): boolean {
        return this.exit === null;
    }

    terminate(): void {
        this.terminateCalls += 1;
        if (!this.stubborn) {
            this.finish({ code: null, signal: "SIGTERM" });
        }
    }

    kill(): void {
        this.killCalls += 1;
        this.finish({ code: null, signal: "SIGKILL" });
    }

    crash(code: number): void {
        this.finish({ code, signal: null });
    }

    onExit(listener: (exit: ProcessExit) => void): () => void {
        if (this.exit) {
            return () => undefined;
        }
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private finish(exit: ProcessExit): void {
        if (this.exit) {
            return;
        }
        this.exit = exit;
        this.resolveExit(exit);
        for (const listener of [...this.listeners]) {
            listener(exit);
        }
        this.listeners.clear();
    }
}
