import { type ChildProcess, spawn } from "node:child_process";
import { promises as fs } from "node:fs";
import path from "node:path";

import { getLogger } from "../../log.js";
import type { ProcessExit, ProcessHandle, ProcessLaunchRequest, ProcessLauncher } from "./lifecycleTypes.js";

const logger = getLogger("lifecycle.process");

type ProcessSignal = "SIGTERM" | "SIGKILL";

/**
 * Launches rapps as detached process groups so termination reaches every descendant.
 * Output goes to the request's log file, or is discarded.
 */
export class ProcessLauncherNode implements ProcessLauncher {
    async launch(request: ProcessLaunchRequest): Promise<ProcessHandle> {
        const env = { ...process.env, ...request.env };
        if (!request.logPath) {
            return spawnProcess({ ...request, env, stdio: "ignore" });
        }

        await fs.mkdir(path.dirname(request.logPath), { recursive: true });
        const logHandle = await fs.open(request.logPath, "a");
        return spawnProcess({ ...request, env, stdio: logHandle.fd }).finally(async () => {
            await logHandle.close();
        });
    }
}

class NodeProcessHandle implements ProcessHandle {
    readonly pid: number;
    readonly exited: Promise<ProcessExit>;
    private readonly listeners = new Set<(exit: ProcessExit) => void>();
    private exit: ProcessExit | null = null;

    constructor(child: ChildProcess) {
        const pid = child.pid;
        if (!pid) {
            throw new Error("Failed to capture process pid.");
        }
        this.pid = pid;
        child.unref();
        child.on("error", (error) => {
            logger.warn({ pid, error }, "error: Rapp process error");
        });
        this.exited = new Promise((resolve) => {
            child.once("exit", (code, signal) => {
                const exit: ProcessExit = { code, signal };
                this.exit = exit;
                logger.debug({ pid, code, signal }, "event: Rapp process exited");
                resolve(exit);
                for (const listener of [...this.listeners]) {
                    listener(exit);
                }
                this.listeners.clear();
            });
        });
    }

    isAlive(): boolean {
        return this.exit === null && isProcessRunning(this.pid);
    }

    terminate(): void {
        killProcessTree(this.pid, "SIGTERM");
    }

    kill(): void {
        killProcessTree(this.pid, "SIGKILL");
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
}

async function spawnProcess(options: {
    command: string;
    args: string[];
    cwd: string;
    env: NodeJS.ProcessEnv;
    stdio: "ignore" | number;
}): Promise<ProcessHandle> {
    const child = spawn(options.command, options.args, {
        cwd: options.cwd,
        env: options.env,
        detached: true,
        stdio: ["ignore", options.stdio, options.stdio]
    });

    return new Promise((resolve, reject) => {
        child.once("error", (error) => {
            reject(error);
        });
        child.once("spawn", () => {
            try {
                resolve(new NodeProcessHandle(child));
            } catch (error) {
                reject(error);
            }
        });
    });
}

export function isProcessRunning(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (error) {
        return errorCode(error) === "EPERM";
    }
}

function killProcessTree(pid: number, signal: ProcessSignal): void {
    try {
        process.kill(-pid, signal);
        return;
    } catch (error) {
        const code = errorCode(error);
        if (code !== "ESRCH" && code !== "EPERM") {
            throw error;
        }
    }

    try {
        process.kill(pid, signal);
    } catch (error) {
        if (errorCode(error) !== "ESRCH") {
            throw error;
        }
    }
}

function errorCode(error: unknown): string | null {
    if (error instanceof Error && "code" in error && typeof error.code === "string") {
        return error.code;
    }
    return null;
}
