import { promises as fs } from "node:fs";
import path from "node:path";

import { configLoad } from "../config/configLoad.js";
import { requestSocket } from "../engine/ipc/client.js";
import { startControlServer } from "../engine/ipc/server.js";
import { appStopDeadlineMs } from "../engine/lifecycle/appManager.js";
import { isProcessRunning } from "../engine/lifecycle/processLauncherNode.js";
import { RappRuntime } from "../engine/rappRuntime.js";
import { getLogger } from "../log.js";
import { DEFAULT_SETTINGS_PATH } from "../paths.js";
import { awaitShutdown, onShutdown, requestShutdown } from "../util/shutdown.js";

const logger = getLogger("command.start");

export type StartOptions = {
    settings?: string;
    socket?: string;
    force?: boolean;
};

export async function startCommand(options: StartOptions): Promise<void> {
    const settingsPath = path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH);
    const config = await configLoad(settingsPath, options.socket ? { socketPath: options.socket } : {});
    logger.info({ settings: config.settingsPath }, "start: Starting rapp manager");

    const socketPath = config.socketPath;
    const pidPath = config.pidPath;
    await fs.mkdir(config.configDir, { recursive: true });

    const socketResponsive = await isDaemonRunning(socketPath);
    const existingPid = await readPidFile(pidPath);
    const pidRunning = existingPid !== null && existingPid !== process.pid && isProcessRunning(existingPid);
    if (socketResponsive || pidRunning) {
        if (!socketResponsive) {
            logger.warn({ pid: existingPid }, "event: Daemon process detected but socket unresponsive");
        }
        if (options.force !== true) {
            logger.info("skip: Daemon already running; pass --force to restart it");
            process.exitCode = 1;
            return;
        }
        const requested = socketResponsive && (await requestDaemonShutdown(socketPath));
        if (!requested) {
            logger.warn("error: Failed to request daemon shutdown. Aborting start.");
            process.exitCode = 1;
            return;
        }
        // The old daemon stops its rapp before exiting.
        const stopped = await waitForDaemonShutdown(
            socketPath,
            existingPid,
            appStopDeadlineMs(config.rapps.stopTimeoutMs) + 5_000
        );
        if (!stopped) {
            logger.warn("error: Daemon did not shut down in time. Aborting start.");
            process.exitCode = 1;
            return;
        }
    }
    await fs.rm(socketPath, { force: true });
    await fs.rm(pidPath, { force: true });

    // Handlers run newest first: control server, then runtime, then pid file.
    onShutdown("pid-file", () => fs.rm(pidPath, { force: true }));

    const runtime = await RappRuntime.create({ config });
    onShutdown("runtime", () => runtime.shutdown());
    await runtime.start();

    let server: Awaited<ReturnType<typeof startControlServer>>;
    try {
        server = await startControlServer({ socketPath, remote: config.remote, runtime });
    } catch (error) {
        logger.error({ error }, "error: Control server failed to start");
        requestShutdown("fatal");
        await awaitShutdown();
        throw error;
    }
    onShutdown("control-server", () => server.close());
    await fs.writeFile(pidPath, `${process.pid}\n`, { mode: 0o600 });

    logger.info(
        { robot: runtime.identity.effectiveName, socket: server.socketPath, remote: server.remoteAddress },
        "ready: Rapp manager ready"
    );
    const signal = await awaitShutdown();
    logger.info({ signal }, "event: Shutdown complete");
    process.exit(0);
}

async function isDaemonRunning(socketPath: string): Promise<boolean> {
    try {
        const response = await requestSocket({ socketPath, path: "/v1/health", method: "GET" });
        return response.statusCode >= 200 && response.statusCode < 300;
    } catch {
        return false;
    }
}

async function requestDaemonShutdown(socketPath: string): Promise<boolean> {
    try {
        const response = await requestSocket({ socketPath, path: "/v1/shutdown", method: "POST" });
        return response.statusCode >= 200 && response.statusCode < 300;
    } catch (error) {
        logger.warn({ error }, "error: Shutdown request failed");
        return false;
    }
}

async function waitForDaemonShutdown(socketPath: string, pid: number | null, timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
        const running = await isDaemonRunning(socketPath);
        const pidRunning = pid !== null && isProcessRunning(pid);
        if (!running && !pidRunning) {
            return true;
        }
        await delay(100);
    }
    return false;
}

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => {
        setTimeout(resolve, ms);
    });
}

async function readPidFile(pidPath: string): Promise<number | null> {
    try {
        const raw = await fs.readFile(pidPath, "utf8");
        const parsed = Number.parseInt(raw.trim(), 10);
        return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
            return null;
        }
        throw error;
    }
}
