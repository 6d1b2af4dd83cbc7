import path from "node:path";

import { DEFAULT_SOCKET_PATH } from "../paths.js";
import { freezeDeep } from "../util/freezeDeep.js";
import type { SettingsConfig } from "./configSettingsParse.js";
import type { Config, ConfigOverrides } from "./configTypes.js";

const DEFAULT_ROBOT_NAME = "rappman";
const DEFAULT_ROBOT_TYPE = "robot";
const DEFAULT_STOP_TIMEOUT_MS = 8_000;
const DEFAULT_CONNECT_TIMEOUT_MS = 3_000;
const DEFAULT_WATCH_INTERVAL_MS = 5_000;
const DEFAULT_APPLICATION_NAMESPACE = "application";
const DEFAULT_REMOTE_HOST = "0.0.0.0";

/**
 * Resolves defaults and derived paths into an immutable Config snapshot.
 * Expects: settings already validated; catalog paths resolve against the settings directory.
 */
export function configResolve(settings: SettingsConfig, settingsPath: string, overrides: ConfigOverrides = {}): Config {
    const resolvedSettingsPath = path.resolve(settingsPath);
    const configDir = path.dirname(resolvedSettingsPath);
    const robotType = settings.robot?.type ?? DEFAULT_ROBOT_TYPE;
    const remote = settings.server?.remote;

    return freezeDeep({
        settingsPath: resolvedSettingsPath,
        configDir,
        socketPath: path.resolve(overrides.socketPath ?? settings.server?.socketPath ?? DEFAULT_SOCKET_PATH),
        pidPath: path.join(configDir, "rappman.pid"),
        robot: {
            name: settings.robot?.name ?? DEFAULT_ROBOT_NAME,
            type: robotType,
            icon: settings.robot?.icon ?? "",
            uniqueName: settings.robot?.uniqueName ?? false,
            platform: settings.robot?.platform ?? `linux.node.${robotType}`,
            capabilities: settings.robot?.capabilities ? listNormalize(settings.robot.capabilities) : null
        },
        rapps: {
            catalogs: catalogListResolve(settings.rapps?.catalogs, configDir),
            autoStart: settings.rapps?.autoStart ?? null,
            stopTimeoutMs: settings.rapps?.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS,
            applicationNamespace: settings.rapps?.applicationNamespace ?? DEFAULT_APPLICATION_NAMESPACE
        },
        hub: {
            url: settings.hub?.url ?? null,
            connectTimeoutMs: settings.hub?.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS
        },
        watch: {
            intervalMs: settings.watch?.intervalMs ?? DEFAULT_WATCH_INTERVAL_MS
        },
        access: {
            localOnly: settings.access?.localOnly ?? false,
            whitelist: [...(settings.access?.whitelist ?? [])],
            blacklist: [...(settings.access?.blacklist ?? [])],
            matcher: settings.access?.matcher ?? "glob"
        },
        remote: remote ? { host: remote.host ?? DEFAULT_REMOTE_HOST, port: remote.port } : null
    });
}

/**
 * Splits a `;`-separated catalog list (or takes a list) and resolves each entry to an absolute path.
 * Order is kept; empty entries are dropped.
 */
export function catalogListResolve(input: string | string[] | undefined, baseDir: string): string[] {
    if (input === undefined) {
        return [];
    }
    const entries = typeof input === "string" ? input.split(";") : input;
    return entries
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
        .map((entry) => path.resolve(baseDir, entry));
}

function listNormalize(input: string[]): string[] {
    return Array.from(new Set(input.map((entry) => entry.trim()).filter((entry) => entry.length > 0))).sort();
}
