import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: string;
    format: LogFormat;
    destination: LogDestination;
    redact: string[];
    service: string;
};

const DEFAULT_REDACT = ["token", "password", "secret", "*.token", "*.password", "*.secret"];
const VALID_FORMATS = new Set<string>(["pretty", "json"]);
const MODULE_WIDTH = 18;
const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }
    rootLogger = buildLogger(resolveLogConfig(overrides));
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: normalizeModule(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const isDev = process.env.NODE_ENV !== "production";
    const level =
        overrides.level ??
        envValue("RAPPMAN_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTestRun() ? "silent" : isDev ? "debug" : "info");
    const destination = overrides.destination ?? envValue("RAPPMAN_LOG_DEST") ?? "stdout";
    let format =
        overrides.format ?? parseFormat(envValue("RAPPMAN_LOG_FORMAT")) ?? parseFormat(envValue("LOG_FORMAT")) ?? "pretty";
    if (destination !== "stdout" && destination !== "stderr") {
        format = "json";
    }
    const redact = overrides.redact ?? mergeRedactList(DEFAULT_REDACT, envValue("RAPPMAN_LOG_REDACT"));
    const service = overrides.service ?? "rappman";
    return { level, format, destination, redact, service };
}

/**
 * Formats one pretty line as `[module] message key=value`.
 * Expects: log carries the `module` field set by getLogger.
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const module = typeof log.module === "string" ? log.module : "unknown";
    const label = `[${module.length > MODULE_WIDTH ? module.slice(0, MODULE_WIDTH) : module.padEnd(MODULE_WIDTH)}]`;
    const message = log[messageKey] === undefined || log[messageKey] === null ? "" : String(log[messageKey]);
    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_RESERVED_FIELDS.has(key) || value === undefined) {
            continue;
        }
        details.push(`${key}=${formatDetail(value)}`);
    }
    return details.length > 0 ? `${label} ${message} ${details.join(" ")}` : `${label} ${message}`;
}

const PRETTY_RESERVED_FIELDS = new Set(["pid", "hostname", "level", "time", "service", "module", "msg"]);

function formatDetail(value: unknown): string {
    if (value instanceof Error) {
        return JSON.stringify(value.message);
    }
    if (typeof value === "object" && value !== null) {
        const described = "message" in value && "type" in value;
        if (described && typeof value.message === "string" && typeof value.type === "string") {
            return JSON.stringify(`${value.type}: ${value.message}`);
        }
        return JSON.stringify(value);
    }
    const text = String(value);
    return /[=\s]/.test(text) || text.length === 0 ? JSON.stringify(text) : text;
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { service: config.service },
        redact: config.redact.length > 0 ? { paths: config.redact, censor: "[REDACTED]" } : undefined,
        errorKey: "error",
        serializers: { error: pino.stdSerializers.err }
    };

    if (config.format === "pretty") {
        const prettyFactory = resolvePrettyFactory();
        if (prettyFactory) {
            return pino(
                options,
                prettyFactory({
                    colorize: true,
                    ignore: "pid,hostname,service,module",
                    hideObject: true,
                    messageFormat: formatPrettyMessage,
                    destination: config.destination === "stderr" ? 2 : 1
                })
            );
        }
    }

    const destination = resolveDestination(config.destination);
    return destination ? pino(options, destination) : pino(options);
}

function resolveDestination(destination: LogDestination): DestinationStream | undefined {
    if (destination === "stdout") {
        return undefined;
    }
    if (destination === "stderr") {
        return pino.destination(2);
    }
    return pino.destination({ dest: destination, mkdir: true, sync: false });
}

function resolvePrettyFactory(): ((options: Record<string, unknown>) => DestinationStream) | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        // pino-pretty is optional at runtime; fall back to JSON lines
        return null;
    }
}

function normalizeModule(moduleName?: string): string {
    const trimmed = moduleName?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : "unknown";
}

function parseFormat(value: string | null): LogFormat | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase();
    return VALID_FORMATS.has(normalized) ? (normalized === "json" ? "json" : "pretty") : null;
}

function envValue(key: string): string | null {
    const value = process.env[key]?.trim();
    return value ? value : null;
}

function mergeRedactList(base: string[], extra: string | null): string[] {
    if (!extra) {
        return [...base];
    }
    const additions = extra
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean);
    return [...new Set([...base, ...additions])];
}

function isUnitTestRun(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}
