import { afterEach, describe, expect, it } from "vitest";

import { formatPrettyMessage, initLogging, resetLogging, resolveLogConfig } from "./log.js";

const ENV_KEYS = ["RAPPMAN_LOG_LEVEL", "LOG_LEVEL", "RAPPMAN_LOG_FORMAT", "LOG_FORMAT", "RAPPMAN_LOG_DEST", "RAPPMAN_LOG_REDACT"];

describe("log", () => {
    const saved = new Map<string, string | undefined>();

    afterEach(() => {
        for (const [key, value] of saved) {
            if (value === undefined) {
                delete process.env[key];
            } else {
                process.env[key] = value;
            }
        }
        saved.clear();
        resetLogging();
    });

    function envClear(): void {
        for (const key of ENV_KEYS) {
            saved.set(key, process.env[key]);
            delete process.env[key];
        }
    }

    it("defaults to silent level under vitest", () => {
        envClear();
        resetLogging();
        expect(initLogging().level).toBe("silent");
    });

    it("prefers the prefixed level variable", () => {
        envClear();
        process.env.RAPPMAN_LOG_LEVEL = "warn";
        process.env.LOG_LEVEL = "error";
        expect(resolveLogConfig().level).toBe("warn");
    });

    it("forces json format for file destinations", () => {
        envClear();
        const config = resolveLogConfig({ destination: "/tmp/rappman.log", format: "pretty" });
        expect(config.format).toBe("json");
    });

    it("merges extra redact paths without duplicates", () => {
        envClear();
        process.env.RAPPMAN_LOG_REDACT = "token, hub.key";
        expect(resolveLogConfig().redact).toEqual([
            "token",
            "password",
            "secret",
            "*.token",
            "*.password",
            "*.secret",
            "hub.key"
        ]);
    });
});

describe("formatPrettyMessage", () => {
    it("renders module label and details", () => {
        const line = formatPrettyMessage(
            { module: "lifecycle", msg: "start: Rapp running", rappId: "demo/talker", pid: 42, level: 30 },
            "msg"
        );
        expect(line).toBe("[lifecycle         ] start: Rapp running rappId=demo/talker");
    });

    it("quotes values containing spaces", () => {
        const line = formatPrettyMessage({ module: "gateway", msg: "error: Flip failed", reason: "hub down" }, "msg");
        expect(line).toBe('[gateway           ] error: Flip failed reason="hub down"');
    });
});
