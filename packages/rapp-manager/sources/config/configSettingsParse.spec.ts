import { describe, expect, it } from "vitest";

import { configSettingsParse } from "./configSettingsParse.js";

describe("configSettingsParse", () => {
    it("accepts a full settings document", () => {
        const parsed = configSettingsParse({
            robot: { name: "kobuki", uniqueName: true, capabilities: ["base"] },
            rapps: { catalogs: ["demo.rapps"], autoStart: "demo/talker", stopTimeoutMs: 2000 },
            hub: { url: "http://127.0.0.1:6380", connectTimeoutMs: 1000 },
            watch: { intervalMs: 1000 },
            access: { localOnly: false, whitelist: ["hub-a*"], blacklist: ["hub-a-bad"], matcher: "glob" },
            server: { socketPath: "/tmp/rappman.sock", remote: { port: 7400 } }
        });

        expect(parsed.robot?.name).toBe("kobuki");
        expect(parsed.access?.whitelist).toEqual(["hub-a*"]);
        expect(parsed.server?.remote?.port).toBe(7400);
    });

    it("rejects unknown keys", () => {
        expect(() => configSettingsParse({ robot: { nmae: "typo" } })).toThrow();
    });

    it("rejects an unknown matcher", () => {
        expect(() => configSettingsParse({ access: { matcher: "fuzzy" } })).toThrow();
    });

    it("rejects a hub url that is not a url", () => {
        expect(() => configSettingsParse({ hub: { url: "not a url" } })).toThrow();
    });
});
