import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { configResolve } from "../config/configResolve.js";
import type { SettingsConfig } from "../config/configSettingsParse.js";
import { HubLocal } from "./gateway/hubLocal.js";
import { ProcessLauncherFake } from "./lifecycle/processLauncherFake.js";
import { RegistryError } from "./rapps/rappTypes.js";
import { RappRuntime } from "./rappRuntime.js";

const CATALOG = "rapps:\n  - id: demo/chirp\n    entry: { command: node }\n    public_interface: [chirps]\n";

describe("RappRuntime", () => {
    let dir: string;
    const runtimes: RappRuntime[] = [];

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "rappman-runtime-"));
        await fs.writeFile(path.join(dir, "catalog.yaml"), CATALOG, "utf8");
    });

    afterEach(async () => {
        for (const runtime of runtimes.splice(0)) {
            await runtime.shutdown();
        }
        await fs.rm(dir, { recursive: true, force: true });
    });

    async function runtimeCreate(settings: SettingsConfig, hub = new HubLocal()) {
        const config = configResolve(
            { robot: { name: "turtle" }, ...settings, rapps: { catalogs: "catalog.yaml", ...settings.rapps } },
            path.join(dir, "settings.json")
        );
        const launcher = new ProcessLauncherFake();
        const runtime = await RappRuntime.create({ config, launcher, hubClient: hub });
        runtimes.push(runtime);
        return { runtime, launcher, hub };
    }

    it("auto-starts the configured rapp and advertises it", async () => {
        const { runtime, hub } = await runtimeCreate({ rapps: { autoStart: "demo/chirp" } });

        await runtime.start();

        expect(runtime.manager.status()).toMatchObject({ state: "running", rappId: "demo/chirp" });
        expect(runtime.health().nextWatchAt).toBeGreaterThan(Date.now());
        expect(Array.from(hub.endpoints().keys()).sort()).toEqual([
            "/turtle/application/chirps",
            "/turtle/application/demo/chirp"
        ]);
    });

    it("fails to create when a catalog is missing", async () => {
        const config = configResolve({ rapps: { catalogs: "missing.yaml" } }, path.join(dir, "settings.json"));

        await expect(RappRuntime.create({ config, launcher: new ProcessLauncherFake() })).rejects.toBeInstanceOf(
            RegistryError
        );
    });

    it("starts without a hub and reconnects on the next tick", async () => {
        const hub = new HubLocal();
        hub.availabilitySet(false);
        const { runtime } = await runtimeCreate({ rapps: { autoStart: "demo/chirp" } }, hub);

        await runtime.start();
        expect(runtime.health()).toMatchObject({ state: "running", hubConnected: false, pending: 2 });

        hub.availabilitySet(true);
        const tick = await runtime.watch.runNow();

        expect(tick).toMatchObject({ reconnected: true, flipped: 2, pending: [] });
        expect(runtime.health()).toMatchObject({ hubConnected: true, pending: 0 });
    });

    it("re-applies advertisement when the policy changes", async () => {
        const { runtime, hub } = await runtimeCreate({ rapps: { autoStart: "demo/chirp" } });
        await runtime.start();

        const policy = await runtime.policyUpdate({ whitelist: ["hub-a*"] });
        expect(policy).toEqual({ localOnly: false, whitelist: ["hub-a*"], blacklist: [] });
        expect(hub.endpoints().get("/turtle/application/demo/chirp")).toEqual(["hub-a*"]);

        await runtime.policyUpdate({ localOnly: true });
        expect(hub.endpoints().size).toBe(0);
    });

    it("stops the rapp and withdraws endpoints on shutdown", async () => {
        const { runtime, hub, launcher } = await runtimeCreate({ rapps: { autoStart: "demo/chirp" } });
        await runtime.start();

        await runtime.shutdown();

        expect(launcher.last().terminateCalls).toBe(1);
        expect(runtime.manager.status().state).toBe("idle");
        expect(hub.isConnected()).toBe(false);
        expect(hub.endpoints().size).toBe(0);
        expect(runtime.health().nextWatchAt).toBeNull();
    });
});
