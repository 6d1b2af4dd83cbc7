import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";

import { AccessGate } from "../access/accessGate.js";
import type { WhitelistPolicy } from "../access/accessTypes.js";
import { hubMatcherResolve } from "../access/hubMatcherResolve.js";
import { GatewayPresence } from "../gateway/gatewayPresence.js";
import { HubLocal } from "../gateway/hubLocal.js";
import { robotIdentityCreate } from "../gateway/robotIdentityCreate.js";
import { EngineEventBus } from "../ipc/events.js";
import { RappRegistry } from "../rapps/rappRegistry.js";
import { AppManager } from "./appManager.js";
import type { LifecycleState } from "./lifecycleTypes.js";
import { ProcessLauncherFake } from "./processLauncherFake.js";

const CATALOG = [
    "rapps:",
    "  - id: turtle/talker",
    "    display_name: Talker",
    "    entry: { command: node, args: [talker.js] }",
    "    public_interface: [chatter]",
    "  - id: turtle/chirp",
    "    entry: { command: node, args: [chirp.js] }",
    "  - id: turtle/follower",
    "    parameters: [topic]",
    "    entry: { command: node }",
    "  - id: turtle/arm",
    "    required_capabilities: [arm]",
    "    entry: { command: node }"
].join("\n");

const OPEN: WhitelistPolicy = { localOnly: false, whitelist: [], blacklist: [] };
const LOCAL = { type: "local" } as const;

describe("AppManager", () => {
    let dir: string;
    let registry: RappRegistry;

    beforeAll(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "rappman-manager-"));
        const source = path.join(dir, "catalog.yaml");
        await fs.writeFile(source, CATALOG, "utf8");
        registry = await RappRegistry.load([source], { platform: "linux.node.turtlebot", capabilities: [] });
    });

    afterAll(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    async function managerCreate(options: { policy?: WhitelistPolicy; stopTimeoutMs?: number } = {}) {
        const eventBus = new EngineEventBus();
        const hub = new HubLocal();
        const gate = new AccessGate(options.policy ?? OPEN, hubMatcherResolve("glob"));
        const presence = new GatewayPresence({
            client: hub,
            identity: robotIdentityCreate("turtle", false),
            eventBus,
            policyGet: () => gate.policyGet(),
            timeoutMs: 1_000
        });
        await presence.connect();
        const launcher = new ProcessLauncherFake();
        const states: LifecycleState[] = [];
        eventBus.onEvent((event) => {
            if (event.type === "lifecycle.changed") {
                states.push(event.payload.state);
            }
        });
        const manager = new AppManager({
            registry,
            gate,
            presence,
            launcher,
            eventBus,
            robot: { name: "turtle", type: "turtlebot", platform: "linux.node.turtlebot", icon: "turtle.png" },
            applicationNamespace: "application",
            stopTimeoutMs: options.stopTimeoutMs ?? 1_000,
            logDir: null
        });
        return { manager, launcher, hub, gate, states };
    }

    it("lets exactly one of many concurrent starts succeed", async () => {
        const { manager } = await managerCreate();

        const outcomes = await Promise.all(
            ["turtle/talker", "turtle/chirp", "turtle/talker", "turtle/chirp"].map((id) => manager.start(id, LOCAL))
        );

        expect(outcomes.filter((outcome) => outcome.ok)).toHaveLength(1);
        expect(outcomes.filter((outcome) => !outcome.ok && outcome.code === "already_running")).toHaveLength(3);
        expect(manager.status().state).toBe("running");
    });

    it("reports not_running when stopping while idle", async () => {
        const { manager, states } = await managerCreate();

        const outcome = await manager.stop(LOCAL);

        expect(outcome).toEqual({ ok: false, code: "not_running", message: "No rapp is running." });
        expect(manager.status().state).toBe("idle");
        expect(states).toEqual([]);
    });

    it("runs the talker then chirp scenario", async () => {
        const { manager, hub } = await managerCreate();

        expect(await manager.start("turtle/talker", LOCAL)).toMatchObject({ ok: true, rappId: "turtle/talker" });
        expect(manager.status()).toMatchObject({ state: "running", rappId: "turtle/talker" });
        expect(Array.from(hub.endpoints().keys()).sort()).toEqual([
            "/turtle/application/chatter",
            "/turtle/application/turtle/talker"
        ]);

        expect(await manager.start("turtle/chirp", LOCAL)).toMatchObject({ ok: false, code: "already_running" });

        expect(await manager.stop(LOCAL)).toEqual({ ok: true, rappId: "turtle/talker", forced: false });
        expect(manager.status()).toMatchObject({ state: "idle", rappId: null });
        expect(hub.endpoints().size).toBe(0);

        expect(await manager.start("turtle/chirp", LOCAL)).toMatchObject({ ok: true, rappId: "turtle/chirp" });
        expect(Array.from(hub.endpoints().keys())).toEqual(["/turtle/application/turtle/chirp"]);
    });

    it("clears state and advertisement when the child exits on its own", async () => {
        const { manager, launcher, hub, states } = await managerCreate();
        await manager.start("turtle/talker", LOCAL);

        launcher.last().crash(1);

        await vi.waitFor(() => {
            expect(hub.endpoints().size).toBe(0);
        });
        expect(manager.status().state).toBe("idle");
        expect(states).toEqual(["starting", "running", "failed", "idle"]);
    });

    it("stops a rapp that is still starting once the launch resolves", async () => {
        const { manager, launcher, states } = await managerCreate();
        const release = launcher.holdLaunches();

        const starting = manager.start("turtle/chirp", LOCAL);
        await vi.waitFor(() => {
            expect(manager.status().state).toBe("starting");
        });
        const stopping = manager.stop(LOCAL);
        release();

        expect(await starting).toMatchObject({ ok: true });
        expect(await stopping).toEqual({ ok: true, rappId: "turtle/chirp", forced: false });
        expect(states).toEqual(["starting", "running", "stopping", "idle"]);
    });

    it("shares one in-flight stop between concurrent callers", async () => {
        const { manager, launcher } = await managerCreate();
        await manager.start("turtle/chirp", LOCAL);

        const [first, second] = await Promise.all([manager.stop(LOCAL), manager.stop(LOCAL)]);

        expect(first).toEqual({ ok: true, rappId: "turtle/chirp", forced: false });
        expect(second).toEqual(first);
        expect(launcher.last().terminateCalls).toBe(1);
    });

    it("force kills a rapp that ignores termination", async () => {
        const { manager, launcher } = await managerCreate({ stopTimeoutMs: 20 });
        launcher.stubborn = true;
        await manager.start("turtle/chirp", LOCAL);

        const outcome = await manager.stop(LOCAL);

        expect(outcome).toEqual({ ok: true, rappId: "turtle/chirp", forced: true });
        expect(launcher.last().killCalls).toBe(1);
        expect(manager.status().state).toBe("idle");
    });

    it("returns to idle after a failed launch", async () => {
        const { manager, launcher, states } = await managerCreate();
        launcher.failNext(new Error("spawn node ENOENT"));

        const outcome = await manager.start("turtle/chirp", LOCAL);

        expect(outcome).toEqual({
            ok: false,
            code: "launch_error",
            message: "Failed to launch turtle/chirp: spawn node ENOENT"
        });
        expect(states).toEqual(["starting", "failed", "idle"]);
        expect(manager.status().state).toBe("idle");
    });

    it("requires declared parameters and passes them to the child", async () => {
        const { manager, launcher } = await managerCreate();

        expect(await manager.start("turtle/follower", LOCAL)).toEqual({
            ok: false,
            code: "launch_error",
            message: "Rapp turtle/follower is missing required parameters: topic"
        });

        await manager.start("turtle/follower", LOCAL, { topic: "chatter" });

        expect(launcher.requests[0]?.env).toEqual({
            RAPP_ID: "turtle/follower",
            RAPP_NAMESPACE: "application",
            RAPP_ROBOT_NAME: "turtle",
            RAPP_PARAM_TOPIC: "chatter"
        });
    });

    it("rejects unknown and unrunnable rapps", async () => {
        const { manager } = await managerCreate();

        expect(await manager.start("turtle/ghost", LOCAL)).toEqual({
            ok: false,
            code: "not_found",
            message: "Rapp not found: turtle/ghost"
        });
        expect(await manager.start("turtle/arm", LOCAL)).toEqual({
            ok: false,
            code: "not_runnable",
            message: "Rapp turtle/arm requires unavailable capabilities: arm"
        });
    });

    it("gates remote callers through the whitelist", async () => {
        const { manager, gate } = await managerCreate({ policy: { localOnly: false, whitelist: ["hub-a*"], blacklist: [] } });

        expect(await manager.start("turtle/chirp", { type: "remote", hub: "hub-b-1" })).toMatchObject({
            ok: false,
            code: "unauthorized"
        });
        expect(await manager.start("turtle/chirp", { type: "remote", hub: "hub-a-1" })).toMatchObject({ ok: true });

        gate.setPolicy({ localOnly: true, whitelist: ["hub-a*"], blacklist: [] });
        expect(await manager.stop({ type: "remote", hub: "hub-a-1" })).toMatchObject({ ok: false, code: "unauthorized" });
        expect(await manager.stop(LOCAL)).toMatchObject({ ok: true });
    });

    it("relays control to an invited hub and releases it on cancel", async () => {
        const { manager } = await managerCreate();

        expect(
            await manager.invite({ hub: "hub-a-1", cancel: false, applicationNamespace: "ops" }, { type: "remote", hub: "hub-a-1" })
        ).toEqual({ ok: true, remoteController: "hub-a-1" });
        expect(manager.status()).toMatchObject({ remoteController: "hub-a-1", applicationNamespace: "ops" });

        expect(await manager.start("turtle/chirp", { type: "remote", hub: "hub-b-1" })).toMatchObject({
            code: "unauthorized"
        });
        expect(await manager.start("turtle/chirp", { type: "remote", hub: "hub-a-1" })).toMatchObject({ ok: true });

        expect(
            await manager.invite({ hub: "hub-b-1", cancel: true, applicationNamespace: null }, { type: "remote", hub: "hub-b-1" })
        ).toMatchObject({ ok: false, code: "invalid" });
        expect(
            await manager.invite({ hub: "hub-b-1", cancel: false, applicationNamespace: "other" }, { type: "remote", hub: "hub-b-1" })
        ).toEqual({ ok: false, code: "unauthorized", message: "Robot is controlled by hub-a-1." });
        expect(manager.status()).toMatchObject({ remoteController: "hub-a-1", applicationNamespace: "ops" });
        expect(await manager.stop({ type: "remote", hub: "hub-a-1" })).toMatchObject({ ok: true, rappId: "turtle/chirp" });
        expect(await manager.start("turtle/chirp", { type: "remote", hub: "hub-a-1" })).toMatchObject({ ok: true });

        expect(
            await manager.invite({ hub: "hub-a-1", cancel: true, applicationNamespace: null }, { type: "remote", hub: "hub-a-1" })
        ).toEqual({ ok: true, remoteController: null });
        expect(manager.status()).toMatchObject({
            state: "idle",
            remoteController: null,
            applicationNamespace: "application"
        });
    });

    it("lists installed and runnable rapps and the platform", async () => {
        const { manager } = await managerCreate();
        await manager.start("turtle/talker", LOCAL);

        const listing = manager.listRapps();

        expect(listing.installed.map((rapp) => rapp.id)).toEqual([
            "turtle/talker",
            "turtle/chirp",
            "turtle/follower",
            "turtle/arm"
        ]);
        expect(listing.runnable.map((rapp) => rapp.id)).toEqual(["turtle/talker", "turtle/chirp", "turtle/follower"]);
        expect(listing.running).toBe("turtle/talker");
        expect(manager.platformInfo()).toEqual({
            name: "turtle",
            robotType: "turtlebot",
            platform: "linux.node.turtlebot",
            icon: "turtle.png"
        });
    });
});
