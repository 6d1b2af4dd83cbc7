import { describe, expect, it, vi } from "vitest";

import type { WhitelistPolicy } from "../access/accessTypes.js";
import { GatewayPresence } from "../gateway/gatewayPresence.js";
import { HubLocal } from "../gateway/hubLocal.js";
import type { PresenceTarget } from "../gateway/hubTypes.js";
import { robotIdentityCreate } from "../gateway/robotIdentityCreate.js";
import { EngineEventBus } from "../ipc/events.js";
import { WatchLoop } from "./watchLoop.js";
import type { WatchSnapshot } from "./watchTypes.js";

const OPEN: WhitelistPolicy = { localOnly: false, whitelist: [], blacklist: [] };
const CHIRP: PresenceTarget = { rappId: "demo/chirp", namespace: "application", publicInterface: [] };

function loopCreate(snapshot?: () => Promise<WatchSnapshot>, intervalMs = 1_000) {
    const hub = new HubLocal();
    const eventBus = new EngineEventBus();
    const presence = new GatewayPresence({
        client: hub,
        identity: robotIdentityCreate("turtle", false),
        eventBus,
        policyGet: () => OPEN,
        timeoutMs: 1_000
    });
    const snapshotRead = vi.fn(snapshot ?? (async () => ({ target: CHIRP, policy: OPEN })));
    const loop = new WatchLoop({ presence, eventBus, intervalMs, snapshot: snapshotRead });
    return { hub, presence, loop, snapshotRead };
}

describe("WatchLoop", () => {
    it("repairs a dropped hub connection on the next tick", async () => {
        const { hub, presence, loop } = loopCreate();
        await presence.connect();
        await presence.setAdvertised(CHIRP);
        hub.connectionDrop();
        expect(hub.endpoints().size).toBe(0);

        const result = await loop.runNow();

        expect(result).toEqual({
            ran: true,
            connected: true,
            reconnected: true,
            flipped: 1,
            withdrawn: 0,
            pending: [],
            changesSinceLastTick: 2
        });
        expect(Array.from(hub.endpoints().keys())).toEqual(["/turtle/application/demo/chirp"]);
        loop.stop();
    });

    it("keeps endpoints pending while the hub is unreachable", async () => {
        const { hub, loop } = loopCreate();
        hub.availabilitySet(false);

        const offline = await loop.runNow();
        expect(offline.connected).toBe(false);
        expect(offline.pending).toEqual(["/turtle/application/demo/chirp"]);

        hub.availabilitySet(true);
        const online = await loop.runNow();
        expect(online.reconnected).toBe(true);
        expect(online.flipped).toBe(1);
        expect(online.pending).toEqual([]);
        loop.stop();
    });

    it("does nothing when presence already matches", async () => {
        const { presence, loop } = loopCreate();
        await presence.connect();
        await presence.setAdvertised(CHIRP);

        const result = await loop.runNow();

        expect(result.reconnected).toBe(false);
        expect(result.flipped).toBe(0);
        expect(result.changesSinceLastTick).toBe(1);
        loop.stop();
    });

    it("skips a tick while another is in flight", async () => {
        let release: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });
        const { loop } = loopCreate(async () => {
            await gate;
            return { target: null, policy: OPEN };
        });

        const first = loop.runNow();
        const second = await loop.runNow();
        release();

        expect(second.ran).toBe(false);
        expect((await first).ran).toBe(true);
        loop.stop();
    });

    it("ticks on its fixed period until stopped", async () => {
        const { loop, snapshotRead } = loopCreate(undefined, 10);

        loop.start();
        await vi.waitFor(() => {
            expect(snapshotRead.mock.calls.length).toBeGreaterThanOrEqual(2);
        });
        loop.stop();
        const calls = snapshotRead.mock.calls.length;
        await new Promise((resolve) => setTimeout(resolve, 50));

        expect(snapshotRead.mock.calls.length).toBe(calls);
    });
});
