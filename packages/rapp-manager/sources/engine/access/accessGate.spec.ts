import { describe, expect, it } from "vitest";

import { AccessGate, accessEvaluate } from "./accessGate.js";
import { hubMatcherResolve } from "./hubMatcherResolve.js";

const glob = hubMatcherResolve("glob");

describe("AccessGate", () => {
    it("allows whitelisted hubs and denies the rest", () => {
        const gate = new AccessGate({ localOnly: false, whitelist: ["hub-a*"], blacklist: [] }, glob);

        expect(gate.evaluate({ type: "remote", hub: "hub-a-1" })).toEqual({
            allowed: true,
            reason: "whitelisted",
            pattern: "hub-a*"
        });
        expect(gate.evaluate({ type: "remote", hub: "hub-b-1" })).toEqual({
            allowed: false,
            reason: "not_whitelisted",
            pattern: null
        });
    });

    it("denies every remote hub in local-only mode", () => {
        const gate = new AccessGate({ localOnly: true, whitelist: ["hub-a*"], blacklist: [] }, glob);

        expect(gate.evaluate({ type: "remote", hub: "hub-a-1" }).allowed).toBe(false);
        expect(gate.evaluate({ type: "remote", hub: "hub-b-1" }).reason).toBe("local_only");
    });

    it("always allows local callers", () => {
        const gate = new AccessGate({ localOnly: true, whitelist: ["nobody"], blacklist: ["*"] }, glob);
        expect(gate.evaluate({ type: "local" })).toEqual({ allowed: true, reason: "local", pattern: null });
    });

    it("treats an empty whitelist as an open policy", () => {
        const gate = new AccessGate({ localOnly: false, whitelist: [], blacklist: [] }, glob);
        expect(gate.evaluate({ type: "remote", hub: "anyone" })).toEqual({ allowed: true, reason: "open", pattern: null });
    });

    it("applies replaced policies to later evaluations", () => {
        const gate = new AccessGate({ localOnly: false, whitelist: [], blacklist: [] }, glob);
        gate.setPolicy({ localOnly: false, whitelist: ["hub-b*"], blacklist: [] });

        expect(gate.evaluate({ type: "remote", hub: "hub-a-1" }).allowed).toBe(false);
        expect(gate.evaluate({ type: "remote", hub: "hub-b-1" }).allowed).toBe(true);
        expect(gate.policyGet()).toEqual({ localOnly: false, whitelist: ["hub-b*"], blacklist: [] });
    });

    it("does not keep a reference to the caller's arrays", () => {
        const whitelist = ["hub-a*"];
        const gate = new AccessGate({ localOnly: false, whitelist, blacklist: [] }, glob);
        whitelist.push("*");

        expect(gate.evaluate({ type: "remote", hub: "hub-z" }).allowed).toBe(false);
    });

    it("rejects invalid regex patterns on replacement", () => {
        const gate = new AccessGate({ localOnly: false, whitelist: [], blacklist: [] }, hubMatcherResolve("regex"));
        expect(() => gate.setPolicy({ localOnly: false, whitelist: ["hub-(a"], blacklist: [] })).toThrow(
            "Invalid hub pattern: hub-(a"
        );
        expect(gate.policyGet().whitelist).toEqual([]);
    });
});

describe("accessEvaluate", () => {
    it("stops at the first matching whitelist pattern", () => {
        const decision = accessEvaluate({ localOnly: false, whitelist: ["hub-?-1", "hub-*"], blacklist: [] }, glob, "hub-a-1");
        expect(decision.pattern).toBe("hub-?-1");
    });

    it("denies blacklisted hubs before consulting the whitelist", () => {
        const decision = accessEvaluate(
            { localOnly: false, whitelist: ["hub-*"], blacklist: ["hub-a-bad"] },
            glob,
            "hub-a-bad"
        );
        expect(decision).toEqual({ allowed: false, reason: "blacklisted", pattern: "hub-a-bad" });
    });

    it("uses regex semantics when the regex matcher is selected", () => {
        const regex = hubMatcherResolve("regex");
        const policy = { localOnly: false, whitelist: ["hub-[ab]-\\d+"], blacklist: [] };

        expect(accessEvaluate(policy, regex, "hub-b-12").allowed).toBe(true);
        expect(accessEvaluate(policy, regex, "hub-c-12").allowed).toBe(false);
        expect(accessEvaluate(policy, regex, "xhub-a-1").allowed).toBe(false);
    });
});
