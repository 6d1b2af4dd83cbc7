import { describe, expect, it } from "vitest";

import { rappPlatformCompatible } from "./rappPlatformCompatible.js";

describe("rappPlatformCompatible", () => {
    it("matches wildcard segments", () => {
        expect(rappPlatformCompatible("linux.node.turtlebot", "*.*.*")).toBe(true);
        expect(rappPlatformCompatible("linux.node.turtlebot", "linux.*.turtlebot")).toBe(true);
    });

    it("rejects differing segments", () => {
        expect(rappPlatformCompatible("linux.node.turtlebot", "linux.node.pr2")).toBe(false);
    });

    it("rejects tuples of different length", () => {
        expect(rappPlatformCompatible("linux.node.turtlebot", "linux.*")).toBe(false);
    });
});
