import { describe, expect, it } from "vitest";

import { AsyncLock } from "./lock.js";

function deferred<T>() {
    let resolve: ((value: T | PromiseLike<T>) => void) | null = null;
    const promise = new Promise<T>((res) => {
        resolve = res;
    });
    return {
        promise,
        resolve: (value: T) => resolve?.(value)
    };
}

describe("AsyncLock", () => {
    it("runs sections one at a time in arrival order", async () => {
        const lock = new AsyncLock();
        const gate = deferred<void>();
        const events: string[] = [];

        const first = lock.inLock(async () => {
            events.push("first-start");
            await gate.promise;
            events.push("first-end");
        });
        const second = lock.inLock(async () => {
            events.push("second");
        });
        const third = lock.inLock(() => {
            events.push("third");
        });

        await Promise.resolve();
        expect(events).toEqual(["first-start"]);

        gate.resolve();
        await Promise.all([first, second, third]);
        expect(events).toEqual(["first-start", "first-end", "second", "third"]);
    });

    it("releases the lock when the section throws", async () => {
        const lock = new AsyncLock();

        await expect(
            lock.inLock(async () => {
                throw new Error("boom");
            })
        ).rejects.toThrow("boom");

        await expect(lock.inLock(async () => "after")).resolves.toBe("after");
    });
});
