import type { WhitelistPolicy } from "../access/accessTypes.js";
import type { PresenceTarget } from "../gateway/hubTypes.js";

export type WatchSnapshot = {
    target: PresenceTarget | null;
    policy: WhitelistPolicy;
};

export type WatchTickResult = {
    ran: boolean;
    connected: boolean;
    reconnected: boolean;
    flipped: number;
    withdrawn: number;
    pending: string[];
    changesSinceLastTick: number;
};
