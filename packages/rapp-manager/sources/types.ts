// Central type re-exports for cross-cutting concerns.
// Import via: import type { ... } from "@/types";

// Config
export type { Config, ConfigOverrides } from "./config/configTypes.js";
// Access
export type {
    AccessCaller,
    AccessDecision,
    HubMatcher,
    HubMatcherKind,
    WhitelistPolicy
} from "./engine/access/accessTypes.js";
// Hub presence
export type {
    HubClient,
    HubEndpoint,
    PresenceChangedEvent,
    PresenceReport,
    PresenceTarget,
    RobotIdentity
} from "./engine/gateway/hubTypes.js";
// Lifecycle
export type {
    InviteOutcome,
    LifecycleChangedEvent,
    LifecycleFailureCode,
    LifecycleState,
    LifecycleStatus,
    ProcessExit,
    ProcessHandle,
    ProcessLaunchRequest,
    ProcessLauncher,
    StartOutcome,
    StopOutcome
} from "./engine/lifecycle/lifecycleTypes.js";
// Rapps
export type { RappDescriptor, RappEntry, RappSummary } from "./engine/rapps/rappTypes.js";
// Watch
export type { WatchSnapshot, WatchTickResult } from "./engine/watch/watchTypes.js";
