export { configLoad } from "./config/configLoad.js";
export { configResolve } from "./config/configResolve.js";
export { configSettingsParse } from "./config/configSettingsParse.js";
export { AccessGate } from "./engine/access/accessGate.js";
export { hubMatcherResolve } from "./engine/access/hubMatcherResolve.js";
export { GatewayPresence } from "./engine/gateway/gatewayPresence.js";
export { HubHttpClient } from "./engine/gateway/hubHttpClient.js";
export { HubLocal } from "./engine/gateway/hubLocal.js";
export { HubConnectionError } from "./engine/gateway/hubTypes.js";
export { robotIdentityCreate } from "./engine/gateway/robotIdentityCreate.js";
export { controlRequest } from "./engine/ipc/client.js";
export { EngineEventBus } from "./engine/ipc/events.js";
export { controlAppBuild, startControlServer } from "./engine/ipc/server.js";
export { AppManager } from "./engine/lifecycle/appManager.js";
export { ProcessLauncherNode } from "./engine/lifecycle/processLauncherNode.js";
export { RappRuntime } from "./engine/rappRuntime.js";
export { rappPlatformCompatible } from "./engine/rapps/rappPlatformCompatible.js";
export { RappRegistry } from "./engine/rapps/rappRegistry.js";
export { RegistryError } from "./engine/rapps/rappTypes.js";
export { WatchLoop } from "./engine/watch/watchLoop.js";
export type * from "./types.js";
