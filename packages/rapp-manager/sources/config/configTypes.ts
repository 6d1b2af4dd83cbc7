import type { HubMatcherKind } from "../engine/access/accessTypes.js";

export type Config = {
    settingsPath: string;
    configDir: string;
    socketPath: string;
    pidPath: string;
    robot: {
        name: string;
        type: string;
        icon: string;
        uniqueName: boolean;
        platform: string;
        capabilities: string[] | null;
    };
    rapps: {
        catalogs: string[];
        autoStart: string | null;
        stopTimeoutMs: number;
        applicationNamespace: string;
    };
    hub: {
        url: string | null;
        connectTimeoutMs: number;
    };
    watch: {
        intervalMs: number;
    };
    access: {
        localOnly: boolean;
        whitelist: string[];
        blacklist: string[];
        matcher: HubMatcherKind;
    };
    remote: {
        host: string;
        port: number;
    } | null;
};

export type ConfigOverrides = {
    socketPath?: string;
};
