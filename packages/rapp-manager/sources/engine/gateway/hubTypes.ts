/**
 * Outward identity of this robot on the hub. Created once per process.
 */
export type RobotIdentity = {
    baseName: string;
    suffix: string | null;
    effectiveName: string;
};

/**
 * One flip rule: an endpoint name and the remote hub patterns allowed to see it.
 */
export type HubEndpoint = {
    name: string;
    remotes: string[];
};

export type HubConnectionLostListener = (reason: string) => void;

/**
 * Client side of the hub connection. Every call honours the abort signal as its deadline.
 */
export interface HubClient {
    readonly kind: string;
    connect(identity: RobotIdentity, signal: AbortSignal): Promise<void>;
    disconnect(): Promise<void>;
    isConnected(): boolean;
    ping(signal: AbortSignal): Promise<boolean>;
    advertise(endpoint: HubEndpoint, signal: AbortSignal): Promise<void>;
    withdraw(name: string, signal: AbortSignal): Promise<void>;
    onConnectionLost(listener: HubConnectionLostListener): () => void;
}

export type HubConnectionErrorKind = "timeout" | "unreachable" | "rejected";

export class HubConnectionError extends Error {
    readonly kind: HubConnectionErrorKind;

    constructor(kind: HubConnectionErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "HubConnectionError";
        this.kind = kind;
    }
}

/**
 * What the presence controller should expose: the running rapp and the namespace it runs under.
 */
export type PresenceTarget = {
    rappId: string;
    namespace: string;
    publicInterface: string[];
};

export type PresenceSource = "set" | "reconcile" | "connection_lost";

export type PresenceChangedEvent = {
    source: PresenceSource;
    target: string | null;
    advertised: string[];
    pending: string[];
    flipped: number;
    withdrawn: number;
};

export type PresenceReport = {
    connected: boolean;
    flipped: number;
    withdrawn: number;
    failed: number;
    pending: string[];
};
