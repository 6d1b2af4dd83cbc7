export type RappEntry = {
    command: string;
    args: string[];
    cwd: string;
};

/**
 * Runnable description of one robot application. Frozen once the registry is loaded.
 */
export type RappDescriptor = {
    id: string;
    displayName: string;
    description: string;
    icon: string;
    entry: RappEntry;
    parameters: string[];
    requiredCapabilities: string[];
    platform: string;
    publicInterface: string[];
    source: string;
};

export type RappSummary = {
    id: string;
    displayName: string;
    description: string;
    icon: string;
    parameters: string[];
    requiredCapabilities: string[];
};

export type RegistryErrorKind = "source_unreadable" | "malformed_entry" | "not_found";

export class RegistryError extends Error {
    readonly kind: RegistryErrorKind;
    readonly source: string | null;

    constructor(kind: RegistryErrorKind, message: string, options?: { source?: string; cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "RegistryError";
        this.kind = kind;
        this.source = options?.source ?? null;
    }
}
