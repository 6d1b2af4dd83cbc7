import { getLogger } from "../../log.js";
import { freezeDeep } from "../../util/freezeDeep.js";
import { rappCatalogRead } from "./rappCatalogRead.js";
import { rappPlatformCompatible } from "./rappPlatformCompatible.js";
import { type RappDescriptor, RegistryError, type RappSummary } from "./rappTypes.js";

const logger = getLogger("rapps.registry");

export type RappRegistryOptions = {
    platform: string;
    capabilities: string[] | null;
};

/**
 * Immutable index of installed rapps built from catalog sources in configured order.
 * Expects: load() is the only constructor path; any source failure fails the whole load.
 */
export class RappRegistry {
    private readonly rapps: ReadonlyMap<string, RappDescriptor>;
    private readonly capabilities: ReadonlySet<string> | null;

    private constructor(rapps: Map<string, RappDescriptor>, capabilities: string[] | null) {
        this.rapps = rapps;
        this.capabilities = capabilities ? new Set(capabilities) : null;
    }

    static async load(sources: string[], options: RappRegistryOptions): Promise<RappRegistry> {
        const rapps = new Map<string, RappDescriptor>();
        for (const source of sources) {
            const descriptors = await rappCatalogRead(source);
            for (const descriptor of descriptors) {
                const existing = rapps.get(descriptor.id);
                if (existing) {
                    logger.warn(
                        { rappId: descriptor.id, kept: existing.source, ignored: source },
                        "load: Duplicate rapp id, keeping first definition"
                    );
                    continue;
                }
                if (!rappPlatformCompatible(options.platform, descriptor.platform)) {
                    logger.info(
                        { rappId: descriptor.id, rappPlatform: descriptor.platform, platform: options.platform },
                        "skip: Rapp not compatible with robot platform"
                    );
                    continue;
                }
                rapps.set(descriptor.id, freezeDeep(descriptor));
            }
        }
        logger.info({ sources: sources.length, rapps: rapps.size }, "load: Rapp registry loaded");
        return new RappRegistry(rapps, options.capabilities);
    }

    lookup(id: string): RappDescriptor {
        const descriptor = this.rapps.get(id);
        if (!descriptor) {
            throw new RegistryError("not_found", `Rapp not found: ${id}`);
        }
        return descriptor;
    }

    list(): RappDescriptor[] {
        return Array.from(this.rapps.values());
    }

    /**
     * Returns the required capabilities this robot lacks; empty means runnable.
     * Without a capability list, any requirement counts as missing.
     */
    missingCapabilities(descriptor: RappDescriptor): string[] {
        const available = this.capabilities;
        if (!available) {
            return [...descriptor.requiredCapabilities];
        }
        return descriptor.requiredCapabilities.filter((capability) => !available.has(capability));
    }

    isRunnable(descriptor: RappDescriptor): boolean {
        return this.missingCapabilities(descriptor).length === 0;
    }

    listRunnable(): RappDescriptor[] {
        return this.list().filter((descriptor) => this.isRunnable(descriptor));
    }
}

export function rappSummary(descriptor: RappDescriptor): RappSummary {
    return {
        id: descriptor.id,
        displayName: descriptor.displayName,
        description: descriptor.description,
        icon: descriptor.icon,
        parameters: [...descriptor.parameters],
        requiredCapabilities: [...descriptor.requiredCapabilities]
    };
}
