import { promises as fs } from "node:fs";

import { rappCatalogParse } from "./rappCatalogParse.js";
import { type RappDescriptor, RegistryError } from "./rappTypes.js";

/**
 * Reads and parses one catalog source.
 * Expects: sourcePath is absolute.
 */
export async function rappCatalogRead(sourcePath: string): Promise<RappDescriptor[]> {
    let content: string;
    try {
        content = await fs.readFile(sourcePath, "utf8");
    } catch (error) {
        const details = error instanceof Error && error.message ? error.message : "could not read catalog";
        throw new RegistryError("source_unreadable", `Failed to read catalog at ${sourcePath}: ${details}`, {
            source: sourcePath,
            cause: error
        });
    }
    return rappCatalogParse(content, sourcePath);
}
