import path from "node:path";

import { parse } from "yaml";
import { z } from "zod";

import { rappParameterNamesDistinct } from "./rappParameterNamesDistinct.js";
import { type RappDescriptor, RegistryError } from "./rappTypes.js";

const RAPP_ID_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]*(?:\/[A-Za-z0-9_][A-Za-z0-9_.-]*)*$/;
const PARAMETER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const rappEntrySchema = z
    .object({
        id: z.string().trim().regex(RAPP_ID_PATTERN, "must be a namespaced identifier like demo/talker"),
        display_name: z.string().trim().min(1).optional(),
        description: z.string().optional(),
        icon: z.string().optional(),
        entry: z
            .object({
                command: z.string().trim().min(1),
                args: z.array(z.string()).optional(),
                cwd: z.string().trim().min(1).optional()
            })
            .strict(),
        parameters: z
            .array(z.string().trim().regex(PARAMETER_PATTERN))
            .refine(rappParameterNamesDistinct, "parameter names must differ by more than case")
            .optional(),
        required_capabilities: z.array(z.string().trim().min(1)).optional(),
        platform: z.string().trim().min(1).optional(),
        public_interface: z.array(z.string().trim().min(1)).optional()
    })
    .strict();

const catalogSchema = z
    .object({
        rapps: z.array(z.unknown())
    })
    .strict();

/**
 * Parses one YAML catalog into descriptors in file order.
 * Expects: sourcePath is absolute; relative commands and working directories resolve against its directory.
 */
export function rappCatalogParse(content: string, sourcePath: string): RappDescriptor[] {
    let document: unknown;
    try {
        document = parse(content);
    } catch (error) {
        throw new RegistryError("malformed_entry", `Catalog ${sourcePath} is not valid YAML.`, {
            source: sourcePath,
            cause: error
        });
    }

    const catalog = catalogSchema.safeParse(document ?? {});
    if (!catalog.success) {
        throw new RegistryError("malformed_entry", `Catalog ${sourcePath} must contain a "rapps" list.`, {
            source: sourcePath,
            cause: catalog.error
        });
    }

    const baseDir = path.dirname(sourcePath);
    return catalog.data.rapps.map((raw, index) => {
        const entry = rappEntrySchema.safeParse(raw);
        if (!entry.success) {
            const issue = entry.error.issues[0];
            const where = issue && issue.path.length > 0 ? ` (${issue.path.join(".")}: ${issue.message})` : "";
            throw new RegistryError(
                "malformed_entry",
                `Catalog ${sourcePath} has an invalid rapp at index ${index}${where}.`,
                { source: sourcePath, cause: entry.error }
            );
        }
        const data = entry.data;
        return {
            id: data.id,
            displayName: data.display_name ?? data.id,
            description: data.description ?? "",
            icon: data.icon ?? "",
            entry: {
                command: commandResolve(data.entry.command, baseDir),
                args: [...(data.entry.args ?? [])],
                cwd: path.resolve(baseDir, data.entry.cwd ?? ".")
            },
            parameters: [...(data.parameters ?? [])],
            requiredCapabilities: [...(data.required_capabilities ?? [])],
            platform: data.platform ?? "*.*.*",
            publicInterface: [...(data.public_interface ?? [])],
            source: sourcePath
        };
    });
}

function commandResolve(command: string, baseDir: string): string {
    if (command.startsWith("./") || command.startsWith("../")) {
        return path.resolve(baseDir, command);
    }
    return command;
}
