import { promises as fs } from "node:fs";
import path from "node:path";

import { ZodError } from "zod";

import { getLogger } from "../log.js";
import { DEFAULT_SETTINGS_PATH } from "../paths.js";
import { configResolve } from "./configResolve.js";
import { configSettingsParse } from "./configSettingsParse.js";
import type { Config, ConfigOverrides } from "./configTypes.js";

const logger = getLogger("config.load");

/**
 * Reads settings.json and resolves it into a frozen Config. A missing file means every default.
 */
export async function configLoad(
    settingsPath: string = DEFAULT_SETTINGS_PATH,
    overrides: ConfigOverrides = {}
): Promise<Config> {
    const resolvedPath = path.resolve(settingsPath);
    const content = await settingsRead(resolvedPath);
    let raw: unknown = {};
    if (content === null) {
        logger.debug({ settings: resolvedPath }, "load: Settings file missing; using defaults");
    } else {
        try {
            raw = JSON.parse(content);
        } catch (error) {
            throw new Error(`Settings file ${resolvedPath} is not valid JSON.`, { cause: error });
        }
    }

    try {
        return configResolve(configSettingsParse(raw), resolvedPath, overrides);
    } catch (error) {
        const details = issueDescribe(error);
        throw new Error(`Settings file ${resolvedPath} is invalid: ${details}`, { cause: error });
    }
}

async function settingsRead(settingsPath: string): Promise<string | null> {
    try {
        return await fs.readFile(settingsPath, "utf8");
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
            return null;
        }
        throw error;
    }
}

function issueDescribe(error: unknown): string {
    if (error instanceof ZodError) {
        const issue = error.issues[0];
        if (issue) {
            return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
        }
    }
    return error instanceof Error ? error.message : String(error);
}
