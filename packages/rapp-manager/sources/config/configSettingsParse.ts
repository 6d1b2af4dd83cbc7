import { z } from "zod";

const patternList = z.array(z.string().trim().min(1));

const settingsSchema = z
    .object({
        robot: z
            .object({
                name: z.string().trim().min(1).optional(),
                type: z.string().trim().min(1).optional(),
                icon: z.string().optional(),
                uniqueName: z.boolean().optional(),
                platform: z.string().trim().min(1).optional(),
                capabilities: z.array(z.string().trim().min(1)).optional()
            })
            .strict()
            .optional(),
        rapps: z
            .object({
                catalogs: z.union([z.string(), z.array(z.string().trim().min(1))]).optional(),
                autoStart: z.string().trim().min(1).optional(),
                stopTimeoutMs: z.number().int().positive().optional(),
                applicationNamespace: z.string().trim().min(1).optional()
            })
            .strict()
            .optional(),
        hub: z
            .object({
                url: z.string().url().optional(),
                connectTimeoutMs: z.number().int().positive().optional()
            })
            .strict()
            .optional(),
        watch: z
            .object({
                intervalMs: z.number().int().positive().optional()
            })
            .strict()
            .optional(),
        access: z
            .object({
                localOnly: z.boolean().optional(),
                whitelist: patternList.optional(),
                blacklist: patternList.optional(),
                matcher: z.enum(["glob", "regex"]).optional()
            })
            .strict()
            .optional(),
        server: z
            .object({
                socketPath: z.string().trim().min(1).optional(),
                remote: z
                    .object({
                        host: z.string().trim().min(1).optional(),
                        port: z.number().int().min(1).max(65535)
                    })
                    .strict()
                    .optional()
            })
            .strict()
            .optional()
    })
    .strict();

export type SettingsConfig = z.infer<typeof settingsSchema>;

/**
 * Parses raw settings data into a validated SettingsConfig.
 * Expects: raw is JSON-compatible; unknown keys are rejected.
 */
export function configSettingsParse(raw: unknown): SettingsConfig {
    return settingsSchema.parse(raw);
}
