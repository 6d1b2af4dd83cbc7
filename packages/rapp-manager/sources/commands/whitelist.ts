import { commandRequest, commandRun, type ClientOptions } from "./commandRequest.js";
import { policyFormat, policyResponseSchema } from "./statusFormat.js";

export type WhitelistOptions = ClientOptions & {
    localOnly?: boolean;
    allow?: string[];
    deny?: string[];
};

/**
 * Prints the access policy, or replaces the given parts of it when any flag is passed.
 */
export async function whitelistCommand(options: WhitelistOptions): Promise<void> {
    await commandRun("Whitelist", async () => {
        const patch = {
            ...(options.localOnly === undefined ? {} : { localOnly: options.localOnly }),
            ...(options.allow === undefined ? {} : { whitelist: options.allow }),
            ...(options.deny === undefined ? {} : { blacklist: options.deny })
        };
        const response =
            Object.keys(patch).length === 0
                ? await commandRequest(options, "GET", "/v1/access")
                : await commandRequest(options, "PUT", "/v1/access", patch);
        for (const line of policyFormat(policyResponseSchema.parse(response).policy)) {
            console.log(line);
        }
    });
}
