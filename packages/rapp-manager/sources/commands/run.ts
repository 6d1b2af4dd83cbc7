import { z } from "zod";

import { commandRequest, commandRun, type ClientOptions } from "./commandRequest.js";
import { paramsParse } from "./paramsParse.js";

export type RunOptions = ClientOptions & {
    param?: string[];
};

const startedSchema = z.object({ rappId: z.string(), pid: z.number() });

export async function runCommand(rappId: string, options: RunOptions): Promise<void> {
    await commandRun("Run", async () => {
        const parameters = paramsParse(options.param ?? []);
        const started = startedSchema.parse(
            await commandRequest(options, "POST", "/v1/rapps/start", { rappId, parameters })
        );
        console.log(`Started ${started.rappId} (pid ${started.pid}).`);
    });
}
