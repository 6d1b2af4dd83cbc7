import { z } from "zod";

import { commandRequest, commandRun, type ClientOptions } from "./commandRequest.js";

const stoppedSchema = z.object({ rappId: z.string(), forced: z.boolean() });

export async function stopCommand(options: ClientOptions): Promise<void> {
    await commandRun("Stop", async () => {
        const reply = await commandRequest(options, "POST", "/v1/rapps/stop", {}, { waitsForStop: true });
        const stopped = stoppedSchema.parse(reply);
        console.log(stopped.forced ? `Killed ${stopped.rappId} after stop timeout.` : `Stopped ${stopped.rappId}.`);
    });
}
