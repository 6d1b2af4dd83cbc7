import { commandRequest, commandRun, type ClientOptions } from "./commandRequest.js";
import { rappsFormat, rappsResponseSchema } from "./statusFormat.js";

export async function listCommand(options: ClientOptions): Promise<void> {
    await commandRun("List", async () => {
        const listing = rappsResponseSchema.parse(await commandRequest(options, "GET", "/v1/rapps"));
        for (const line of rappsFormat(listing)) {
            console.log(line);
        }
    });
}
