import { commandRequest, commandRun, type ClientOptions } from "./commandRequest.js";
import { healthResponseSchema, statusFormat, statusResponseSchema } from "./statusFormat.js";

export async function statusCommand(options: ClientOptions): Promise<void> {
    await commandRun("Status", async () => {
        const status = statusResponseSchema.parse(await commandRequest(options, "GET", "/v1/status"));
        const health = healthResponseSchema.parse(await commandRequest(options, "GET", "/v1/health"));
        for (const line of statusFormat(status.status, health)) {
            console.log(line);
        }
    });
}
