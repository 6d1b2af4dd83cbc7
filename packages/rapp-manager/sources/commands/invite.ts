import { z } from "zod";

import { commandRequest, commandRun, type ClientOptions } from "./commandRequest.js";

export type InviteOptions = ClientOptions & {
    cancel?: boolean;
    namespace?: string;
};

const invitedSchema = z.object({ remoteController: z.string().nullable() });

export async function inviteCommand(hub: string, options: InviteOptions): Promise<void> {
    await commandRun("Invite", async () => {
        const response = invitedSchema.parse(
            await commandRequest(
                options,
                "POST",
                "/v1/invite",
                {
                    hub,
                    cancel: options.cancel ?? false,
                    ...(options.namespace === undefined ? {} : { applicationNamespace: options.namespace })
                },
                { waitsForStop: options.cancel === true }
            )
        );
        console.log(
            response.remoteController ? `Remote controller: ${response.remoteController}` : "No remote controller."
        );
    });
}
