import { z } from "zod";

export const statusResponseSchema = z.object({
    status: z.object({
        state: z.string(),
        rappId: z.string().nullable(),
        pid: z.number().nullable(),
        startedAt: z.number().nullable(),
        remoteController: z.string().nullable(),
        applicationNamespace: z.string()
    })
});

export const healthResponseSchema = z.object({
    robot: z.string(),
    hub: z.string(),
    hubConnected: z.boolean(),
    pending: z.number(),
    nextWatchAt: z.number().nullable()
});

export const rappsResponseSchema = z.object({
    installed: z.array(
        z.object({
            id: z.string(),
            displayName: z.string(),
            description: z.string(),
            parameters: z.array(z.string()),
            requiredCapabilities: z.array(z.string())
        })
    ),
    runnable: z.array(z.object({ id: z.string() })),
    running: z.string().nullable()
});

export const policyResponseSchema = z.object({
    policy: z.object({
        localOnly: z.boolean(),
        whitelist: z.array(z.string()),
        blacklist: z.array(z.string())
    })
});

export type StatusResponse = z.infer<typeof statusResponseSchema>;
export type HealthResponse = z.infer<typeof healthResponseSchema>;
export type RappsResponse = z.infer<typeof rappsResponseSchema>;
export type PolicyResponse = z.infer<typeof policyResponseSchema>;

export function statusFormat(status: StatusResponse["status"], health: HealthResponse, now = Date.now()): string[] {
    const lines = [`Robot: ${health.robot}`];
    if (status.rappId) {
        const uptime = status.startedAt === null ? "" : ` for ${Math.max(0, Math.round((now - status.startedAt) / 1000))}s`;
        const pid = status.pid === null ? "" : ` (pid ${status.pid})`;
        lines.push(`Rapp: ${status.rappId} ${status.state}${pid}${uptime}`);
    } else {
        lines.push(`Rapp: none (${status.state})`);
    }
    lines.push(`Namespace: ${status.applicationNamespace}`);
    lines.push(`Remote controller: ${status.remoteController ?? "none"}`);
    const pending = health.pending > 0 ? `, ${health.pending} pending` : "";
    lines.push(`Hub: ${health.hub} ${health.hubConnected ? "connected" : "disconnected"}${pending}`);
    lines.push(
        health.nextWatchAt === null
            ? "Watch: not scheduled"
            : `Watch: next check in ${Math.max(0, Math.ceil((health.nextWatchAt - now) / 1000))}s`
    );
    return lines;
}

export function rappsFormat(listing: RappsResponse): string[] {
    if (listing.installed.length === 0) {
        return ["No rapps installed."];
    }
    const runnable = new Set(listing.runnable.map((rapp) => rapp.id));
    return listing.installed.map((rapp) => {
        const marks = [
            listing.running === rapp.id ? "running" : null,
            runnable.has(rapp.id) ? null : `needs ${rapp.requiredCapabilities.join(", ")}`,
            rapp.parameters.length > 0 ? `params ${rapp.parameters.join(", ")}` : null
        ].filter((mark): mark is string => mark !== null);
        const name = rapp.displayName === rapp.id ? rapp.id : `${rapp.id} (${rapp.displayName})`;
        return marks.length > 0 ? `${name} [${marks.join("; ")}]` : name;
    });
}

export function policyFormat(policy: PolicyResponse["policy"]): string[] {
    return [
        `Local only: ${policy.localOnly ? "yes" : "no"}`,
        `Whitelist: ${policy.whitelist.length > 0 ? policy.whitelist.join(", ") : "(open)"}`,
        `Blacklist: ${policy.blacklist.length > 0 ? policy.blacklist.join(", ") : "(none)"}`
    ];
}
