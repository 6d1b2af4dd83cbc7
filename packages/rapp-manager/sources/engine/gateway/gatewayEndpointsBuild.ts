import type { WhitelistPolicy } from "../access/accessTypes.js";
import type { HubEndpoint, PresenceTarget, RobotIdentity } from "./hubTypes.js";

/**
 * Computes the endpoints that should be flipped for a target under a policy.
 * Local-only or no target yields nothing; an empty whitelist opens endpoints to every hub (`*`).
 */
export function gatewayEndpointsBuild(
    identity: RobotIdentity,
    target: PresenceTarget | null,
    policy: WhitelistPolicy
): HubEndpoint[] {
    if (!target || policy.localOnly) {
        return [];
    }
    const remotes = policy.whitelist.length > 0 ? [...policy.whitelist] : ["*"];
    const prefix = `/${identity.effectiveName}/${target.namespace}`;
    const names = [`${prefix}/${target.rappId}`, ...target.publicInterface.map((name) => `${prefix}/${name}`)];
    return Array.from(new Set(names)).map((name) => ({ name, remotes: [...remotes] }));
}
