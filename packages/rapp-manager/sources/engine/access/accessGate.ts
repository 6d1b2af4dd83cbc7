import { getLogger } from "../../log.js";
import { freezeDeep } from "../../util/freezeDeep.js";
import type { AccessCaller, AccessDecision, HubMatcher, WhitelistPolicy } from "./accessTypes.js";

const logger = getLogger("access.gate");

/**
 * Evaluates remote control requests against the active whitelist policy.
 * Expects: policy replacement goes through setPolicy so evaluations never see a half-applied policy.
 */
export class AccessGate {
    private readonly matcher: HubMatcher;
    private policy: WhitelistPolicy;

    constructor(policy: WhitelistPolicy, matcher: HubMatcher) {
        this.matcher = matcher;
        this.policy = policyClone(policy, matcher);
    }

    setPolicy(policy: WhitelistPolicy): void {
        const next = policyClone(policy, this.matcher);
        this.policy = next;
        logger.info(
            { localOnly: next.localOnly, whitelist: next.whitelist, blacklist: next.blacklist },
            "event: Access policy replaced"
        );
    }

    policyGet(): WhitelistPolicy {
        return this.policy;
    }

    evaluate(caller: AccessCaller): AccessDecision {
        if (caller.type === "local") {
            return { allowed: true, reason: "local", pattern: null };
        }
        return accessEvaluate(this.policy, this.matcher, caller.hub);
    }
}

/**
 * Evaluates one remote hub identity: local-only denies, blacklist denies, then the whitelist
 * is walked top to bottom and the first match allows. An empty whitelist is an open policy.
 */
export function accessEvaluate(policy: WhitelistPolicy, matcher: HubMatcher, hub: string): AccessDecision {
    if (policy.localOnly) {
        return { allowed: false, reason: "local_only", pattern: null };
    }
    for (const pattern of policy.blacklist) {
        if (matcher.match(pattern, hub)) {
            return { allowed: false, reason: "blacklisted", pattern };
        }
    }
    if (policy.whitelist.length === 0) {
        return { allowed: true, reason: "open", pattern: null };
    }
    for (const pattern of policy.whitelist) {
        if (matcher.match(pattern, hub)) {
            return { allowed: true, reason: "whitelisted", pattern };
        }
    }
    return { allowed: false, reason: "not_whitelisted", pattern: null };
}

function policyClone(policy: WhitelistPolicy, matcher: HubMatcher): WhitelistPolicy {
    const whitelist = patternsNormalize(policy.whitelist);
    const blacklist = patternsNormalize(policy.blacklist);
    for (const pattern of [...whitelist, ...blacklist]) {
        matcher.validate(pattern);
    }
    return freezeDeep({ localOnly: policy.localOnly, whitelist, blacklist });
}

function patternsNormalize(patterns: string[]): string[] {
    return patterns.map((pattern) => pattern.trim()).filter((pattern) => pattern.length > 0);
}
