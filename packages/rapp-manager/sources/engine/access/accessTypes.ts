export type HubMatcherKind = "glob" | "regex";

/**
 * Decides whether a whitelist pattern matches a requesting hub identity.
 * Expects: validate() throws for patterns the matcher cannot evaluate.
 */
export type HubMatcher = {
    kind: HubMatcherKind;
    match: (pattern: string, candidate: string) => boolean;
    validate: (pattern: string) => void;
};

export type WhitelistPolicy = {
    localOnly: boolean;
    whitelist: string[];
    blacklist: string[];
};

export type AccessCaller = { type: "local" } | { type: "remote"; hub: string };

export type AccessReason = "local" | "local_only" | "blacklisted" | "whitelisted" | "not_whitelisted" | "open";

export type AccessDecision = {
    allowed: boolean;
    reason: AccessReason;
    pattern: string | null;
};
