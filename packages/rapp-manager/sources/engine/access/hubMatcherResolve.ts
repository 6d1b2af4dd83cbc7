import type { HubMatcher, HubMatcherKind } from "./accessTypes.js";
import { hubPatternGlobMatch } from "./hubPatternGlobMatch.js";
import { hubPatternRegexMatch, hubPatternRegexValidate } from "./hubPatternRegexMatch.js";

export function hubMatcherResolve(kind: HubMatcherKind): HubMatcher {
    switch (kind) {
        case "glob":
            return { kind, match: hubPatternGlobMatch, validate: () => undefined };
        case "regex":
            return { kind, match: hubPatternRegexMatch, validate: hubPatternRegexValidate };
    }
}
