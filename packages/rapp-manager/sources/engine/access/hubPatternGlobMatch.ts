const regexCache = new Map<string, RegExp>();

/**
 * Matches a hub identity against a glob where `*` is any run of characters and `?` is one character.
 * The whole identity must match; comparison is case-sensitive.
 */
export function hubPatternGlobMatch(pattern: string, candidate: string): boolean {
    const normalizedPattern = pattern.trim();
    if (!normalizedPattern) {
        return false;
    }
    return globRegExp(normalizedPattern).test(candidate.trim());
}

function globRegExp(pattern: string): RegExp {
    const cached = regexCache.get(pattern);
    if (cached) {
        return cached;
    }
    let source = "";
    for (const char of pattern) {
        if (char === "*") {
            source += ".*";
        } else if (char === "?") {
            source += ".";
        } else {
            source += char.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
        }
    }
    const compiled = new RegExp(`^${source}$`);
    regexCache.set(pattern, compiled);
    return compiled;
}
