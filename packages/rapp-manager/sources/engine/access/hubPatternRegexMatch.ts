/**
 * Matches a hub identity against a regular expression anchored at both ends.
 * Expects: pattern was accepted by hubPatternRegexValidate.
 */
export function hubPatternRegexMatch(pattern: string, candidate: string): boolean {
    return new RegExp(`^(?:${pattern})$`).test(candidate.trim());
}

export function hubPatternRegexValidate(pattern: string): void {
    try {
        new RegExp(`^(?:${pattern})$`);
    } catch (error) {
        throw new Error(`Invalid hub pattern: ${pattern}`, { cause: error });
    }
}
