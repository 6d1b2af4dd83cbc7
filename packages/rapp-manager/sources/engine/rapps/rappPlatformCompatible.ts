/**
 * Matches a robot platform tuple against a rapp platform pattern using `*` as a segment wildcard.
 * Expects: both values are `.`-separated tuples such as `linux.node.turtlebot`.
 */
export function rappPlatformCompatible(robotPlatform: string, rappPlatform: string): boolean {
    const robotSegments = robotPlatform.trim().split(".");
    const rappSegments = rappPlatform.trim().split(".");
    if (robotSegments.length !== rappSegments.length) {
        return false;
    }
    for (let i = 0; i < rappSegments.length; i += 1) {
        const rappSegment = rappSegments[i];
        if (rappSegment === "*") {
            continue;
        }
        if (rappSegment !== robotSegments[i]) {
            return false;
        }
    }
    return true;
}
