const PARAMETER_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Parses repeated `name=value` flags into a parameter map. Later values win.
 */
export function paramsParse(values: string[]): Record<string, string> {
    const parameters: Record<string, string> = {};
    for (const entry of values) {
        const separator = entry.indexOf("=");
        if (separator <= 0) {
            throw new Error(`Parameter must look like name=value: ${entry}`);
        }
        const name = entry.slice(0, separator).trim();
        if (!PARAMETER_NAME.test(name)) {
            throw new Error(`Invalid parameter name: ${name}`);
        }
        parameters[name] = entry.slice(separator + 1);
    }
    return parameters;
}

export function paramCollect(value: string, previous: string[] = []): string[] {
    return [...previous, value];
}
