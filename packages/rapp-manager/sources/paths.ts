import os from "node:os";
import path from "node:path";

function resolveRappmanRoot(): string {
    const root = process.env.RAPPMAN_ROOT_DIR?.trim();
    if (root) {
        return path.resolve(root);
    }
    return path.join(os.homedir(), ".rappman");
}

export const DEFAULT_RAPPMAN_DIR = resolveRappmanRoot();

export function resolveRappmanPath(...segments: string[]): string {
    return path.join(DEFAULT_RAPPMAN_DIR, ...segments);
}

export const DEFAULT_SETTINGS_PATH = resolveRappmanPath("settings.json");
export const DEFAULT_SOCKET_PATH = resolveRappmanPath("rappman.sock");
