import os from "node:os";
import path from "node:path";

function resolveEnginehostRoot(): string {
    const root = process.env.ENGINEHOST_ROOT_DIR?.trim();
    if (root) {
        return path.resolve(root);
    }
    return path.join(os.homedir(), ".enginehost");
}

export const DEFAULT_ENGINEHOST_DIR = resolveEnginehostRoot();

export function resolveEnginehostPath(...segments: string[]): string {
    return path.join(DEFAULT_ENGINEHOST_DIR, ...segments);
}
