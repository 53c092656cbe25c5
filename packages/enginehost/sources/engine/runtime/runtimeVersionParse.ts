import type { RuntimeVersion } from "../../settings.js";

/**
 * Extracts major/minor from `--version` output such as "Python 3.11.9".
 */
export function runtimeVersionParse(output: string): RuntimeVersion | null {
    const match = /Python\s+(\d+)\.(\d+)/i.exec(output);
    if (!match?.[1] || !match[2]) {
        return null;
    }
    return { major: Number(match[1]), minor: Number(match[2]) };
}

/**
 * Same major as the requirement and at least its minor.
 */
export function runtimeVersionSatisfies(version: RuntimeVersion, required: RuntimeVersion): boolean {
    return version.major === required.major && version.minor >= required.minor;
}
