import path from "node:path";

export const ENVIRONMENT_MARKER_NAME = ".environment-complete";

export type EnvironmentPaths = {
    sidecarDir: string;
    environmentDir: string;
    markerPath: string;
    pythonPath: string;
    pipPath: string;
};

/**
 * Resolves the provisioned sidecar layout under dataDir.
 * The marker sits in sidecarDir beside the environment directory, never inside it.
 */
export function environmentPathsResolve(dataDir: string, platform: NodeJS.Platform = process.platform): EnvironmentPaths {
    const sidecarDir = path.join(dataDir, "sidecar");
    const environmentDir = path.join(sidecarDir, ".venv");
    const binDir = platform === "win32" ? path.join(environmentDir, "Scripts") : path.join(environmentDir, "bin");
    const suffix = platform === "win32" ? ".exe" : "";
    return {
        sidecarDir,
        environmentDir,
        markerPath: path.join(sidecarDir, ENVIRONMENT_MARKER_NAME),
        pythonPath: path.join(binDir, `python${suffix}`),
        pipPath: path.join(binDir, `pip${suffix}`)
    };
}
