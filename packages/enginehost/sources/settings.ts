import { resolveEnginehostPath } from "./paths.js";

export type RuntimeVersion = {
    major: number;
    minor: number;
};

export type SidecarSettings = {
    sourceDir?: string;
    files?: string[];
    requirementsFile?: string;
    app?: string;
    server?: string;
    runFromSource?: boolean;
    env?: Record<string, string>;
};

export type RuntimeSettings = {
    bundledPath?: string;
    searchPaths?: string[];
    minVersion?: RuntimeVersion;
};

export type PortSettings = {
    first?: number;
    last?: number;
};

export type HealthSettings = {
    path?: string;
    startupTimeoutMs?: number;
    pollIntervalMs?: number;
    requestTimeoutMs?: number;
    monitorIntervalMs?: number;
};

export type RestartSettings = {
    maxCrashRetries?: number;
    stopTimeoutMs?: number;
    orphanGraceMs?: number;
};

export type ProvisioningSettings = {
    progressIntervalMs?: number;
};

export type SettingsConfig = {
    engine?: {
        dataDir?: string;
    };
    sidecar?: SidecarSettings;
    runtime?: RuntimeSettings;
    ports?: PortSettings;
    health?: HealthSettings;
    restart?: RestartSettings;
    provisioning?: ProvisioningSettings;
};

export const DEFAULT_SETTINGS_PATH = resolveEnginehostPath("settings.json");

/**
 * Well-known interpreter locations probed after the bundled runtime.
 */
export const DEFAULT_RUNTIME_SEARCH_PATHS = [
    "/usr/local/bin/python3",
    "/opt/homebrew/bin/python3",
    "/usr/bin/python3",
    "/Library/Frameworks/Python.framework/Versions/3.11/bin/python3",
    "/Library/Frameworks/Python.framework/Versions/3.12/bin/python3"
];
