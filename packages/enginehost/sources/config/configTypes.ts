import type { RuntimeVersion } from "../settings.js";

export type Config = {
    settingsPath: string;
    dataDir: string;
    sidecar: {
        sourceDir: string;
        files: string[];
        requirementsFile: string;
        app: string;
        server: string;
        runFromSource: boolean;
        env: Record<string, string>;
    };
    runtime: {
        bundledPath: string | null;
        searchPaths: string[];
        minVersion: RuntimeVersion;
    };
    ports: {
        first: number;
        last: number;
    };
    health: {
        path: string;
        startupTimeoutMs: number;
        pollIntervalMs: number;
        requestTimeoutMs: number;
        monitorIntervalMs: number;
    };
    restart: {
        maxCrashRetries: number;
        stopTimeoutMs: number;
        orphanGraceMs: number;
    };
    provisioning: {
        progressIntervalMs: number;
    };
};
