import path from "node:path";

import { DEFAULT_ENGINEHOST_DIR } from "../paths.js";
import { DEFAULT_RUNTIME_SEARCH_PATHS, type SettingsConfig } from "../settings.js";
import { freezeDeep } from "../util/freezeDeep.js";
import type { Config } from "./configTypes.js";

const DEFAULT_PORT_FIRST = 8000;
const DEFAULT_PORT_LAST = 8009;

/**
 * Resolves derived paths and defaults into an immutable Config snapshot.
 * Expects: settings already validated; relative paths resolve against the settings directory.
 */
export function configResolve(settings: SettingsConfig, settingsPath: string): Config {
    const resolvedSettingsPath = path.resolve(settingsPath);
    const configDir = path.dirname(resolvedSettingsPath);
    const dataDir = path.resolve(configDir, settings.engine?.dataDir ?? DEFAULT_ENGINEHOST_DIR);
    const sidecar = settings.sidecar ?? {};
    const runtime = settings.runtime ?? {};
    const health = settings.health ?? {};
    const restart = settings.restart ?? {};

    return freezeDeep({
        settingsPath: resolvedSettingsPath,
        dataDir,
        sidecar: {
            sourceDir: path.resolve(configDir, sidecar.sourceDir ?? path.join(dataDir, "sidecar-source")),
            files: [...(sidecar.files ?? ["main.py", "requirements.txt"])],
            requirementsFile: sidecar.requirementsFile ?? "requirements.txt",
            app: sidecar.app ?? "main:app",
            server: sidecar.server ?? "uvicorn",
            runFromSource: sidecar.runFromSource ?? false,
            env: { ...sidecar.env }
        },
        runtime: {
            bundledPath: runtime.bundledPath ? path.resolve(configDir, runtime.bundledPath) : null,
            searchPaths: [...(runtime.searchPaths ?? DEFAULT_RUNTIME_SEARCH_PATHS)],
            minVersion: runtime.minVersion ?? { major: 3, minor: 11 }
        },
        ports: {
            first: settings.ports?.first ?? DEFAULT_PORT_FIRST,
            last: settings.ports?.last ?? Math.max(DEFAULT_PORT_LAST, settings.ports?.first ?? DEFAULT_PORT_FIRST)
        },
        health: {
            path: health.path ?? "/health",
            startupTimeoutMs: health.startupTimeoutMs ?? 30_000,
            pollIntervalMs: health.pollIntervalMs ?? 500,
            requestTimeoutMs: health.requestTimeoutMs ?? 2_000,
            monitorIntervalMs: health.monitorIntervalMs ?? 5_000
        },
        restart: {
            maxCrashRetries: restart.maxCrashRetries ?? 3,
            stopTimeoutMs: restart.stopTimeoutMs ?? 5_000,
            orphanGraceMs: restart.orphanGraceMs ?? 1_000
        },
        provisioning: {
            progressIntervalMs: settings.provisioning?.progressIntervalMs ?? 500
        }
    });
}
