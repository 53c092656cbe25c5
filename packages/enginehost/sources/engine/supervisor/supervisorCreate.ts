import path from "node:path";

import type { Config } from "../../config/configTypes.js";
import { Environment } from "../environment/environment.js";
import { environmentPathsResolve } from "../environment/environmentPathsResolve.js";
import { HealthProber } from "../health/healthProber.js";
import { ProcessLauncher } from "../launch/processLauncher.js";
import { sidecarArgsBuild } from "../launch/sidecarArgsBuild.js";
import { OrphanReaper } from "../orphans/orphanReaper.js";
import { ProcessRecordStore } from "../orphans/processRecordStore.js";
import { RuntimeDetector } from "../runtime/runtimeDetector.js";
import { Supervisor } from "./supervisor.js";

export type SupervisorParts = {
    supervisor: Supervisor;
    runtime: RuntimeDetector;
    environment: Environment;
    health: HealthProber;
    records: ProcessRecordStore;
};

/**
 * Wires the lifecycle components for one data directory.
 */
export function supervisorCreate(config: Config): SupervisorParts {
    const records = new ProcessRecordStore(path.join(config.dataDir, "sidecar.pid"), {
        legacyPort: config.ports.first
    });
    const runtime = new RuntimeDetector({
        bundledPath: config.runtime.bundledPath,
        searchPaths: [...config.runtime.searchPaths],
        minVersion: config.runtime.minVersion
    });
    const paths = environmentPathsResolve(config.dataDir);
    const environment = new Environment({
        paths,
        sourceDir: config.sidecar.sourceDir,
        files: [...config.sidecar.files],
        requirementsFile: config.sidecar.requirementsFile,
        progressIntervalMs: config.provisioning.progressIntervalMs
    });
    const launcher = new ProcessLauncher({
        executable: paths.pythonPath,
        args: (port) => sidecarArgsBuild({ server: config.sidecar.server, app: config.sidecar.app, port }),
        cwd: config.sidecar.runFromSource ? config.sidecar.sourceDir : paths.sidecarDir,
        env: { ...config.sidecar.env },
        ports: { first: config.ports.first, last: config.ports.last },
        records
    });
    const health = new HealthProber({
        path: config.health.path,
        pollIntervalMs: config.health.pollIntervalMs,
        requestTimeoutMs: config.health.requestTimeoutMs
    });
    const orphans = new OrphanReaper({ records, graceMs: config.restart.orphanGraceMs });

    const supervisor = new Supervisor({
        runtime,
        environment,
        launcher,
        health,
        orphans,
        records,
        startupTimeoutMs: config.health.startupTimeoutMs,
        monitorIntervalMs: config.health.monitorIntervalMs,
        maxCrashRetries: config.restart.maxCrashRetries,
        stopTimeoutMs: config.restart.stopTimeoutMs
    });

    return { supervisor, runtime, environment, health, records };
}
