import { promises as fs } from "node:fs";
import path from "node:path";

import type { Config } from "@/types";
import { configLoad } from "../config/configLoad.js";
import type { EnvironmentStatus } from "../engine/environment/environment.js";
import { portFind } from "../engine/launch/portFind.js";
import { supervisorCreate } from "../engine/supervisor/supervisorCreate.js";
import { supervisorErrorIs } from "../engine/supervisor/supervisorError.js";
import { DEFAULT_SETTINGS_PATH, type RuntimeVersion } from "../settings.js";

export type DoctorOptions = {
    settings?: string;
};

export type DoctorReport = {
    runtime: { path: string; version: RuntimeVersion | null } | null;
    minVersion: RuntimeVersion;
    environment: { status: EnvironmentStatus; path: string };
    sourceDir: string;
    missingFiles: string[];
    ports: { first: number; last: number };
    freePort: number | null;
};

export async function doctorCommand(options: DoctorOptions): Promise<void> {
    const config = await configLoad(path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH));
    const report = await doctorCollect(config);
    for (const line of doctorFormat(report)) {
        console.log(line);
    }
    if (!doctorReportOk(report)) {
        process.exitCode = 1;
    }
}

export async function doctorCollect(
    config: Config,
    findPort: (range: { first: number; last: number }) => Promise<number> = portFind
): Promise<DoctorReport> {
    const { runtime, environment } = supervisorCreate(config);
    const runtimePath = await runtime.detect();
    const version = runtimePath ? await runtime.versionRead(runtimePath) : null;

    const missingFiles: string[] = [];
    for (const file of config.sidecar.files) {
        try {
            await fs.access(path.join(config.sidecar.sourceDir, file));
        } catch (error) {
            if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
                throw error;
            }
            missingFiles.push(file);
        }
    }

    let freePort: number | null = null;
    try {
        freePort = await findPort(config.ports);
    } catch (error) {
        if (!supervisorErrorIs(error, "port-conflict")) {
            throw error;
        }
    }

    return {
        runtime: runtimePath ? { path: runtimePath, version } : null,
        minVersion: config.runtime.minVersion,
        environment: { status: await environment.status(), path: environment.paths.environmentDir },
        sourceDir: config.sidecar.sourceDir,
        missingFiles,
        ports: { first: config.ports.first, last: config.ports.last },
        freePort
    };
}

export function doctorFormat(report: DoctorReport): string[] {
    const required = `${report.minVersion.major}.${report.minVersion.minor}`;
    const lines: string[] = [];
    if (report.runtime) {
        const version = report.runtime.version ? `${report.runtime.version.major}.${report.runtime.version.minor}` : "bundled";
        lines.push(`  OK: Runtime ${report.runtime.path} (${version})`);
    } else {
        lines.push(`  FAIL: No Python runtime ${required} or newer found`);
    }
    lines.push(`  ${report.environment.status === "partial" ? "WARN" : "OK"}: Environment ${report.environment.status} (${report.environment.path})`);
    if (report.missingFiles.length > 0) {
        lines.push(`  FAIL: Sidecar files missing in ${report.sourceDir}: ${report.missingFiles.join(", ")}`);
    } else {
        lines.push(`  OK: Sidecar files present in ${report.sourceDir}`);
    }
    if (report.freePort === null) {
        lines.push(`  FAIL: No free port between ${report.ports.first} and ${report.ports.last}`);
    } else {
        lines.push(`  OK: First free port ${report.freePort}`);
    }
    lines.push(doctorReportOk(report) ? "Doctor finished OK." : "Doctor finished with issues.");
    return lines;
}

export function doctorReportOk(report: DoctorReport): boolean {
    return report.runtime !== null && report.missingFiles.length === 0 && report.freePort !== null;
}
