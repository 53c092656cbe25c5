import path from "node:path";

import type { ProcessRecord } from "@/types";
import { configLoad } from "../config/configLoad.js";
import { processIsRunning } from "../engine/processes/processIsRunning.js";
import { supervisorCreate } from "../engine/supervisor/supervisorCreate.js";
import { DEFAULT_SETTINGS_PATH } from "../settings.js";

export type StatusOptions = {
    settings?: string;
};

export type StatusReport =
    | { state: "stopped" }
    | { state: "stale"; record: ProcessRecord }
    | { state: "running"; record: ProcessRecord; healthy: boolean };

export async function statusCommand(options: StatusOptions): Promise<void> {
    const config = await configLoad(path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH));
    const { records, health } = supervisorCreate(config);
    const report = await statusCollect({
        readRecord: () => records.read(),
        isRunning: processIsRunning,
        check: (port) => health.check(port)
    });
    for (const line of statusFormat(report)) {
        console.log(line);
    }
}

export async function statusCollect(deps: {
    readRecord: () => Promise<ProcessRecord | null>;
    isRunning: (pid: number) => boolean;
    check: (port: number) => Promise<boolean>;
}): Promise<StatusReport> {
    const record = await deps.readRecord();
    if (!record) {
        return { state: "stopped" };
    }
    if (!deps.isRunning(record.pid)) {
        return { state: "stale", record };
    }
    return { state: "running", record, healthy: await deps.check(record.port) };
}

export function statusFormat(report: StatusReport): string[] {
    switch (report.state) {
        case "stopped":
            return ["Engine: not running"];
        case "stale":
            return [
                `Engine: not running (stale record for pid ${report.record.pid} on port ${report.record.port})`,
                "The record is cleaned up on the next start."
            ];
        case "running":
            return [
                `Engine: running (pid ${report.record.pid})`,
                `Port: ${report.record.port}`,
                `Health: ${report.healthy ? "ok" : "not responding"}`
            ];
    }
}
