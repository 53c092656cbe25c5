import type { Logger } from "pino";

import { getLogger } from "../../log.js";
import { portListenersList } from "../processes/portListenersList.js";
import { processIsRunning } from "../processes/processIsRunning.js";
import {
    type ProcessTerminateResult,
    type ProcessTerminateTarget,
    processTargetFromPid,
    processTerminate
} from "../processes/processTerminate.js";
import type { ProcessRecordStore } from "./processRecordStore.js";

export type OrphanReaperOptions = {
    records: Pick<ProcessRecordStore, "read" | "delete">;
    graceMs: number;
    isRunning?: (pid: number) => boolean;
    listenersList?: (port: number) => Promise<number[] | null>;
    targetFromPid?: (pid: number) => ProcessTerminateTarget;
    logger?: Logger;
};

export type OrphanReconcileResult = "no-record" | "not-running" | "not-sidecar" | ProcessTerminateResult | "failed";

/**
 * Terminates a sidecar left behind by a previous run, identified by its durable record.
 * Expects: called before any new launch so the recorded port is released first.
 */
export class OrphanReaper {
    private readonly options: OrphanReaperOptions;
    private readonly logger: Logger;

    constructor(options: OrphanReaperOptions) {
        this.options = options;
        this.logger = options.logger ?? getLogger("sidecar.orphans");
    }

    /**
     * Best effort: never throws, and always deletes the record it found.
     */
    async reconcile(): Promise<OrphanReconcileResult> {
        let result: OrphanReconcileResult = "failed";
        try {
            result = await this.reconcileRecord();
        } catch (error) {
            this.logger.warn({ error }, "error: Orphan reconciliation failed");
        }
        try {
            await this.options.records.delete();
        } catch (error) {
            this.logger.warn({ error }, "error: Failed to delete stale sidecar record");
        }
        return result;
    }

    private async reconcileRecord(): Promise<OrphanReconcileResult> {
        const record = await this.options.records.read();
        if (!record) {
            return "no-record";
        }

        const isRunning = this.options.isRunning ?? processIsRunning;
        if (!isRunning(record.pid)) {
            this.logger.info({ processId: record.pid, port: record.port }, "event: Recorded sidecar is no longer running");
            return "not-running";
        }

        const listeners = await (this.options.listenersList ?? portListenersList)(record.port);
        if (!listeners || !listeners.includes(record.pid)) {
            this.logger.info(
                { processId: record.pid, port: record.port, listeners },
                "event: Recorded pid does not own its port; leaving it alone"
            );
            return "not-sidecar";
        }

        this.logger.info({ processId: record.pid, port: record.port }, "stop: Terminating orphaned sidecar");
        const target = (this.options.targetFromPid ?? processTargetFromPid)(record.pid);
        const outcome = await processTerminate(target, { graceMs: this.options.graceMs });
        this.logger.info({ processId: record.pid, outcome }, "stop: Orphaned sidecar terminated");
        return outcome;
    }
}
