import type { Logger } from "pino";

import { getLogger } from "../../log.js";
import type { EnvironmentEnsureOptions, EnvironmentStatus } from "../environment/environment.js";
import type { HealthTarget } from "../health/healthProber.js";
import type { SidecarHandle } from "../launch/sidecarProcess.js";
import type { OrphanReconcileResult } from "../orphans/orphanReaper.js";
import { processTerminate } from "../processes/processTerminate.js";
import { SupervisorError, supervisorErrorIs } from "./supervisorError.js";
import { type SupervisorState, supervisorStateMessage } from "./supervisorState.js";

const PROGRESS_CREATING = 0.1;
const PROGRESS_INSTALL_START = 0.2;
const PROGRESS_INSTALL_END = 0.9;
const PROGRESS_STARTING = 0.95;

export type SupervisorRuntime = {
    detect(): Promise<string | null>;
};

export type SupervisorEnvironment = {
    status(): Promise<EnvironmentStatus>;
    ensure(runtimePath: string, options?: EnvironmentEnsureOptions): Promise<"reused" | "created">;
    discardPartial(): Promise<boolean>;
    discard(): Promise<void>;
};

export type SupervisorLauncher = {
    launch(): Promise<SidecarHandle>;
};

export type SupervisorHealth = {
    waitUntilHealthy(target: HealthTarget, options: { timeoutMs: number; signal?: AbortSignal }): Promise<void>;
    check(port: number): Promise<boolean>;
};

export type SupervisorOrphans = {
    reconcile(): Promise<OrphanReconcileResult>;
};

export type SupervisorOptions = {
    runtime: SupervisorRuntime;
    environment: SupervisorEnvironment;
    launcher: SupervisorLauncher;
    health: SupervisorHealth;
    orphans: SupervisorOrphans;
    records: { delete(): Promise<void> };
    startupTimeoutMs: number;
    monitorIntervalMs: number;
    maxCrashRetries: number;
    stopTimeoutMs: number;
    logger?: Logger;
};

export type SupervisorStateListener = (state: SupervisorState, progress: number) => void;

/**
 * Owns the sidecar lifecycle: orphan cleanup, runtime detection, provisioning, launch,
 * health verification and bounded crash recovery.
 * Expects: one instance per data directory; entry points share a single in-flight slot,
 * so a call made while another runs starts nothing and settles with the running one.
 */
export class Supervisor {
    private readonly options: SupervisorOptions;
    private readonly logger: Logger;
    private readonly listeners = new Set<SupervisorStateListener>();
    private currentState: SupervisorState = { type: "notStarted" };
    private currentProgress = 0;
    private firstLaunch = false;
    private crashes = 0;
    private handle: SidecarHandle | null = null;
    private inFlight: Promise<void> | null = null;
    private controller: AbortController | null = null;
    private monitorHandle: NodeJS.Timeout | null = null;
    private monitorTicking = false;

    constructor(options: SupervisorOptions) {
        this.options = options;
        this.logger = options.logger ?? getLogger("supervisor");
    }

    get state(): SupervisorState {
        return this.currentState;
    }

    get progress(): number {
        return this.currentProgress;
    }

    get isFirstLaunch(): boolean {
        return this.firstLaunch;
    }

    get crashCount(): number {
        return this.crashes;
    }

    get port(): number | null {
        return this.handle?.port ?? null;
    }

    get pid(): number | null {
        return this.handle?.pid ?? null;
    }

    onStateChange(listener: SupervisorStateListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    ensureRunning(): Promise<void> {
        return this.exclusive("ensureRunning", (signal) => this.ensureRunningRun(signal));
    }

    /**
     * Recovery after an error: drops a partially provisioned environment and starts over.
     */
    retrySetup(): Promise<void> {
        return this.exclusive("retrySetup", async (signal) => {
            this.progressSet(0);
            if (await this.options.environment.discardPartial()) {
                this.logger.info("event: Discarded partial environment before retry");
            }
            await this.ensureRunningRun(signal);
        });
    }

    restartProcess(resetRetryCounter: boolean): Promise<void> {
        return this.exclusive("restartProcess", (signal) => this.restartRun(signal, resetRetryCounter));
    }

    /**
     * Stops the sidecar, removes the environment and its marker, then provisions from scratch.
     */
    cleanInstall(): Promise<void> {
        return this.exclusive("cleanInstall", async (signal) => {
            this.monitorStop();
            await this.sidecarStop();
            await this.options.environment.discard();
            this.logger.info("event: Environment removed for clean install");
            this.progressSet(0);
            await this.ensureRunningRun(signal);
        });
    }

    /**
     * Cancels in-flight work, stops monitoring and terminates the sidecar.
     */
    async stop(): Promise<void> {
        this.monitorStop();
        this.controller?.abort();
        const inFlight = this.inFlight;
        if (inFlight) {
            await inFlight;
        }
        await this.sidecarStop();
        this.stateSet({ type: "notStarted" }, 0);
        this.logger.info("stop: Supervisor stopped");
    }

    private exclusive(name: string, operation: (signal: AbortSignal) => Promise<void>): Promise<void> {
        if (this.inFlight) {
            this.logger.debug({ operation: name }, "event: Operation already in flight");
            return this.inFlight;
        }
        const controller = new AbortController();
        this.controller = controller;
        const run = this.operationRun(name, controller.signal, operation).finally(() => {
            if (this.controller === controller) {
                this.controller = null;
            }
            this.inFlight = null;
        });
        this.inFlight = run;
        return run;
    }

    private async operationRun(
        name: string,
        signal: AbortSignal,
        operation: (signal: AbortSignal) => Promise<void>
    ): Promise<void> {
        try {
            await operation(signal);
        } catch (error) {
            if (signal.aborted) {
                this.logger.info({ operation: name }, "stop: Operation cancelled");
                return;
            }
            const failure = supervisorErrorIs(error)
                ? error
                : new SupervisorError("launch-failed", error instanceof Error ? error.message : String(error), {
                      cause: error
                  });
            this.logger.warn(
                { error, operation: name, kind: failure.kind, details: failure.details },
                "error: Sidecar operation failed"
            );
            this.stateSet({ type: "error", kind: failure.kind, message: failure.message });
        }
    }

    private async ensureRunningRun(signal: AbortSignal): Promise<void> {
        if (this.currentState.type === "running" && this.handle?.isRunning()) {
            return;
        }
        this.monitorStop();
        await this.sidecarStop();

        const reconciled = await this.options.orphans.reconcile();
        this.logger.debug({ result: reconciled }, "event: Orphan reconciliation finished");

        this.stateSet({ type: "checkingRuntime" });
        const runtimePath = await this.options.runtime.detect();
        if (!runtimePath) {
            this.stateSet({ type: "runtimeMissing" });
            return;
        }
        cancelledThrowIf(signal);

        this.stateSet({ type: "checkingEnvironment" });
        const status = await this.options.environment.status();
        this.firstLaunch = status !== "complete";
        await this.options.environment.ensure(runtimePath, {
            signal,
            onProgress: (event) => {
                if (event.phase === "creating") {
                    this.stateSet({ type: "creatingEnvironment" }, PROGRESS_CREATING);
                    return;
                }
                this.stateSet(
                    { type: "installingDependencies", progress: event.progress },
                    PROGRESS_INSTALL_START + (PROGRESS_INSTALL_END - PROGRESS_INSTALL_START) * event.progress
                );
            }
        });
        cancelledThrowIf(signal);

        await this.processStart(signal, true);
    }

    private async restartRun(signal: AbortSignal, resetRetryCounter: boolean): Promise<void> {
        this.monitorStop();
        if (resetRetryCounter) {
            this.crashes = 0;
        }
        await this.sidecarStop();
        await this.processStart(signal, resetRetryCounter);
    }

    private async processStart(signal: AbortSignal, resetRetryCounter: boolean): Promise<void> {
        this.stateSet({ type: "startingProcess" }, PROGRESS_STARTING);
        const handle = await this.options.launcher.launch();
        this.handle = handle;
        cancelledThrowIf(signal);

        this.stateSet({ type: "waitingForHealth" });
        await this.options.health.waitUntilHealthy(handle, { timeoutMs: this.options.startupTimeoutMs, signal });
        cancelledThrowIf(signal);

        if (resetRetryCounter) {
            this.crashes = 0;
        }
        this.stateSet({ type: "running" }, 1);
        this.logger.info({ processId: handle.pid, port: handle.port }, "start: Sidecar running");
        this.monitorStart();
    }

    private async sidecarStop(): Promise<void> {
        const handle = this.handle;
        this.handle = null;
        if (!handle) {
            return;
        }
        const result = await processTerminate(handle, { graceMs: this.options.stopTimeoutMs });
        this.logger.info({ processId: handle.pid, port: handle.port, result }, "stop: Sidecar stopped");
        try {
            await this.options.records.delete();
        } catch (error) {
            this.logger.warn({ error }, "error: Failed to delete sidecar identity record");
        }
    }

    private monitorStart(): void {
        if (this.monitorHandle) {
            return;
        }
        this.monitorHandle = setInterval(() => {
            void this.monitorTick().catch((error) => {
                this.logger.warn({ error }, "error: Sidecar monitor tick failed");
            });
        }, this.options.monitorIntervalMs);
    }

    private monitorStop(): void {
        if (this.monitorHandle) {
            clearInterval(this.monitorHandle);
            this.monitorHandle = null;
        }
    }

    private async monitorTick(): Promise<void> {
        const handle = this.handle;
        if (this.monitorTicking || this.inFlight || this.currentState.type !== "running" || !handle) {
            return;
        }
        this.monitorTicking = true;
        try {
            if (!handle.isRunning()) {
                await this.crashHandle(handle);
                return;
            }
            const healthy = await this.options.health.check(handle.port);
            if (healthy) {
                this.logger.debug({ port: handle.port }, "event: Sidecar healthy");
            } else {
                this.logger.warn({ processId: handle.pid, port: handle.port }, "event: Sidecar alive but not answering");
            }
        } finally {
            this.monitorTicking = false;
        }
    }

    /**
     * Restarts after an unexpected exit. A restart that dies or never turns healthy counts
     * as another crash, until the budget runs out.
     */
    private crashHandle(handle: SidecarHandle): Promise<void> {
        this.monitorStop();
        return this.exclusive("crashRestart", async (signal) => {
            const maxCrashRetries = this.options.maxCrashRetries;
            let exited = handle;
            while (true) {
                this.crashes += 1;
                this.logger.warn(
                    {
                        processId: exited.pid,
                        crashCount: this.crashes,
                        maxCrashRetries,
                        exit: exited.exitStatus(),
                        output: exited.outputTail()
                    },
                    "event: Sidecar exited unexpectedly"
                );
                if (this.crashes > maxCrashRetries) {
                    await this.sidecarStop();
                    throw new SupervisorError(
                        "crash-exhausted",
                        `The engine stopped unexpectedly ${this.crashes} times. Automatic restarts are disabled.`
                    );
                }
                try {
                    await this.restartRun(signal, false);
                    return;
                } catch (error) {
                    if (signal.aborted || !(supervisorErrorIs(error, "process-died") || supervisorErrorIs(error, "health-timeout"))) {
                        throw error;
                    }
                    this.logger.warn({ error, crashCount: this.crashes }, "error: Automatic restart failed");
                    exited = this.handle ?? exited;
                }
            }
        });
    }

    private stateSet(state: SupervisorState, progress?: number): void {
        this.currentState = state;
        if (progress !== undefined) {
            this.currentProgress = progress;
        }
        this.logger.debug({ state: state.type, progress: this.currentProgress }, `event: ${supervisorStateMessage(state)}`);
        for (const listener of this.listeners) {
            try {
                listener(state, this.currentProgress);
            } catch (error) {
                this.logger.warn({ error }, "error: Supervisor state listener failed");
            }
        }
    }

    private progressSet(progress: number): void {
        this.currentProgress = progress;
    }
}

function cancelledThrowIf(signal: AbortSignal): void {
    if (signal.aborted) {
        throw new SupervisorError("cancelled", "Operation cancelled.");
    }
}
