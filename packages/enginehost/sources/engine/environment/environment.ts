import { promises as fs } from "node:fs";
import path from "node:path";

import type { Logger } from "pino";

import { getLogger } from "../../log.js";
import { atomicWrite } from "../../util/atomicWrite.js";
import { type CommandRunInput, type CommandRunResult, type CommandRunner, commandRun } from "../processes/commandRun.js";
import { SupervisorError, supervisorErrorIs } from "../supervisor/supervisorError.js";
import type { EnvironmentPaths } from "./environmentPathsResolve.js";
import { progressSimulate } from "./progressSimulate.js";

const MARKER_CONTENT = "complete\n";

export type EnvironmentStatus = "missing" | "partial" | "complete";

export type EnvironmentProgress = { phase: "creating" } | { phase: "installing"; progress: number };

export type EnvironmentEnsureOptions = {
    signal?: AbortSignal;
    onProgress?: (progress: EnvironmentProgress) => void;
};

export type EnvironmentOptions = {
    paths: EnvironmentPaths;
    sourceDir: string;
    files: string[];
    requirementsFile: string;
    progressIntervalMs: number;
    run?: CommandRunner;
    logger?: Logger;
};

/**
 * Provisions the isolated sidecar environment and tracks completion with a marker file.
 * Expects: a directory without its marker is partial and is always discarded, never repaired.
 */
export class Environment {
    readonly paths: EnvironmentPaths;
    private readonly options: EnvironmentOptions;
    private readonly run: CommandRunner;
    private readonly logger: Logger;
    private readonly installLogger: Logger;

    constructor(options: EnvironmentOptions) {
        this.options = options;
        this.paths = options.paths;
        this.run = options.run ?? commandRun;
        this.logger = options.logger ?? getLogger("sidecar.environment");
        this.installLogger = getLogger("sidecar.install");
    }

    async status(): Promise<EnvironmentStatus> {
        if (!(await pathExists(this.paths.sidecarDir))) {
            return "missing";
        }
        if ((await pathExists(this.paths.markerPath)) && (await pathExists(this.paths.environmentDir))) {
            return "complete";
        }
        return "partial";
    }

    /**
     * Returns "reused" for a complete environment, otherwise provisions from scratch.
     */
    async ensure(runtimePath: string, options: EnvironmentEnsureOptions = {}): Promise<"reused" | "created"> {
        const status = await this.status();
        if (status === "complete") {
            this.logger.debug({ path: this.paths.environmentDir }, "event: Environment already complete");
            return "reused";
        }
        if (status === "partial") {
            this.logger.warn({ path: this.paths.sidecarDir }, "event: Discarding partial environment");
            await this.discard();
        }

        options.onProgress?.({ phase: "creating" });
        this.logger.info({ path: this.paths.environmentDir, runtime: runtimePath }, "start: Creating environment");
        await this.filesCopy();
        const venv = await this.commandRunChecked(
            {
                command: runtimePath,
                args: ["-m", "venv", this.paths.environmentDir],
                cwd: this.paths.sidecarDir,
                signal: options.signal
            },
            "Failed to create the engine environment."
        );
        this.logger.debug({ exitCode: venv.exitCode }, "event: Environment created");

        options.onProgress?.({ phase: "installing", progress: 0 });
        this.logger.info({ requirements: this.options.requirementsFile }, "start: Installing dependencies");
        const stop = progressSimulate({
            intervalMs: this.options.progressIntervalMs,
            onProgress: (progress) => options.onProgress?.({ phase: "installing", progress })
        });
        try {
            await this.commandRunChecked(
                {
                    command: this.paths.pipPath,
                    args: ["install", "-r", this.options.requirementsFile, "--quiet"],
                    cwd: this.paths.sidecarDir,
                    signal: options.signal,
                    onLine: (line, stream) => {
                        this.installLogger.debug({ stream }, line);
                    }
                },
                "Failed to install engine dependencies."
            );
        } finally {
            stop();
        }

        await atomicWrite(this.paths.markerPath, MARKER_CONTENT, 0o644);
        options.onProgress?.({ phase: "installing", progress: 1 });
        this.logger.info({ path: this.paths.environmentDir }, "event: Environment ready");
        return "created";
    }

    async discardPartial(): Promise<boolean> {
        if ((await this.status()) !== "partial") {
            return false;
        }
        await this.discard();
        return true;
    }

    async discard(): Promise<void> {
        await fs.rm(this.paths.markerPath, { force: true });
        await fs.rm(this.paths.sidecarDir, { recursive: true, force: true });
    }

    private async filesCopy(): Promise<void> {
        const missing: string[] = [];
        for (const file of this.options.files) {
            if (!(await pathExists(path.join(this.options.sourceDir, file)))) {
                missing.push(file);
            }
        }
        if (missing.length > 0) {
            throw new SupervisorError(
                "provisioning-failed",
                `Sidecar files not found in ${this.options.sourceDir}: ${missing.join(", ")}`
            );
        }
        await fs.mkdir(this.paths.sidecarDir, { recursive: true });
        for (const file of this.options.files) {
            const target = path.join(this.paths.sidecarDir, file);
            await fs.mkdir(path.dirname(target), { recursive: true });
            await fs.copyFile(path.join(this.options.sourceDir, file), target);
        }
    }

    private async commandRunChecked(input: CommandRunInput, message: string): Promise<CommandRunResult> {
        let result: CommandRunResult;
        try {
            result = await this.run(input);
        } catch (error) {
            if (supervisorErrorIs(error)) {
                throw error;
            }
            throw new SupervisorError("provisioning-failed", message, {
                details: error instanceof Error ? error.message : String(error),
                cause: error
            });
        }
        if (result.exitCode !== 0) {
            this.logger.warn(
                { command: input.command, exitCode: result.exitCode, signal: result.signal },
                "error: Provisioning command failed"
            );
            throw new SupervisorError("provisioning-failed", message, { details: result.stderr });
        }
        return result;
    }
}

async function pathExists(target: string): Promise<boolean> {
    try {
        await fs.access(target);
        return true;
    } catch (error) {
        if ((error as NodeJS.ErrnoException).code === "ENOENT") {
            return false;
        }
        throw error;
    }
}
