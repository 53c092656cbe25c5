import { constants as fsConstants, promises as fs } from "node:fs";

import type { Logger } from "pino";

import { getLogger } from "../../log.js";
import type { RuntimeVersion } from "../../settings.js";
import { type CommandRunner, commandRun } from "../processes/commandRun.js";
import { runtimeVersionParse, runtimeVersionSatisfies } from "./runtimeVersionParse.js";

export type RuntimeDetectorOptions = {
    bundledPath: string | null;
    searchPaths: string[];
    minVersion: RuntimeVersion;
    run?: CommandRunner;
    pathLookup?: () => Promise<string | null>;
    logger?: Logger;
};

/**
 * Locates an interpreter: the bundled one first, then well-known system paths, then PATH.
 * System candidates must report a version satisfying minVersion.
 */
export class RuntimeDetector {
    private readonly options: RuntimeDetectorOptions;
    private readonly run: CommandRunner;
    private readonly logger: Logger;

    constructor(options: RuntimeDetectorOptions) {
        this.options = options;
        this.run = options.run ?? commandRun;
        this.logger = options.logger ?? getLogger("sidecar.runtime");
    }

    async detect(): Promise<string | null> {
        const bundled = this.options.bundledPath;
        if (bundled && (await runtimeIsExecutable(bundled))) {
            this.logger.info({ path: bundled }, "event: Using bundled runtime");
            return bundled;
        }

        for (const candidate of this.options.searchPaths) {
            if (await this.candidateAccept(candidate)) {
                this.logger.info({ path: candidate }, "event: Found system runtime");
                return candidate;
            }
        }

        const located = await (this.options.pathLookup ?? (() => this.pathLookup()))();
        if (located && (await this.candidateAccept(located))) {
            this.logger.info({ path: located }, "event: Found runtime on PATH");
            return located;
        }

        this.logger.warn(
            { minVersion: `${this.options.minVersion.major}.${this.options.minVersion.minor}` },
            "error: No suitable runtime found"
        );
        return null;
    }

    async versionRead(executable: string): Promise<RuntimeVersion | null> {
        try {
            const result = await this.run({ command: executable, args: ["--version"] });
            if (result.exitCode !== 0) {
                return null;
            }
            return runtimeVersionParse(`${result.stdout}\n${result.stderr}`);
        } catch {
            return null;
        }
    }

    private async candidateAccept(candidate: string): Promise<boolean> {
        if (!(await runtimeIsExecutable(candidate))) {
            return false;
        }
        const version = await this.versionRead(candidate);
        if (!version) {
            return false;
        }
        const accepted = runtimeVersionSatisfies(version, this.options.minVersion);
        if (!accepted) {
            this.logger.debug({ path: candidate, version: `${version.major}.${version.minor}` }, "event: Runtime too old");
        }
        return accepted;
    }

    private async pathLookup(): Promise<string | null> {
        try {
            const result = await this.run({ command: "/bin/sh", args: ["-c", "command -v python3"] });
            if (result.exitCode !== 0) {
                return null;
            }
            const located = result.stdout.split(/\r?\n/)[0]?.trim();
            return located ? located : null;
        } catch {
            return null;
        }
    }
}

async function runtimeIsExecutable(filePath: string): Promise<boolean> {
    try {
        const stat = await fs.stat(filePath);
        if (!stat.isFile()) {
            return false;
        }
        await fs.access(filePath, fsConstants.X_OK);
        return true;
    } catch {
        return false;
    }
}
