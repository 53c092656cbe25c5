import { spawn } from "node:child_process";

import type { Logger } from "pino";

import { getLogger } from "../../log.js";
import type { ProcessRecordStore } from "../orphans/processRecordStore.js";
import { OutputDrain } from "../processes/outputDrain.js";
import { SupervisorError } from "../supervisor/supervisorError.js";
import { portFind } from "./portFind.js";
import { SidecarProcess } from "./sidecarProcess.js";

export type ProcessLauncherOptions = {
    executable: string;
    args: (port: number) => string[];
    cwd: string;
    env?: Record<string, string>;
    ports: { first: number; last: number };
    records: Pick<ProcessRecordStore, "write">;
    portFind?: (range: { first: number; last: number }) => Promise<number>;
    logger?: Logger;
};

/**
 * Starts the sidecar on the first free candidate port and records its identity.
 * Expects: the executable lives inside a provisioned environment; no retries happen here.
 */
export class ProcessLauncher {
    private readonly options: ProcessLauncherOptions;
    private readonly logger: Logger;
    private readonly outputLogger: Logger;

    constructor(options: ProcessLauncherOptions) {
        this.options = options;
        this.logger = options.logger ?? getLogger("sidecar.launch");
        this.outputLogger = getLogger("sidecar.output");
    }

    async launch(): Promise<SidecarProcess> {
        const port = await (this.options.portFind ?? portFind)(this.options.ports);
        const args = this.options.args(port);
        this.logger.info({ port, cwd: this.options.cwd }, "start: Launching sidecar");

        const output = new OutputDrain({
            onLine: (line) => {
                this.outputLogger.debug({ port }, line);
            }
        });
        const sidecar = await new Promise<SidecarProcess>((resolve, reject) => {
            const child = spawn(this.options.executable, args, {
                cwd: this.options.cwd,
                env: { ...process.env, ...this.options.env, PYTHONUNBUFFERED: "1" },
                stdio: ["ignore", "pipe", "pipe"]
            });
            output.attach(child.stdout);
            output.attach(child.stderr);
            child.once("error", (error) => {
                reject(
                    new SupervisorError("launch-failed", `Could not start the engine process: ${error.message}`, {
                        cause: error
                    })
                );
            });
            child.once("spawn", () => {
                const pid = child.pid;
                if (!pid) {
                    reject(new SupervisorError("launch-failed", "Engine process started without a pid."));
                    return;
                }
                resolve(new SidecarProcess(child, pid, port, output));
            });
        });

        try {
            await this.options.records.write({ pid: sidecar.pid, port });
        } catch (error) {
            this.logger.warn({ error, processId: sidecar.pid }, "error: Failed to persist sidecar identity record");
        }

        this.logger.info({ processId: sidecar.pid, port }, "start: Sidecar process started");
        return sidecar;
    }
}
