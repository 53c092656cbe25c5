import { spawn } from "node:child_process";

import { SupervisorError } from "../supervisor/supervisorError.js";
import { OutputDrain } from "./outputDrain.js";

const ABORT_KILL_MS = 2_000;

export type CommandRunInput = {
    command: string;
    args: string[];
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    signal?: AbortSignal;
    onLine?: (line: string, stream: "stdout" | "stderr") => void;
    maxLines?: number;
};

export type CommandRunResult = {
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
};

export type CommandRunner = (input: CommandRunInput) => Promise<CommandRunResult>;

/**
 * Runs a command to completion while draining stdout and stderr for its whole lifetime.
 * Rejects with the spawn error when the executable cannot start, and with a "cancelled"
 * SupervisorError after the child exits when the signal aborted it.
 */
export function commandRun(input: CommandRunInput): Promise<CommandRunResult> {
    return new Promise((resolve, reject) => {
        if (input.signal?.aborted) {
            reject(new SupervisorError("cancelled", `Command cancelled before start: ${input.command}`));
            return;
        }

        const child = spawn(input.command, input.args, {
            cwd: input.cwd,
            env: input.env,
            stdio: ["ignore", "pipe", "pipe"]
        });
        const stdout = new OutputDrain({
            maxLines: input.maxLines,
            onLine: input.onLine ? (line) => input.onLine?.(line, "stdout") : undefined
        });
        const stderr = new OutputDrain({
            maxLines: input.maxLines,
            onLine: input.onLine ? (line) => input.onLine?.(line, "stderr") : undefined
        });
        stdout.attach(child.stdout);
        stderr.attach(child.stderr);

        let aborted = false;
        let killTimer: NodeJS.Timeout | null = null;
        const onAbort = () => {
            aborted = true;
            child.kill("SIGTERM");
            killTimer = setTimeout(() => {
                child.kill("SIGKILL");
            }, ABORT_KILL_MS);
            killTimer.unref();
        };
        input.signal?.addEventListener("abort", onAbort, { once: true });
        const cleanup = () => {
            input.signal?.removeEventListener("abort", onAbort);
            if (killTimer) {
                clearTimeout(killTimer);
            }
        };

        child.once("error", (error) => {
            cleanup();
            reject(error);
        });
        child.once("close", (exitCode, signal) => {
            cleanup();
            if (aborted) {
                reject(new SupervisorError("cancelled", `Command cancelled: ${input.command}`));
                return;
            }
            resolve({ exitCode, signal, stdout: stdout.text(), stderr: stderr.text() });
        });
    });
}
