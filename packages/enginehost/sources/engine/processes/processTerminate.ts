import { sleep } from "../../util/sleep.js";
import { processIsRunning } from "./processIsRunning.js";

const DEFAULT_POLL_MS = 100;

export type ProcessTerminateTarget = {
    isRunning(): boolean;
    kill(signal: NodeJS.Signals): void;
};

export type ProcessTerminateResult = "not-running" | "exited" | "killed";

/**
 * Sends SIGTERM, waits up to graceMs for exit, then escalates to SIGKILL.
 */
export async function processTerminate(
    target: ProcessTerminateTarget,
    options: { graceMs: number; pollMs?: number }
): Promise<ProcessTerminateResult> {
    if (!target.isRunning()) {
        return "not-running";
    }

    target.kill("SIGTERM");
    const pollMs = options.pollMs ?? DEFAULT_POLL_MS;
    const deadline = Date.now() + options.graceMs;
    while (Date.now() < deadline) {
        if (!target.isRunning()) {
            return "exited";
        }
        await sleep(Math.min(pollMs, Math.max(0, deadline - Date.now())));
    }
    if (!target.isRunning()) {
        return "exited";
    }

    target.kill("SIGKILL");
    return "killed";
}

/**
 * Builds a terminate target for a bare pid, such as one read from a previous run's record.
 */
export function processTargetFromPid(pid: number): ProcessTerminateTarget {
    return {
        isRunning: () => processIsRunning(pid),
        kill: (signal) => {
            try {
                process.kill(pid, signal);
            } catch (error) {
                if ((error as NodeJS.ErrnoException).code !== "ESRCH") {
                    throw error;
                }
            }
        }
    };
}
