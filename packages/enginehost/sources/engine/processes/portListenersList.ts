import { type CommandRunResult, type CommandRunner, commandRun } from "./commandRun.js";

/**
 * Lists pids listening on a local TCP port through lsof.
 * Returns null when lsof is unavailable or fails in a way that says nothing about the port.
 */
export async function portListenersList(port: number, run: CommandRunner = commandRun): Promise<number[] | null> {
    let result: CommandRunResult;
    try {
        result = await run({ command: "lsof", args: ["-nP", `-iTCP:${port}`, "-sTCP:LISTEN", "-t"] });
    } catch {
        return null;
    }

    // lsof exits 1 when nothing matches.
    if (result.exitCode === 1 && result.stdout.trim().length === 0) {
        return [];
    }
    if (result.exitCode !== 0) {
        return null;
    }

    const pids = new Set<number>();
    for (const line of result.stdout.split(/\r?\n/)) {
        const pid = Number.parseInt(line.trim(), 10);
        if (Number.isInteger(pid) && pid > 0) {
            pids.add(pid);
        }
    }
    return [...pids];
}
