import { describe, expect, it, vi } from "vitest";

import type { CommandRunInput, CommandRunResult } from "./commandRun.js";
import { portListenersList } from "./portListenersList.js";

function runner(result: Partial<CommandRunResult>) {
    return vi.fn(async (_input: CommandRunInput): Promise<CommandRunResult> => ({
        exitCode: 0,
        signal: null,
        stdout: "",
        stderr: "",
        ...result
    }));
}

describe("portListenersList", () => {
    it("asks lsof for listeners on the port", async () => {
        const run = runner({ stdout: "4321\n" });

        await portListenersList(8000, run);

        expect(run).toHaveBeenCalledWith({ command: "lsof", args: ["-nP", "-iTCP:8000", "-sTCP:LISTEN", "-t"] });
    });

    it("parses and deduplicates pids", async () => {
        const pids = await portListenersList(8000, runner({ stdout: "4321\n4322\n4321\n\n" }));
        expect(pids).toEqual([4321, 4322]);
    });

    it("treats exit code 1 without output as no listeners", async () => {
        const pids = await portListenersList(8001, runner({ exitCode: 1 }));
        expect(pids).toEqual([]);
    });

    it("returns null when lsof fails otherwise", async () => {
        const pids = await portListenersList(8001, runner({ exitCode: 2, stderr: "lsof: unsupported" }));
        expect(pids).toBeNull();
    });

    it("returns null when lsof is not installed", async () => {
        const run = vi.fn(async (): Promise<CommandRunResult> => {
            throw Object.assign(new Error("spawn lsof ENOENT"), { code: "ENOENT" });
        });
        expect(await portListenersList(8001, run)).toBeNull();
    });
});
