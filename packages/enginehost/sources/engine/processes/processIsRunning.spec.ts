import { spawn } from "node:child_process";

import { describe, expect, it } from "vitest";

import { processIsRunning } from "./processIsRunning.js";

describe("processIsRunning", () => {
    it("is true for the current process", () => {
        expect(processIsRunning(process.pid)).toBe(true);
    });

    it("rejects invalid pids", () => {
        expect(processIsRunning(0)).toBe(false);
        expect(processIsRunning(-1)).toBe(false);
        expect(processIsRunning(1.5)).toBe(false);
    });

    it("is false once a child has exited", async () => {
        const child = spawn(process.execPath, ["-e", ""], { stdio: "ignore" });
        await new Promise((resolve) => child.once("exit", resolve));
        const pid = child.pid;
        if (!pid) {
            throw new Error("Expected child pid");
        }

        expect(processIsRunning(pid)).toBe(false);
    });
});
