import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ProcessRecordStore } from "../orphans/processRecordStore.js";
import { SupervisorError } from "../supervisor/supervisorError.js";
import { portIsBindable } from "./portFind.js";
import { ProcessLauncher } from "./processLauncher.js";
import type { SidecarProcess } from "./sidecarProcess.js";

const SERVER_SCRIPT = [
    "const http = require('node:http');",
    "const port = Number(process.argv[process.argv.indexOf('--port') + 1]);",
    "http.createServer((req, res) => { res.statusCode = req.url === '/health' ? 200 : 404; res.end('ok'); })",
    "  .listen(port, '127.0.0.1', () => console.log('listening ' + port + ' unbuffered=' + process.env.PYTHONUNBUFFERED + ' cwd=' + process.cwd()));"
].join("\n");

describe("ProcessLauncher", () => {
    let tempDir: string;
    let records: ProcessRecordStore;
    const launched: SidecarProcess[] = [];

    beforeEach(async () => {
        tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), "enginehost-launch-")));
        await fs.writeFile(path.join(tempDir, "server.cjs"), SERVER_SCRIPT, "utf8");
        records = new ProcessRecordStore(path.join(tempDir, "sidecar.pid"), { legacyPort: 8000 });
    });

    afterEach(async () => {
        for (const sidecar of launched.splice(0)) {
            sidecar.kill("SIGKILL");
            await vi.waitFor(
                () => {
                    expect(sidecar.isRunning()).toBe(false);
                },
                { timeout: 5_000 }
            );
        }
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it("spawns the sidecar on the chosen port and records its identity", async () => {
        const port = await freePort();
        const launcher = new ProcessLauncher({
            executable: process.execPath,
            args: (chosen) => [path.join(tempDir, "server.cjs"), "--host", "127.0.0.1", "--port", String(chosen)],
            cwd: tempDir,
            ports: { first: port, last: port },
            records,
            portFind: async () => port
        });

        const sidecar = await launcher.launch();
        launched.push(sidecar);

        expect(sidecar.port).toBe(port);
        expect(sidecar.isRunning()).toBe(true);
        expect(await records.read()).toEqual({ pid: sidecar.pid, port });
        await vi.waitFor(
            () => {
                expect(sidecar.outputTail()).toBe(`listening ${port} unbuffered=1 cwd=${tempDir}`);
            },
            { timeout: 5_000 }
        );
    });

    it("reports exit through the handle", async () => {
        const launcher = new ProcessLauncher({
            executable: process.execPath,
            args: () => ["-e", "process.exit(4)"],
            cwd: tempDir,
            ports: { first: 8000, last: 8000 },
            records,
            portFind: async () => 8000
        });

        const sidecar = await launcher.launch();
        await vi.waitFor(
            () => {
                expect(sidecar.exitStatus()).toEqual({ code: 4, signal: null });
            },
            { timeout: 5_000 }
        );

        expect(sidecar.isRunning()).toBe(false);
    });

    it("raises launch-failed when the executable is missing", async () => {
        const write = vi.fn(async () => undefined);
        const launcher = new ProcessLauncher({
            executable: path.join(tempDir, "missing", "python"),
            args: () => [],
            cwd: tempDir,
            ports: { first: 8000, last: 8000 },
            records: { write },
            portFind: async () => 8000
        });

        const error = await launcher.launch().catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(SupervisorError);
        expect(error).toMatchObject({ kind: "launch-failed" });
        expect(write).not.toHaveBeenCalled();
    });

    it("propagates port conflicts without spawning", async () => {
        const write = vi.fn(async () => undefined);
        const launcher = new ProcessLauncher({
            executable: process.execPath,
            args: () => [],
            cwd: tempDir,
            ports: { first: 8000, last: 8001 },
            records: { write },
            portFind: async () => {
                throw new SupervisorError("port-conflict", "No free port between 8000 and 8001.");
            }
        });

        await expect(launcher.launch()).rejects.toMatchObject({ kind: "port-conflict" });
        expect(write).not.toHaveBeenCalled();
    });
});

async function freePort(): Promise<number> {
    for (let port = 47_100; port < 47_200; port += 1) {
        if (await portIsBindable(port)) {
            return port;
        }
    }
    throw new Error("No free port for test");
}
