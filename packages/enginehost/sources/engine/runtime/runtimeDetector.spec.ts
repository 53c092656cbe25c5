import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { RuntimeDetector } from "./runtimeDetector.js";

const MIN_VERSION = { major: 3, minor: 11 };

describe("RuntimeDetector", () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "enginehost-runtime-"));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    async function fakeRuntime(name: string, script: string): Promise<string> {
        const filePath = path.join(tempDir, name);
        await fs.writeFile(filePath, `#!/bin/sh\n${script}\n`, { mode: 0o755 });
        return filePath;
    }

    it("prefers the bundled runtime without checking its version", async () => {
        const bundled = await fakeRuntime("bundled", 'echo "Python 2.7.18"');
        const system = await fakeRuntime("system", 'echo "Python 3.12.1"');
        const pathLookup = vi.fn(async () => null);
        const detector = new RuntimeDetector({
            bundledPath: bundled,
            searchPaths: [system],
            minVersion: MIN_VERSION,
            pathLookup
        });

        expect(await detector.detect()).toBe(bundled);
        expect(pathLookup).not.toHaveBeenCalled();
    });

    it("walks the search paths and skips missing or outdated interpreters", async () => {
        const old = await fakeRuntime("python-old", 'echo "Python 3.9.6"');
        const current = await fakeRuntime("python-current", 'echo "Python 3.11.4" >&2');
        const detector = new RuntimeDetector({
            bundledPath: path.join(tempDir, "missing-bundled"),
            searchPaths: [path.join(tempDir, "missing"), old, current],
            minVersion: MIN_VERSION,
            pathLookup: async () => null
        });

        expect(await detector.detect()).toBe(current);
    });

    it("falls back to the interpreter found on PATH", async () => {
        const located = await fakeRuntime("python-path", 'echo "Python 3.13.0"');
        const detector = new RuntimeDetector({
            bundledPath: null,
            searchPaths: [],
            minVersion: MIN_VERSION,
            pathLookup: async () => located
        });

        expect(await detector.detect()).toBe(located);
    });

    it("rejects a PATH interpreter with the wrong major version", async () => {
        const located = await fakeRuntime("python-four", 'echo "Python 4.0.0"');
        const detector = new RuntimeDetector({
            bundledPath: null,
            searchPaths: [],
            minVersion: MIN_VERSION,
            pathLookup: async () => located
        });

        expect(await detector.detect()).toBeNull();
    });

    it("ignores candidates that are not executable", async () => {
        const plain = path.join(tempDir, "python-plain");
        await fs.writeFile(plain, '#!/bin/sh\necho "Python 3.12.0"\n', { mode: 0o644 });
        const detector = new RuntimeDetector({
            bundledPath: plain,
            searchPaths: [plain, tempDir],
            minVersion: MIN_VERSION,
            pathLookup: async () => null
        });

        expect(await detector.detect()).toBeNull();
    });

    it("treats a failing version command as unusable", async () => {
        const broken = await fakeRuntime("python-broken", 'echo "Python 3.12.0"; exit 1');
        const detector = new RuntimeDetector({
            bundledPath: null,
            searchPaths: [broken],
            minVersion: MIN_VERSION,
            pathLookup: async () => null
        });

        expect(await detector.versionRead(broken)).toBeNull();
        expect(await detector.detect()).toBeNull();
    });

    it("looks up python3 through the shell by default", async () => {
        const located = await fakeRuntime("python-shell", 'echo "Python 3.11.0"');
        const run = vi.fn(async (input: { command: string; args: string[] }) => {
            if (input.command === "/bin/sh") {
                return { exitCode: 0, signal: null, stdout: `${located}\n`, stderr: "" };
            }
            return { exitCode: 0, signal: null, stdout: "Python 3.11.0\n", stderr: "" };
        });
        const detector = new RuntimeDetector({ bundledPath: null, searchPaths: [], minVersion: MIN_VERSION, run });

        expect(await detector.detect()).toBe(located);
        expect(run.mock.calls.map(([input]) => [input.command, input.args])).toEqual([
            ["/bin/sh", ["-c", "command -v python3"]],
            [located, ["--version"]]
        ]);
    });
});
