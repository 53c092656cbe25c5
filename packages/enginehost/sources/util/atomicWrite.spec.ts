import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { atomicWrite } from "./atomicWrite.js";

describe("atomicWrite", () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "enginehost-atomic-"));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it("creates the parent directory and replaces existing content", async () => {
        const target = path.join(tempDir, "nested", "sidecar.pid");

        await atomicWrite(target, "100:8000");
        await atomicWrite(target, "200:8001");

        expect(await fs.readFile(target, "utf8")).toBe("200:8001");
        expect(await fs.readdir(path.dirname(target))).toEqual(["sidecar.pid"]);
    });

    it("writes owner-only files by default", async () => {
        const target = path.join(tempDir, "record");

        await atomicWrite(target, "1");

        expect((await fs.stat(target)).mode & 0o777).toBe(0o600);
    });
});
