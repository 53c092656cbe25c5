import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { configResolve } from "../../config/configResolve.js";
import { supervisorCreate } from "./supervisorCreate.js";

describe("supervisorCreate", () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "enginehost-create-"));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it("places the identity record and environment under the data directory", async () => {
        const config = configResolve({ engine: { dataDir: "data" } }, path.join(tempDir, "settings.json"));

        const parts = supervisorCreate(config);

        expect(parts.records.filePath).toBe(path.join(tempDir, "data", "sidecar.pid"));
        expect(parts.environment.paths.sidecarDir).toBe(path.join(tempDir, "data", "sidecar"));
        expect(await parts.environment.status()).toBe("missing");
        expect(parts.supervisor.state).toEqual({ type: "notStarted" });
    });

    it("reads legacy pid-only records with the first candidate port", async () => {
        const config = configResolve(
            { engine: { dataDir: "data" }, ports: { first: 8100, last: 8105 } },
            path.join(tempDir, "settings.json")
        );
        const parts = supervisorCreate(config);
        await fs.mkdir(path.join(tempDir, "data"), { recursive: true });
        await fs.writeFile(parts.records.filePath, "4321\n", "utf8");

        expect(await parts.records.read()).toEqual({ pid: 4321, port: 8100 });
    });
});
