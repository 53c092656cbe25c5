import { promises as fs } from "node:fs";

import { atomicWrite } from "../../util/atomicWrite.js";

export type ProcessRecord = {
    pid: number;
    port: number;
};

/**
 * Durable `<pid>:<port>` record of the sidecar launched by this application.
 * Expects: legacyPort is the port implied by records written as a bare pid.
 */
export class ProcessRecordStore {
    readonly filePath: string;
    private readonly legacyPort: number;

    constructor(filePath: string, options: { legacyPort: number }) {
        this.filePath = filePath;
        this.legacyPort = options.legacyPort;
    }

    async read(): Promise<ProcessRecord | null> {
        let raw: string;
        try {
            raw = await fs.readFile(this.filePath, "utf8");
        } catch (error) {
            if ((error as NodeJS.ErrnoException).code === "ENOENT") {
                return null;
            }
            throw error;
        }
        return processRecordParse(raw, this.legacyPort);
    }

    async write(record: ProcessRecord): Promise<void> {
        await atomicWrite(this.filePath, `${record.pid}:${record.port}`);
    }

    async delete(): Promise<void> {
        await fs.rm(this.filePath, { force: true });
    }
}

/**
 * Parses `<pid>:<port>` or the legacy bare `<pid>` form; returns null for anything else.
 */
export function processRecordParse(raw: string, legacyPort: number): ProcessRecord | null {
    const text = raw.trim();
    const match = /^(\d+)(?::(\d+))?$/.exec(text);
    if (!match?.[1]) {
        return null;
    }
    const pid = Number(match[1]);
    const port = match[2] === undefined ? legacyPort : Number(match[2]);
    if (!Number.isSafeInteger(pid) || pid <= 0 || port <= 0 || port > 65_535) {
        return null;
    }
    return { pid, port };
}
