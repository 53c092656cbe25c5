import { promises as fs } from "node:fs";
import path from "node:path";

/**
 * Writes a file atomically by renaming a sibling temp file into place.
 * Creates the parent directory when it is missing.
 */
export async function atomicWrite(filePath: string, payload: string, mode = 0o600): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
    try {
        await fs.writeFile(tempPath, payload, { mode });
        await fs.rename(tempPath, filePath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
    }
}
