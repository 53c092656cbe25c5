import type { Readable } from "node:stream";

const DEFAULT_MAX_LINES = 200;

/**
 * Continuously reads child-process pipes and keeps a bounded tail of complete lines.
 * Expects: every attached stream is read for its whole lifetime so the child never blocks on a full pipe.
 */
export class OutputDrain {
    private readonly maxLines: number;
    private readonly onLine: ((line: string) => void) | null;
    private readonly tail: string[] = [];

    constructor(options: { maxLines?: number; onLine?: (line: string) => void } = {}) {
        this.maxLines = options.maxLines ?? DEFAULT_MAX_LINES;
        this.onLine = options.onLine ?? null;
    }

    attach(stream: Readable | null): void {
        if (!stream) {
            return;
        }
        let pending = "";
        stream.setEncoding("utf8");
        stream.on("data", (chunk: string) => {
            pending += chunk;
            const parts = pending.split(/\r?\n/);
            pending = parts.pop() ?? "";
            for (const line of parts) {
                this.push(line);
            }
        });
        stream.on("end", () => {
            if (pending.length > 0) {
                this.push(pending);
                pending = "";
            }
        });
    }

    text(): string {
        return this.tail.join("\n");
    }

    private push(line: string): void {
        this.tail.push(line);
        if (this.tail.length > this.maxLines) {
            this.tail.splice(0, this.tail.length - this.maxLines);
        }
        this.onLine?.(line);
    }
}
