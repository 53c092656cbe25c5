import type { Logger } from "pino";

import { getLogger } from "../../log.js";
import { sleep } from "../../util/sleep.js";
import { SIDECAR_HOST } from "../launch/sidecarArgsBuild.js";
import { SupervisorError } from "../supervisor/supervisorError.js";

export type HealthProberOptions = {
    path: string;
    pollIntervalMs: number;
    requestTimeoutMs: number;
    logger?: Logger;
};

export type HealthTarget = {
    readonly port: number;
    isRunning(): boolean;
};

/**
 * Polls the sidecar's health endpoint; HTTP 200 is the only healthy answer.
 */
export class HealthProber {
    private readonly options: HealthProberOptions;
    private readonly logger: Logger;

    constructor(options: HealthProberOptions) {
        this.options = options;
        this.logger = options.logger ?? getLogger("sidecar.health");
    }

    /**
     * Resolves once the endpoint answers 200. Liveness is checked before every poll so a
     * dead process fails fast with "process-died" instead of running out the timeout.
     */
    async waitUntilHealthy(target: HealthTarget, options: { timeoutMs: number; signal?: AbortSignal }): Promise<void> {
        const startedAt = Date.now();
        const deadline = startedAt + options.timeoutMs;
        let attempts = 0;

        while (true) {
            if (options.signal?.aborted) {
                throw new SupervisorError("cancelled", "Health check cancelled.");
            }
            if (!target.isRunning()) {
                throw new SupervisorError("process-died", "The engine process exited during startup.");
            }
            attempts += 1;
            if (await this.check(target.port)) {
                this.logger.info({ port: target.port, attempts, elapsedMs: Date.now() - startedAt }, "event: Health check passed");
                return;
            }
            const remaining = deadline - Date.now();
            if (remaining <= 0) {
                break;
            }
            await sleep(Math.min(this.options.pollIntervalMs, remaining), options.signal);
        }

        if (!target.isRunning()) {
            throw new SupervisorError("process-died", "The engine process exited during startup.");
        }
        throw new SupervisorError(
            "health-timeout",
            `The engine did not respond within ${Math.round(options.timeoutMs / 1000)}s.`
        );
    }

    async check(port: number): Promise<boolean> {
        const url = `http://${SIDECAR_HOST}:${port}${this.options.path}`;
        try {
            const response = await fetch(url, { signal: AbortSignal.timeout(this.options.requestTimeoutMs) });
            await response.body?.cancel();
            return response.status === 200;
        } catch {
            return false;
        }
    }
}
