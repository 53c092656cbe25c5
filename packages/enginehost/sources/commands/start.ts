import path from "node:path";

import { configLoad } from "../config/configLoad.js";
import type { Supervisor } from "../engine/supervisor/supervisor.js";
import { supervisorCreate } from "../engine/supervisor/supervisorCreate.js";
import { supervisorStateMessage } from "../engine/supervisor/supervisorState.js";
import { getLogger } from "../log.js";
import { DEFAULT_SETTINGS_PATH } from "../settings.js";
import { awaitShutdown, isShutdown, onShutdown, requestShutdown } from "../util/shutdown.js";

const logger = getLogger("command.start");

export type StartOptions = {
    settings?: string;
    clean?: boolean;
};

export async function startCommand(options: StartOptions): Promise<void> {
    const settingsPath = path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH);
    const config = await configLoad(settingsPath);
    logger.info({ settings: config.settingsPath, dataDir: config.dataDir }, "start: Starting engine host");

    const { supervisor } = supervisorCreate(config);
    const exitCode = await startRun(supervisor, { clean: options.clean === true });
    process.exit(exitCode);
}

/**
 * Brings the sidecar up and keeps it supervised until shutdown; resolves with the exit code.
 * Expects: called once per process, since shutdown handlers are process-wide.
 */
export async function startRun(supervisor: Supervisor, options: { clean: boolean }): Promise<number> {
    let ready = false;
    supervisor.onStateChange((state, progress) => {
        logger.info({ state: state.type, progress: Math.round(progress * 100) }, `event: ${supervisorStateMessage(state)}`);
        if (ready && state.type === "error") {
            logger.error({ state: state.type, kind: state.kind }, `error: ${state.message}`);
            requestShutdown("fatal");
        }
    });

    const shutdown = awaitShutdown();
    onShutdown("sidecar", () => supervisor.stop());

    if (options.clean) {
        await supervisor.cleanInstall();
    } else {
        await supervisor.ensureRunning();
    }

    const state = supervisor.state;
    if (!isShutdown() && (state.type === "runtimeMissing" || state.type === "error")) {
        // The identity record stays behind so the next start can reap a live sidecar.
        logger.error({ state: state.type }, `error: ${supervisorStateMessage(state)}`);
        return 1;
    }

    if (!isShutdown()) {
        ready = true;
        logger.info({ port: supervisor.port, processId: supervisor.pid }, "ready: Engine ready");
    }
    const signal = await shutdown;
    logger.info({ signal }, "event: Shutdown complete");
    return signal === "fatal" ? 1 : 0;
}
