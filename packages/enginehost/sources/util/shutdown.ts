import { getLogger } from "../log.js";

type ShutdownHandler = () => void | Promise<void>;
type ShutdownReason = NodeJS.Signals | "fatal";

// Sidecar termination waits up to stopTimeoutMs before a forced kill; stay above it.
const FORCE_EXIT_MS = 10_000;

const shutdownHandlers = new Map<string, ShutdownHandler[]>();
const shutdownController = new AbortController();
const logger = getLogger("shutdown");

let shutdownReason: ShutdownReason | null = null;
let shutdownCompletion: Promise<void> | null = null;
let signalsAttached = false;

export const shutdownSignal: AbortSignal = shutdownController.signal;

/**
 * Registers a named handler run once on shutdown; returns an unregister function.
 */
export function onShutdown(name: string, handler: ShutdownHandler): () => void {
    if (shutdownSignal.aborted) {
        void Promise.resolve()
            .then(handler)
            .catch((error) => {
                logger.warn({ error, name }, "error: Late shutdown handler failed");
            });
        return () => {};
    }

    const handlers = shutdownHandlers.get(name) ?? [];
    handlers.push(handler);
    shutdownHandlers.set(name, handlers);

    return () => {
        const list = shutdownHandlers.get(name);
        if (!list) {
            return;
        }
        const index = list.indexOf(handler);
        if (index !== -1) {
            list.splice(index, 1);
        }
        if (list.length === 0) {
            shutdownHandlers.delete(name);
        }
    };
}

export function isShutdown(): boolean {
    return shutdownSignal.aborted;
}

/**
 * Waits for SIGINT/SIGTERM (or requestShutdown) and for every handler to settle.
 */
export function awaitShutdown(): Promise<ShutdownReason> {
    if (!signalsAttached) {
        signalsAttached = true;
        process.once("SIGINT", () => requestShutdown("SIGINT"));
        process.once("SIGTERM", () => requestShutdown("SIGTERM"));
    }
    return new Promise((resolve) => {
        const finish = () => {
            const reason = shutdownReason ?? "SIGTERM";
            void (shutdownCompletion ?? Promise.resolve()).then(() => resolve(reason));
        };
        if (shutdownSignal.aborted) {
            finish();
            return;
        }
        shutdownSignal.addEventListener("abort", finish, { once: true });
    });
}

export function requestShutdown(reason: ShutdownReason = "SIGTERM"): void {
    if (shutdownReason) {
        return;
    }
    shutdownReason = reason;
    shutdownCompletion = runHandlers(reason);
    shutdownController.abort();
}

async function runHandlers(reason: ShutdownReason): Promise<void> {
    const forceExit = setTimeout(() => {
        logger.warn(`event: Shutdown: forcing exit after ${FORCE_EXIT_MS}ms`);
        process.exit(1);
    }, FORCE_EXIT_MS);
    forceExit.unref();

    const snapshot = Array.from(shutdownHandlers.entries()).map(([name, handlers]) => [name, [...handlers]] as const);
    shutdownHandlers.clear();
    const total = snapshot.reduce((sum, [, handlers]) => sum + handlers.length, 0);
    logger.info({ reason }, `event: Shutdown: running ${total} handler${total === 1 ? "" : "s"}`);

    const startedAt = Date.now();
    await Promise.allSettled(
        snapshot.flatMap(([name, handlers]) =>
            handlers.map((handler, index) =>
                Promise.resolve()
                    .then(handler)
                    .catch((error) => {
                        logger.warn({ error }, `error: Shutdown: handler ${name}[${index + 1}] failed`);
                    })
            )
        )
    );
    logger.info(`event: Shutdown: completed in ${Date.now() - startedAt}ms`);
    clearTimeout(forceExit);
}
