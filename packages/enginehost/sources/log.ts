import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: string;
    format: LogFormat;
    destination: LogDestination;
    service: string;
    environment: string;
};

const VALID_FORMATS = new Set<LogFormat>(["pretty", "json"]);
const MODULE_WIDTH = 16;
const PRETTY_RESERVED_FIELDS = new Set(["pid", "hostname", "level", "time", "service", "environment", "module", "msg"]);
const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }
    rootLogger = buildLogger(resolveLogConfig(overrides));
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: normalizeModule(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const isDev = process.env.NODE_ENV !== "production";
    const level =
        overrides.level ??
        envValue("ENGINEHOST_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTestRun() ? "silent" : isDev ? "debug" : "info");
    const destination = overrides.destination ?? envValue("ENGINEHOST_LOG_DEST") ?? "stderr";
    let format = overrides.format ?? parseFormat(envValue("ENGINEHOST_LOG_FORMAT")) ?? "pretty";
    if (destination !== "stdout" && destination !== "stderr") {
        format = "json";
    }

    return {
        level,
        format,
        destination,
        service: overrides.service ?? "enginehost",
        environment: overrides.environment ?? envValue("NODE_ENV") ?? "development"
    };
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: {
            service: config.service,
            environment: config.environment
        },
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    const destination = resolveDestination(config.destination);
    if (config.format === "pretty") {
        const prettyFactory = resolvePrettyFactory();
        if (prettyFactory) {
            const prettyStream = prettyFactory({
                colorize: true,
                translateTime: false,
                ignore: "pid,hostname,level,service,environment,module",
                hideObject: true,
                messageFormat: formatPrettyMessage,
                destination: config.destination === "stdout" ? 1 : 2
            });
            return pino(options, prettyStream);
        }
    }

    return destination ? pino(options, destination) : pino(options);
}

/**
 * Renders one pretty log line as `[hh:mm:ss] [module] message key=value`.
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const time = formatLogTime(log.time);
    const module = normalizeModule(typeof log.module === "string" ? log.module : undefined);
    const moduleLabel = `[${module.length > MODULE_WIDTH ? module.slice(0, MODULE_WIDTH) : module.padEnd(MODULE_WIDTH, " ")}]`;
    const messageValue = log[messageKey];
    const message = messageValue === undefined || messageValue === null ? "" : String(messageValue);
    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_RESERVED_FIELDS.has(key) || value === undefined) {
            continue;
        }
        details.push(`${key}=${formatDetailValue(value)}`);
    }
    const body = [moduleLabel, message, ...details].filter((part) => part.length > 0).join(" ");
    return `[${time}] ${body}`;
}

function formatDetailValue(value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (typeof value === "string") {
        return /[=\s]/.test(value) ? JSON.stringify(value) : value;
    }
    if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
        return String(value);
    }
    if (value instanceof Error) {
        return JSON.stringify(value.message);
    }
    if (typeof value === "object" && "message" in value && typeof value.message === "string") {
        return JSON.stringify(value.message);
    }
    try {
        return JSON.stringify(value);
    } catch {
        return String(value);
    }
}

function formatLogTime(value: unknown): string {
    const date = typeof value === "number" || typeof value === "string" ? new Date(value) : new Date();
    const safe = Number.isNaN(date.getTime()) ? new Date() : date;
    return [safe.getHours(), safe.getMinutes(), safe.getSeconds()]
        .map((part) => String(part).padStart(2, "0"))
        .join(":");
}

function normalizeModule(moduleName?: string): string {
    const trimmed = moduleName?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : "unknown";
}

function resolveDestination(destination: LogDestination): DestinationStream | undefined {
    if (destination === "stdout") {
        return undefined;
    }
    if (destination === "stderr") {
        return pino.destination(2);
    }
    return pino.destination({ dest: destination, mkdir: true, sync: false });
}

function resolvePrettyFactory(): ((options: Record<string, unknown>) => DestinationStream) | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        return null;
    }
}

function parseFormat(value: string | null): LogFormat | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase().trim();
    for (const format of VALID_FORMATS) {
        if (format === normalized) {
            return format;
        }
    }
    return null;
}

function envValue(key: string): string | null {
    const value = process.env[key]?.trim();
    return value ? value : null;
}

function isUnitTestRun(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}
