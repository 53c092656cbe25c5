import { z } from "zod";

import type { SettingsConfig } from "../settings.js";

const port = z.number().int().min(1).max(65_535);
const duration = z.number().int().positive();

/**
 * Parses raw settings data into a validated SettingsConfig.
 * Expects: raw is JSON-compatible and matches the settings schema.
 */
export function configSettingsParse(raw: unknown): SettingsConfig {
    const sidecar = z
        .object({
            sourceDir: z.string().min(1).optional(),
            files: z.array(z.string().min(1)).min(1).optional(),
            requirementsFile: z.string().min(1).optional(),
            app: z.string().min(1).optional(),
            server: z.string().min(1).optional(),
            runFromSource: z.boolean().optional(),
            env: z.record(z.string()).optional()
        })
        .passthrough();

    const runtime = z
        .object({
            bundledPath: z.string().min(1).optional(),
            searchPaths: z.array(z.string().min(1)).optional(),
            minVersion: z
                .object({
                    major: z.number().int().nonnegative(),
                    minor: z.number().int().nonnegative()
                })
                .optional()
        })
        .passthrough();

    const ports = z
        .object({
            first: port.optional(),
            last: port.optional()
        })
        .passthrough()
        .refine(
            (value) => value.first === undefined || value.last === undefined || value.first <= value.last,
            "ports.first must not be greater than ports.last"
        );

    const settingsSchema = z
        .object({
            engine: z
                .object({
                    dataDir: z.string().min(1).optional()
                })
                .passthrough()
                .optional(),
            sidecar: sidecar.optional(),
            runtime: runtime.optional(),
            ports: ports.optional(),
            health: z
                .object({
                    path: z
                        .string()
                        .min(1)
                        .refine((value) => value.startsWith("/"), "health.path must start with /")
                        .optional(),
                    startupTimeoutMs: duration.optional(),
                    pollIntervalMs: duration.optional(),
                    requestTimeoutMs: duration.optional(),
                    monitorIntervalMs: duration.optional()
                })
                .passthrough()
                .optional(),
            restart: z
                .object({
                    maxCrashRetries: z.number().int().nonnegative().optional(),
                    stopTimeoutMs: duration.optional(),
                    orphanGraceMs: duration.optional()
                })
                .passthrough()
                .optional(),
            provisioning: z
                .object({
                    progressIntervalMs: duration.optional()
                })
                .passthrough()
                .optional()
        })
        .passthrough();

    return settingsSchema.parse(raw);
}
