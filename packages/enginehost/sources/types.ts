// Central type re-exports for cross-cutting concerns.
// Import via: import type { ... } from "@/types";

// Config
export type { Config } from "./config/configTypes.js";
// Environment
export type { EnvironmentProgress, EnvironmentStatus } from "./engine/environment/environment.js";
export type { EnvironmentPaths } from "./engine/environment/environmentPathsResolve.js";
// Health
export type { HealthTarget } from "./engine/health/healthProber.js";
// Launch
export type { SidecarExit, SidecarHandle } from "./engine/launch/sidecarProcess.js";
// Orphans
export type { OrphanReconcileResult } from "./engine/orphans/orphanReaper.js";
export type { ProcessRecord } from "./engine/orphans/processRecordStore.js";
// Processes
export type { CommandRunInput, CommandRunner, CommandRunResult } from "./engine/processes/commandRun.js";
// Settings
export type { RuntimeVersion, SettingsConfig } from "./settings.js";
// Supervisor
export type { SupervisorStateListener } from "./engine/supervisor/supervisor.js";
export type { SupervisorErrorKind } from "./engine/supervisor/supervisorError.js";
export type { SupervisorState, SupervisorStateType } from "./engine/supervisor/supervisorState.js";
