import type { SupervisorErrorKind } from "./supervisorError.js";

export type SupervisorState =
    | { type: "notStarted" }
    | { type: "checkingRuntime" }
    | { type: "runtimeMissing" }
    | { type: "checkingEnvironment" }
    | { type: "creatingEnvironment" }
    | { type: "installingDependencies"; progress: number }
    | { type: "startingProcess" }
    | { type: "waitingForHealth" }
    | { type: "running" }
    | { type: "error"; kind: SupervisorErrorKind; message: string };

export type SupervisorStateType = SupervisorState["type"];

/**
 * Compares two states by tag only, ignoring progress and error payloads.
 */
export function supervisorStateSame(left: SupervisorState, right: SupervisorState): boolean {
    return left.type === right.type;
}

/**
 * True only while the environment is being created or its dependencies installed.
 */
export function supervisorStateIsFirstTimeSetup(state: SupervisorState): boolean {
    return state.type === "creatingEnvironment" || state.type === "installingDependencies";
}

/**
 * True while any startup work is happening, including a routine reconnect.
 */
export function supervisorStateIsSetupPhase(state: SupervisorState): boolean {
    switch (state.type) {
        case "notStarted":
        case "checkingRuntime":
        case "checkingEnvironment":
        case "creatingEnvironment":
        case "installingDependencies":
        case "startingProcess":
        case "waitingForHealth":
            return true;
        case "runtimeMissing":
        case "running":
        case "error":
            return false;
    }
}

export function supervisorStateMessage(state: SupervisorState): string {
    switch (state.type) {
        case "notStarted":
            return "Preparing engine...";
        case "checkingRuntime":
            return "Checking system requirements...";
        case "runtimeMissing":
            return "A compatible Python runtime was not found. Install Python 3.11 or newer.";
        case "checkingEnvironment":
            return "Checking environment...";
        case "creatingEnvironment":
            return "Setting up engine environment...";
        case "installingDependencies":
            return `Installing engine components... ${Math.floor(clampProgress(state.progress) * 100)}%`;
        case "startingProcess":
            return "Starting engine...";
        case "waitingForHealth":
            return "Connecting to engine...";
        case "running":
            return "Ready";
        case "error":
            return `Error: ${state.message}`;
    }
}

function clampProgress(progress: number): number {
    if (!Number.isFinite(progress)) {
        return 0;
    }
    return Math.min(1, Math.max(0, progress));
}
