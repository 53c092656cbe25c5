export type SupervisorErrorKind =
    | "runtime-missing"
    | "provisioning-failed"
    | "port-conflict"
    | "launch-failed"
    | "health-timeout"
    | "process-died"
    | "crash-exhausted"
    | "cancelled";

/**
 * Error raised by the sidecar lifecycle components.
 * Expects: kind is stable and drives which recovery actions the front end offers.
 */
export class SupervisorError extends Error {
    readonly kind: SupervisorErrorKind;
    readonly details?: string;

    constructor(kind: SupervisorErrorKind, message: string, options?: { details?: string; cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "SupervisorError";
        this.kind = kind;
        this.details = options?.details;
    }
}

export function supervisorErrorIs(error: unknown, kind?: SupervisorErrorKind): error is SupervisorError {
    return error instanceof SupervisorError && (kind === undefined || error.kind === kind);
}
