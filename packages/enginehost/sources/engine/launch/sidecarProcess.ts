import type { ChildProcess } from "node:child_process";

import type { OutputDrain } from "../processes/outputDrain.js";

export type SidecarExit = {
    code: number | null;
    signal: NodeJS.Signals | null;
};

/**
 * Liveness and termination handle for a launched sidecar.
 */
export interface SidecarHandle {
    readonly pid: number;
    readonly port: number;
    isRunning(): boolean;
    kill(signal: NodeJS.Signals): void;
    exitStatus(): SidecarExit | null;
    outputTail(): string;
}

/**
 * Wraps a spawned sidecar child; liveness follows the child's exit event.
 * Expects: constructed from the child's "spawn" handler so no exit is missed.
 */
export class SidecarProcess implements SidecarHandle {
    readonly pid: number;
    readonly port: number;
    private readonly child: ChildProcess;
    private readonly output: OutputDrain;
    private exit: SidecarExit | null = null;

    constructor(child: ChildProcess, pid: number, port: number, output: OutputDrain) {
        this.child = child;
        this.pid = pid;
        this.port = port;
        this.output = output;
        child.once("exit", (code, signal) => {
            this.exit = { code, signal };
        });
    }

    isRunning(): boolean {
        return this.exit === null;
    }

    exitStatus(): SidecarExit | null {
        return this.exit;
    }

    kill(signal: NodeJS.Signals): void {
        if (this.exit !== null) {
            return;
        }
        this.child.kill(signal);
    }

    outputTail(): string {
        return this.output.text();
    }
}
