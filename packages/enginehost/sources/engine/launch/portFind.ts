import net from "node:net";

import { portListenersList } from "../processes/portListenersList.js";
import { SupervisorError } from "../supervisor/supervisorError.js";

export type PortFindOptions = {
    first: number;
    last: number;
    listenersList?: (port: number) => Promise<number[] | null>;
    bindable?: (port: number) => Promise<boolean>;
};

/**
 * Returns the first port in [first, last] with no listener.
 * Falls back to a bind probe for a port whose listeners cannot be listed.
 */
export async function portFind(options: PortFindOptions): Promise<number> {
    const listenersList = options.listenersList ?? portListenersList;
    const bindable = options.bindable ?? portIsBindable;

    for (let port = options.first; port <= options.last; port += 1) {
        const listeners = await listenersList(port);
        const free = listeners === null ? await bindable(port) : listeners.length === 0;
        if (free) {
            return port;
        }
    }

    throw new SupervisorError(
        "port-conflict",
        `No free port between ${options.first} and ${options.last}. Close other applications using these ports.`
    );
}

export function portIsBindable(port: number, host = "127.0.0.1"): Promise<boolean> {
    return new Promise((resolve) => {
        const server = net.createServer();
        server.once("error", () => resolve(false));
        server.listen({ host, port, exclusive: true }, () => {
            server.close(() => resolve(true));
        });
    });
}
