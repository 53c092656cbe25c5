import net from "node:net";

import { describe, expect, it, vi } from "vitest";

import { portFind, portIsBindable } from "./portFind.js";

describe("portFind", () => {
    it("returns the first port without listeners", async () => {
        const listenersList = vi.fn(async (port: number) => (port < 8002 ? [4321] : []));

        const port = await portFind({ first: 8000, last: 8004, listenersList });

        expect(port).toBe(8002);
        expect(listenersList.mock.calls.map(([candidate]) => candidate)).toEqual([8000, 8001, 8002]);
    });

    it("raises port-conflict when every candidate is taken", async () => {
        await expect(
            portFind({ first: 8000, last: 8002, listenersList: async () => [1] })
        ).rejects.toMatchObject({ kind: "port-conflict", message: expect.stringContaining("8000 and 8002") });
    });

    it("uses the bind probe when listeners cannot be listed", async () => {
        const bindable = vi.fn(async (port: number) => port === 8001);

        const port = await portFind({ first: 8000, last: 8003, listenersList: async () => null, bindable });

        expect(port).toBe(8001);
        expect(bindable).toHaveBeenCalledTimes(2);
    });
});

describe("portIsBindable", () => {
    it("detects an occupied port", async () => {
        const server = net.createServer();
        await new Promise<void>((resolve) => server.listen({ host: "127.0.0.1", port: 0 }, resolve));
        const address = server.address();
        if (!address || typeof address === "string") {
            throw new Error("Expected TCP address");
        }

        try {
            expect(await portIsBindable(address.port)).toBe(false);
        } finally {
            await new Promise((resolve) => server.close(resolve));
        }
        expect(await portIsBindable(address.port)).toBe(true);
    });
});
