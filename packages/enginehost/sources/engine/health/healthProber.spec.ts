import http from "node:http";

import { afterEach, describe, expect, it } from "vitest";

import { HealthProber } from "./healthProber.js";

const servers: http.Server[] = [];

afterEach(async () => {
    for (const server of servers.splice(0)) {
        await new Promise((resolve) => server.close(resolve));
    }
});

describe("HealthProber", () => {
    it("resolves once the endpoint starts answering 200", async () => {
        let requests = 0;
        const port = await serverStart((request, response) => {
            requests += 1;
            response.statusCode = request.url === "/health" && requests >= 3 ? 200 : 503;
            response.end();
        });
        const prober = proberCreate();

        await prober.waitUntilHealthy({ port, isRunning: () => true }, { timeoutMs: 5_000 });

        expect(requests).toBe(3);
    });

    it("fails with process-died as soon as the process exits", async () => {
        const port = await serverStart((_request, response) => {
            response.statusCode = 503;
            response.end();
        });
        let running = true;
        setTimeout(() => {
            running = false;
        }, 100);
        const prober = proberCreate();
        const startedAt = Date.now();

        await expect(
            prober.waitUntilHealthy({ port, isRunning: () => running }, { timeoutMs: 10_000 })
        ).rejects.toMatchObject({ kind: "process-died" });
        expect(Date.now() - startedAt).toBeLessThan(5_000);
    });

    it("fails with health-timeout when a live process never answers", async () => {
        const port = await serverStart((_request, response) => {
            response.statusCode = 500;
            response.end();
        });
        const prober = proberCreate();

        await expect(
            prober.waitUntilHealthy({ port, isRunning: () => true }, { timeoutMs: 300 })
        ).rejects.toMatchObject({ kind: "health-timeout" });
    });

    it("stops waiting when cancelled", async () => {
        const port = await serverStart((_request, response) => {
            response.statusCode = 503;
            response.end();
        });
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 100);
        const prober = proberCreate();

        await expect(
            prober.waitUntilHealthy({ port, isRunning: () => true }, { timeoutMs: 10_000, signal: controller.signal })
        ).rejects.toMatchObject({ kind: "cancelled" });
    });

    it("only treats status 200 on the configured path as healthy", async () => {
        const port = await serverStart((request, response) => {
            response.statusCode = request.url === "/ready" ? 200 : 404;
            response.end();
        });

        expect(await proberCreate("/ready").check(port)).toBe(true);
        expect(await proberCreate("/health").check(port)).toBe(false);
    });

    it("reports a closed port as unhealthy", async () => {
        const port = await serverStart((_request, response) => {
            response.end();
        });
        const server = servers.pop();
        await new Promise((resolve) => server?.close(resolve));

        expect(await proberCreate().check(port)).toBe(false);
    });
});

function proberCreate(path = "/health"): HealthProber {
    return new HealthProber({ path, pollIntervalMs: 50, requestTimeoutMs: 1_000 });
}

async function serverStart(handler: http.RequestListener): Promise<number> {
    const server = http.createServer(handler);
    servers.push(server);
    await new Promise<void>((resolve) => server.listen({ host: "127.0.0.1", port: 0 }, resolve));
    const address = server.address();
    if (!address || typeof address === "string") {
        throw new Error("Expected TCP address");
    }
    return address.port;
}
