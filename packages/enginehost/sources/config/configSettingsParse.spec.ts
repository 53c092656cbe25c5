import { describe, expect, it } from "vitest";

import { configSettingsParse } from "./configSettingsParse.js";

describe("configSettingsParse", () => {
    it("accepts an empty document", () => {
        expect(configSettingsParse({})).toEqual({});
    });

    it("accepts sidecar and port settings", () => {
        const parsed = configSettingsParse({
            sidecar: {
                sourceDir: "/opt/engine/backend",
                app: "server:app",
                env: { HF_HOME: "/tmp/hf" }
            },
            ports: { first: 9100, last: 9104 }
        });

        expect(parsed.sidecar?.sourceDir).toBe("/opt/engine/backend");
        expect(parsed.sidecar?.app).toBe("server:app");
        expect(parsed.sidecar?.env).toEqual({ HF_HOME: "/tmp/hf" });
        expect(parsed.ports).toEqual({ first: 9100, last: 9104 });
    });

    it("rejects an inverted port range", () => {
        expect(() => configSettingsParse({ ports: { first: 9000, last: 8000 } })).toThrow(
            "ports.first must not be greater than ports.last"
        );
    });

    it("rejects health paths without a leading slash", () => {
        expect(() => configSettingsParse({ health: { path: "health" } })).toThrow("health.path must start with /");
    });

    it("rejects non-integer retry counts", () => {
        expect(() => configSettingsParse({ restart: { maxCrashRetries: 1.5 } })).toThrow();
    });

    it("accepts runtime minimum version", () => {
        const parsed = configSettingsParse({ runtime: { minVersion: { major: 3, minor: 12 } } });
        expect(parsed.runtime?.minVersion).toEqual({ major: 3, minor: 12 });
    });
});
