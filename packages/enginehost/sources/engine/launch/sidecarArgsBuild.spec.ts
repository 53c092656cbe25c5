import { describe, expect, it } from "vitest";

import { sidecarArgsBuild } from "./sidecarArgsBuild.js";

describe("sidecarArgsBuild", () => {
    it("binds the server module to localhost on the chosen port", () => {
        expect(sidecarArgsBuild({ server: "uvicorn", app: "main:app", port: 8003 })).toEqual([
            "-m",
            "uvicorn",
            "main:app",
            "--host",
            "127.0.0.1",
            "--port",
            "8003"
        ]);
    });
});
