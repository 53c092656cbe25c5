export const SIDECAR_HOST = "127.0.0.1";

/**
 * Builds interpreter arguments that serve the sidecar app on the loopback interface.
 */
export function sidecarArgsBuild(options: { server: string; app: string; port: number }): string[] {
    return ["-m", options.server, options.app, "--host", SIDECAR_HOST, "--port", String(options.port)];
}
