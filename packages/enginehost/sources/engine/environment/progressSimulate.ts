export type ProgressSimulateOptions = {
    intervalMs: number;
    start?: number;
    step?: number;
    ceiling?: number;
    onProgress: (progress: number) => void;
};

/**
 * Advances an estimated progress value on a fixed cadence until stopped.
 * The value never exceeds ceiling. Returns a stop function.
 */
export function progressSimulate(options: ProgressSimulateOptions): () => void {
    const step = options.step ?? 0.05;
    const ceiling = options.ceiling ?? 0.95;
    let value = options.start ?? 0;
    const timer = setInterval(() => {
        const next = Math.min(ceiling, value + step);
        if (next <= value) {
            return;
        }
        value = next;
        options.onProgress(value);
    }, options.intervalMs);
    timer.unref();
    return () => {
        clearInterval(timer);
    };
}
