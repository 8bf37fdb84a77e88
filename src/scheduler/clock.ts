// ============================================================================
// Herald — Clock
// Injectable time source so the scheduler can be simulated deterministically
// ============================================================================

export interface Clock {
    now(): Date;
    /** Resolves after `ms`, or early (without rejecting) when `signal` aborts. */
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
    now: () => new Date(),
    sleep: (ms, signal) => new Promise<void>(resolve => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, Math.max(0, ms));
        signal?.addEventListener('abort', onAbort, { once: true });
    }),
};

export type RandomSource = () => number;
