/**
 * Resolve after `ms`, or reject with the signal's reason once it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }

        const onAbort = () => {
            clearTimeout(timer);
            reject(signal?.reason);
        };

        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Exponential backoff: base * 2^(attempt - 1), capped at max.
 * `attempt` counts from 1.
 */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
    if (attempt <= 0) {
        return 0;
    }
    return Math.min(baseMs * Math.pow(2, attempt - 1), maxMs);
}
