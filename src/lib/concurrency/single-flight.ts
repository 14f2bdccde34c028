/**
 * Single-flight execution
 *
 * At most one in-progress operation exists per key; concurrent callers for the
 * same key share its promise. The entry is removed once the operation settles,
 * so a failed operation can be retried by the next caller.
 */

interface Flight<V> {
    promise: Promise<V>;
    startedAt: number;
}

export interface StalledFlight {
    key: string;
    ageMs: number;
}

export class SingleFlight<V> {
    private readonly flights = new Map<string, Flight<V>>();

    constructor(private readonly name: string) {}

    /**
     * Run `fn` for `key` unless a call for that key is already in flight.
     */
    do(key: string, fn: () => Promise<V>): Promise<V> {
        const existing = this.flights.get(key);
        if (existing) {
            return existing.promise;
        }

        const promise = (async () => {
            try {
                return await fn();
            } finally {
                this.flights.delete(key);
            }
        })();

        this.flights.set(key, { promise, startedAt: Date.now() });
        return promise;
    }

    isInFlight(key: string): boolean {
        return this.flights.has(key);
    }

    get size(): number {
        return this.flights.size;
    }

    /**
     * Keys whose operation has been running longer than `thresholdMs`.
     */
    stalled(thresholdMs: number, now: number = Date.now()): StalledFlight[] {
        const result: StalledFlight[] = [];
        for (const [key, flight] of this.flights) {
            const ageMs = now - flight.startedAt;
            if (ageMs > thresholdMs) {
                result.push({ key: `${this.name}:${key}`, ageMs });
            }
        }
        return result;
    }
}
