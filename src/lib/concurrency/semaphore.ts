/**
 * Per-key concurrency cap.
 *
 * Keys are independent: work under different keys never waits on each other.
 */
export class KeyedSemaphore {
    private readonly active = new Map<string, number>();
    private readonly waiting = new Map<string, Array<() => void>>();

    constructor(private readonly limit: number) {
        if (limit < 1) {
            throw new RangeError('KeyedSemaphore limit must be at least 1');
        }
    }

    async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
        await this.acquire(key);
        try {
            return await fn();
        } finally {
            this.release(key);
        }
    }

    activeCount(key: string): number {
        return this.active.get(key) ?? 0;
    }

    private acquire(key: string): Promise<void> {
        const count = this.active.get(key) ?? 0;
        if (count < this.limit) {
            this.active.set(key, count + 1);
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            const queue = this.waiting.get(key) ?? [];
            queue.push(resolve);
            this.waiting.set(key, queue);
        });
    }

    private release(key: string): void {
        const queue = this.waiting.get(key);
        const next = queue?.shift();
        if (next) {
            // Slot passes straight to the next waiter; the count is unchanged.
            if (queue && queue.length === 0) {
                this.waiting.delete(key);
            }
            next();
            return;
        }

        const count = (this.active.get(key) ?? 1) - 1;
        if (count <= 0) {
            this.active.delete(key);
        } else {
            this.active.set(key, count);
        }
    }
}
