/**
 * ActivityPub Delivery
 *
 * Every (activity, inbox) pair is delivered independently: signed POST,
 * exponential backoff on any non-2xx or transport error, then one
 * DeliveryExhausted once the attempt ceiling is reached. Nothing survives
 * a restart. Concurrent requests are capped per destination domain.
 */

import { withContext, type ActivityPubActivity } from './activities';
import { hostOf } from './schemas';
import type { ActivityPubClient, SigningKey } from './fetch';
import { SingleFlight, type StalledFlight } from '@/lib/concurrency/single-flight';
import { KeyedSemaphore } from '@/lib/concurrency/semaphore';
import { backoffDelay, sleep } from '@/lib/concurrency/sleep';
import { DeliveryExhausted, errorMessage } from '@/lib/errors';
import type { RetryPolicy } from '@/lib/config';

export type DeliveryTransport = Pick<ActivityPubClient, 'post'>;

export interface DeliveryTarget {
    inbox: string;
    sharedInbox?: string | null;
}

export type DeliveryOutcome = 'delivered' | 'exhausted' | 'cancelled';

export interface DeliveryResult {
    activityId: string;
    inbox: string;
    outcome: DeliveryOutcome;
    attempts: number;
}

export interface DeliveryOptions extends RetryPolicy {
    domainConcurrency: number;
}

type Listener<T> = (value: T) => void;

/**
 * Inboxes to deliver to, one per server where a shared inbox is known
 */
export function uniqueInboxes(targets: DeliveryTarget[]): string[] {
    return [...new Set(targets.map((t) => t.sharedInbox || t.inbox))];
}

export class DeliveryEngine {
    private readonly flights = new SingleFlight<DeliveryResult>('delivery');
    private readonly domains: KeyedSemaphore;
    private readonly pending = new Set<Promise<DeliveryResult>>();
    private readonly exhaustedListeners: Listener<DeliveryExhausted>[] = [];
    private readonly deliveredListeners: Listener<DeliveryResult>[] = [];
    private readonly controller = new AbortController();

    constructor(
        private readonly transport: DeliveryTransport,
        private readonly options: DeliveryOptions
    ) {
        this.domains = new KeyedSemaphore(options.domainConcurrency);
    }

    onExhausted(listener: Listener<DeliveryExhausted>): () => void {
        this.exhaustedListeners.push(listener);
        return () => remove(this.exhaustedListeners, listener);
    }

    onDelivered(listener: Listener<DeliveryResult>): () => void {
        this.deliveredListeners.push(listener);
        return () => remove(this.deliveredListeners, listener);
    }

    /**
     * Deliver an activity to every target inbox. Resolves once every pair
     * has been delivered, exhausted or cancelled; never rejects.
     */
    deliver(activity: ActivityPubActivity, targets: DeliveryTarget[], key: SigningKey): Promise<DeliveryResult[]> {
        const body = JSON.stringify(withContext(activity));
        return Promise.all(
            uniqueInboxes(targets).map((inbox) => this.track(
                this.flights.do(`${activity.id} ${inbox}`, () => this.run(activity.id, inbox, body, key))
            ))
        );
    }

    /**
     * Wait for every delivery in flight, including their retries
     */
    async drain(): Promise<void> {
        while (this.pending.size > 0) {
            await Promise.allSettled([...this.pending]);
        }
    }

    /**
     * Abort pending backoff timers; affected pairs resolve as cancelled
     */
    cancel(): void {
        this.controller.abort(new Error('delivery cancelled'));
    }

    get inFlight(): number {
        return this.flights.size;
    }

    stalled(thresholdMs: number): StalledFlight[] {
        return this.flights.stalled(thresholdMs);
    }

    private track(promise: Promise<DeliveryResult>): Promise<DeliveryResult> {
        this.pending.add(promise);
        const forget = () => this.pending.delete(promise);
        void promise.then(forget, forget);
        return promise;
    }

    private async run(activityId: string, inbox: string, body: string, key: SigningKey): Promise<DeliveryResult> {
        const { maxAttempts, baseDelayMs, maxDelayMs } = this.options;
        const { signal } = this.controller;
        const domain = hostOf(inbox) ?? inbox;
        let lastError = 'not attempted';

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            if (signal.aborted) {
                return { activityId, inbox, outcome: 'cancelled', attempts: attempt - 1 };
            }

            try {
                const status = await this.domains.run(domain, () => this.transport.post(inbox, body, key));
                if (status >= 200 && status < 300) {
                    const result: DeliveryResult = { activityId, inbox, outcome: 'delivered', attempts: attempt };
                    this.emit(this.deliveredListeners, result);
                    return result;
                }
                lastError = `HTTP ${status}`;
            } catch (error) {
                lastError = errorMessage(error);
            }

            if (attempt < maxAttempts) {
                console.warn(`[Delivery] ${activityId} -> ${inbox} attempt ${attempt} failed: ${lastError}`);
                try {
                    await sleep(backoffDelay(attempt, baseDelayMs, maxDelayMs), signal);
                } catch {
                    return { activityId, inbox, outcome: 'cancelled', attempts: attempt };
                }
            }
        }

        const exhausted = new DeliveryExhausted(activityId, inbox, maxAttempts, lastError);
        console.error(`[Delivery] ${exhausted.message}`);
        this.emit(this.exhaustedListeners, exhausted);
        return { activityId, inbox, outcome: 'exhausted', attempts: maxAttempts };
    }

    private emit<T>(listeners: Listener<T>[], value: T): void {
        for (const listener of listeners) {
            try {
                listener(value);
            } catch (error) {
                console.error('[Delivery] Listener failed:', error);
            }
        }
    }
}

function remove<T>(list: T[], item: T): void {
    const index = list.indexOf(item);
    if (index >= 0) list.splice(index, 1);
}
