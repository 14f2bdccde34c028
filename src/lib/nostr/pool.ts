/**
 * Relay Pool
 *
 * Fans subscriptions out to every configured relay, funnels their events
 * through one shared dedup index and broadcasts publications.
 */

import { matchFilter, type Filter } from './filter';
import type { NostrEvent } from './event';
import {
    RelayConnection,
    type PublishResult,
    type RelayState,
    type SocketFactory,
} from './relay';
import { errorMessage } from '@/lib/errors';

export interface EventClaimer {
    /** True for the first caller to see this id within the retention window */
    claim(id: string): Promise<boolean>;
    /** Forget a claim whose processing failed, so a redelivery is processed */
    release(id: string): Promise<void>;
}

export type PoolEventHandler = (event: NostrEvent, relay: string) => void | Promise<void>;

export interface RelayPoolOptions {
    relays: string[];
    socketFactory: SocketFactory;
    dedup: EventClaimer;
    backoff: { baseMs: number; maxMs: number };
    publishTimeoutMs?: number;
}

export class RelayPool {
    private readonly connections = new Map<string, RelayConnection>();
    private readonly handlers: PoolEventHandler[] = [];

    constructor(private readonly options: RelayPoolOptions) {
        for (const url of new Set(options.relays)) {
            this.connections.set(url, new RelayConnection({
                url,
                socketFactory: options.socketFactory,
                backoff: options.backoff,
                publishTimeoutMs: options.publishTimeoutMs,
                onEvent: (_subscriptionId, event, relay) => this.handleEvent(event, relay),
                onStateChange: (state, relay) => {
                    console.log(`[RelayPool] ${relay} is ${state}`);
                },
            }));
        }
    }

    get relays(): string[] {
        return [...this.connections.keys()];
    }

    onEvent(handler: PoolEventHandler): void {
        this.handlers.push(handler);
    }

    /**
     * Register a persistent subscription on every relay
     */
    subscribe(id: string, filters: Filter[]): void {
        for (const connection of this.connections.values()) {
            connection.subscribe(id, filters);
        }
    }

    unsubscribe(id: string): void {
        for (const connection of this.connections.values()) {
            connection.unsubscribe(id);
        }
    }

    start(): void {
        for (const connection of this.connections.values()) {
            connection.connect();
        }
    }

    stop(): void {
        for (const connection of this.connections.values()) {
            connection.stop();
        }
    }

    states(): Record<string, RelayState> {
        const states: Record<string, RelayState> = {};
        for (const [url, connection] of this.connections) {
            states[url] = connection.state;
        }
        return states;
    }

    /**
     * Broadcast an event to every subscribed relay.
     * Relays are independent: one failure never affects the others.
     */
    async publish(event: NostrEvent): Promise<PublishResult[]> {
        const targets = [...this.connections.values()].filter((c) => c.state === 'subscribed' || c.state === 'degraded');
        const settled = await Promise.allSettled(targets.map((c) => c.publish(event)));

        const results = settled.map((outcome, i): PublishResult => outcome.status === 'fulfilled'
            ? outcome.value
            : { relay: targets[i].url, ok: false, message: errorMessage(outcome.reason) });

        const accepted = results.filter((r) => r.ok).length;
        if (accepted < results.length) {
            console.warn(`[RelayPool] Event ${event.id} accepted by ${accepted}/${results.length} relays`);
        }
        return results;
    }

    /**
     * Resolve the first event any relay returns for the filter, or null
     */
    query(filter: Filter, timeoutMs: number): Promise<NostrEvent | null> {
        const targets = [...this.connections.values()].filter((c) => c.state === 'subscribed' || c.state === 'degraded');
        if (targets.length === 0) {
            return Promise.resolve(null);
        }

        return new Promise((resolve) => {
            let remaining = targets.length;
            let done = false;
            for (const connection of targets) {
                void connection.query([filter], timeoutMs).then((events) => {
                    const match = events.find((e) => matchFilter(filter, e));
                    if (!done && match) {
                        done = true;
                        resolve(match);
                    }
                }, (error: unknown) => {
                    console.warn(`[RelayPool] Query on ${connection.url} failed:`, errorMessage(error));
                }).finally(() => {
                    remaining--;
                    if (remaining === 0 && !done) {
                        done = true;
                        resolve(null);
                    }
                });
            }
        });
    }

    private handleEvent(event: NostrEvent, relay: string): void {
        this.dispatch(event, relay).catch((error: unknown) => {
            console.error(`[RelayPool] Failed to process event ${event.id} from ${relay}:`, errorMessage(error));
        });
    }

    private async dispatch(event: NostrEvent, relay: string): Promise<void> {
        if (!(await this.options.dedup.claim(event.id))) {
            return;
        }
        try {
            for (const handler of this.handlers) {
                await handler(event, relay);
            }
        } catch (error) {
            await this.options.dedup.release(event.id);
            throw error;
        }
    }
}
