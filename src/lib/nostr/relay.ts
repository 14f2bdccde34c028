/**
 * Relay Connection
 *
 * One long-lived connection to a Nostr relay:
 *   disconnected -> connecting -> subscribed <-> degraded -> disconnected
 *
 * Persistent subscriptions survive reconnects: every time the socket opens,
 * the same filter set is issued again. Transport errors always end in a
 * reconnect with exponential backoff until stop() is called.
 */

import WebSocket from 'ws';
import { v4 as uuidv4 } from 'uuid';
import type { Filter } from './filter';
import { parseEvent, type NostrEvent } from './event';
import { backoffDelay } from '@/lib/concurrency/sleep';

export type RelayState = 'disconnected' | 'connecting' | 'subscribed' | 'degraded';

export interface SocketHandlers {
    onOpen(): void;
    onMessage(data: string): void;
    onClose(): void;
    onError(error: Error): void;
}

export interface RelaySocket {
    send(data: string): void;
    close(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => RelaySocket;

export interface PublishResult {
    relay: string;
    ok: boolean;
    message: string;
}

export interface RelayConnectionOptions {
    url: string;
    socketFactory: SocketFactory;
    backoff: { baseMs: number; maxMs: number };
    publishTimeoutMs?: number;
    onEvent: (subscriptionId: string, event: NostrEvent, relay: string) => void;
    onStateChange?: (state: RelayState, relay: string) => void;
}

interface PendingQuery {
    events: NostrEvent[];
    finish: () => void;
}

function rawDataToString(data: WebSocket.RawData): string {
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString('utf8');
    }
    if (Buffer.isBuffer(data)) {
        return data.toString('utf8');
    }
    return Buffer.from(data).toString('utf8');
}

/**
 * Socket factory backed by the `ws` package
 */
export function wsSocketFactory(userAgent: string): SocketFactory {
    return (url, handlers) => {
        const ws = new WebSocket(url, { headers: { 'User-Agent': userAgent } });
        ws.on('open', () => handlers.onOpen());
        ws.on('message', (data: WebSocket.RawData) => handlers.onMessage(rawDataToString(data)));
        ws.on('close', () => handlers.onClose());
        ws.on('error', (error: Error) => handlers.onError(error));
        return {
            send: (data) => ws.send(data),
            close: () => ws.close(),
        };
    };
}

export class RelayConnection {
    readonly url: string;
    private currentState: RelayState = 'disconnected';
    private socket?: RelaySocket;
    private open = false;
    private stopped = true;
    private reconnectAttempt = 0;
    private reconnectTimer?: NodeJS.Timeout;
    private readonly subscriptions = new Map<string, Filter[]>();
    private readonly closedSubscriptions = new Map<string, number>();
    private readonly resubscribeTimers = new Map<string, NodeJS.Timeout>();
    private readonly queries = new Map<string, PendingQuery>();
    private readonly pendingPublishes = new Map<string, Array<(result: PublishResult) => void>>();

    constructor(private readonly options: RelayConnectionOptions) {
        this.url = options.url;
    }

    get state(): RelayState {
        return this.currentState;
    }

    /**
     * Filters of the persistent subscriptions, as issued on every (re)connect
     */
    get activeSubscriptions(): ReadonlyMap<string, Filter[]> {
        return this.subscriptions;
    }

    connect(): void {
        this.stopped = false;
        if (this.socket) {
            return;
        }
        this.setState('connecting');
        this.socket = this.options.socketFactory(this.url, {
            onOpen: () => this.handleOpen(),
            onMessage: (data) => this.handleMessage(data),
            onClose: () => this.handleClose(),
            onError: (error) => {
                console.warn(`[Relay] ${this.url} transport error:`, error.message);
            },
        });
    }

    subscribe(id: string, filters: Filter[]): void {
        this.subscriptions.set(id, filters);
        if (this.open) {
            this.sendFrame(['REQ', id, ...filters]);
        }
    }

    unsubscribe(id: string): void {
        if (!this.subscriptions.delete(id)) {
            return;
        }
        this.clearResubscribe(id);
        this.closedSubscriptions.delete(id);
        if (this.open) {
            this.sendFrame(['CLOSE', id]);
        }
    }

    /**
     * Send an event and wait for the relay's OK
     */
    publish(event: NostrEvent, timeoutMs: number = this.options.publishTimeoutMs ?? 10_000): Promise<PublishResult> {
        if (!this.open) {
            return Promise.resolve({ relay: this.url, ok: false, message: 'not connected' });
        }

        return new Promise((resolve) => {
            const settle = (result: PublishResult) => {
                clearTimeout(timer);
                const waiting = this.pendingPublishes.get(event.id);
                if (waiting) {
                    const rest = waiting.filter((w) => w !== settle);
                    if (rest.length > 0) this.pendingPublishes.set(event.id, rest);
                    else this.pendingPublishes.delete(event.id);
                }
                resolve(result);
            };
            const timer = setTimeout(() => settle({ relay: this.url, ok: false, message: 'timeout' }), timeoutMs);

            const waiting = this.pendingPublishes.get(event.id) ?? [];
            waiting.push(settle);
            this.pendingPublishes.set(event.id, waiting);
            this.sendFrame(['EVENT', event]);
        });
    }

    /**
     * One-shot subscription: collect events until EOSE, CLOSED or timeout
     */
    query(filters: Filter[], timeoutMs: number): Promise<NostrEvent[]> {
        if (!this.open) {
            return Promise.resolve([]);
        }

        const id = `q-${uuidv4()}`;
        return new Promise((resolve) => {
            const pending: PendingQuery = {
                events: [],
                finish: () => {
                    clearTimeout(timer);
                    if (!this.queries.delete(id)) {
                        return;
                    }
                    if (this.open) {
                        this.sendFrame(['CLOSE', id]);
                    }
                    resolve(pending.events);
                },
            };
            const timer = setTimeout(() => pending.finish(), timeoutMs);
            this.queries.set(id, pending);
            this.sendFrame(['REQ', id, ...filters]);
        });
    }

    stop(): void {
        this.stopped = true;
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer);
            this.reconnectTimer = undefined;
        }
        for (const id of [...this.resubscribeTimers.keys()]) {
            this.clearResubscribe(id);
        }
        const socket = this.socket;
        this.teardown('connection stopped');
        socket?.close();
    }

    private handleOpen(): void {
        this.open = true;
        this.reconnectAttempt = 0;
        this.closedSubscriptions.clear();
        for (const [id, filters] of this.subscriptions) {
            this.sendFrame(['REQ', id, ...filters]);
        }
        console.log(`[Relay] Connected to ${this.url} (${this.subscriptions.size} subscriptions)`);
        this.setState('subscribed');
    }

    private handleClose(): void {
        if (!this.socket) {
            return;
        }
        this.teardown('connection closed');
        if (!this.stopped) {
            this.scheduleReconnect();
        }
    }

    private teardown(reason: string): void {
        this.socket = undefined;
        this.open = false;
        for (const query of [...this.queries.values()]) {
            query.finish();
        }
        for (const [, waiting] of [...this.pendingPublishes]) {
            for (const settle of [...waiting]) {
                settle({ relay: this.url, ok: false, message: reason });
            }
        }
        this.setState('disconnected');
    }

    private scheduleReconnect(): void {
        this.reconnectAttempt++;
        const delay = backoffDelay(this.reconnectAttempt, this.options.backoff.baseMs, this.options.backoff.maxMs);
        console.log(`[Relay] Reconnecting to ${this.url} in ${delay}ms (attempt ${this.reconnectAttempt})`);
        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = undefined;
            if (!this.stopped) {
                this.connect();
            }
        }, delay);
    }

    private handleMessage(data: string): void {
        let frame: unknown;
        try {
            frame = JSON.parse(data);
        } catch {
            console.warn(`[Relay] ${this.url} sent invalid JSON`);
            return;
        }
        if (!Array.isArray(frame) || typeof frame[0] !== 'string') {
            return;
        }

        switch (frame[0]) {
            case 'EVENT':
                this.handleEventFrame(frame[1], frame[2]);
                break;
            case 'EOSE':
                if (typeof frame[1] === 'string') this.handleEose(frame[1]);
                break;
            case 'OK':
                this.handleOk(frame[1], frame[2], frame[3]);
                break;
            case 'CLOSED':
                if (typeof frame[1] === 'string') this.handleClosed(frame[1], String(frame[2] ?? ''));
                break;
            case 'NOTICE':
                console.log(`[Relay] NOTICE from ${this.url}:`, frame[1]);
                break;
            default:
                break;
        }
    }

    private handleEventFrame(subscriptionId: unknown, raw: unknown): void {
        if (typeof subscriptionId !== 'string') {
            return;
        }
        const event = parseEvent(raw);
        if (!event) {
            return;
        }

        const query = this.queries.get(subscriptionId);
        if (query) {
            query.events.push(event);
            return;
        }

        if (this.subscriptions.has(subscriptionId)) {
            this.markHealthy(subscriptionId);
            this.options.onEvent(subscriptionId, event, this.url);
        }
    }

    private handleEose(subscriptionId: string): void {
        const query = this.queries.get(subscriptionId);
        if (query) {
            query.finish();
            return;
        }
        if (this.subscriptions.has(subscriptionId)) {
            this.markHealthy(subscriptionId);
        }
    }

    private handleOk(eventId: unknown, accepted: unknown, message: unknown): void {
        if (typeof eventId !== 'string') {
            return;
        }
        const waiting = this.pendingPublishes.get(eventId);
        if (!waiting) {
            return;
        }
        for (const settle of [...waiting]) {
            settle({ relay: this.url, ok: accepted === true, message: typeof message === 'string' ? message : '' });
        }
    }

    private handleClosed(subscriptionId: string, message: string): void {
        const query = this.queries.get(subscriptionId);
        if (query) {
            query.finish();
            return;
        }
        const filters = this.subscriptions.get(subscriptionId);
        if (!filters) {
            return;
        }

        const attempt = (this.closedSubscriptions.get(subscriptionId) ?? 0) + 1;
        this.closedSubscriptions.set(subscriptionId, attempt);
        console.warn(`[Relay] ${this.url} closed subscription ${subscriptionId}: ${message}`);
        this.setState('degraded');

        this.clearResubscribe(subscriptionId);
        const delay = backoffDelay(attempt, this.options.backoff.baseMs, this.options.backoff.maxMs);
        this.resubscribeTimers.set(subscriptionId, setTimeout(() => {
            this.resubscribeTimers.delete(subscriptionId);
            const current = this.subscriptions.get(subscriptionId);
            if (current && this.open) {
                this.sendFrame(['REQ', subscriptionId, ...current]);
            }
        }, delay));
    }

    private markHealthy(subscriptionId: string): void {
        if (!this.closedSubscriptions.delete(subscriptionId)) {
            return;
        }
        if (this.closedSubscriptions.size === 0 && this.currentState === 'degraded') {
            this.setState('subscribed');
        }
    }

    private clearResubscribe(id: string): void {
        const timer = this.resubscribeTimers.get(id);
        if (timer) {
            clearTimeout(timer);
            this.resubscribeTimers.delete(id);
        }
    }

    private sendFrame(frame: unknown[]): void {
        if (!this.socket || !this.open) {
            return;
        }
        try {
            this.socket.send(JSON.stringify(frame));
        } catch (error) {
            console.warn(`[Relay] Failed to send to ${this.url}:`, error);
        }
    }

    private setState(state: RelayState): void {
        if (state === this.currentState) {
            return;
        }
        this.currentState = state;
        this.options.onStateChange?.(state, this.url);
    }
}
