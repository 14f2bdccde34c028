/**
 * ActivityPub HTTP client
 *
 * Signed GETs for actors and objects, signed POSTs for delivery.
 * `fetch` is injected so the engine can be exercised without a network.
 */

import { signRequest } from './signatures';
import { hostOf, noteSchema, remoteActorSchema, type InboundNote, type RemoteActor } from './schemas';
import { TransportTransient, errorMessage } from '@/lib/errors';
import type { BridgeCache } from '@/lib/cache';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface SigningKey {
    keyId: string;
    privateKeyPem: string;
}

export interface ActivityPubClientOptions {
    userAgent: string;
    cache: BridgeCache;
    /** Key for signed GETs (servers with authorized fetch reject unsigned ones) */
    instanceKey: () => Promise<SigningKey>;
    fetch?: FetchLike;
    timeoutMs?: number;
}

export interface FetchActorOptions {
    /** Skip the cache */
    force?: boolean;
    /** Store the document in the cache once fetched */
    remember?: boolean;
}

const ACCEPT = 'application/activity+json, application/ld+json; profile="https://www.w3.org/ns/activitystreams"';

/**
 * `user@host` handle of a remote actor
 */
export function actorHandle(actor: RemoteActor): string {
    const host = hostOf(actor.id) ?? 'unknown';
    return `${actor.preferredUsername ?? actor.id.split('/').pop() ?? 'unknown'}@${host}`;
}

export class ActivityPubClient {
    private readonly fetchFn: FetchLike;
    private readonly timeoutMs: number;

    constructor(private readonly options: ActivityPubClientOptions) {
        this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
        this.timeoutMs = options.timeoutMs ?? 10_000;
    }

    /**
     * Signed GET of an ActivityPub document. Null when the object is gone
     * or the server refuses it; throws TransportTransient on I/O errors
     * and 5xx/429 responses.
     */
    async getJson(url: string): Promise<unknown> {
        const key = await this.options.instanceKey();
        const signature = signRequest('GET', url, null, key.privateKeyPem, key.keyId);

        let response: Response;
        try {
            response = await this.fetchFn(url, {
                method: 'GET',
                headers: {
                    'Accept': ACCEPT,
                    'User-Agent': this.options.userAgent,
                    ...signature,
                },
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (error) {
            throw new TransportTransient(`GET ${url} failed: ${errorMessage(error)}`, undefined, error);
        }

        if (response.status >= 500 || response.status === 429) {
            throw new TransportTransient(`GET ${url} returned ${response.status}`, response.status);
        }
        if (!response.ok) {
            console.warn(`[Fetch] GET ${url} returned ${response.status}`);
            return null;
        }

        try {
            return await response.json();
        } catch (error) {
            console.warn(`[Fetch] GET ${url} returned invalid JSON:`, errorMessage(error));
            return null;
        }
    }

    /**
     * Fetch a remote actor, from the cache unless forced
     */
    async fetchActor(uri: string, { force = false, remember = true }: FetchActorOptions = {}): Promise<RemoteActor | null> {
        if (!force) {
            const cached = this.options.cache.actors.get(uri);
            if (cached) return cached;
        }

        const data = await this.getJson(uri);
        if (data === null) return null;

        const parsed = remoteActorSchema.safeParse(data);
        if (!parsed.success) {
            console.warn(`[Fetch] Invalid actor document at ${uri}:`, parsed.error.issues[0]?.message);
            return null;
        }

        if (remember) {
            this.remember(parsed.data);
        }
        return parsed.data;
    }

    remember(actor: RemoteActor): void {
        this.options.cache.actors.set(actor.id, actor);
    }

    /**
     * Fetch a remote note (or Article/Page/Question)
     */
    async fetchNote(uri: string): Promise<InboundNote | null> {
        const data = await this.getJson(uri);
        if (data === null) return null;

        const parsed = noteSchema.safeParse(data);
        if (!parsed.success) {
            console.warn(`[Fetch] ${uri} is not a note:`, parsed.error.issues[0]?.message);
            return null;
        }
        return parsed.data;
    }

    /**
     * Signed POST of an activity to an inbox. Resolves the response status;
     * rejects only on transport errors.
     */
    async post(inbox: string, body: string, key: SigningKey): Promise<number> {
        const signature = signRequest('POST', inbox, body, key.privateKeyPem, key.keyId);

        let response: Response;
        try {
            response = await this.fetchFn(inbox, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/activity+json',
                    'Accept': 'application/activity+json',
                    'User-Agent': this.options.userAgent,
                    ...signature,
                },
                body,
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (error) {
            throw new TransportTransient(`POST ${inbox} failed: ${errorMessage(error)}`, undefined, error);
        }

        await response.text().catch(() => '');
        return response.status;
    }
}
