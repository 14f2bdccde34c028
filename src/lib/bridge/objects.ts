/**
 * Object Resolver
 *
 * Lookups shared by both ingestion directions: native events by id,
 * remote actors by URI, the native event standing for an ActivityPub
 * object, and the inboxes an activity goes to.
 */

import { Kind, type NostrEvent } from '@/lib/nostr/event';
import { threadRefs } from '@/lib/nostr/tags';
import { parseLocalActorUrl, parseLocalNoteUrl } from '@/lib/activitypub/actor';
import type { DeliveryTarget } from '@/lib/activitypub/delivery';
import type { SigningKey } from '@/lib/activitypub/fetch';
import type { InboundNote, RemoteActor } from '@/lib/activitypub/schemas';
import type { EventRef } from '@/lib/translate/ap-to-nostr';
import { profileFromMetadata } from '@/lib/translate/nostr-to-ap';
import type { ActorProfile, VirtualActorRecord } from '@/lib/store/types';
import { TransportTransient } from '@/lib/errors';
import type { BridgeServices } from './types';

export function signingKeyOf(actor: VirtualActorRecord): SigningKey {
    return { keyId: `${actor.actorUri}#main-key`, privateKeyPem: actor.privateKeyPem };
}

export function eventRefOf(event: NostrEvent): EventRef {
    const { root } = threadRefs(event);
    return root && root !== event.id
        ? { eventId: event.id, pubkey: event.pubkey, rootId: root }
        : { eventId: event.id, pubkey: event.pubkey };
}

export class ObjectResolver {
    constructor(private readonly services: BridgeServices) {}

    /**
     * A native event by id, from the cache or the relays
     */
    async nativeEvent(id: string): Promise<NostrEvent | null> {
        const { cache, pool, config } = this.services;
        const cached = cache.events.get(id);
        if (cached) {
            return cached;
        }
        const event = await pool.query({ ids: [id], limit: 1 }, config.relayQueryTimeoutMs);
        if (event) {
            cache.events.set(id, event);
        }
        return event;
    }

    /**
     * Profile metadata of a native pubkey, from the cache or the relays.
     * A pubkey without metadata is remembered as such until the entry expires.
     */
    async profile(pubkey: string): Promise<ActorProfile | null> {
        const { cache, pool, config } = this.services;
        const cached = cache.profiles.get(pubkey);
        if (cached) {
            return cached.profile;
        }
        const event = await pool.query({ authors: [pubkey], kinds: [Kind.Metadata], limit: 1 }, config.relayQueryTimeoutMs);
        const profile = event ? profileFromMetadata(event) : null;
        cache.profiles.set(pubkey, { profile });
        return profile;
    }

    /**
     * Remote actor document. Transport failures count as unreachable.
     */
    async actor(uri: string): Promise<RemoteActor | null> {
        try {
            return await this.services.client.fetchActor(uri);
        } catch (error) {
            if (error instanceof TransportTransient) {
                console.warn(`[Bridge] Actor ${uri} unreachable: ${error.message}`);
                return null;
            }
            throw error;
        }
    }

    async note(uri: string): Promise<InboundNote | null> {
        try {
            return await this.services.client.fetchNote(uri);
        } catch (error) {
            if (error instanceof TransportTransient) {
                console.warn(`[Bridge] Object ${uri} unreachable: ${error.message}`);
                return null;
            }
            throw error;
        }
    }

    /**
     * Native event standing for an ActivityPub object: one of our note
     * URLs, or an object bridged in earlier
     */
    async eventRef(uri: string): Promise<EventRef | null> {
        const { identities, store } = this.services;

        const localId = parseLocalNoteUrl(uri, identities.domain);
        if (localId) {
            const event = await this.nativeEvent(localId);
            return event ? eventRefOf(event) : null;
        }

        const mapping = await store.objectMap.getByApId(uri);
        if (!mapping) {
            return null;
        }
        return mapping.rootId
            ? { eventId: mapping.eventId, pubkey: mapping.pubkey, rootId: mapping.rootId }
            : { eventId: mapping.eventId, pubkey: mapping.pubkey };
    }

    /**
     * Delivery targets of everyone following a virtual actor
     */
    async followerInboxes(pubkey: string): Promise<DeliveryTarget[]> {
        const followers = await this.services.identities.effectiveFollowers(pubkey);
        const targets: DeliveryTarget[] = [];
        for (const follower of followers) {
            if (follower.inbox) {
                targets.push({ inbox: follower.inbox, sharedInbox: follower.sharedInbox });
            }
        }
        return targets;
    }

    /**
     * Delivery targets of individual actors; our own actors and
     * unreachable ones are left out
     */
    async actorInboxes(actorUris: string[]): Promise<DeliveryTarget[]> {
        const { domain } = this.services.identities;
        const remote = actorUris.filter((uri) => parseLocalActorUrl(uri, domain) === null);
        const actors = await Promise.all(remote.map((uri) => this.actor(uri)));

        const targets: DeliveryTarget[] = [];
        for (const actor of actors) {
            if (actor) {
                targets.push({ inbox: actor.inbox, sharedInbox: actor.endpoints?.sharedInbox });
            }
        }
        return targets;
    }
}
