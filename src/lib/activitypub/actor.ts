/**
 * ActivityPub Actor Utilities
 *
 * Serializes virtual actors (the federated face of Nostr pubkeys) and
 * builds the bridge's local URLs.
 * See: https://www.w3.org/TR/activitypub/#actor-objects
 */

import type { VirtualActorRecord } from '@/lib/store/types';
import { decodeEventId, decodePubkey, npubEncode } from '@/lib/nostr/nip19';

const ACTIVITY_STREAMS_CONTEXT = 'https://www.w3.org/ns/activitystreams';
const SECURITY_CONTEXT = 'https://w3id.org/security/v1';

export interface ActivityPubImage {
    type: 'Image';
    mediaType?: string;
    url: string;
}

export interface ActivityPubActor {
    '@context': (string | object)[];
    id: string;
    type: 'Person';
    preferredUsername: string;
    name: string | null;
    summary: string | null;
    url: string;
    inbox: string;
    outbox: string;
    followers: string;
    following: string;
    manuallyApprovesFollowers: boolean;
    discoverable: boolean;
    published: string;
    icon?: ActivityPubImage;
    image?: ActivityPubImage;
    publicKey: {
        id: string;
        owner: string;
        publicKeyPem: string;
    };
    endpoints: {
        sharedInbox: string;
    };
}

/**
 * Get the actor URL for a Nostr pubkey
 */
export function getActorUrl(pubkey: string, nodeDomain: string): string {
    return `https://${nodeDomain}/users/${npubEncode(pubkey)}`;
}

export function getSharedInboxUrl(nodeDomain: string): string {
    return `https://${nodeDomain}/inbox`;
}

/**
 * URL of a bridged Nostr note
 */
export function getNoteUrl(eventId: string, nodeDomain: string): string {
    return `https://${nodeDomain}/notes/${eventId}`;
}

export function getActivityUrl(id: string, nodeDomain: string): string {
    return `https://${nodeDomain}/activities/${id}`;
}

/**
 * Pubkey of a local actor URL, or null when the URL is not one of ours
 */
export function parseLocalActorUrl(url: string, nodeDomain: string): string | null {
    const prefix = `https://${nodeDomain}/users/`;
    if (!url.startsWith(prefix)) {
        return null;
    }
    const rest = url.slice(prefix.length).split(/[/#?]/)[0];
    return decodePubkey(rest);
}

/**
 * Event id of a local note URL, or null when the URL is not one of ours
 */
export function parseLocalNoteUrl(url: string, nodeDomain: string): string | null {
    const prefix = `https://${nodeDomain}/notes/`;
    if (!url.startsWith(prefix)) {
        return null;
    }
    const rest = url.slice(prefix.length).split(/[/#?]/)[0];
    return decodeEventId(rest);
}

function image(url: string | null): ActivityPubImage | undefined {
    if (!url) {
        return undefined;
    }
    const ext = url.split(/[?#]/)[0].split('.').pop()?.toLowerCase();
    const mediaType = ext === 'jpg' || ext === 'jpeg' ? 'image/jpeg'
        : ext === 'png' ? 'image/png'
        : ext === 'gif' ? 'image/gif'
        : ext === 'webp' ? 'image/webp'
        : undefined;
    return mediaType ? { type: 'Image', mediaType, url } : { type: 'Image', url };
}

/**
 * Convert a virtual actor record to an ActivityPub Actor
 */
export function virtualActorToActor(record: VirtualActorRecord, nodeDomain: string): ActivityPubActor {
    const actorUrl = record.actorUri;

    const actor: ActivityPubActor = {
        '@context': [
            ACTIVITY_STREAMS_CONTEXT,
            SECURITY_CONTEXT,
            {
                'manuallyApprovesFollowers': 'as:manuallyApprovesFollowers',
                'toot': 'http://joinmastodon.org/ns#',
                'discoverable': 'toot:discoverable',
            },
        ],
        id: actorUrl,
        type: 'Person',
        preferredUsername: npubEncode(record.pubkey),
        name: record.displayName,
        summary: record.summary,
        url: actorUrl,
        inbox: `${actorUrl}/inbox`,
        outbox: `${actorUrl}/outbox`,
        followers: `${actorUrl}/followers`,
        following: `${actorUrl}/following`,
        manuallyApprovesFollowers: false,
        discoverable: true,
        published: record.createdAt.toISOString(),
        publicKey: {
            id: `${actorUrl}#main-key`,
            owner: actorUrl,
            publicKeyPem: record.publicKeyPem,
        },
        endpoints: {
            sharedInbox: getSharedInboxUrl(nodeDomain),
        },
    };

    const icon = image(record.avatarUrl);
    if (icon) {
        actor.icon = icon;
    }

    const header = image(record.bannerUrl);
    if (header) {
        actor.image = header;
    }

    return actor;
}
