/**
 * ActivityPub Collections
 *
 * Followers and outbox documents of virtual actors. The bridge keeps no
 * outbox history (notes live on the relays), so outboxes are always empty.
 */

import { ACTIVITY_STREAMS_CONTEXT } from './activities';

export interface OrderedCollection {
    '@context': string;
    id: string;
    type: 'OrderedCollection';
    totalItems: number;
    orderedItems: string[];
}

export function createOrderedCollection(id: string, items: string[]): OrderedCollection {
    return {
        '@context': ACTIVITY_STREAMS_CONTEXT,
        id,
        type: 'OrderedCollection',
        totalItems: items.length,
        orderedItems: items,
    };
}

/**
 * Followers collection of a virtual actor
 */
export function createFollowersCollection(actorUrl: string, followerUris: string[]): OrderedCollection {
    return createOrderedCollection(`${actorUrl}/followers`, followerUris);
}

export function createOutboxCollection(actorUrl: string): OrderedCollection {
    return createOrderedCollection(`${actorUrl}/outbox`, []);
}
