/**
 * ActivityPub Activities
 *
 * Outbound activity objects for federation. Builders are pure: ids,
 * actors and timestamps are passed in by the caller.
 * See: https://www.w3.org/TR/activitypub/#overview
 */

import type { ActivityPubActor } from './actor';

export const ACTIVITY_STREAMS_CONTEXT = 'https://www.w3.org/ns/activitystreams';
export const AS_PUBLIC = 'https://www.w3.org/ns/activitystreams#Public';

export const NOTE_CONTEXT: (string | Record<string, string>)[] = [
    ACTIVITY_STREAMS_CONTEXT,
    {
        'sensitive': 'as:sensitive',
        'Hashtag': 'as:Hashtag',
        'toot': 'http://joinmastodon.org/ns#',
        'Emoji': 'toot:Emoji',
        'misskey': 'https://misskey-hub.net/ns#',
        '_misskey_quote': 'misskey:_misskey_quote',
        '_misskey_reaction': 'misskey:_misskey_reaction',
        'fedibird': 'http://fedibird.com/ns#',
        'quoteUri': 'fedibird:quoteUri',
    },
];

export interface ActivityPubTag {
    type: 'Mention' | 'Hashtag' | 'Emoji';
    name: string;
    href?: string;
    id?: string;
    icon?: {
        type: 'Image';
        url: string;
        mediaType?: string;
    };
}

export interface ActivityPubAttachment {
    type: 'Document';
    mediaType?: string;
    url: string;
    name?: string;
}

export interface ActivityPubNote {
    id: string;
    type: 'Note';
    attributedTo: string;
    content: string;
    published: string;
    to: string[];
    cc: string[];
    inReplyTo: string | null;
    url: string;
    summary?: string;
    sensitive?: boolean;
    tag: ActivityPubTag[];
    attachment: ActivityPubAttachment[];
    quoteUrl?: string;
    _misskey_quote?: string;
    quoteUri?: string;
}

export interface Tombstone {
    id: string;
    type: 'Tombstone';
}

export type ActivityPubObject = ActivityPubNote | ActivityPubActor | Tombstone;

export type ActivityType = 'Create' | 'Update' | 'Delete' | 'Follow' | 'Accept' | 'Reject' | 'Undo' | 'Like' | 'Announce';

export interface ActivityPubActivity {
    '@context'?: string | (string | Record<string, string>)[];
    id: string;
    type: ActivityType;
    actor: string;
    object: string | ActivityPubObject | ActivityPubActivity;
    published?: string;
    to?: string[];
    cc?: string[];
    /** Emoji of a reaction (Misskey / Pleroma) */
    content?: string;
    _misskey_reaction?: string;
    tag?: ActivityPubTag[];
}

/**
 * Attach the JSON-LD context for delivery
 */
export function withContext(activity: ActivityPubActivity): ActivityPubActivity {
    return { '@context': NOTE_CONTEXT, ...activity };
}

/**
 * Create a Create activity for a new note
 */
export function createCreateActivity(note: ActivityPubNote): ActivityPubActivity {
    return {
        id: `${note.id}/activity`,
        type: 'Create',
        actor: note.attributedTo,
        published: note.published,
        to: note.to,
        cc: note.cc,
        object: note,
    };
}

/**
 * Create a Follow activity
 */
export function createFollowActivity(actorUrl: string, targetActorUrl: string, activityId: string): ActivityPubActivity {
    return {
        id: activityId,
        type: 'Follow',
        actor: actorUrl,
        object: targetActorUrl,
    };
}

/**
 * Create a Like activity. Reactions other than a plain like carry their emoji.
 */
export function createLikeActivity(
    actorUrl: string,
    targetUrl: string,
    activityId: string,
    emoji?: { content: string; tag?: ActivityPubTag }
): ActivityPubActivity {
    const activity: ActivityPubActivity = {
        id: activityId,
        type: 'Like',
        actor: actorUrl,
        object: targetUrl,
    };
    if (emoji) {
        activity.content = emoji.content;
        activity._misskey_reaction = emoji.content;
        if (emoji.tag) {
            activity.tag = [emoji.tag];
        }
    }
    return activity;
}

/**
 * Create an Announce (repost) activity
 */
export function createAnnounceActivity(
    actorUrl: string,
    targetUrl: string,
    activityId: string,
    published: string,
    recipients: string[] = []
): ActivityPubActivity {
    return {
        id: activityId,
        type: 'Announce',
        actor: actorUrl,
        object: targetUrl,
        published,
        to: [AS_PUBLIC],
        cc: [`${actorUrl}/followers`, ...recipients],
    };
}

/**
 * Create an Undo activity (for unfollowing, unliking, etc.)
 */
export function createUndoActivity(actorUrl: string, originalActivity: ActivityPubActivity, activityId: string): ActivityPubActivity {
    return {
        id: activityId,
        type: 'Undo',
        actor: actorUrl,
        object: originalActivity,
    };
}

/**
 * Create an Accept activity (for accepting follow requests)
 */
export function createAcceptActivity(actorUrl: string, followActivity: ActivityPubActivity, activityId: string): ActivityPubActivity {
    return {
        id: activityId,
        type: 'Accept',
        actor: actorUrl,
        object: followActivity,
    };
}

export function createDeleteActivity(actorUrl: string, objectId: string, activityId: string): ActivityPubActivity {
    return {
        id: activityId,
        type: 'Delete',
        actor: actorUrl,
        to: [AS_PUBLIC],
        object: { id: objectId, type: 'Tombstone' },
    };
}

/**
 * Create an Update activity carrying a refreshed actor document
 */
export function createUpdateActivity(actor: ActivityPubActor, activityId: string, published: string): ActivityPubActivity {
    return {
        id: activityId,
        type: 'Update',
        actor: actor.id,
        published,
        to: [AS_PUBLIC],
        cc: [actor.followers],
        object: actor,
    };
}

/**
 * Escape HTML in content for safety
 */
export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#039;');
}
