/**
 * Tag helpers for the NIPs the bridge reads and writes
 * (NIP-10 threads, NIP-32 labels, NIP-48 proxy tags, NIP-92 imeta).
 */

import type { NostrEvent } from './event';
import { isHexKey } from './keys';

export type Tag = string[];

export function tagValues(tags: Tag[], name: string): string[] {
    return tags.filter((t) => t[0] === name && t[1] !== undefined).map((t) => t[1]);
}

export function firstTagValue(tags: Tag[], name: string): string | undefined {
    return tags.find((t) => t[0] === name && t[1] !== undefined)?.[1];
}

export interface ThreadRefs {
    root?: string;
    reply?: string;
    /** Pubkey hint attached to the reply e-tag, if any */
    replyAuthor?: string;
}

/**
 * Resolve the root and direct parent of an event per NIP-10,
 * falling back to positional e-tags when no markers are present.
 */
export function threadRefs(event: Pick<NostrEvent, 'tags'>): ThreadRefs {
    const eTags = event.tags.filter((t) => t[0] === 'e' && t[1] !== undefined && isHexKey(t[1]));
    if (eTags.length === 0) {
        return {};
    }

    const marked = eTags.filter((t) => t[3] === 'root' || t[3] === 'reply');
    if (marked.length > 0) {
        const root = marked.find((t) => t[3] === 'root');
        const reply = marked.find((t) => t[3] === 'reply') ?? root;
        return {
            root: root?.[1],
            reply: reply?.[1],
            replyAuthor: reply?.[4] && isHexKey(reply[4]) ? reply[4] : undefined,
        };
    }

    const first = eTags[0];
    const last = eTags[eTags.length - 1];
    return { root: first[1], reply: last[1] };
}

/**
 * Target event of a reaction or repost: the last e-tag
 */
export function targetEventId(event: Pick<NostrEvent, 'tags'>): string | undefined {
    const eTags = event.tags.filter((t) => t[0] === 'e' && t[1] !== undefined && isHexKey(t[1]));
    return eTags[eTags.length - 1]?.[1];
}

export function labelTags(namespace: string, activityPubId: string): Tag[] {
    return [
        ['proxy', activityPubId, 'activitypub'],
        ['L', namespace],
        ['l', `${namespace}.activitypub:${activityPubId}`, namespace],
    ];
}

/**
 * Whether an event was published by this bridge (carries its label namespace)
 */
export function isLabelledBy(event: Pick<NostrEvent, 'tags'>, namespace: string): boolean {
    return event.tags.some((t) => t[0] === 'L' && t[1] === namespace);
}

/**
 * ActivityPub id recorded on a bridged event, if any
 */
export function proxiedActivityPubId(event: Pick<NostrEvent, 'tags'>): string | undefined {
    return event.tags.find((t) => t[0] === 'proxy' && t[2] === 'activitypub')?.[1];
}

export interface MediaTag {
    url: string;
    mediaType?: string;
    alt?: string;
}

/**
 * Parse NIP-92 imeta tags ("url <u>", "m <mime>", "alt <text>")
 */
export function imetaTags(tags: Tag[]): MediaTag[] {
    const media: MediaTag[] = [];
    for (const tag of tags) {
        if (tag[0] !== 'imeta') continue;
        const fields = new Map<string, string>();
        for (const entry of tag.slice(1)) {
            const space = entry.indexOf(' ');
            if (space > 0) {
                fields.set(entry.slice(0, space), entry.slice(space + 1));
            }
        }
        const url = fields.get('url');
        if (url) {
            media.push({ url, mediaType: fields.get('m'), alt: fields.get('alt') });
        }
    }
    return media;
}

export function imetaTag(media: MediaTag): Tag {
    const tag = ['imeta', `url ${media.url}`];
    if (media.mediaType) tag.push(`m ${media.mediaType}`);
    if (media.alt) tag.push(`alt ${media.alt}`);
    return tag;
}
