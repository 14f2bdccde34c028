/**
 * ActivityPub -> Nostr
 *
 * Pure translation of inbound activities into unsigned event templates.
 * The caller resolves mentioned actors and referenced objects first and
 * signs the result with the bridged identity's key.
 */

import { Kind, nowSeconds, type EventTemplate } from '@/lib/nostr/event';
import { npubEncode, noteEncode } from '@/lib/nostr/nip19';
import { imetaTag, labelTags, type Tag } from '@/lib/nostr/tags';
import { AS_PUBLIC } from '@/lib/activitypub/activities';
import { hostOf, type InboundActivity, type InboundNote, type InboundTag, type RemoteActor } from '@/lib/activitypub/schemas';
import { htmlToMarkdown } from '@/lib/text/markdown';
import { DegradationLog, type Translation } from './types';

/** A native event standing for an ActivityPub object */
export interface EventRef {
    eventId: string;
    pubkey: string;
    /** Thread root of the event, when it is itself a reply */
    rootId?: string;
}

export interface FederationContext {
    /** Label namespace stamped on every bridged event */
    namespace: string;
    /** Native pubkeys of resolvable actors, keyed by actor URI */
    actors: ReadonlyMap<string, string>;
    /** Native events of already bridged objects, keyed by ActivityPub id */
    objects: ReadonlyMap<string, EventRef>;
}

type ReactionActivity = Extract<InboundActivity, { type: 'Like' | 'EmojiReact' }>;
type AnnounceActivity = Extract<InboundActivity, { type: 'Announce' }>;

const PUBLIC_ADDRESSES = new Set([AS_PUBLIC, 'as:Public', 'Public']);
const SUPPORTED_MEDIA = /^(image|video|audio)\//;

const HASHTAG_LINK = /\[#([^\]\s]+)\]\(https?:\/\/[^)\s]+\)/g;
const MENTION_LINK = /\[(@[^\]\s]+)\]\((https?:\/\/[^)\s]+)\)/g;
const LEADING_MENTIONS = /^(?:\s*\[@[^\]\s]+\]\(https?:\/\/[^)\s]+\))+\s*/;

/**
 * Whether an object or activity is addressed to the public collection
 */
export function isPublic(to: string[], cc: string[]): boolean {
    return [...to, ...cc].some((address) => PUBLIC_ADDRESSES.has(address));
}

function createdAt(published: string | undefined): number {
    const time = published ? Date.parse(published) : NaN;
    return Number.isFinite(time) ? Math.floor(time / 1000) : nowSeconds();
}

function findMention(tags: InboundTag[], label: string, href: string): InboundTag | undefined {
    const host = hostOf(href);
    return tags.find((t) =>
        t.type === 'Mention' && (t.href === href || t.name === label || (host !== null && t.name === `${label}@${host}`))
    );
}

function emojiTag(tag: InboundTag): Tag | null {
    if (tag.type !== 'Emoji' || !tag.name || !tag.icon) {
        return null;
    }
    return ['emoji', tag.name.replace(/^:|:$/g, ''), tag.icon.url];
}

/**
 * Translate a public Note (or Article/Page/Question) into a kind 1 event
 */
export function translateFederationNote(note: InboundNote, ctx: FederationContext): Translation<EventTemplate> {
    const log = new DegradationLog();
    const tags: Tag[] = [];
    const pubkeys = new Set<string>();

    let content = htmlToMarkdown(note.content).replace(HASHTAG_LINK, (_, hashtag: string) => `#${hashtag}`);

    const parent = note.inReplyTo ? ctx.objects.get(note.inReplyTo) : undefined;
    if (note.inReplyTo && !parent) {
        log.add('missing_parent', note.inReplyTo, `reply to ${note.inReplyTo} bridged as a top-level note`);
    }
    if (parent) {
        content = content.replace(LEADING_MENTIONS, '');
        const root = parent.rootId ?? parent.eventId;
        if (root !== parent.eventId) {
            tags.push(['e', root, '', 'root'], ['e', parent.eventId, '', 'reply']);
        } else {
            tags.push(['e', parent.eventId, '', 'root']);
        }
        pubkeys.add(parent.pubkey);
    }

    content = content.replace(MENTION_LINK, (_, label: string, href: string) => {
        const mention = findMention(note.tag, label, href);
        const pubkey = ctx.actors.get(mention?.href ?? href) ?? ctx.actors.get(href);
        if (pubkey) {
            pubkeys.add(pubkey);
            return `nostr:${npubEncode(pubkey)}`;
        }
        log.add('unresolved_mention', mention?.href ?? href);
        return mention?.name ?? label;
    });

    for (const tag of note.tag) {
        if (tag.type === 'Mention' && tag.href) {
            const pubkey = ctx.actors.get(tag.href);
            if (pubkey) pubkeys.add(pubkey);
        } else if (tag.type === 'Hashtag' && tag.name) {
            tags.push(['t', tag.name.replace(/^#/, '').toLowerCase()]);
        } else {
            const emoji = emojiTag(tag);
            if (emoji) tags.push(emoji);
        }
    }

    const blocks = [content];

    const quoteUri = note.quoteUrl ?? note._misskey_quote ?? note.quoteUri;
    if (quoteUri) {
        const quoted = ctx.objects.get(quoteUri);
        if (quoted) {
            blocks[0] = content.replace(`RE: ${quoteUri}`, '').trim();
            blocks.push(`nostr:${noteEncode(quoted.eventId)}`);
            tags.push(['q', quoted.eventId, '', quoted.pubkey]);
            pubkeys.add(quoted.pubkey);
        } else {
            log.add('missing_quote', quoteUri);
            if (!content.includes(quoteUri)) blocks.push(quoteUri);
        }
    }

    const media: string[] = [];
    for (const attachment of note.attachment) {
        const mediaType = attachment.mediaType ?? undefined;
        if (!content.includes(attachment.url)) {
            media.push(attachment.url);
        }
        if (mediaType && !SUPPORTED_MEDIA.test(mediaType)) {
            log.add('unsupported_media', attachment.url, `${mediaType} sent as a link`);
            continue;
        }
        tags.push(imetaTag({ url: attachment.url, mediaType, alt: attachment.name ?? undefined }));
    }
    if (media.length > 0) {
        blocks.push(media.join('\n'));
    }

    if (note.summary) {
        tags.push(['content-warning', note.summary]);
    } else if (note.sensitive) {
        tags.push(['content-warning', '']);
    }

    for (const pubkey of pubkeys) {
        tags.push(['p', pubkey]);
    }
    tags.push(...labelTags(ctx.namespace, note.id));

    return log.result({
        kind: Kind.TextNote,
        content: blocks.filter(Boolean).join('\n\n'),
        tags,
        created_at: createdAt(note.published),
    });
}

/**
 * Like / EmojiReact -> kind 7. A plain like becomes "+"; emoji reactions keep their emoji.
 */
export function translateReaction(activity: ReactionActivity, target: EventRef, namespace: string): EventTemplate {
    const tags: Tag[] = [['e', target.eventId], ['p', target.pubkey]];
    const reaction = (activity._misskey_reaction ?? activity.content ?? '').trim();

    let content = '+';
    const custom = reaction.match(/^:([\w+-]+)(?:@[\w.-]+)?:$/);
    if (custom) {
        const emoji = activity.tag.map(emojiTag).find((t): t is Tag => t !== null && t[1] === custom[1]);
        if (emoji) {
            content = `:${emoji[1]}:`;
            tags.push(emoji);
        }
    } else if (reaction && /^[^\p{L}\p{N}\s]+$/u.test(reaction)) {
        content = reaction;
    }

    tags.push(...labelTags(namespace, activity.id));
    return { kind: Kind.Reaction, content, tags, created_at: createdAt(activity.published) };
}

export function translateAnnounce(activity: AnnounceActivity, target: EventRef, namespace: string): EventTemplate {
    return {
        kind: Kind.Repost,
        content: '',
        tags: [['e', target.eventId, ''], ['p', target.pubkey], ...labelTags(namespace, activity.id)],
        created_at: createdAt(activity.published),
    };
}

/**
 * Kind 5 deletion of the events standing for a deleted or undone object
 */
export function translateDeletion(activityId: string, eventIds: string[], namespace: string): EventTemplate {
    return {
        kind: Kind.EventDeletion,
        content: '',
        tags: [...eventIds.map((id): Tag => ['e', id]), ...labelTags(namespace, activityId)],
        created_at: nowSeconds(),
    };
}

/**
 * Actor document -> kind 0 metadata of the bridged identity
 */
export function translateActorProfile(actor: RemoteActor, namespace: string): EventTemplate {
    const metadata = {
        name: actor.preferredUsername ?? actor.name ?? undefined,
        display_name: actor.name ?? actor.preferredUsername,
        about: actor.summary ? htmlToMarkdown(actor.summary) : undefined,
        picture: actor.icon,
        banner: actor.image,
        website: actor.url,
    };
    return {
        kind: Kind.Metadata,
        content: JSON.stringify(metadata),
        tags: labelTags(namespace, actor.id),
        created_at: nowSeconds(),
    };
}

/**
 * Kind 3 contact list of a bridged identity, capped at `limit` entries
 */
export function translateContactList(actorUri: string, follows: string[], limit: number, namespace: string): EventTemplate {
    return {
        kind: Kind.ContactList,
        content: '',
        tags: [...follows.slice(0, limit).map((pubkey): Tag => ['p', pubkey]), ...labelTags(namespace, actorUri)],
        created_at: nowSeconds(),
    };
}
