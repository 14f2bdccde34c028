/**
 * Nostr -> ActivityPub
 *
 * Pure translation of native events into activities. Identities and
 * referenced objects are resolved by the caller and passed in through
 * the context; nothing here performs I/O.
 */

import { z } from 'zod';
import { Kind, isKnownKind, type NostrEvent } from '@/lib/nostr/event';
import { decodeEntity, NOSTR_URI_REGEX } from '@/lib/nostr/nip19';
import { firstTagValue, imetaTags, tagValues, targetEventId, threadRefs } from '@/lib/nostr/tags';
import { isHexKey } from '@/lib/nostr/keys';
import { getActivityUrl, getNoteUrl } from '@/lib/activitypub/actor';
import {
    AS_PUBLIC,
    createAnnounceActivity,
    createCreateActivity,
    createDeleteActivity,
    createLikeActivity,
    createUndoActivity,
    escapeHtml,
    type ActivityPubActivity,
    type ActivityPubAttachment,
    type ActivityPubNote,
    type ActivityPubTag,
} from '@/lib/activitypub/activities';
import { markdownToHtml } from '@/lib/text/markdown';
import type { ActorProfile } from '@/lib/store/types';
import { assertNever, DegradationLog, type Translation } from './types';

export interface ResolvedActor {
    actorUri: string;
    /** `user@host` */
    handle: string;
}

export interface NativeContext {
    domain: string;
    /** Actor URI of the event author */
    authorActorUri: string;
    /** Resolved actors of the pubkeys the event references, keyed by pubkey */
    actors: ReadonlyMap<string, ResolvedActor>;
    /** ActivityPub ids of referenced events bridged in from the federation */
    objects: ReadonlyMap<string, string>;
    /** Events targeted by a deletion, when they could be fetched */
    deletedEvents?: ReadonlyMap<string, NostrEvent>;
}

export type NativeTranslation =
    | { type: 'note'; note: ActivityPubNote; activity: ActivityPubActivity; recipients: string[] }
    | { type: 'reaction'; activity: ActivityPubActivity; recipients: string[] }
    | { type: 'repost'; activity: ActivityPubActivity; recipients: string[] }
    | { type: 'deletion'; activities: ActivityPubActivity[] }
    | { type: 'profile'; profile: ActorProfile }
    | { type: 'contacts'; follows: string[] }
    | { type: 'skipped'; reason: string };

const metadataSchema = z.object({
    name: z.string().nullish(),
    display_name: z.string().nullish(),
    about: z.string().nullish(),
    picture: z.string().nullish(),
    banner: z.string().nullish(),
});

const SUPPORTED_MEDIA = /^(image|video|audio)\//;

function objectUri(eventId: string, ctx: NativeContext): string {
    return ctx.objects.get(eventId) ?? getNoteUrl(eventId, ctx.domain);
}

function published(event: NostrEvent): string {
    return new Date(event.created_at * 1000).toISOString();
}

function httpUrl(value: string | null | undefined): string | null {
    return value && /^https?:\/\//.test(value) ? value : null;
}

/**
 * Actor URIs of every resolvable pubkey in the event's p tags
 */
function taggedActors(event: NostrEvent, ctx: NativeContext): string[] {
    const uris = new Set<string>();
    for (const pubkey of tagValues(event.tags, 'p')) {
        const actor = ctx.actors.get(pubkey);
        if (actor && actor.actorUri !== ctx.authorActorUri) {
            uris.add(actor.actorUri);
        }
    }
    return [...uris];
}

function mentionHtml(actor: ResolvedActor): string {
    const username = actor.handle.split('@')[0];
    return `<span class="h-card"><a href="${escapeHtml(actor.actorUri)}" class="u-url mention">@<span>${escapeHtml(username)}</span></a></span>`;
}

function translateNote(event: NostrEvent, ctx: NativeContext, log: DegradationLog): NativeTranslation {
    const tags: ActivityPubTag[] = [];
    const mentioned = new Set<string>();

    let content = markdownToHtml(event.content).replace(NOSTR_URI_REGEX, (match: string, value: string) => {
        const entity = decodeEntity(value);
        if (!entity) {
            log.add('invalid_reference', value);
            return match;
        }
        switch (entity.type) {
            case 'npub':
            case 'nprofile': {
                const actor = ctx.actors.get(entity.pubkey);
                if (!actor) {
                    log.add('unresolved_mention', entity.pubkey);
                    return match;
                }
                if (!mentioned.has(actor.actorUri)) {
                    mentioned.add(actor.actorUri);
                    tags.push({ type: 'Mention', href: actor.actorUri, name: `@${actor.handle}` });
                }
                return mentionHtml(actor);
            }
            case 'note':
            case 'nevent': {
                const url = escapeHtml(objectUri(entity.id, ctx));
                return `<a href="${url}">${url}</a>`;
            }
            default:
                return assertNever(entity);
        }
    });

    for (const hashtag of tagValues(event.tags, 't')) {
        tags.push({ type: 'Hashtag', name: `#${hashtag}` });
    }

    for (const tag of event.tags) {
        if (tag[0] === 'emoji' && tag[1] && tag[2]) {
            tags.push({ type: 'Emoji', name: `:${tag[1]}:`, id: tag[2], icon: { type: 'Image', url: tag[2] } });
        }
    }

    const attachment: ActivityPubAttachment[] = [];
    for (const media of imetaTags(event.tags)) {
        if (media.mediaType && !SUPPORTED_MEDIA.test(media.mediaType)) {
            log.add('unsupported_media', media.url, `${media.mediaType} sent as a link`);
            if (!event.content.includes(media.url)) {
                const url = escapeHtml(media.url);
                content += `<p><a href="${url}">${url}</a></p>`;
            }
            continue;
        }
        attachment.push({ type: 'Document', mediaType: media.mediaType, url: media.url, name: media.alt });
    }

    const refs = threadRefs(event);
    const inReplyTo = refs.reply ? objectUri(refs.reply, ctx) : null;
    const recipients = [...new Set([...mentioned, ...taggedActors(event, ctx)])];
    const url = getNoteUrl(event.id, ctx.domain);

    const note: ActivityPubNote = {
        id: url,
        type: 'Note',
        attributedTo: ctx.authorActorUri,
        content,
        published: published(event),
        to: [AS_PUBLIC],
        cc: [`${ctx.authorActorUri}/followers`, ...recipients],
        inReplyTo,
        url,
        tag: tags,
        attachment,
    };

    const warning = event.tags.find((t) => t[0] === 'content-warning');
    if (warning) {
        note.sensitive = true;
        if (warning[1]) {
            note.summary = warning[1];
        }
    }

    const quoted = firstTagValue(event.tags, 'q');
    if (quoted && isHexKey(quoted)) {
        const quoteUrl = objectUri(quoted, ctx);
        note.quoteUrl = quoteUrl;
        note._misskey_quote = quoteUrl;
        note.quoteUri = quoteUrl;
    }

    return { type: 'note', note, activity: createCreateActivity(note), recipients };
}

function reactionEmoji(event: NostrEvent): { content: string; tag?: ActivityPubTag } | undefined {
    const content = event.content.trim();
    if (content === '' || content === '+') {
        return undefined;
    }
    const custom = content.match(/^:([\w+-]+):$/);
    if (custom) {
        const emoji = event.tags.find((t) => t[0] === 'emoji' && t[1] === custom[1] && t[2]);
        if (!emoji) return undefined;
        return { content, tag: { type: 'Emoji', name: content, id: emoji[2], icon: { type: 'Image', url: emoji[2] } } };
    }
    return { content };
}

function translateReaction(event: NostrEvent, ctx: NativeContext, log: DegradationLog): NativeTranslation {
    const target = targetEventId(event);
    if (!target) {
        log.add('invalid_reference', event.id, 'reaction without a target event');
        return { type: 'skipped', reason: 'reaction without target' };
    }
    if (event.content.trim() === '-') {
        return { type: 'skipped', reason: 'dislike' };
    }
    const activity = createLikeActivity(
        ctx.authorActorUri,
        objectUri(target, ctx),
        getActivityUrl(event.id, ctx.domain),
        reactionEmoji(event)
    );
    return { type: 'reaction', activity, recipients: taggedActors(event, ctx) };
}

function translateRepost(event: NostrEvent, ctx: NativeContext, log: DegradationLog): NativeTranslation {
    const target = targetEventId(event);
    if (!target) {
        log.add('invalid_reference', event.id, 'repost without a target event');
        return { type: 'skipped', reason: 'repost without target' };
    }
    const recipients = taggedActors(event, ctx);
    const activity = createAnnounceActivity(
        ctx.authorActorUri,
        objectUri(target, ctx),
        getActivityUrl(event.id, ctx.domain),
        published(event),
        recipients
    );
    return { type: 'repost', activity, recipients };
}

function translateDeletion(event: NostrEvent, ctx: NativeContext, log: DegradationLog): NativeTranslation {
    const activities: ActivityPubActivity[] = [];
    const activityUrl = getActivityUrl(event.id, ctx.domain);

    for (const id of tagValues(event.tags, 'e').filter(isHexKey)) {
        const deleted = ctx.deletedEvents?.get(id);
        if (deleted && deleted.pubkey !== event.pubkey) {
            continue;
        }
        const activityId = `${activityUrl}#${id}`;
        const target = deleted ? targetEventId(deleted) : undefined;

        if (deleted?.kind === Kind.Reaction || deleted?.kind === Kind.Repost) {
            if (!target) {
                log.add('invalid_reference', id, 'deleted event has no target');
                continue;
            }
            const original: ActivityPubActivity = {
                id: getActivityUrl(id, ctx.domain),
                type: deleted.kind === Kind.Reaction ? 'Like' : 'Announce',
                actor: ctx.authorActorUri,
                object: objectUri(target, ctx),
            };
            activities.push(createUndoActivity(ctx.authorActorUri, original, activityId));
            continue;
        }

        activities.push(createDeleteActivity(ctx.authorActorUri, getNoteUrl(id, ctx.domain), activityId));
    }

    if (activities.length === 0) {
        return { type: 'skipped', reason: 'nothing to delete' };
    }
    return { type: 'deletion', activities };
}

/**
 * Actor profile carried by a kind 0 metadata event, or null when the
 * content is not a metadata object
 */
export function profileFromMetadata(event: NostrEvent): ActorProfile | null {
    let json: unknown;
    try {
        json = JSON.parse(event.content);
    } catch {
        return null;
    }
    const parsed = metadataSchema.safeParse(json);
    if (!parsed.success) {
        return null;
    }
    const metadata = parsed.data;
    return {
        displayName: metadata.display_name || metadata.name || null,
        summary: metadata.about ? markdownToHtml(metadata.about) : null,
        avatarUrl: httpUrl(metadata.picture),
        bannerUrl: httpUrl(metadata.banner),
    };
}

function translateMetadata(event: NostrEvent): NativeTranslation {
    const profile = profileFromMetadata(event);
    return profile
        ? { type: 'profile', profile }
        : { type: 'skipped', reason: 'metadata is not a profile object' };
}

function translateContacts(event: NostrEvent): NativeTranslation {
    return { type: 'contacts', follows: [...new Set(tagValues(event.tags, 'p').filter(isHexKey))] };
}

/**
 * Translate a native event into the activities that represent it
 */
export function translateNativeEvent(event: NostrEvent, ctx: NativeContext): Translation<NativeTranslation> {
    const log = new DegradationLog();
    const { kind } = event;

    if (!isKnownKind(kind)) {
        return log.result({ type: 'skipped', reason: `unsupported kind ${kind}` });
    }

    switch (kind) {
        case Kind.Metadata:
            return log.result(translateMetadata(event));
        case Kind.TextNote:
            return log.result(translateNote(event, ctx, log));
        case Kind.ContactList:
            return log.result(translateContacts(event));
        case Kind.EventDeletion:
            return log.result(translateDeletion(event, ctx, log));
        case Kind.Repost:
            return log.result(translateRepost(event, ctx, log));
        case Kind.Reaction:
            return log.result(translateReaction(event, ctx, log));
        default:
            return assertNever(kind);
    }
}
