/**
 * Inbound ActivityPub documents
 *
 * Remote servers disagree on shapes (a reference may be a URI, an embedded
 * object or an array of either), so every inbound document is normalized
 * here before anything else reads it. The activity schema is a closed
 * union: an activity type not listed is rejected as invalid.
 */

import { z } from 'zod';

const objectWithId = z.object({ id: z.string() });
const linkObject = z.object({ href: z.string() });

/** A reference to another object, reduced to its id */
const ref = z
    .union([z.string(), objectWithId, z.array(z.union([z.string(), objectWithId])).nonempty()])
    .transform((value) => {
        const first = Array.isArray(value) ? value[0] : value;
        return typeof first === 'string' ? first : first.id;
    });

/** to / cc: absent, a single URI or a list */
const addressing = z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((value) => (value === undefined ? [] : Array.isArray(value) ? value : [value]));

const urlValue = z.union([z.string(), linkObject]).transform((v) => (typeof v === 'string' ? v : v.href));

/** icon / image / url: a URI, an object with a url or href, or a list of those */
const mediaUrl = z
    .union([
        z.string(),
        z.object({ url: z.union([urlValue, z.array(urlValue).nonempty()]) }),
        z.array(z.object({ url: urlValue })).nonempty(),
    ])
    .nullish()
    .transform((value): string | undefined => {
        if (value === null || value === undefined) return undefined;
        if (typeof value === 'string') return value;
        if (Array.isArray(value)) return value[0].url;
        return Array.isArray(value.url) ? value.url[0] : value.url;
    });

// ============================================
// ACTORS
// ============================================

export const remoteActorSchema = z.object({
    id: z.string().url(),
    type: z.string(),
    preferredUsername: z.string().optional(),
    name: z.string().nullish(),
    summary: z.string().nullish(),
    url: mediaUrl,
    inbox: z.string().url(),
    outbox: z.string().optional(),
    followers: z.string().optional(),
    endpoints: z.object({ sharedInbox: z.string().url().optional() }).optional(),
    icon: mediaUrl,
    image: mediaUrl,
    publicKey: z.object({
        id: z.string(),
        owner: z.string(),
        publicKeyPem: z.string(),
    }),
});

export type RemoteActor = z.output<typeof remoteActorSchema>;

// ============================================
// OBJECTS
// ============================================

export const tagSchema = z.object({
    type: z.string(),
    href: z.string().optional(),
    name: z.string().optional(),
    id: z.string().optional(),
    icon: z.object({ url: z.string(), mediaType: z.string().optional() }).optional(),
});

export type InboundTag = z.output<typeof tagSchema>;

const tagList = z
    .union([z.array(tagSchema), tagSchema])
    .optional()
    .transform((value): InboundTag[] => (value === undefined ? [] : Array.isArray(value) ? value : [value]));

export const attachmentSchema = z.object({
    type: z.string().optional(),
    mediaType: z.string().nullish(),
    url: urlValue,
    name: z.string().nullish(),
});

export type InboundAttachment = z.output<typeof attachmentSchema>;

const attachmentList = z
    .union([z.array(attachmentSchema), attachmentSchema])
    .optional()
    .transform((value): InboundAttachment[] => (value === undefined ? [] : Array.isArray(value) ? value : [value]));

export const noteSchema = z.object({
    id: z.string().url(),
    type: z.enum(['Note', 'Article', 'Page', 'Question']),
    attributedTo: ref,
    content: z.string().nullish().transform((v) => v ?? ''),
    summary: z.string().nullish(),
    sensitive: z.boolean().nullish(),
    published: z.string().optional(),
    inReplyTo: ref.nullish(),
    url: mediaUrl,
    to: addressing,
    cc: addressing,
    tag: tagList,
    attachment: attachmentList,
    quoteUrl: z.string().nullish(),
    quoteUri: z.string().nullish(),
    _misskey_quote: z.string().nullish(),
});

export type InboundNote = z.output<typeof noteSchema>;

// ============================================
// ACTIVITIES
// ============================================

const activityBase = {
    id: z.string().url(),
    actor: ref,
    to: addressing,
    cc: addressing,
    published: z.string().optional(),
};

const embeddedActivity = z.object({
    id: z.string().optional(),
    type: z.string(),
    actor: ref.optional(),
    object: ref,
});

const reactionFields = {
    ...activityBase,
    object: ref,
    content: z.string().nullish(),
    _misskey_reaction: z.string().nullish(),
    tag: tagList,
};

export const inboundActivitySchema = z.discriminatedUnion('type', [
    z.object({ ...activityBase, type: z.literal('Create'), object: z.union([noteSchema, ref]) }),
    z.object({ ...activityBase, type: z.literal('Update'), object: z.union([remoteActorSchema, objectWithId.extend({ type: z.string() })]) }),
    z.object({ ...activityBase, type: z.literal('Delete'), object: ref }),
    z.object({ ...activityBase, type: z.literal('Follow'), object: ref }),
    z.object({ ...activityBase, type: z.literal('Undo'), object: z.union([embeddedActivity, ref]) }),
    z.object({ ...reactionFields, type: z.literal('Like') }),
    z.object({ ...reactionFields, type: z.literal('EmojiReact') }),
    z.object({ ...activityBase, type: z.literal('Announce'), object: ref }),
    z.object({ ...activityBase, type: z.literal('Accept'), object: z.union([embeddedActivity, ref]) }),
    z.object({ ...activityBase, type: z.literal('Reject'), object: z.union([embeddedActivity, ref]) }),
]);

export type InboundActivity = z.output<typeof inboundActivitySchema>;
export type InboundActivityType = InboundActivity['type'];
export type EmbeddedActivity = z.output<typeof embeddedActivity>;

/**
 * Host of a URI, or null when it is not an absolute URL
 */
export function hostOf(uri: string): string | null {
    try {
        return new URL(uri).host;
    } catch {
        return null;
    }
}

/**
 * Whether two URIs live on the same server
 */
export function sameHost(a: string, b: string): boolean {
    const host = hostOf(a);
    return host !== null && host === hostOf(b);
}
