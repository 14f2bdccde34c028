/**
 * Nostr Events
 *
 * Event model, id hashing and BIP-340 signatures.
 * See: https://github.com/nostr-protocol/nips/blob/master/01.md
 */

import { z } from 'zod';
import { schnorr } from '@noble/curves/secp256k1';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import { getPublicKey } from './keys';

export const Kind = {
    Metadata: 0,
    TextNote: 1,
    ContactList: 3,
    EventDeletion: 5,
    Repost: 6,
    Reaction: 7,
} as const;

export type KnownKind = (typeof Kind)[keyof typeof Kind];

const KNOWN_KINDS: ReadonlySet<number> = new Set(Object.values(Kind));

export function isKnownKind(kind: number): kind is KnownKind {
    return KNOWN_KINDS.has(kind);
}

const hex64 = z.string().regex(/^[0-9a-f]{64}$/);

export const nostrEventSchema = z.object({
    id: hex64,
    pubkey: hex64,
    created_at: z.number().int().nonnegative(),
    kind: z.number().int().nonnegative(),
    tags: z.array(z.array(z.string())),
    content: z.string(),
    sig: z.string().regex(/^[0-9a-f]{128}$/),
});

export type NostrEvent = z.infer<typeof nostrEventSchema>;

export interface EventTemplate {
    kind: number;
    tags: string[][];
    content: string;
    created_at: number;
}

export type UnsignedEvent = EventTemplate & { pubkey: string };

/**
 * Current time in seconds
 */
export function nowSeconds(): number {
    return Math.floor(Date.now() / 1000);
}

export function serializeEvent(event: UnsignedEvent): string {
    return JSON.stringify([0, event.pubkey, event.created_at, event.kind, event.tags, event.content]);
}

export function getEventHash(event: UnsignedEvent): string {
    return bytesToHex(sha256(utf8ToBytes(serializeEvent(event))));
}

/**
 * Hash and sign an event template with a hex secret key
 */
export function finalizeEvent(template: EventTemplate, secretKey: string): NostrEvent {
    const unsigned: UnsignedEvent = { ...template, pubkey: getPublicKey(secretKey) };
    const id = getEventHash(unsigned);
    const sig = bytesToHex(schnorr.sign(id, secretKey));
    return { ...unsigned, id, sig };
}

/**
 * Check both the id and the signature of an event
 */
export function verifyEvent(event: NostrEvent): boolean {
    try {
        if (getEventHash(event) !== event.id) {
            return false;
        }
        return schnorr.verify(event.sig, event.id, event.pubkey);
    } catch {
        return false;
    }
}

/**
 * Parse and verify an untrusted value as an event; null when it is not a valid one
 */
export function parseEvent(value: unknown): NostrEvent | null {
    const parsed = nostrEventSchema.safeParse(value);
    if (!parsed.success || !verifyEvent(parsed.data)) {
        return null;
    }
    return parsed.data;
}
