/**
 * WebFinger (RFC 7033) for virtual actors
 *
 * Only native pubkeys are discoverable here: `acct:npub1…@{domain}`, or the
 * actor URL itself. Remote actors are found on their own servers.
 */

import { decodePubkey, npubEncode } from '@/lib/nostr/nip19';
import { getActorUrl, parseLocalActorUrl } from './actor';

export interface JrdLink {
    rel: string;
    type: string;
    href: string;
}

export interface JrdDocument {
    subject: string;
    aliases: string[];
    links: JrdLink[];
}

const ACCT_PATTERN = /^acct:@?([^@\s]+)@([^@\s]+)$/i;

/**
 * Pubkey a resource names on this bridge. Null when the resource is for
 * another host or does not name a pubkey.
 */
export function resourcePubkey(resource: string, nodeDomain: string): string | null {
    const acct = ACCT_PATTERN.exec(resource.trim());
    if (acct) {
        const [, user, host] = acct;
        return sameDomain(host, nodeDomain) ? decodePubkey(user) : null;
    }
    return parseLocalActorUrl(resource, nodeDomain);
}

function sameDomain(host: string, nodeDomain: string): boolean {
    const wanted = host.toLowerCase();
    return wanted === nodeDomain || wanted === nodeDomain.replace(/:\d+$/, '');
}

export function jrdFor(pubkey: string, nodeDomain: string): JrdDocument {
    const actorUrl = getActorUrl(pubkey, nodeDomain);
    return {
        subject: `acct:${npubEncode(pubkey)}@${nodeDomain}`,
        aliases: [actorUrl],
        links: [{ rel: 'self', type: 'application/activity+json', href: actorUrl }],
    };
}
