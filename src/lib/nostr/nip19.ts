/**
 * NIP-19 bech32 entities and NIP-27 content references
 */

import { bech32 } from '@scure/base';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { isHexKey } from './keys';

const BECH32_LIMIT = 5000;

const TLV_SPECIAL = 0;
const TLV_RELAY = 1;
const TLV_AUTHOR = 2;

export type DecodedEntity =
    | { type: 'npub'; pubkey: string }
    | { type: 'note'; id: string }
    | { type: 'nprofile'; pubkey: string; relays: string[] }
    | { type: 'nevent'; id: string; relays: string[]; author?: string };

/**
 * Matches `nostr:` references inside content
 */
export const NOSTR_URI_REGEX = /nostr:((?:npub|nprofile|note|nevent)1[02-9ac-hj-np-z]+)/g;

type Bech32String = `${string}1${string}`;

function isBech32String(value: string): value is Bech32String {
    return value.includes('1');
}

function encodeBytes(prefix: string, bytes: Uint8Array): string {
    return bech32.encode(prefix, bech32.toWords(bytes), BECH32_LIMIT);
}

function encodeTlv(entries: Array<[number, Uint8Array]>): Uint8Array {
    const parts: number[] = [];
    for (const [type, value] of entries) {
        parts.push(type, value.length, ...value);
    }
    return Uint8Array.from(parts);
}

function parseTlv(data: Uint8Array): Map<number, Uint8Array[]> {
    const result = new Map<number, Uint8Array[]>();
    let offset = 0;
    while (offset + 2 <= data.length) {
        const type = data[offset];
        const length = data[offset + 1];
        const value = data.slice(offset + 2, offset + 2 + length);
        if (value.length < length) {
            break;
        }
        const list = result.get(type) ?? [];
        list.push(value);
        result.set(type, list);
        offset += 2 + length;
    }
    return result;
}

export function npubEncode(pubkey: string): string {
    return encodeBytes('npub', hexToBytes(pubkey));
}

export function noteEncode(id: string): string {
    return encodeBytes('note', hexToBytes(id));
}

export function nprofileEncode(pubkey: string, relays: string[] = []): string {
    const encoder = new TextEncoder();
    return encodeBytes('nprofile', encodeTlv([
        [TLV_SPECIAL, hexToBytes(pubkey)],
        ...relays.map((r): [number, Uint8Array] => [TLV_RELAY, encoder.encode(r)]),
    ]));
}

export function neventEncode(id: string, relays: string[] = [], author?: string): string {
    const encoder = new TextEncoder();
    const entries: Array<[number, Uint8Array]> = [[TLV_SPECIAL, hexToBytes(id)]];
    for (const relay of relays) {
        entries.push([TLV_RELAY, encoder.encode(relay)]);
    }
    if (author) {
        entries.push([TLV_AUTHOR, hexToBytes(author)]);
    }
    return encodeBytes('nevent', encodeTlv(entries));
}

/**
 * Decode a bech32 entity; null when it is malformed or of an unsupported type
 */
export function decodeEntity(value: string): DecodedEntity | null {
    const input = value.startsWith('nostr:') ? value.slice(6) : value;
    if (!isBech32String(input)) {
        return null;
    }

    let prefix: string;
    let data: Uint8Array;
    try {
        const decoded = bech32.decode(input, BECH32_LIMIT);
        prefix = decoded.prefix;
        data = Uint8Array.from(bech32.fromWords(decoded.words));
    } catch {
        return null;
    }

    const decoder = new TextDecoder();
    switch (prefix) {
        case 'npub':
        case 'note': {
            if (data.length !== 32) return null;
            const hex = bytesToHex(data);
            return prefix === 'npub' ? { type: 'npub', pubkey: hex } : { type: 'note', id: hex };
        }
        case 'nprofile':
        case 'nevent': {
            const tlv = parseTlv(data);
            const special = tlv.get(TLV_SPECIAL)?.[0];
            if (!special || special.length !== 32) return null;
            const relays = (tlv.get(TLV_RELAY) ?? []).map((r) => decoder.decode(r));
            if (prefix === 'nprofile') {
                return { type: 'nprofile', pubkey: bytesToHex(special), relays };
            }
            const author = tlv.get(TLV_AUTHOR)?.[0];
            return {
                type: 'nevent',
                id: bytesToHex(special),
                relays,
                author: author && author.length === 32 ? bytesToHex(author) : undefined,
            };
        }
        default:
            return null;
    }
}

/**
 * Pubkey referenced by an npub/nprofile, or by a raw hex key
 */
export function decodePubkey(value: string): string | null {
    if (isHexKey(value)) {
        return value;
    }
    const entity = decodeEntity(value);
    if (entity?.type === 'npub' || entity?.type === 'nprofile') {
        return entity.pubkey;
    }
    return null;
}

/**
 * Event id referenced by a note/nevent, or by a raw hex id
 */
export function decodeEventId(value: string): string | null {
    if (isHexKey(value)) {
        return value;
    }
    const entity = decodeEntity(value);
    if (entity?.type === 'note' || entity?.type === 'nevent') {
        return entity.id;
    }
    return null;
}
