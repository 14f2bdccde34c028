import { describe, it, expect } from 'vitest';
import {
  NOSTR_URI_REGEX,
  decodeEntity,
  decodeEventId,
  decodePubkey,
  neventEncode,
  noteEncode,
  nprofileEncode,
  npubEncode,
} from './nip19';

const PUBKEY = '3bf0c63fcb93463407af97a5e5ee64fa883d107ef9e558472c4eb9aaaefa459d';
const NPUB = 'npub180cvv07tjdrrgpa0j7j7tmnyl2yr6yr7l8j4s3evf6u64th6gkwsyjh6w6';
const EVENT_ID = 'a'.repeat(64);

describe('NIP-19', () => {
  it('encodes a public key as npub', () => {
    expect(npubEncode(PUBKEY)).toBe(NPUB);
  });

  it('decodes npub with or without the nostr: prefix', () => {
    expect(decodeEntity(NPUB)).toEqual({ type: 'npub', pubkey: PUBKEY });
    expect(decodeEntity(`nostr:${NPUB}`)).toEqual({ type: 'npub', pubkey: PUBKEY });
  });

  it('carries relays through nprofile', () => {
    const encoded = nprofileEncode(PUBKEY, ['wss://relay.example']);
    expect(encoded.startsWith('nprofile1')).toBe(true);
    expect(decodeEntity(encoded)).toEqual({ type: 'nprofile', pubkey: PUBKEY, relays: ['wss://relay.example'] });
  });

  it('carries the author through nevent', () => {
    const encoded = neventEncode(EVENT_ID, [], PUBKEY);
    expect(decodeEntity(encoded)).toEqual({ type: 'nevent', id: EVENT_ID, relays: [], author: PUBKEY });
  });

  it('returns null for garbage and unsupported prefixes', () => {
    expect(decodeEntity('npub1notreallybech32')).toBeNull();
    expect(decodeEntity('hello')).toBeNull();
    expect(decodeEntity(npubEncode(PUBKEY).replace('npub', 'nsec'))).toBeNull();
  });

  it('decodes pubkeys and event ids from any supported form', () => {
    expect(decodePubkey(PUBKEY)).toBe(PUBKEY);
    expect(decodePubkey(NPUB)).toBe(PUBKEY);
    expect(decodePubkey(noteEncode(EVENT_ID))).toBeNull();

    expect(decodeEventId(EVENT_ID)).toBe(EVENT_ID);
    expect(decodeEventId(noteEncode(EVENT_ID))).toBe(EVENT_ID);
    expect(decodeEventId(neventEncode(EVENT_ID))).toBe(EVENT_ID);
    expect(decodeEventId(NPUB)).toBeNull();
  });

  it('finds nostr: references inside text', () => {
    const text = `gm nostr:${NPUB} and nostr:${noteEncode(EVENT_ID)}.`;
    const found = [...text.matchAll(NOSTR_URI_REGEX)].map((m) => m[1]);
    expect(found).toEqual([NPUB, noteEncode(EVENT_ID)]);
  });
});
