import { describe, it, expect } from 'vitest';
import { finalizeEvent, getEventHash, parseEvent, serializeEvent, verifyEvent } from './event';
import { deriveSecretKey, getPublicKey, isHexKey } from './keys';
import { ALICE_PK, ALICE_SK, signed } from '@/test-utils/events';

describe('Nostr events', () => {
  it('derives the x-only public key of the generator for secret key 1', () => {
    expect(ALICE_PK).toBe('79be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798');
  });

  it('serializes events in canonical NIP-01 order', () => {
    const serialized = serializeEvent({
      pubkey: ALICE_PK,
      created_at: 1,
      kind: 1,
      tags: [['t', 'nostr']],
      content: 'hi',
    });
    expect(serialized).toBe(`[0,"${ALICE_PK}",1,1,[["t","nostr"]],"hi"]`);
  });

  it('signs events that verify', () => {
    const event = finalizeEvent({ kind: 1, tags: [], content: 'hello world', created_at: 1_700_000_000 }, ALICE_SK);

    expect(event.pubkey).toBe(ALICE_PK);
    expect(event.id).toBe(getEventHash(event));
    expect(event.sig).toMatch(/^[0-9a-f]{128}$/);
    expect(verifyEvent(event)).toBe(true);
  });

  it('rejects events whose content was changed after signing', () => {
    const event = signed(ALICE_SK, { content: 'original' });
    expect(verifyEvent({ ...event, content: 'tampered' })).toBe(false);
  });

  it('rejects events with a forged signature', () => {
    const event = signed(ALICE_SK);
    const other = signed(ALICE_SK, { content: 'other' });
    expect(verifyEvent({ ...event, sig: other.sig })).toBe(false);
  });

  describe('parseEvent', () => {
    it('returns valid events', () => {
      const event = signed(ALICE_SK);
      expect(parseEvent(JSON.parse(JSON.stringify(event)))).toEqual(event);
    });

    it('returns null for malformed values', () => {
      expect(parseEvent({ id: 'x' })).toBeNull();
      expect(parseEvent('event')).toBeNull();
      expect(parseEvent(null)).toBeNull();
    });
  });

  describe('deriveSecretKey', () => {
    it('is deterministic per subject', () => {
      const a = deriveSecretKey('test-secret-value', 'https://remote.example/users/carol');
      const b = deriveSecretKey('test-secret-value', 'https://remote.example/users/carol');
      const c = deriveSecretKey('test-secret-value', 'https://remote.example/users/dave');

      expect(a).toBe(b);
      expect(a).not.toBe(c);
      expect(isHexKey(a)).toBe(true);
      expect(isHexKey(getPublicKey(a))).toBe(true);
    });

    it('depends on the bridge secret', () => {
      expect(deriveSecretKey('test-secret-one', 'subject')).not.toBe(deriveSecretKey('test-secret-two', 'subject'));
    });
  });
});
