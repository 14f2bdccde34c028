import { describe, it, expect } from 'vitest';
import { jrdFor, resourcePubkey } from './webfinger';
import { npubEncode } from '@/lib/nostr/nip19';
import { ALICE_PK } from '@/test-utils/events';

const DOMAIN = 'bridge.example';
const NPUB = npubEncode(ALICE_PK);

describe('resourcePubkey', () => {
  it('reads acct handles with or without a leading @', () => {
    expect(resourcePubkey(`acct:${NPUB}@${DOMAIN}`, DOMAIN)).toBe(ALICE_PK);
    expect(resourcePubkey(`acct:@${NPUB}@BRIDGE.example`, DOMAIN)).toBe(ALICE_PK);
  });

  it('reads actor URLs of this bridge', () => {
    expect(resourcePubkey(`https://${DOMAIN}/users/${NPUB}`, DOMAIN)).toBe(ALICE_PK);
  });

  it('ignores other hosts and handles that are not keys', () => {
    expect(resourcePubkey(`acct:${NPUB}@elsewhere.example`, DOMAIN)).toBeNull();
    expect(resourcePubkey(`https://elsewhere.example/users/${NPUB}`, DOMAIN)).toBeNull();
    expect(resourcePubkey(`acct:alice@${DOMAIN}`, DOMAIN)).toBeNull();
    expect(resourcePubkey('not a resource', DOMAIN)).toBeNull();
  });

  it('accepts the host without the port the bridge listens on', () => {
    expect(resourcePubkey(`acct:${NPUB}@localhost`, 'localhost:3000')).toBe(ALICE_PK);
  });
});

describe('jrdFor', () => {
  it('links the npub handle to the actor document only', () => {
    const actorUrl = `https://${DOMAIN}/users/${NPUB}`;

    expect(jrdFor(ALICE_PK, DOMAIN)).toEqual({
      subject: `acct:${NPUB}@${DOMAIN}`,
      aliases: [actorUrl],
      links: [{ rel: 'self', type: 'application/activity+json', href: actorUrl }],
    });
  });
});
