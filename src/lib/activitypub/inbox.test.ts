import { describe, it, expect, vi, beforeAll, beforeEach } from 'vitest';
import { InboxVerifier, type InboundRequest } from './inbox';
import { ActivityPubClient } from './fetch';
import { generateKeyPair, signRequest, type KeyPair } from './signatures';
import { remoteActorSchema } from './schemas';
import { BridgeCache } from '@/lib/cache';
import { InvalidActivity, SignatureInvalid } from '@/lib/errors';

const NOW = new Date('2024-01-01T00:00:00Z');
const CAROL = 'https://remote.example/users/carol';
const KEY_ID = `${CAROL}#main-key`;
const TARGET = 'https://bridge.example/users/npub1target';

let carolKey: KeyPair;
let otherKey: KeyPair;
let instanceKey: KeyPair;

beforeAll(async () => {
  [carolKey, otherKey, instanceKey] = await Promise.all([generateKeyPair(), generateKeyPair(), generateKeyPair()]);
});

function actorDocument(publicKeyPem: string, id = CAROL) {
  return {
    id,
    type: 'Person',
    preferredUsername: 'carol',
    inbox: `${id}/inbox`,
    publicKey: { id: KEY_ID, owner: CAROL, publicKeyPem },
  };
}

function followBody(actor = CAROL, type = 'Follow'): string {
  return JSON.stringify({
    '@context': 'https://www.w3.org/ns/activitystreams',
    id: 'https://remote.example/follows/1',
    type,
    actor,
    object: TARGET,
  });
}

function signed(body: string, privateKeyPem: string, date = NOW): InboundRequest {
  const headers = signRequest('POST', 'https://bridge.example/inbox', body, privateKeyPem, KEY_ID, date);
  return {
    method: 'POST',
    path: '/inbox',
    body,
    headers: {
      host: 'bridge.example',
      date: headers['Date'],
      digest: headers['Digest'],
      signature: headers['Signature'],
      'content-type': 'application/activity+json',
    },
  };
}

describe('InboxVerifier', () => {
  let cache: BridgeCache;
  let served: unknown;
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(JSON.stringify(served), { status: 200 }));

  function verifier(): InboxVerifier {
    const client = new ActivityPubClient({
      userAgent: 'test-agent',
      cache,
      instanceKey: async () => ({ keyId: 'https://bridge.example/users/instance#main-key', privateKeyPem: instanceKey.privateKey }),
      fetch: fetchMock,
    });
    return new InboxVerifier(client, () => NOW);
  }

  beforeEach(() => {
    cache = new BridgeCache(60_000);
    served = actorDocument(carolKey.publicKey);
    fetchMock.mockClear();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('accepts a correctly signed activity and caches its actor', async () => {
    const { activity, actor } = await verifier().verify(signed(followBody(), carolKey.privateKey));

    expect(activity.type).toBe('Follow');
    expect(activity.object).toBe(TARGET);
    expect(actor.id).toBe(CAROL);
    expect(cache.actors.get(CAROL)?.publicKey.publicKeyPem).toBe(carolKey.publicKey);
  });

  it('signs the actor fetch with the instance key', async () => {
    await verifier().verify(signed(followBody(), carolKey.privateKey));

    const init = fetchMock.mock.calls[0][1];
    expect(fetchMock.mock.calls[0][0]).toBe(CAROL);
    expect(JSON.stringify(init?.headers)).toContain('keyId=\\"https://bridge.example/users/instance#main-key\\"');
  });

  it('rejects a body that does not match its digest without fetching anything', async () => {
    const request = signed(followBody(), carolKey.privateKey);
    request.body = request.body.replace('follows/1', 'follows/2');

    await expect(verifier().verify(request)).rejects.toBeInstanceOf(SignatureInvalid);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(cache.actors.size).toBe(0);
  });

  it('rejects a signature made with another key and leaves the cache untouched', async () => {
    await expect(verifier().verify(signed(followBody(), otherKey.privateKey))).rejects.toBeInstanceOf(SignatureInvalid);
    expect(cache.actors.size).toBe(0);
  });

  it('refetches a cached actor whose key no longer verifies', async () => {
    cache.actors.set(CAROL, remoteActorSchema.parse(actorDocument(otherKey.publicKey)));

    await verifier().verify(signed(followBody(), carolKey.privateKey));

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(cache.actors.get(CAROL)?.publicKey.publicKeyPem).toBe(carolKey.publicKey);
  });

  it('rejects an activity whose actor does not own the signing key', async () => {
    const mallory = 'https://remote.example/users/mallory';
    served = actorDocument(carolKey.publicKey, mallory);

    await expect(verifier().verify(signed(followBody(mallory), carolKey.privateKey))).rejects.toBeInstanceOf(SignatureInvalid);
    expect(cache.actors.size).toBe(0);
  });

  it('rejects a stale Date header', async () => {
    const stale = new Date(NOW.getTime() - 13 * 60 * 60 * 1000);

    await expect(verifier().verify(signed(followBody(), carolKey.privateKey, stale))).rejects.toBeInstanceOf(SignatureInvalid);
  });

  it('rejects activity types it does not handle', async () => {
    await expect(verifier().verify(signed(followBody(CAROL, 'Move'), carolKey.privateKey))).rejects.toBeInstanceOf(InvalidActivity);
  });
});
