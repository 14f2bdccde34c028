import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { GET } from './route';
import { GET as getNodeInfo } from '../../nodeinfo/2.1/route';
import { setBridge } from '@/lib/bridge/runtime';
import { npubEncode } from '@/lib/nostr/nip19';
import { ALICE_PK } from '@/test-utils/events';
import { createTestBridge, TEST_DOMAIN } from '@/test-utils/bridge';

const { coordinator } = createTestBridge({ publicKey: 'test-public-pem', privateKey: 'test-private-pem' });

function webfinger(resource?: string): Promise<Response> {
  const query = resource === undefined ? '' : `?resource=${encodeURIComponent(resource)}`;
  return GET(new Request(`https://${TEST_DOMAIN}/.well-known/webfinger${query}`));
}

describe('GET /.well-known/webfinger', () => {
  beforeAll(() => setBridge(coordinator));
  afterAll(() => setBridge(null));

  it('resolves an npub handle to its actor', async () => {
    const npub = npubEncode(ALICE_PK);
    const response = await webfinger(`acct:${npub}@${TEST_DOMAIN}`);

    expect(response.status).toBe(200);
    expect(response.headers.get('Content-Type')).toBe('application/jrd+json');
    const body = await response.json();
    expect(body.subject).toBe(`acct:${npub}@${TEST_DOMAIN}`);
    expect(body.links).toHaveLength(1);
    expect(body.links[0]).toEqual({
      rel: 'self',
      type: 'application/activity+json',
      href: `https://${TEST_DOMAIN}/users/${npub}`,
    });
  });

  it('rejects a request without a resource', async () => {
    expect((await webfinger()).status).toBe(400);
  });

  it('does not answer for other domains', async () => {
    expect((await webfinger(`acct:${npubEncode(ALICE_PK)}@elsewhere.example`)).status).toBe(404);
  });

  it('does not answer for bridged identities or names that are not npubs', async () => {
    const identity = await coordinator.identities.resolveIdentity('https://remote.example/users/carol');

    expect((await webfinger(`acct:${npubEncode(identity.pubkey)}@${TEST_DOMAIN}`)).status).toBe(404);
    expect((await webfinger(`acct:alice@${TEST_DOMAIN}`)).status).toBe(404);
  });
});

describe('GET /nodeinfo/2.1', () => {
  beforeAll(() => setBridge(coordinator));
  afterAll(() => setBridge(null));

  it('describes the bridge', async () => {
    const body = await (await getNodeInfo()).json();

    expect(body).toMatchObject({
      version: '2.1',
      software: { name: 'nostr-ap-bridge', version: '0.1.0' },
      protocols: ['activitypub'],
      metadata: { nodeName: TEST_DOMAIN, relays: ['wss://relay.example'] },
    });
  });
});
