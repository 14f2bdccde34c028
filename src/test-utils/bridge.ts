import type { FetchLike } from '@/lib/activitypub/fetch';
import type { KeyPair } from '@/lib/activitypub/signatures';
import { BridgeCoordinator } from '@/lib/bridge/coordinator';
import { loadConfig } from '@/lib/config';
import { MemoryStore } from '@/lib/store/memory-store';
import { FakeRelayNetwork } from './fake-relay';

export const TEST_DOMAIN = 'bridge.example';
export const TEST_SECRET = 'test-secret-test-secret';
export const TEST_RELAY = 'wss://relay.example';

/**
 * In-process stand-in for the remote servers: serves documents to
 * signed GETs and records every POST
 */
export class FakeFederation {
  readonly documents = new Map<string, unknown>();
  readonly deliveries: { inbox: string; activity: unknown }[] = [];
  /** Inboxes that answer every POST with a 500 */
  readonly failing = new Set<string>();

  readonly fetch: FetchLike = async (input, init) => {
    if (init?.method === 'POST') {
      const body = typeof init.body === 'string' ? init.body : '';
      if (this.failing.has(input)) {
        return new Response('down', { status: 500 });
      }
      this.deliveries.push({ inbox: input, activity: JSON.parse(body) });
      return new Response(null, { status: 202 });
    }
    const document = this.documents.get(input);
    return document === undefined
      ? new Response('not found', { status: 404 })
      : new Response(JSON.stringify(document), { status: 200, headers: { 'Content-Type': 'application/activity+json' } });
  };
}

/**
 * A coordinator over a memory store, fake relays and a fake federation.
 * Every virtual actor shares `keys` so signatures can be checked for real.
 */
export function createTestBridge(keys: KeyPair, env: Record<string, string> = {}) {
  const federation = new FakeFederation();
  const network = new FakeRelayNetwork();
  const store = new MemoryStore();
  const coordinator = new BridgeCoordinator({
    config: loadConfig({
      BRIDGE_DOMAIN: TEST_DOMAIN,
      BRIDGE_SECRET: TEST_SECRET,
      RELAYS: TEST_RELAY,
      DELIVERY_MAX_ATTEMPTS: '2',
      DELIVERY_BASE_DELAY_MS: '1',
      DELIVERY_MAX_DELAY_MS: '2',
      ...env,
    }),
    store,
    socketFactory: network.factory,
    fetch: federation.fetch,
    generateKeys: async () => keys,
    publishTimeoutMs: 20,
  });
  return { coordinator, federation, network, store };
}
