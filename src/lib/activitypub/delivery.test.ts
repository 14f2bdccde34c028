import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DeliveryEngine, uniqueInboxes, type DeliveryOptions } from './delivery';
import { NOTE_CONTEXT, createFollowActivity } from './activities';
import type { SigningKey } from './fetch';
import { sleep } from '@/lib/concurrency/sleep';
import { DeliveryExhausted, TransportTransient } from '@/lib/errors';

const KEY: SigningKey = { keyId: 'https://bridge.example/users/npub1a#main-key', privateKeyPem: 'test-key' };
const ACTIVITY = createFollowActivity('https://bridge.example/users/npub1a', 'https://remote.example/users/carol', 'https://bridge.example/activities/1');
const INBOX = 'https://remote.example/inbox';

const OPTIONS: DeliveryOptions = { maxAttempts: 4, baseDelayMs: 1, maxDelayMs: 5, domainConcurrency: 2 };

function transport(respond: (inbox: string, call: number) => Promise<number>) {
  let calls = 0;
  return {
    post: vi.fn(async (inbox: string, _body: string, _key: SigningKey) => respond(inbox, ++calls)),
  };
}

describe('DeliveryEngine', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('stops retrying once the inbox accepts', async () => {
    const fake = transport(async (_inbox, call) => (call < 3 ? 500 : 200));
    const engine = new DeliveryEngine(fake, { ...OPTIONS, maxAttempts: 5 });
    const delivered = vi.fn();
    engine.onDelivered(delivered);

    const [result] = await engine.deliver(ACTIVITY, [{ inbox: INBOX }], KEY);

    expect(result).toEqual({ activityId: ACTIVITY.id, inbox: INBOX, outcome: 'delivered', attempts: 3 });
    expect(fake.post).toHaveBeenCalledTimes(3);
    expect(delivered).toHaveBeenCalledTimes(1);
  });

  it('retries transport errors', async () => {
    const fake = transport(async (_inbox, call) => {
      if (call === 1) throw new TransportTransient('connection reset');
      return 202;
    });
    const engine = new DeliveryEngine(fake, OPTIONS);

    const [result] = await engine.deliver(ACTIVITY, [{ inbox: INBOX }], KEY);

    expect(result.outcome).toBe('delivered');
    expect(result.attempts).toBe(2);
  });

  it('gives up after the attempt ceiling with exactly one DeliveryExhausted', async () => {
    const fake = transport(async () => 500);
    const engine = new DeliveryEngine(fake, OPTIONS);
    const exhausted: DeliveryExhausted[] = [];
    engine.onExhausted((error) => exhausted.push(error));

    const [result] = await engine.deliver(ACTIVITY, [{ inbox: INBOX }], KEY);

    expect(result.outcome).toBe('exhausted');
    expect(fake.post).toHaveBeenCalledTimes(4);
    expect(exhausted).toHaveLength(1);
    expect(exhausted[0]).toBeInstanceOf(DeliveryExhausted);
    expect(exhausted[0].attempts).toBe(4);
    expect(exhausted[0].lastError).toBe('HTTP 500');
    expect(exhausted[0].inbox).toBe(INBOX);
  });

  it('posts the activity with its JSON-LD context', async () => {
    const fake = transport(async () => 202);
    const engine = new DeliveryEngine(fake, OPTIONS);

    await engine.deliver(ACTIVITY, [{ inbox: INBOX }], KEY);

    const [inbox, body, key] = fake.post.mock.calls[0];
    expect(inbox).toBe(INBOX);
    expect(key).toBe(KEY);
    expect(JSON.parse(body)).toEqual({ '@context': NOTE_CONTEXT, ...ACTIVITY });
  });

  it('shares one delivery between concurrent requests for the same pair', async () => {
    const fake = transport(async () => {
      await sleep(5);
      return 200;
    });
    const engine = new DeliveryEngine(fake, OPTIONS);

    const [first, second] = await Promise.all([
      engine.deliver(ACTIVITY, [{ inbox: INBOX }], KEY),
      engine.deliver(ACTIVITY, [{ inbox: INBOX }], KEY),
    ]);

    expect(fake.post).toHaveBeenCalledTimes(1);
    expect(first).toEqual(second);
  });

  it('caps concurrent requests per domain', async () => {
    let active = 0;
    let peak = 0;
    const fake = transport(async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      active--;
      return 200;
    });
    const engine = new DeliveryEngine(fake, { ...OPTIONS, domainConcurrency: 1 });

    await engine.deliver(ACTIVITY, [
      { inbox: 'https://remote.example/users/a/inbox' },
      { inbox: 'https://remote.example/users/b/inbox' },
      { inbox: 'https://remote.example/users/c/inbox' },
    ], KEY);

    expect(fake.post).toHaveBeenCalledTimes(3);
    expect(peak).toBe(1);
  });

  it('resolves pending retries as cancelled', async () => {
    const fake = transport(async () => 503);
    const engine = new DeliveryEngine(fake, { ...OPTIONS, baseDelayMs: 60_000, maxDelayMs: 60_000 });
    const exhausted = vi.fn();
    engine.onExhausted(exhausted);

    const pending = engine.deliver(ACTIVITY, [{ inbox: INBOX }], KEY);
    await vi.waitFor(() => expect(fake.post).toHaveBeenCalledTimes(1));
    engine.cancel();

    expect(await pending).toEqual([{ activityId: ACTIVITY.id, inbox: INBOX, outcome: 'cancelled', attempts: 1 }]);
    expect(exhausted).not.toHaveBeenCalled();
  });

  it('drains deliveries that are still retrying', async () => {
    const fake = transport(async (_inbox, call) => (call === 1 ? 500 : 200));
    const engine = new DeliveryEngine(fake, OPTIONS);

    void engine.deliver(ACTIVITY, [{ inbox: INBOX }], KEY);
    await engine.drain();

    expect(fake.post).toHaveBeenCalledTimes(2);
    expect(engine.inFlight).toBe(0);
  });
});

describe('uniqueInboxes', () => {
  it('prefers shared inboxes and removes duplicates', () => {
    expect(uniqueInboxes([
      { inbox: 'https://a.example/users/1/inbox', sharedInbox: 'https://a.example/inbox' },
      { inbox: 'https://a.example/users/2/inbox', sharedInbox: 'https://a.example/inbox' },
      { inbox: 'https://b.example/users/3/inbox', sharedInbox: null },
    ])).toEqual(['https://a.example/inbox', 'https://b.example/users/3/inbox']);
  });
});
