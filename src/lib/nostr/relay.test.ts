import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RelayConnection, type RelayState } from './relay';
import type { NostrEvent } from './event';
import { FakeRelayNetwork } from '@/test-utils/fake-relay';
import { ALICE_SK, signed } from '@/test-utils/events';
import { sleep } from '@/lib/concurrency/sleep';

const RELAY_URL = 'wss://relay.example';
const FILTERS = [{ kinds: [0, 1, 3, 5, 6, 7], since: 1_700_000_000 }];

describe('RelayConnection', () => {
  let network: FakeRelayNetwork;
  let received: NostrEvent[];
  let states: RelayState[];
  let connection: RelayConnection;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    network = new FakeRelayNetwork();
    received = [];
    states = [];
    connection = new RelayConnection({
      url: RELAY_URL,
      socketFactory: network.factory,
      backoff: { baseMs: 1, maxMs: 5 },
      publishTimeoutMs: 50,
      onEvent: (_id, event) => received.push(event),
      onStateChange: (state) => states.push(state),
    });
    connection.subscribe('bridge', FILTERS);
  });

  it('issues the subscription once the socket opens', () => {
    connection.connect();
    expect(connection.state).toBe('connecting');

    network.latest(RELAY_URL).open();

    expect(connection.state).toBe('subscribed');
    expect(network.latest(RELAY_URL).framesOfType('REQ')).toEqual([['REQ', 'bridge', ...FILTERS]]);
  });

  it('re-issues the identical filter set after a dropped connection', async () => {
    connection.connect();
    const first = network.latest(RELAY_URL);
    first.open();
    const before = first.framesOfType('REQ');

    first.drop();
    expect(connection.state).toBe('disconnected');

    await vi.waitFor(() => expect(network.socketsFor(RELAY_URL)).toHaveLength(2));
    const second = network.latest(RELAY_URL);
    second.open();

    expect(second.framesOfType('REQ')).toEqual(before);
    expect(states).toEqual(['connecting', 'subscribed', 'disconnected', 'connecting', 'subscribed']);
    connection.stop();
  });

  it('does not reconnect after stop', async () => {
    connection.connect();
    network.latest(RELAY_URL).open();
    connection.stop();

    await sleep(20);
    expect(network.socketsFor(RELAY_URL)).toHaveLength(1);
    expect(network.latest(RELAY_URL).closed).toBe(true);
    expect(connection.state).toBe('disconnected');
  });

  it('delivers valid events and drops forged ones', () => {
    connection.connect();
    const socket = network.latest(RELAY_URL);
    socket.open();

    const good = signed(ALICE_SK, { content: 'good' });
    socket.receive(['EVENT', 'bridge', good]);
    socket.receive(['EVENT', 'bridge', { ...good, content: 'forged' }]);
    socket.receive(['EVENT', 'unknown-subscription', good]);
    socket.receive(['NOTICE', 'hello']);

    expect(received).toEqual([good]);
  });

  it('degrades on CLOSED and recovers after re-subscribing', async () => {
    connection.connect();
    const socket = network.latest(RELAY_URL);
    socket.open();

    socket.receive(['CLOSED', 'bridge', 'rate-limited: slow down']);
    expect(connection.state).toBe('degraded');

    await vi.waitFor(() => expect(socket.framesOfType('REQ')).toHaveLength(2));
    socket.receive(['EOSE', 'bridge']);

    expect(connection.state).toBe('subscribed');
    connection.stop();
  });

  describe('publish', () => {
    it('resolves with the relay OK result', async () => {
      connection.connect();
      const socket = network.latest(RELAY_URL);
      socket.open();
      const event = signed(ALICE_SK);

      const pending = connection.publish(event);
      expect(socket.framesOfType('EVENT')).toEqual([['EVENT', event]]);
      socket.receive(['OK', event.id, false, 'blocked: no thanks']);

      await expect(pending).resolves.toEqual({ relay: RELAY_URL, ok: false, message: 'blocked: no thanks' });
    });

    it('times out without an OK', async () => {
      connection.connect();
      network.latest(RELAY_URL).open();

      await expect(connection.publish(signed(ALICE_SK), 10)).resolves.toEqual({ relay: RELAY_URL, ok: false, message: 'timeout' });
    });

    it('fails immediately when not connected', async () => {
      await expect(connection.publish(signed(ALICE_SK))).resolves.toEqual({ relay: RELAY_URL, ok: false, message: 'not connected' });
    });
  });

  describe('query', () => {
    it('collects events until EOSE and closes the subscription', async () => {
      connection.connect();
      const socket = network.latest(RELAY_URL);
      socket.open();
      const event = signed(ALICE_SK);

      const pending = connection.query([{ ids: [event.id] }], 1000);
      const req = socket.framesOfType('REQ')[1];
      const queryId = String(req[1]);
      expect(queryId.startsWith('q-')).toBe(true);
      expect(req[2]).toEqual({ ids: [event.id] });

      socket.receive(['EVENT', queryId, event]);
      socket.receive(['EOSE', queryId]);

      await expect(pending).resolves.toEqual([event]);
      expect(socket.framesOfType('CLOSE')).toEqual([['CLOSE', queryId]]);
      expect(received).toEqual([]);
    });

    it('resolves what it has when the connection drops', async () => {
      connection.connect();
      const socket = network.latest(RELAY_URL);
      socket.open();

      const pending = connection.query([{ kinds: [0] }], 1000);
      socket.drop();

      await expect(pending).resolves.toEqual([]);
      connection.stop();
    });
  });
});
