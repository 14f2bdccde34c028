import { describe, it, expect } from 'vitest';
import { labelNamespace, loadConfig } from './config';
import { ConfigError } from './errors';

const BASE = {
  BRIDGE_DOMAIN: 'Bridge.Example',
  BRIDGE_SECRET: 'test-secret-test-secret',
  RELAYS: 'wss://one.example, wss://two.example,',
};

describe('loadConfig', () => {
  it('applies defaults and derives the user agent', () => {
    const config = loadConfig(BASE);

    expect(config.domain).toBe('bridge.example');
    expect(config.relays).toEqual(['wss://one.example', 'wss://two.example']);
    expect(config.databaseUrl).toBeNull();
    expect(config.port).toBe(3000);
    expect(config.delivery).toEqual({ maxAttempts: 5, baseDelayMs: 2000, maxDelayMs: 300_000, domainConcurrency: 4 });
    expect(config.dedupRetentionMs).toBe(48 * 60 * 60 * 1000);
    expect(config.threadResolutionDepth).toBe(32);
    expect(config.userAgent).toBe('nostr-ap-bridge/0.1.0 (+https://bridge.example)');
  });

  it('coerces numeric settings from strings', () => {
    const config = loadConfig({ ...BASE, PORT: '8080', DELIVERY_MAX_ATTEMPTS: '3', DEDUP_RETENTION_HOURS: '1' });

    expect(config.port).toBe(8080);
    expect(config.delivery.maxAttempts).toBe(3);
    expect(config.dedupRetentionMs).toBe(3_600_000);
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig(BASE))).toBe(true);
  });

  it('reports every invalid setting at once', () => {
    let caught: unknown;
    try {
      loadConfig({ BRIDGE_DOMAIN: 'https://bridge.example', BRIDGE_SECRET: 'short', RELAYS: 'https://relay.example' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues.map((issue) => issue.split(':')[0])).toEqual(['BRIDGE_DOMAIN', 'BRIDGE_SECRET', 'RELAYS.0']);
  });

  it('requires at least one relay', () => {
    expect(() => loadConfig({ ...BASE, RELAYS: ' , ' })).toThrow(ConfigError);
  });
});

describe('labelNamespace', () => {
  it('reverses the domain and drops the port', () => {
    expect(labelNamespace('bridge.example.org')).toBe('org.example.bridge');
    expect(labelNamespace('localhost:3000')).toBe('localhost');
  });
});
