import { z } from 'zod';
import { ConfigError } from './errors';

const VERSION = '0.1.0';

const relayList = z
  .string()
  .transform((value) => value.split(',').map((r) => r.trim()).filter(Boolean))
  .pipe(z.array(z.string().regex(/^wss?:\/\/\S+$/, 'must be a ws:// or wss:// URL')).min(1));

const envSchema = z.object({
  BRIDGE_DOMAIN: z.string().min(1).regex(/^[a-z0-9.-]+(:\d+)?$/i, 'must be a bare host name'),
  BRIDGE_SECRET: z.string().min(16),
  RELAYS: relayList,
  DATABASE_URL: z.string().url().optional(),
  PORT: z.coerce.number().int().positive().default(3000),
  DELIVERY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  DELIVERY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  DELIVERY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(300_000),
  DELIVERY_DOMAIN_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  RELAY_BACKOFF_BASE_MS: z.coerce.number().int().min(1).default(1000),
  RELAY_BACKOFF_MAX_MS: z.coerce.number().int().min(1).default(60_000),
  RELAY_QUERY_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),
  DEDUP_RETENTION_HOURS: z.coerce.number().positive().default(48),
  SUBSCRIPTION_LOOKBACK_SECONDS: z.coerce.number().int().min(0).default(180),
  CONTACT_LIST_LIMIT: z.coerce.number().int().min(1).default(500),
  THREAD_RESOLUTION_DEPTH: z.coerce.number().int().min(1).default(32),
});

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface BridgeConfig {
  version: string;
  domain: string;
  secret: string;
  relays: string[];
  databaseUrl: string | null;
  port: number;
  delivery: RetryPolicy & { domainConcurrency: number };
  relayBackoff: { baseMs: number; maxMs: number };
  relayQueryTimeoutMs: number;
  dedupRetentionMs: number;
  subscriptionLookbackSeconds: number;
  contactListLimit: number;
  threadResolutionDepth: number;
  userAgent: string;
}

/**
 * Read and validate the bridge configuration from the environment.
 * The result is frozen; configuration is immutable after startup.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const e = parsed.data;

  const config: BridgeConfig = {
    version: VERSION,
    domain: e.BRIDGE_DOMAIN.toLowerCase(),
    secret: e.BRIDGE_SECRET,
    relays: e.RELAYS,
    databaseUrl: e.DATABASE_URL ?? null,
    port: e.PORT,
    delivery: {
      maxAttempts: e.DELIVERY_MAX_ATTEMPTS,
      baseDelayMs: e.DELIVERY_BASE_DELAY_MS,
      maxDelayMs: e.DELIVERY_MAX_DELAY_MS,
      domainConcurrency: e.DELIVERY_DOMAIN_CONCURRENCY,
    },
    relayBackoff: { baseMs: e.RELAY_BACKOFF_BASE_MS, maxMs: e.RELAY_BACKOFF_MAX_MS },
    relayQueryTimeoutMs: e.RELAY_QUERY_TIMEOUT_MS,
    dedupRetentionMs: e.DEDUP_RETENTION_HOURS * 60 * 60 * 1000,
    subscriptionLookbackSeconds: e.SUBSCRIPTION_LOOKBACK_SECONDS,
    contactListLimit: e.CONTACT_LIST_LIMIT,
    threadResolutionDepth: e.THREAD_RESOLUTION_DEPTH,
    userAgent: `nostr-ap-bridge/${VERSION} (+https://${e.BRIDGE_DOMAIN.toLowerCase()})`,
  };

  return Object.freeze(config);
}

/**
 * Label namespace for bridged events: the domain in reverse-DNS order.
 */
export function labelNamespace(domain: string): string {
  return domain.replace(/:\d+$/, '').split('.').reverse().join('.');
}
