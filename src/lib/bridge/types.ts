import type { ActivityPubActivity } from '@/lib/activitypub/activities';
import type { ActivityPubClient } from '@/lib/activitypub/fetch';
import type { DeliveryEngine } from '@/lib/activitypub/delivery';
import type { BridgeCache } from '@/lib/cache';
import type { DedupIndex } from '@/lib/cache/dedup';
import type { BridgeConfig } from '@/lib/config';
import type { TranslationDegraded } from '@/lib/errors';
import type { IdentityMapper } from '@/lib/identity/mapper';
import type { NostrEvent } from '@/lib/nostr/event';
import type { RelayPool } from '@/lib/nostr/pool';
import type { BridgeStore } from '@/lib/store/types';

/**
 * What an ingestion did. `activities` were handed to delivery,
 * `events` were published to the relays; `recorded` changed local state only.
 */
export type IngestResult =
  | { status: 'bridged'; activities: ActivityPubActivity[]; events: NostrEvent[] }
  | { status: 'recorded'; detail: string }
  | { status: 'skipped'; reason: string };

export type DegradationListener = (degradation: TranslationDegraded, source: string) => void;

/**
 * Components shared by both ingestion directions
 */
export interface BridgeServices {
  config: BridgeConfig;
  /** Label namespace of bridged events */
  namespace: string;
  store: BridgeStore;
  cache: BridgeCache;
  dedup: DedupIndex;
  identities: IdentityMapper;
  client: ActivityPubClient;
  pool: Pick<RelayPool, 'publish' | 'query'>;
  delivery: DeliveryEngine;
  reportDegradations(source: string, degradations: TranslationDegraded[]): void;
}

export function skipped(reason: string): IngestResult {
  return { status: 'skipped', reason };
}

export function recorded(detail: string): IngestResult {
  return { status: 'recorded', detail };
}

export function bridged(activities: ActivityPubActivity[], events: NostrEvent[] = []): IngestResult {
  return { status: 'bridged', activities, events };
}
