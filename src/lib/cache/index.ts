/**
 * Cache Layer
 *
 * Bounded in-memory caches in front of the store and the network.
 * Only validated data is written here.
 */

import { LRUCache } from 'lru-cache';
import type { RemoteActor } from '@/lib/activitypub/schemas';
import type { NostrEvent } from '@/lib/nostr/event';
import type { ActorProfile, BridgedIdentityRecord, VirtualActorRecord } from '@/lib/store/types';

const TEN_MINUTES = 10 * 60 * 1000;

/** Whether a pubkey belongs to a bridged identity (negative answers are cached too) */
export interface PubkeyOwner {
  bridged: BridgedIdentityRecord | null;
}

/** Latest profile metadata found on the relays for a pubkey, if any */
export interface ResolvedProfile {
  profile: ActorProfile | null;
}

export interface CacheStats {
  actors: number;
  events: number;
  profiles: number;
  seenIds: number;
  virtualActors: number;
  bridgedIdentities: number;
  pubkeyOwners: number;
}

export class BridgeCache {
  /** Remote actor documents by actor URI */
  readonly actors = new LRUCache<string, RemoteActor>({ max: 100, ttl: TEN_MINUTES });
  /** Recently fetched native events by id */
  readonly events = new LRUCache<string, NostrEvent>({ max: 1000 });
  /** Native profile metadata (kind 0) by pubkey */
  readonly profiles = new LRUCache<string, ResolvedProfile>({ max: 1000, ttl: TEN_MINUTES });
  /** Ids known to be processed within the dedup retention window */
  readonly seenIds: LRUCache<string, true>;
  readonly virtualActors = new LRUCache<string, VirtualActorRecord>({ max: 1000 });
  readonly bridgedIdentities = new LRUCache<string, BridgedIdentityRecord>({ max: 1000 });
  readonly pubkeyOwners = new LRUCache<string, PubkeyOwner>({ max: 10_000 });

  constructor(seenRetentionMs: number) {
    this.seenIds = new LRUCache<string, true>({ max: 10_000, ttl: seenRetentionMs });
  }

  stats(): CacheStats {
    return {
      actors: this.actors.size,
      events: this.events.size,
      profiles: this.profiles.size,
      seenIds: this.seenIds.size,
      virtualActors: this.virtualActors.size,
      bridgedIdentities: this.bridgedIdentities.size,
      pubkeyOwners: this.pubkeyOwners.size,
    };
  }
}
