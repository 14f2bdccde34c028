import type {
  ActorProfile,
  BridgeStore,
  BridgedIdentityPartition,
  BridgedIdentityRecord,
  DedupPartition,
  FollowerPartition,
  FollowerRecord,
  FollowerSource,
  NativeFollowPartition,
  NativeFollowRecord,
  ObjectMapPartition,
  ObjectMapping,
  VirtualActorPartition,
  VirtualActorRecord,
} from './types';

function followerKey(pubkey: string, followerUri: string, source: FollowerSource): string {
  return `${pubkey}\n${followerUri}\n${source}`;
}

/**
 * Process-local store. Used when no DATABASE_URL is configured, and in tests.
 * Every check-then-write runs without an intervening await, so each
 * operation is atomic with respect to other callers.
 */
export class MemoryStore implements BridgeStore {
  private readonly actors = new Map<string, VirtualActorRecord>();
  private readonly identities = new Map<string, BridgedIdentityRecord>();
  private readonly identitiesByPubkey = new Map<string, string>();
  private readonly seen = new Map<string, number>();
  private readonly followerRecords = new Map<string, FollowerRecord>();
  private readonly follows = new Map<string, NativeFollowRecord>();
  private readonly contactLists = new Map<string, Date>();
  private readonly objects = new Map<string, ObjectMapping>();
  private readonly objectsByEvent = new Map<string, string>();
  private closed = false;

  readonly virtualActors: VirtualActorPartition = {
    get: async (pubkey) => {
      this.assertOpen();
      return copy(this.actors.get(pubkey));
    },
    insert: async (record) => {
      this.assertOpen();
      const existing = this.actors.get(record.pubkey);
      if (existing) {
        return { ...existing };
      }
      this.actors.set(record.pubkey, { ...record });
      return { ...record };
    },
    updateProfile: async (pubkey: string, profile: ActorProfile, at: Date) => {
      this.assertOpen();
      const existing = this.actors.get(pubkey);
      if (!existing) {
        return null;
      }
      const updated = { ...existing, ...profile, updatedAt: at };
      this.actors.set(pubkey, updated);
      return { ...updated };
    },
  };

  readonly bridgedIdentities: BridgedIdentityPartition = {
    getByActorUri: async (actorUri) => {
      this.assertOpen();
      return copy(this.identities.get(actorUri));
    },
    getByPubkey: async (pubkey) => {
      this.assertOpen();
      const actorUri = this.identitiesByPubkey.get(pubkey);
      return actorUri ? copy(this.identities.get(actorUri)) : null;
    },
    insert: async (record) => {
      this.assertOpen();
      const existing = this.identities.get(record.actorUri);
      if (existing) {
        return { ...existing };
      }
      this.identities.set(record.actorUri, { ...record });
      this.identitiesByPubkey.set(record.pubkey, record.actorUri);
      return { ...record };
    },
  };

  readonly dedup: DedupPartition = {
    claim: async (id, now, retentionMs) => {
      this.assertOpen();
      const firstSeen = this.seen.get(id);
      if (firstSeen !== undefined && firstSeen >= now.getTime() - retentionMs) {
        return false;
      }
      this.seen.set(id, now.getTime());
      return true;
    },
    release: async (id) => {
      this.assertOpen();
      this.seen.delete(id);
    },
    prune: async (before) => {
      this.assertOpen();
      let removed = 0;
      for (const [id, firstSeen] of this.seen) {
        if (firstSeen < before.getTime()) {
          this.seen.delete(id);
          removed++;
        }
      }
      return removed;
    },
  };

  readonly followers: FollowerPartition = {
    upsert: async (record) => {
      this.assertOpen();
      const key = followerKey(record.pubkey, record.followerUri, record.source);
      const existing = this.followerRecords.get(key);
      if (existing && existing.updatedAt.getTime() > record.updatedAt.getTime()) {
        return false;
      }
      this.followerRecords.set(key, { ...record });
      return true;
    },
    list: async (pubkey) => {
      this.assertOpen();
      return [...this.followerRecords.values()].filter((r) => r.pubkey === pubkey).map((r) => ({ ...r }));
    },
    listByFollower: async (followerUri, source) => {
      this.assertOpen();
      return [...this.followerRecords.values()]
        .filter((r) => r.followerUri === followerUri && r.source === source)
        .map((r) => ({ ...r }));
    },
  };

  readonly nativeFollows: NativeFollowPartition = {
    list: async (pubkey) => {
      this.assertOpen();
      return [...this.follows.values()].filter((r) => r.pubkey === pubkey).map((r) => ({ ...r }));
    },
    add: async (record) => {
      this.assertOpen();
      this.follows.set(`${record.pubkey}\n${record.targetActorUri}`, { ...record });
    },
    remove: async (pubkey, targetActorUri) => {
      this.assertOpen();
      const key = `${pubkey}\n${targetActorUri}`;
      const existing = this.follows.get(key);
      this.follows.delete(key);
      return existing ? { ...existing } : null;
    },
    markContactList: async (pubkey, at) => {
      this.assertOpen();
      const applied = this.contactLists.get(pubkey);
      if (applied && applied > at) {
        return false;
      }
      this.contactLists.set(pubkey, at);
      return true;
    },
  };

  readonly objectMap: ObjectMapPartition = {
    put: async (mapping) => {
      this.assertOpen();
      const previous = this.objects.get(mapping.apId);
      if (previous) {
        this.objectsByEvent.delete(previous.eventId);
      }
      this.objects.set(mapping.apId, { ...mapping });
      this.objectsByEvent.set(mapping.eventId, mapping.apId);
    },
    getByApId: async (apId) => {
      this.assertOpen();
      return copy(this.objects.get(apId));
    },
    getByEventId: async (eventId) => {
      this.assertOpen();
      const apId = this.objectsByEvent.get(eventId);
      return apId ? copy(this.objects.get(apId)) : null;
    },
    remove: async (apId) => {
      this.assertOpen();
      const existing = this.objects.get(apId);
      if (existing) {
        this.objectsByEvent.delete(existing.eventId);
        this.objects.delete(apId);
      }
    },
  };

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('MemoryStore is closed');
    }
  }
}

function copy<T extends object>(value: T | undefined): T | null {
  return value ? { ...value } : null;
}
