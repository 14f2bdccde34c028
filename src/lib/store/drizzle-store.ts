/**
 * Postgres-backed store (drizzle-orm over the Neon serverless driver).
 * Each operation is a single statement or an idempotent statement pair;
 * every driver failure surfaces as StoreUnavailable.
 */

import { and, eq, lt, sql } from 'drizzle-orm';
import {
  actorFollowers,
  bridgedIdentities,
  contactLists,
  dedupIndex,
  nativeFollows,
  objectMap,
  virtualActors,
  type Database,
} from '@/db';
import { StoreUnavailable } from '@/lib/errors';
import type {
  BridgeStore,
  BridgedIdentityPartition,
  DedupPartition,
  FollowerPartition,
  NativeFollowPartition,
  ObjectMapPartition,
  VirtualActorPartition,
} from './types';

async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    console.error(`[Store] ${operation} failed:`, error);
    throw new StoreUnavailable(operation, error);
  }
}

export class DrizzleStore implements BridgeStore {
  constructor(private readonly db: Database) {}

  readonly virtualActors: VirtualActorPartition = {
    get: (pubkey) => guard('virtualActors.get', async () => {
      const [row] = await this.db.select().from(virtualActors).where(eq(virtualActors.pubkey, pubkey)).limit(1);
      return row ?? null;
    }),

    insert: (record) => guard('virtualActors.insert', async () => {
      const [inserted] = await this.db.insert(virtualActors).values(record).onConflictDoNothing().returning();
      if (inserted) {
        return inserted;
      }
      const [existing] = await this.db.select().from(virtualActors).where(eq(virtualActors.pubkey, record.pubkey)).limit(1);
      if (!existing) {
        throw new Error(`virtual actor ${record.pubkey} conflicted but is missing`);
      }
      return existing;
    }),

    updateProfile: (pubkey, profile, at) => guard('virtualActors.updateProfile', async () => {
      const [row] = await this.db.update(virtualActors)
        .set({ ...profile, updatedAt: at })
        .where(eq(virtualActors.pubkey, pubkey))
        .returning();
      return row ?? null;
    }),
  };

  readonly bridgedIdentities: BridgedIdentityPartition = {
    getByActorUri: (actorUri) => guard('bridgedIdentities.getByActorUri', async () => {
      const [row] = await this.db.select().from(bridgedIdentities).where(eq(bridgedIdentities.actorUri, actorUri)).limit(1);
      return row ?? null;
    }),

    getByPubkey: (pubkey) => guard('bridgedIdentities.getByPubkey', async () => {
      const [row] = await this.db.select().from(bridgedIdentities).where(eq(bridgedIdentities.pubkey, pubkey)).limit(1);
      return row ?? null;
    }),

    insert: (record) => guard('bridgedIdentities.insert', async () => {
      const [inserted] = await this.db.insert(bridgedIdentities).values(record).onConflictDoNothing().returning();
      if (inserted) {
        return inserted;
      }
      const [existing] = await this.db.select().from(bridgedIdentities).where(eq(bridgedIdentities.actorUri, record.actorUri)).limit(1);
      if (!existing) {
        throw new Error(`bridged identity ${record.actorUri} conflicted but is missing`);
      }
      return existing;
    }),
  };

  readonly dedup: DedupPartition = {
    claim: (id, now, retentionMs) => guard('dedup.claim', async () => {
      const inserted = await this.db.insert(dedupIndex)
        .values({ id, firstSeenAt: now })
        .onConflictDoNothing()
        .returning({ id: dedupIndex.id });
      if (inserted.length > 0) {
        return true;
      }

      // An entry exists: re-claim it only when it fell out of the retention window
      const cutoff = new Date(now.getTime() - retentionMs);
      const reclaimed = await this.db.update(dedupIndex)
        .set({ firstSeenAt: now })
        .where(and(eq(dedupIndex.id, id), lt(dedupIndex.firstSeenAt, cutoff)))
        .returning({ id: dedupIndex.id });
      return reclaimed.length > 0;
    }),

    release: (id) => guard('dedup.release', async () => {
      await this.db.delete(dedupIndex).where(eq(dedupIndex.id, id));
    }),

    prune: (before) => guard('dedup.prune', async () => {
      const removed = await this.db.delete(dedupIndex)
        .where(lt(dedupIndex.firstSeenAt, before))
        .returning({ id: dedupIndex.id });
      return removed.length;
    }),
  };

  readonly followers: FollowerPartition = {
    upsert: (record) => guard('followers.upsert', async () => {
      const written = await this.db.insert(actorFollowers)
        .values(record)
        .onConflictDoUpdate({
          target: [actorFollowers.pubkey, actorFollowers.followerUri, actorFollowers.source],
          set: {
            inbox: record.inbox,
            sharedInbox: record.sharedInbox,
            active: record.active,
            updatedAt: record.updatedAt,
          },
          setWhere: sql`${actorFollowers.updatedAt} <= excluded.updated_at`,
        })
        .returning({ pubkey: actorFollowers.pubkey });
      return written.length > 0;
    }),

    list: (pubkey) => guard('followers.list', () =>
      this.db.select().from(actorFollowers).where(eq(actorFollowers.pubkey, pubkey))
    ),

    listByFollower: (followerUri, source) => guard('followers.listByFollower', () =>
      this.db.select().from(actorFollowers)
        .where(and(eq(actorFollowers.followerUri, followerUri), eq(actorFollowers.source, source)))
    ),
  };

  readonly nativeFollows: NativeFollowPartition = {
    list: (pubkey) => guard('nativeFollows.list', () =>
      this.db.select().from(nativeFollows).where(eq(nativeFollows.pubkey, pubkey))
    ),

    add: (record) => guard('nativeFollows.add', async () => {
      await this.db.insert(nativeFollows).values(record).onConflictDoUpdate({
        target: [nativeFollows.pubkey, nativeFollows.targetActorUri],
        set: { followActivityId: record.followActivityId },
      });
    }),

    remove: (pubkey, targetActorUri) => guard('nativeFollows.remove', async () => {
      const [row] = await this.db.delete(nativeFollows)
        .where(and(eq(nativeFollows.pubkey, pubkey), eq(nativeFollows.targetActorUri, targetActorUri)))
        .returning();
      return row ?? null;
    }),

    markContactList: (pubkey, at) => guard('nativeFollows.markContactList', async () => {
      const written = await this.db.insert(contactLists)
        .values({ pubkey, appliedAt: at })
        .onConflictDoUpdate({
          target: contactLists.pubkey,
          set: { appliedAt: at },
          setWhere: sql`${contactLists.appliedAt} <= excluded.applied_at`,
        })
        .returning({ pubkey: contactLists.pubkey });
      return written.length > 0;
    }),
  };

  readonly objectMap: ObjectMapPartition = {
    put: (mapping) => guard('objectMap.put', async () => {
      await this.db.insert(objectMap).values(mapping).onConflictDoUpdate({
        target: objectMap.apId,
        set: { eventId: mapping.eventId, pubkey: mapping.pubkey, kind: mapping.kind, rootId: mapping.rootId },
      });
    }),

    getByApId: (apId) => guard('objectMap.getByApId', async () => {
      const [row] = await this.db.select().from(objectMap).where(eq(objectMap.apId, apId)).limit(1);
      return row ?? null;
    }),

    getByEventId: (eventId) => guard('objectMap.getByEventId', async () => {
      const [row] = await this.db.select().from(objectMap).where(eq(objectMap.eventId, eventId)).limit(1);
      return row ?? null;
    }),

    remove: (apId) => guard('objectMap.remove', async () => {
      await this.db.delete(objectMap).where(eq(objectMap.apId, apId));
    }),
  };

  async close(): Promise<void> {
    // The HTTP driver holds no connections
  }
}
