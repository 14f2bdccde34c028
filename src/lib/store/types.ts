/**
 * Persistent Store
 *
 * Key-value records partitioned by record kind. Every component receives
 * the store handle at construction; there is no ambient instance.
 */

export interface ActorProfile {
  displayName: string | null;
  summary: string | null;
  avatarUrl: string | null;
  bannerUrl: string | null;
}

export interface VirtualActorRecord extends ActorProfile {
  pubkey: string;
  actorUri: string;
  publicKeyPem: string;
  privateKeyPem: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface BridgedIdentityRecord {
  actorUri: string;
  pubkey: string;
  secretKey: string;
  createdAt: Date;
}

export type FollowerSource = 'federation' | 'relay';

export interface FollowerRecord {
  /** Followed virtual actor */
  pubkey: string;
  followerUri: string;
  source: FollowerSource;
  inbox: string | null;
  sharedInbox: string | null;
  active: boolean;
  updatedAt: Date;
}

export interface NativeFollowRecord {
  pubkey: string;
  targetActorUri: string;
  followActivityId: string;
  createdAt: Date;
}

export interface ObjectMapping {
  apId: string;
  eventId: string;
  /** Author of the native event */
  pubkey: string;
  kind: number;
  /** Thread root of the native event, when it is a reply */
  rootId: string | null;
  createdAt: Date;
}

export interface VirtualActorPartition {
  get(pubkey: string): Promise<VirtualActorRecord | null>;
  /** Insert unless present; resolves to the record that ends up stored */
  insert(record: VirtualActorRecord): Promise<VirtualActorRecord>;
  updateProfile(pubkey: string, profile: ActorProfile, at: Date): Promise<VirtualActorRecord | null>;
}

export interface BridgedIdentityPartition {
  getByActorUri(actorUri: string): Promise<BridgedIdentityRecord | null>;
  getByPubkey(pubkey: string): Promise<BridgedIdentityRecord | null>;
  insert(record: BridgedIdentityRecord): Promise<BridgedIdentityRecord>;
}

export interface DedupPartition {
  /**
   * Atomically record `id` as seen. True when no entry younger than
   * `retentionMs` existed, i.e. the caller is the first to process it.
   */
  claim(id: string, now: Date, retentionMs: number): Promise<boolean>;
  /** Forget an id so it can be claimed again */
  release(id: string): Promise<void>;
  /** Drop entries first seen before `before`; resolves to the number removed */
  prune(before: Date): Promise<number>;
}

export interface FollowerPartition {
  /**
   * Write a record unless a newer one exists for the same
   * (pubkey, follower, source). Resolves true when written.
   */
  upsert(record: FollowerRecord): Promise<boolean>;
  list(pubkey: string): Promise<FollowerRecord[]>;
  /** Records of one source written for the given follower */
  listByFollower(followerUri: string, source: FollowerSource): Promise<FollowerRecord[]>;
}

export interface NativeFollowPartition {
  list(pubkey: string): Promise<NativeFollowRecord[]>;
  add(record: NativeFollowRecord): Promise<void>;
  remove(pubkey: string, targetActorUri: string): Promise<NativeFollowRecord | null>;
  /**
   * Record `at` as the newest contact list of `pubkey`. False, and nothing
   * written, when a newer list was recorded before.
   */
  markContactList(pubkey: string, at: Date): Promise<boolean>;
}

export interface ObjectMapPartition {
  put(mapping: ObjectMapping): Promise<void>;
  getByApId(apId: string): Promise<ObjectMapping | null>;
  getByEventId(eventId: string): Promise<ObjectMapping | null>;
  remove(apId: string): Promise<void>;
}

export interface BridgeStore {
  readonly virtualActors: VirtualActorPartition;
  readonly bridgedIdentities: BridgedIdentityPartition;
  readonly dedup: DedupPartition;
  readonly followers: FollowerPartition;
  readonly nativeFollows: NativeFollowPartition;
  readonly objectMap: ObjectMapPartition;
  close(): Promise<void>;
}
