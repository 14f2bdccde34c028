import { pgTable, text, timestamp, integer, boolean, index, primaryKey } from 'drizzle-orm/pg-core';

// ============================================
// VIRTUAL ACTORS (native pubkey -> federated actor)
// ============================================

export const virtualActors = pgTable('virtual_actors', {
  pubkey: text('pubkey').primaryKey(), // hex x-only key
  actorUri: text('actor_uri').notNull().unique(),
  displayName: text('display_name'),
  summary: text('summary'),
  avatarUrl: text('avatar_url'),
  bannerUrl: text('banner_url'),
  publicKeyPem: text('public_key_pem').notNull(),
  privateKeyPem: text('private_key_pem').notNull(), // generated once, never rotated
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

// ============================================
// BRIDGED IDENTITIES (remote actor -> native key pair)
// ============================================

export const bridgedIdentities = pgTable('bridged_identities', {
  actorUri: text('actor_uri').primaryKey(),
  pubkey: text('pubkey').notNull().unique(),
  secretKey: text('secret_key').notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});

// ============================================
// DEDUP INDEX
// ============================================

export const dedupIndex = pgTable('dedup_index', {
  id: text('id').primaryKey(), // event id or activity id
  firstSeenAt: timestamp('first_seen_at').notNull(),
}, (table) => [
  index('dedup_first_seen_idx').on(table.firstSeenAt),
]);

// ============================================
// FOLLOWERS OF VIRTUAL ACTORS
// ============================================

export const actorFollowers = pgTable('actor_followers', {
  pubkey: text('pubkey').notNull(), // followed virtual actor
  followerUri: text('follower_uri').notNull(),
  source: text('source', { enum: ['federation', 'relay'] }).notNull(),
  inbox: text('inbox'),
  sharedInbox: text('shared_inbox'),
  active: boolean('active').notNull(),
  updatedAt: timestamp('updated_at').notNull(),
}, (table) => [
  primaryKey({ columns: [table.pubkey, table.followerUri, table.source] }),
  index('actor_followers_pubkey_idx').on(table.pubkey),
  index('actor_followers_follower_idx').on(table.followerUri),
]);

// ============================================
// FOLLOWS FROM NATIVE USERS TO REMOTE ACTORS
// ============================================

export const nativeFollows = pgTable('native_follows', {
  pubkey: text('pubkey').notNull(), // native follower
  targetActorUri: text('target_actor_uri').notNull(),
  followActivityId: text('follow_activity_id').notNull(), // kept for Undo
  createdAt: timestamp('created_at').defaultNow().notNull(),
}, (table) => [
  primaryKey({ columns: [table.pubkey, table.targetActorUri] }),
]);

// Created-at of the newest contact list applied per native user
export const contactLists = pgTable('contact_lists', {
  pubkey: text('pubkey').primaryKey(),
  appliedAt: timestamp('applied_at').notNull(),
});

// ============================================
// OBJECT MAP (ActivityPub id <-> native event id)
// ============================================

export const objectMap = pgTable('object_map', {
  apId: text('ap_id').primaryKey(),
  eventId: text('event_id').notNull().unique(),
  pubkey: text('pubkey').notNull(),
  kind: integer('kind').notNull(),
  rootId: text('root_id'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});
