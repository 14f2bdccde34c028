/**
 * Identity Mapper
 *
 * Native pubkey <-> ActivityPub actor. A pubkey maps to the virtual actor
 * `https://{domain}/users/{npub}`, materialized (with an RSA key pair) the
 * first time it is referenced. A remote actor maps to a bridged identity
 * whose Nostr key is derived from the bridge secret and the actor URI.
 *
 * Lookups go cache -> store -> create; creation is single-flight per key.
 */

import { getActorUrl, parseLocalActorUrl } from '@/lib/activitypub/actor';
import { generateKeyPair, type KeyPair } from '@/lib/activitypub/signatures';
import { deriveSecretKey, getPublicKey } from '@/lib/nostr/keys';
import { npubEncode } from '@/lib/nostr/nip19';
import { SingleFlight, type StalledFlight } from '@/lib/concurrency/single-flight';
import type { BridgeCache } from '@/lib/cache';
import type {
    ActorProfile,
    BridgedIdentityRecord,
    BridgeStore,
    FollowerRecord,
    VirtualActorRecord,
} from '@/lib/store/types';

export type ResolvedIdentity =
    | { kind: 'native'; pubkey: string; actorUri: string }
    | { kind: 'bridged'; pubkey: string; actorUri: string; secretKey: string };

export interface FollowerEndpoint {
    uri: string;
    inbox: string | null;
    sharedInbox: string | null;
}

export interface IdentityMapperOptions {
    domain: string;
    secret: string;
    store: BridgeStore;
    cache: BridgeCache;
    generateKeys?: () => Promise<KeyPair>;
    now?: () => Date;
}

const EMPTY_PROFILE: ActorProfile = { displayName: null, summary: null, avatarUrl: null, bannerUrl: null };

export class IdentityMapper {
    private readonly actorFlights = new SingleFlight<VirtualActorRecord>('actor');
    private readonly identityFlights = new SingleFlight<BridgedIdentityRecord>('identity');
    private readonly generateKeys: () => Promise<KeyPair>;
    private readonly now: () => Date;

    constructor(private readonly options: IdentityMapperOptions) {
        this.generateKeys = options.generateKeys ?? generateKeyPair;
        this.now = options.now ?? (() => new Date());
    }

    get domain(): string {
        return this.options.domain;
    }

    actorUriFor(pubkey: string): string {
        return getActorUrl(pubkey, this.options.domain);
    }

    /**
     * `npub…@domain`, the handle remote servers see for a native pubkey
     */
    handleFor(pubkey: string): string {
        return `${npubEncode(pubkey)}@${this.options.domain}`;
    }

    /**
     * Virtual actor of a native pubkey, created on first reference
     */
    async resolveActor(pubkey: string): Promise<VirtualActorRecord> {
        const cached = this.options.cache.virtualActors.get(pubkey);
        if (cached) {
            return cached;
        }

        return this.actorFlights.do(pubkey, async () => {
            const { store, cache } = this.options;
            const stored = await store.virtualActors.get(pubkey);
            if (stored) {
                cache.virtualActors.set(pubkey, stored);
                return stored;
            }

            const keys = await this.generateKeys();
            const at = this.now();
            const record = await store.virtualActors.insert({
                pubkey,
                actorUri: this.actorUriFor(pubkey),
                ...EMPTY_PROFILE,
                publicKeyPem: keys.publicKey,
                privateKeyPem: keys.privateKey,
                createdAt: at,
                updatedAt: at,
            });
            cache.virtualActors.set(pubkey, record);
            console.log(`[Identity] Materialized virtual actor ${record.actorUri}`);
            return record;
        });
    }

    /**
     * Native identity of an actor URI. Our own actors map back to their
     * pubkey; any other actor gets a persisted bridged identity.
     */
    async resolveIdentity(actorUri: string): Promise<ResolvedIdentity> {
        const local = parseLocalActorUrl(actorUri, this.options.domain);
        if (local) {
            return { kind: 'native', pubkey: local, actorUri: this.actorUriFor(local) };
        }

        const record = await this.resolveBridged(actorUri);
        return { kind: 'bridged', pubkey: record.pubkey, actorUri: record.actorUri, secretKey: record.secretKey };
    }

    private async resolveBridged(actorUri: string): Promise<BridgedIdentityRecord> {
        const cached = this.options.cache.bridgedIdentities.get(actorUri);
        if (cached) {
            return cached;
        }

        return this.identityFlights.do(actorUri, async () => {
            const { store, cache } = this.options;
            let record = await store.bridgedIdentities.getByActorUri(actorUri);
            if (!record) {
                const secretKey = deriveSecretKey(this.options.secret, actorUri);
                record = await store.bridgedIdentities.insert({
                    actorUri,
                    pubkey: getPublicKey(secretKey),
                    secretKey,
                    createdAt: this.now(),
                });
                console.log(`[Identity] Bridged ${actorUri} as ${npubEncode(record.pubkey)}`);
            }
            cache.bridgedIdentities.set(actorUri, record);
            cache.pubkeyOwners.set(record.pubkey, { bridged: record });
            return record;
        });
    }

    /**
     * Bridged identity owning a pubkey, or null for native pubkeys
     */
    async bridgedIdentityOf(pubkey: string): Promise<BridgedIdentityRecord | null> {
        const { store, cache } = this.options;
        const cached = cache.pubkeyOwners.get(pubkey);
        if (cached) {
            return cached.bridged;
        }
        const record = await store.bridgedIdentities.getByPubkey(pubkey);
        cache.pubkeyOwners.set(pubkey, { bridged: record });
        return record;
    }

    /**
     * Actor URI standing for a pubkey on the federation side, without creating anything
     */
    async actorUriOf(pubkey: string): Promise<string> {
        const bridged = await this.bridgedIdentityOf(pubkey);
        return bridged ? bridged.actorUri : this.actorUriFor(pubkey);
    }

    async updateProfile(pubkey: string, profile: ActorProfile): Promise<VirtualActorRecord> {
        const actor = await this.resolveActor(pubkey);
        const updated = await this.options.store.virtualActors.updateProfile(pubkey, profile, this.now());
        const record = updated ?? { ...actor, ...profile };
        this.options.cache.virtualActors.set(pubkey, record);
        return record;
    }

    // ============================================
    // FOLLOWERS
    // ============================================

    /**
     * Record a federation Follow of a virtual actor
     */
    async addFollower(pubkey: string, follower: FollowerEndpoint, at: Date = this.now()): Promise<boolean> {
        return this.options.store.followers.upsert({
            pubkey,
            followerUri: follower.uri,
            source: 'federation',
            inbox: follower.inbox,
            sharedInbox: follower.sharedInbox,
            active: true,
            updatedAt: at,
        });
    }

    /**
     * Record a federation Undo(Follow)
     */
    async removeFollower(pubkey: string, followerUri: string, at: Date = this.now()): Promise<boolean> {
        return this.options.store.followers.upsert({
            pubkey,
            followerUri,
            source: 'federation',
            inbox: null,
            sharedInbox: null,
            active: false,
            updatedAt: at,
        });
    }

    /**
     * Apply a contact list observed on the relays for a bridged follower:
     * listed pubkeys become relay-sourced follows, previously listed ones
     * that are gone are deactivated.
     */
    async applyRelayFollowList(follower: FollowerEndpoint, follows: string[], at: Date = this.now()): Promise<void> {
        const { followers } = this.options.store;
        const listed = new Set(follows);
        const previous = await followers.listByFollower(follower.uri, 'relay');

        const writes: Promise<boolean>[] = [];
        for (const pubkey of listed) {
            writes.push(followers.upsert({
                pubkey,
                followerUri: follower.uri,
                source: 'relay',
                inbox: follower.inbox,
                sharedInbox: follower.sharedInbox,
                active: true,
                updatedAt: at,
            }));
        }
        for (const record of previous) {
            if (record.active && !listed.has(record.pubkey)) {
                writes.push(followers.upsert({ ...record, active: false, updatedAt: at }));
            }
        }
        await Promise.all(writes);
    }

    /**
     * Active followers of a virtual actor. Per follower, a federation
     * record wins over a relay record regardless of timestamps.
     */
    async effectiveFollowers(pubkey: string): Promise<FollowerRecord[]> {
        const records = await this.options.store.followers.list(pubkey);
        const byFollower = new Map<string, FollowerRecord>();
        for (const record of records) {
            const current = byFollower.get(record.followerUri);
            if (!current || (current.source === 'relay' && record.source === 'federation')) {
                byFollower.set(record.followerUri, record);
            }
        }
        return [...byFollower.values()].filter((r) => r.active);
    }

    stalled(thresholdMs: number): StalledFlight[] {
        return [...this.actorFlights.stalled(thresholdMs), ...this.identityFlights.stalled(thresholdMs)];
    }
}
