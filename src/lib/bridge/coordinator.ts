/**
 * Bridge Coordinator
 *
 * Builds every component from one configuration and one store handle and
 * exposes the only two ingestion entry points. Cross-cutting mapping state
 * (object map, follower sets, native follows) is written from here and
 * nowhere else.
 */

import { Kind, nowSeconds, type NostrEvent } from '@/lib/nostr/event';
import { deriveSecretKey, getPublicKey } from '@/lib/nostr/keys';
import { RelayPool } from '@/lib/nostr/pool';
import type { SocketFactory } from '@/lib/nostr/relay';
import type { ActivityPubNote } from '@/lib/activitypub/activities';
import { virtualActorToActor, type ActivityPubActor } from '@/lib/activitypub/actor';
import { ActivityPubClient, type FetchLike, type SigningKey } from '@/lib/activitypub/fetch';
import { DeliveryEngine } from '@/lib/activitypub/delivery';
import { InboxVerifier, type InboundRequest, type VerifiedActivity } from '@/lib/activitypub/inbox';
import type { KeyPair } from '@/lib/activitypub/signatures';
import { BridgeCache, type CacheStats } from '@/lib/cache';
import { DedupIndex } from '@/lib/cache/dedup';
import { labelNamespace, type BridgeConfig } from '@/lib/config';
import type { StalledFlight } from '@/lib/concurrency/single-flight';
import {
    DeliveryExhausted,
    InvalidActivity,
    SignatureInvalid,
    errorMessage,
    type TranslationDegraded,
} from '@/lib/errors';
import { IdentityMapper } from '@/lib/identity/mapper';
import type { BridgeStore, VirtualActorRecord } from '@/lib/store/types';
import { FederationIngest } from './federation-ingest';
import { NativeIngest } from './native-ingest';
import { ObjectResolver, signingKeyOf } from './objects';
import type { BridgeServices, DegradationListener, IngestResult } from './types';

export interface BridgeCoordinatorOptions {
    config: BridgeConfig;
    store: BridgeStore;
    socketFactory: SocketFactory;
    fetch?: FetchLike;
    generateKeys?: () => Promise<KeyPair>;
    now?: () => Date;
    maintenanceIntervalMs?: number;
    publishTimeoutMs?: number;
    /** How long stop() waits for deliveries before cancelling their retries */
    drainTimeoutMs?: number;
}

export interface MaintenanceReport {
    pruned: number;
    stalled: StalledFlight[];
    cache: CacheStats;
}

const SUBSCRIPTION_ID = 'bridge';
const INSTANCE_SUBJECT = 'instance';
const STALL_THRESHOLD_MS = 60_000;

function hasProfile(actor: VirtualActorRecord): boolean {
    return Boolean(actor.displayName || actor.summary || actor.avatarUrl || actor.bannerUrl);
}

export class BridgeCoordinator {
    readonly config: BridgeConfig;
    readonly store: BridgeStore;
    readonly cache: BridgeCache;
    readonly identities: IdentityMapper;
    readonly client: ActivityPubClient;
    readonly pool: RelayPool;
    readonly delivery: DeliveryEngine;
    readonly verifier: InboxVerifier;

    private readonly dedup: DedupIndex;
    private readonly objects: ObjectResolver;
    private readonly native: NativeIngest;
    private readonly federation: FederationIngest;
    private readonly degradationListeners: DegradationListener[] = [];
    private readonly instancePubkey: string;
    private readonly maintenanceIntervalMs: number;
    private readonly drainTimeoutMs: number;
    private maintenanceTimer: NodeJS.Timeout | null = null;

    constructor(options: BridgeCoordinatorOptions) {
        const { config, store } = options;
        const now = options.now ?? (() => new Date());

        this.config = config;
        this.store = store;
        this.maintenanceIntervalMs = options.maintenanceIntervalMs ?? 60 * 60 * 1000;
        this.drainTimeoutMs = options.drainTimeoutMs ?? 10_000;
        this.instancePubkey = getPublicKey(deriveSecretKey(config.secret, INSTANCE_SUBJECT));

        this.cache = new BridgeCache(config.dedupRetentionMs);
        this.dedup = new DedupIndex(store.dedup, this.cache, config.dedupRetentionMs, now);
        this.identities = new IdentityMapper({
            domain: config.domain,
            secret: config.secret,
            store,
            cache: this.cache,
            generateKeys: options.generateKeys,
            now,
        });
        this.client = new ActivityPubClient({
            userAgent: config.userAgent,
            cache: this.cache,
            instanceKey: () => this.instanceKey(),
            fetch: options.fetch,
        });
        this.pool = new RelayPool({
            relays: config.relays,
            socketFactory: options.socketFactory,
            dedup: this.dedup,
            backoff: config.relayBackoff,
            publishTimeoutMs: options.publishTimeoutMs,
        });
        this.delivery = new DeliveryEngine(this.client, config.delivery);
        this.verifier = new InboxVerifier(this.client, now);

        const services: BridgeServices = {
            config,
            namespace: labelNamespace(config.domain),
            store,
            cache: this.cache,
            dedup: this.dedup,
            identities: this.identities,
            client: this.client,
            pool: this.pool,
            delivery: this.delivery,
            reportDegradations: (source, degradations) => this.reportDegradations(source, degradations),
        };
        this.objects = new ObjectResolver(services);
        this.native = new NativeIngest(services, this.objects);
        this.federation = new FederationIngest(services, this.objects);

        this.pool.onEvent(async (event) => {
            await this.ingestNativeEvent(event);
        });
    }

    // ============================================
    // INGESTION
    // ============================================

    /**
     * A native event observed on the relays (already deduplicated by the pool)
     */
    ingestNativeEvent(event: NostrEvent): Promise<IngestResult> {
        return this.native.ingest(event);
    }

    /**
     * An activity whose HTTP signature has been verified
     */
    ingestFederationActivity(verified: VerifiedActivity): Promise<IngestResult> {
        return this.federation.ingest(verified);
    }

    /**
     * Verify a raw inbox POST and ingest it. Rejections throw
     * SignatureInvalid or InvalidActivity before anything is touched.
     */
    async receive(request: InboundRequest): Promise<IngestResult> {
        let verified: VerifiedActivity;
        try {
            verified = await this.verifier.verify(request);
        } catch (error) {
            if (error instanceof SignatureInvalid || error instanceof InvalidActivity) {
                console.warn(`[Inbox] Rejected ${request.path}: ${error.message}`);
            }
            throw error;
        }
        return this.ingestFederationActivity(verified);
    }

    // ============================================
    // DOCUMENTS
    // ============================================

    /**
     * Actor document of a native pubkey. Bridged identities have no local
     * actor: their documents live on their own servers.
     */
    async localActor(pubkey: string): Promise<ActivityPubActor | null> {
        if (await this.identities.bridgedIdentityOf(pubkey)) {
            return null;
        }
        let record = await this.identities.resolveActor(pubkey);
        if (!hasProfile(record)) {
            const profile = await this.objects.profile(pubkey);
            if (profile) {
                record = await this.identities.updateProfile(pubkey, profile);
            }
        }
        return virtualActorToActor(record, this.config.domain);
    }

    async followerUris(pubkey: string): Promise<string[]> {
        const followers = await this.identities.effectiveFollowers(pubkey);
        return followers.map((follower) => follower.followerUri);
    }

    async noteObject(eventId: string): Promise<ActivityPubNote | null> {
        const event = await this.objects.nativeEvent(eventId);
        return event ? this.native.noteObject(event) : null;
    }

    // ============================================
    // INSTANCE ACTOR
    // ============================================

    /**
     * Virtual actor whose key signs the bridge's own fetches
     */
    instanceActor(): Promise<VirtualActorRecord> {
        return this.identities.resolveActor(this.instancePubkey);
    }

    private async instanceKey(): Promise<SigningKey> {
        return signingKeyOf(await this.instanceActor());
    }

    // ============================================
    // LISTENERS
    // ============================================

    onDegraded(listener: DegradationListener): () => void {
        this.degradationListeners.push(listener);
        return () => {
            const index = this.degradationListeners.indexOf(listener);
            if (index >= 0) this.degradationListeners.splice(index, 1);
        };
    }

    onDeliveryExhausted(listener: (error: DeliveryExhausted) => void): () => void {
        return this.delivery.onExhausted(listener);
    }

    private reportDegradations(source: string, degradations: TranslationDegraded[]): void {
        for (const degradation of degradations) {
            console.warn(`[Bridge] Degraded translation of ${source}: ${degradation.message}`);
            for (const listener of this.degradationListeners) {
                try {
                    listener(degradation, source);
                } catch (error) {
                    console.error('[Bridge] Degradation listener failed:', errorMessage(error));
                }
            }
        }
    }

    // ============================================
    // LIFECYCLE
    // ============================================

    /**
     * Materialize the instance actor, then subscribe and connect the relays.
     * The instance key signs the actor fetches of inbox verification, so it
     * exists before the first request is verified.
     */
    async start(): Promise<void> {
        if (this.maintenanceTimer) {
            return;
        }
        await this.instanceActor();
        if (this.maintenanceTimer) {
            return;
        }
        this.pool.subscribe(SUBSCRIPTION_ID, [{
            kinds: [Kind.Metadata, Kind.TextNote, Kind.ContactList, Kind.EventDeletion, Kind.Repost, Kind.Reaction],
            since: nowSeconds() - this.config.subscriptionLookbackSeconds,
        }]);
        this.pool.start();

        this.maintenanceTimer = setInterval(() => {
            this.runMaintenance().catch((error: unknown) => {
                console.error('[Bridge] Maintenance failed:', errorMessage(error));
            });
        }, this.maintenanceIntervalMs);
        this.maintenanceTimer.unref();

        console.log(`[Bridge] Started for ${this.config.domain} on ${this.pool.relays.length} relay(s)`);
    }

    /**
     * Stop the relays, give deliveries a grace period, cancel the retries
     * still pending and close the store
     */
    async stop(): Promise<void> {
        if (this.maintenanceTimer) {
            clearInterval(this.maintenanceTimer);
            this.maintenanceTimer = null;
        }
        this.pool.stop();

        let timeout: NodeJS.Timeout | undefined;
        const deadline = new Promise<void>((resolve) => {
            timeout = setTimeout(resolve, this.drainTimeoutMs);
        });
        await Promise.race([this.delivery.drain(), deadline]);
        clearTimeout(timeout);

        this.delivery.cancel();
        await this.delivery.drain();
        await this.store.close();
        console.log('[Bridge] Stopped');
    }

    /**
     * Prune the dedup index and report single-flight operations that
     * have been running for too long
     */
    async runMaintenance(): Promise<MaintenanceReport> {
        const pruned = await this.dedup.prune();
        const stalled = this.stalled(STALL_THRESHOLD_MS);
        for (const flight of stalled) {
            console.warn(`[Bridge] ${flight.key} in flight for ${Math.round(flight.ageMs / 1000)}s`);
        }
        const cache = this.cache.stats();
        console.log(`[Bridge] Maintenance: pruned ${pruned} dedup entries, ${cache.seenIds} ids and ${cache.events} events cached`);
        return { pruned, stalled, cache };
    }

    stalled(thresholdMs: number): StalledFlight[] {
        return [
            ...this.identities.stalled(thresholdMs),
            ...this.delivery.stalled(thresholdMs),
            ...this.federation.stalled(thresholdMs),
        ];
    }
}
