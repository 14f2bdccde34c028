/**
 * Nostr -> ActivityPub ingestion
 *
 * Resolves what a native event references, translates it and hands the
 * activities to delivery. Events the bridge published itself (labelled
 * with its namespace, or signed by a bridged identity) are not sent back
 * to the federation.
 */

import { v4 as uuidv4 } from 'uuid';
import { Kind, type NostrEvent } from '@/lib/nostr/event';
import { decodeEntity, NOSTR_URI_REGEX } from '@/lib/nostr/nip19';
import { firstTagValue, isLabelledBy, tagValues } from '@/lib/nostr/tags';
import { isHexKey } from '@/lib/nostr/keys';
import { translateNativeEvent, type NativeContext, type ResolvedActor } from '@/lib/translate/nostr-to-ap';
import { assertNever } from '@/lib/translate/types';
import {
    createFollowActivity,
    createUndoActivity,
    createUpdateActivity,
    type ActivityPubActivity,
    type ActivityPubNote,
} from '@/lib/activitypub/activities';
import { getActivityUrl, virtualActorToActor } from '@/lib/activitypub/actor';
import { actorHandle } from '@/lib/activitypub/fetch';
import type { DeliveryTarget } from '@/lib/activitypub/delivery';
import { KeyedSemaphore } from '@/lib/concurrency/semaphore';
import type { BridgedIdentityRecord, VirtualActorRecord } from '@/lib/store/types';
import { signingKeyOf, type ObjectResolver } from './objects';
import { bridged, recorded, skipped, type BridgeServices, type IngestResult } from './types';

export class NativeIngest {
    // One contact list at a time per pubkey
    private readonly contactLists = new KeyedSemaphore(1);

    constructor(
        private readonly services: BridgeServices,
        private readonly objects: ObjectResolver
    ) {}

    async ingest(event: NostrEvent): Promise<IngestResult> {
        const { identities, namespace, cache } = this.services;

        const owner = await identities.bridgedIdentityOf(event.pubkey);
        if (owner) {
            return event.kind === Kind.ContactList
                ? this.applyBridgedContacts(owner, event)
                : skipped('authored by a bridged identity');
        }
        if (isLabelledBy(event, namespace)) {
            return skipped('already bridged from the federation');
        }

        const ctx = await this.context(event);
        const { value, degradations } = translateNativeEvent(event, ctx);
        this.services.reportDegradations(event.id, degradations);

        switch (value.type) {
            case 'skipped':
                return skipped(value.reason);
            case 'note':
            case 'reaction':
            case 'repost':
                cache.events.set(event.id, event);
                return this.send(event.pubkey, [value.activity], value.recipients);
            case 'deletion': {
                for (const id of ctx.deletedEvents?.keys() ?? []) {
                    cache.events.delete(id);
                }
                const addressed = [...ctx.actors.values()]
                    .map((actor) => actor.actorUri)
                    .filter((uri) => uri !== ctx.authorActorUri);
                return this.send(event.pubkey, value.activities, addressed);
            }
            case 'profile': {
                const actor = await identities.updateProfile(event.pubkey, value.profile);
                cache.profiles.set(event.pubkey, { profile: value.profile });
                const update = createUpdateActivity(
                    virtualActorToActor(actor, identities.domain),
                    getActivityUrl(event.id, identities.domain),
                    new Date(event.created_at * 1000).toISOString()
                );
                return this.send(event.pubkey, [update], []);
            }
            case 'contacts':
                return this.contactLists.run(event.pubkey, () => this.applyContacts(event, value.follows));
            default:
                return assertNever(value);
        }
    }

    /**
     * Note object served at the note URL of a native kind 1 event.
     * Null for other kinds and for events that came from the federation.
     */
    async noteObject(event: NostrEvent): Promise<ActivityPubNote | null> {
        const { identities, namespace } = this.services;
        if (event.kind !== Kind.TextNote || isLabelledBy(event, namespace)) {
            return null;
        }
        if (await identities.bridgedIdentityOf(event.pubkey)) {
            return null;
        }
        const { value } = translateNativeEvent(event, await this.context(event));
        return value.type === 'note' ? value.note : null;
    }

    // ============================================
    // CONTEXT
    // ============================================

    private async context(event: NostrEvent): Promise<NativeContext> {
        const { identities, store } = this.services;
        const pubkeys = new Set(tagValues(event.tags, 'p').filter(isHexKey));
        const eventIds = new Set(tagValues(event.tags, 'e').filter(isHexKey));

        const quoted = firstTagValue(event.tags, 'q');
        if (quoted && isHexKey(quoted)) {
            eventIds.add(quoted);
        }
        for (const match of event.content.matchAll(NOSTR_URI_REGEX)) {
            const entity = decodeEntity(match[1]);
            if (!entity) continue;
            if (entity.type === 'npub' || entity.type === 'nprofile') {
                pubkeys.add(entity.pubkey);
            } else {
                eventIds.add(entity.id);
            }
        }

        // Retractions also go to whoever the retracted events addressed
        const deletedEvents = new Map<string, NostrEvent>();
        if (event.kind === Kind.EventDeletion) {
            await Promise.all([...eventIds].map(async (id) => {
                const deleted = await this.objects.nativeEvent(id);
                if (deleted) deletedEvents.set(id, deleted);
            }));
            for (const deleted of deletedEvents.values()) {
                for (const pubkey of tagValues(deleted.tags, 'p').filter(isHexKey)) {
                    pubkeys.add(pubkey);
                }
            }
        }

        const actors = new Map<string, ResolvedActor>();
        const objects = new Map<string, string>();

        await Promise.all([
            ...[...pubkeys].map(async (pubkey) => {
                const actor = await this.resolvedActor(pubkey);
                if (actor) actors.set(pubkey, actor);
            }),
            ...[...eventIds].map(async (id) => {
                const mapping = await store.objectMap.getByEventId(id);
                if (mapping) objects.set(id, mapping.apId);
            }),
        ]);

        return {
            domain: identities.domain,
            authorActorUri: identities.actorUriFor(event.pubkey),
            actors,
            objects,
            deletedEvents,
        };
    }

    private async resolvedActor(pubkey: string): Promise<ResolvedActor | null> {
        const { identities } = this.services;
        const owner = await identities.bridgedIdentityOf(pubkey);
        if (!owner) {
            return { actorUri: identities.actorUriFor(pubkey), handle: identities.handleFor(pubkey) };
        }
        const actor = await this.objects.actor(owner.actorUri);
        return actor ? { actorUri: actor.id, handle: actorHandle(actor) } : null;
    }

    // ============================================
    // DELIVERY
    // ============================================

    private async send(pubkey: string, activities: ActivityPubActivity[], recipients: string[]): Promise<IngestResult> {
        const actor = await this.services.identities.resolveActor(pubkey);
        const targets = [
            ...await this.objects.followerInboxes(pubkey),
            ...await this.objects.actorInboxes(recipients),
        ];
        for (const activity of activities) {
            this.deliver(actor, activity, targets);
        }
        return bridged(activities);
    }

    private deliver(actor: VirtualActorRecord, activity: ActivityPubActivity, targets: DeliveryTarget[]): void {
        if (targets.length === 0) {
            return;
        }
        void this.services.delivery.deliver(activity, targets, signingKeyOf(actor));
    }

    // ============================================
    // FOLLOWS
    // ============================================

    /**
     * Diff a native contact list against the follows already sent and
     * federate the difference. Only bridged identities can be followed
     * this way; native-to-native follows stay on the relays.
     */
    private async applyContacts(event: NostrEvent, follows: string[]): Promise<IngestResult> {
        const { identities, store } = this.services;
        const at = new Date(event.created_at * 1000);

        if (!(await store.nativeFollows.markContactList(event.pubkey, at))) {
            return skipped('contact list older than the one already applied');
        }
        const current = await store.nativeFollows.list(event.pubkey);

        const owners = await Promise.all(follows.map((pubkey) => identities.bridgedIdentityOf(pubkey)));
        const wanted = new Set(owners.flatMap((owner) => (owner ? [owner.actorUri] : [])));
        const existing = new Set(current.map((record) => record.targetActorUri));

        const actor = await identities.resolveActor(event.pubkey);
        const activities: ActivityPubActivity[] = [];

        for (const target of wanted) {
            if (existing.has(target)) continue;
            const follow = createFollowActivity(actor.actorUri, target, getActivityUrl(uuidv4(), identities.domain));
            await store.nativeFollows.add({
                pubkey: event.pubkey,
                targetActorUri: target,
                followActivityId: follow.id,
                createdAt: at,
            });
            this.deliver(actor, follow, await this.objects.actorInboxes([target]));
            activities.push(follow);
        }

        for (const record of current) {
            if (wanted.has(record.targetActorUri)) continue;
            await store.nativeFollows.remove(event.pubkey, record.targetActorUri);
            const undo = createUndoActivity(
                actor.actorUri,
                createFollowActivity(actor.actorUri, record.targetActorUri, record.followActivityId),
                getActivityUrl(uuidv4(), identities.domain)
            );
            this.deliver(actor, undo, await this.objects.actorInboxes([record.targetActorUri]));
            activities.push(undo);
        }

        if (activities.length === 0) {
            return skipped('contact list unchanged');
        }
        console.log(`[Bridge] ${actor.actorUri}: ${activities.length} follow change(s)`);
        return bridged(activities);
    }

    /**
     * A contact list signed by a bridged identity is that remote actor
     * following native users through the relays
     */
    private async applyBridgedContacts(owner: BridgedIdentityRecord, event: NostrEvent): Promise<IngestResult> {
        const actor = await this.objects.actor(owner.actorUri);
        if (!actor) {
            return skipped(`follower ${owner.actorUri} unreachable`);
        }
        const follows = [...new Set(tagValues(event.tags, 'p').filter(isHexKey))];
        await this.services.identities.applyRelayFollowList(
            { uri: actor.id, inbox: actor.inbox, sharedInbox: actor.endpoints?.sharedInbox ?? null },
            follows,
            new Date(event.created_at * 1000)
        );
        return recorded(`relay follows of ${actor.id}`);
    }
}
