/**
 * ActivityPub -> Nostr ingestion
 *
 * Dispatches verified activities by type. Content is republished on the
 * relays signed by the sender's bridged identity; follows mutate the
 * follower sets of virtual actors.
 */

import { v4 as uuidv4 } from 'uuid';
import { finalizeEvent, type EventTemplate, type NostrEvent } from '@/lib/nostr/event';
import { threadRefs } from '@/lib/nostr/tags';
import { createAcceptActivity, createFollowActivity } from '@/lib/activitypub/activities';
import { getActivityUrl, parseLocalActorUrl } from '@/lib/activitypub/actor';
import type { VerifiedActivity } from '@/lib/activitypub/inbox';
import { sameHost, type InboundActivity, type InboundNote, type RemoteActor } from '@/lib/activitypub/schemas';
import {
    isPublic,
    translateActorProfile,
    translateAnnounce,
    translateContactList,
    translateDeletion,
    translateFederationNote,
    translateReaction,
    type EventRef,
    type FederationContext,
} from '@/lib/translate/ap-to-nostr';
import { assertNever } from '@/lib/translate/types';
import type { ResolvedIdentity } from '@/lib/identity/mapper';
import type { ObjectMapping } from '@/lib/store/types';
import { SingleFlight, type StalledFlight } from '@/lib/concurrency/single-flight';
import { InvalidActivity, TranslationDegraded } from '@/lib/errors';
import { signingKeyOf, type ObjectResolver } from './objects';
import { bridged, recorded, skipped, type BridgeServices, type IngestResult } from './types';

type BridgedIdentity = Extract<ResolvedIdentity, { kind: 'bridged' }>;
type ActivityOf<T extends InboundActivity['type']> = Extract<InboundActivity, { type: T }>;

export class FederationIngest {
    private readonly notes = new SingleFlight<NostrEvent | null>('note');

    constructor(
        private readonly services: BridgeServices,
        private readonly objects: ObjectResolver
    ) {}

    async ingest(verified: VerifiedActivity): Promise<IngestResult> {
        const { dedup } = this.services;
        const { id, actor } = verified.activity;
        if (!sameHost(id, actor)) {
            throw new InvalidActivity(`activity ${id} is not hosted by ${actor}`);
        }
        if (!(await dedup.claim(id))) {
            return skipped('duplicate activity');
        }
        try {
            return await this.dispatch(verified);
        } catch (error) {
            await dedup.release(id);
            throw error;
        }
    }

    stalled(thresholdMs: number): StalledFlight[] {
        return this.notes.stalled(thresholdMs);
    }

    private async dispatch({ activity, actor }: VerifiedActivity): Promise<IngestResult> {
        const identity = await this.services.identities.resolveIdentity(activity.actor);
        if (identity.kind === 'native') {
            return skipped('activity from a local actor');
        }

        switch (activity.type) {
            case 'Create':
                return this.handleCreate(activity);
            case 'Update':
                return this.handleUpdate(activity, identity);
            case 'Delete':
                return this.handleDelete(activity, identity);
            case 'Follow':
                return this.handleFollow(activity, actor, identity);
            case 'Undo':
                return this.handleUndo(activity, identity);
            case 'Like':
            case 'EmojiReact':
                return this.handleReaction(activity, identity);
            case 'Announce':
                return this.handleAnnounce(activity, identity);
            case 'Accept':
            case 'Reject':
                return this.handleFollowResponse(activity);
            default:
                return assertNever(activity);
        }
    }

    // ============================================
    // CONTENT
    // ============================================

    private async handleCreate(activity: ActivityOf<'Create'>): Promise<IngestResult> {
        const note = typeof activity.object === 'string'
            ? await this.objects.note(activity.object)
            : activity.object;

        if (!note || (typeof activity.object === 'string' && note.id !== activity.object)) {
            return skipped('object unavailable');
        }
        if (note.attributedTo !== activity.actor) {
            return skipped('note attributed to another actor');
        }
        if (!sameHost(note.id, note.attributedTo)) {
            return skipped('note is not hosted by its author');
        }
        if (!isPublic(note.to, note.cc)) {
            return skipped('not public');
        }

        const events = await this.bridgeThread(note);
        return events.length > 0 ? bridged([], events) : skipped('already bridged');
    }

    /**
     * Bridge a note after its unbridged ancestors, oldest first. The walk
     * up the reply chain is iterative, bounded and cycle-checked.
     */
    private async bridgeThread(note: InboundNote): Promise<NostrEvent[]> {
        const depth = this.services.config.threadResolutionDepth;
        const chain: InboundNote[] = [note];
        const visited = new Set([note.id]);
        let cursor = note.inReplyTo ?? null;

        while (cursor) {
            if (visited.has(cursor)) {
                console.warn(`[Bridge] Reply cycle at ${cursor}`);
                break;
            }
            if (chain.length > depth) {
                this.services.reportDegradations(note.id, [
                    new TranslationDegraded('thread_too_deep', note.id, `ancestors beyond ${depth} levels left unbridged`),
                ]);
                break;
            }
            visited.add(cursor);

            if (await this.objects.eventRef(cursor)) {
                break;
            }
            const parent = await this.objects.note(cursor);
            if (!parent || parent.id !== cursor || !isPublic(parent.to, parent.cc)) {
                break;
            }
            chain.push(parent);
            cursor = parent.inReplyTo ?? null;
        }

        const events: NostrEvent[] = [];
        for (const item of chain.reverse()) {
            const event = await this.bridgeNote(item, true);
            if (event) events.push(event);
        }
        return events;
    }

    /**
     * Publish one note as a kind 1 event. Null when it was bridged before
     * or belongs to one of our own actors.
     */
    private bridgeNote(note: InboundNote, withQuote: boolean): Promise<NostrEvent | null> {
        if (!sameHost(note.id, note.attributedTo)) {
            console.warn(`[Bridge] Note ${note.id} is not hosted by ${note.attributedTo}`);
            return Promise.resolve(null);
        }
        return this.notes.do(note.id, async () => {
            const { store, identities } = this.services;
            if (await store.objectMap.getByApId(note.id)) {
                return null;
            }
            const author = await identities.resolveIdentity(note.attributedTo);
            if (author.kind === 'native') {
                return null;
            }
            if (withQuote) {
                await this.bridgeQuoted(note);
            }

            const { value, degradations } = translateFederationNote(note, await this.context(note));
            this.services.reportDegradations(note.id, degradations);
            return this.publishMapped(note.id, value, author);
        });
    }

    /**
     * Bring a quoted note over first so the quote can point at it.
     * The quoted note's own thread and quote are not followed.
     */
    private async bridgeQuoted(note: InboundNote): Promise<void> {
        const uri = note.quoteUrl ?? note._misskey_quote ?? note.quoteUri;
        if (!uri || uri === note.id || await this.objects.eventRef(uri)) {
            return;
        }
        const quoted = await this.objects.note(uri);
        if (quoted && quoted.id === uri && isPublic(quoted.to, quoted.cc)) {
            await this.bridgeNote(quoted, false);
        }
    }

    private async context(note: InboundNote): Promise<FederationContext> {
        const actors = new Map<string, string>();
        const objects = new Map<string, EventRef>();

        const mentions = note.tag.flatMap((tag) => (tag.type === 'Mention' && tag.href ? [tag.href] : []));
        const references = [note.inReplyTo, note.quoteUrl ?? note._misskey_quote ?? note.quoteUri]
            .filter((uri): uri is string => typeof uri === 'string');

        await Promise.all([
            ...mentions.map(async (href) => {
                const pubkey = await this.mentionedPubkey(href);
                if (pubkey) actors.set(href, pubkey);
            }),
            ...references.map(async (uri) => {
                const ref = await this.objects.eventRef(uri);
                if (ref) objects.set(uri, ref);
            }),
        ]);

        return { namespace: this.services.namespace, actors, objects };
    }

    private async mentionedPubkey(href: string): Promise<string | null> {
        const { identities } = this.services;
        const local = parseLocalActorUrl(href, identities.domain);
        if (local) {
            return local;
        }
        const actor = await this.objects.actor(href);
        return actor ? (await identities.resolveIdentity(actor.id)).pubkey : null;
    }

    private async handleUpdate(activity: ActivityOf<'Update'>, identity: BridgedIdentity): Promise<IngestResult> {
        const object = activity.object;
        if (!('publicKey' in object)) {
            return skipped(`${object.type} updates are not bridged`);
        }
        if (object.id !== activity.actor) {
            return skipped('update of another actor');
        }
        this.services.client.remember(object);
        const event = await this.publish(translateActorProfile(object, this.services.namespace), identity);
        return bridged([], [event]);
    }

    private async handleDelete(activity: ActivityOf<'Delete'>, identity: BridgedIdentity): Promise<IngestResult> {
        if (activity.object === activity.actor) {
            return skipped('actor deletion is not bridged');
        }
        return this.retract(activity.id, activity.object, identity);
    }

    private async handleReaction(activity: ActivityOf<'Like' | 'EmojiReact'>, identity: BridgedIdentity): Promise<IngestResult> {
        const target = await this.objects.eventRef(activity.object);
        if (!target) {
            return skipped('reaction target is not bridged');
        }
        const event = await this.publishMapped(activity.id, translateReaction(activity, target, this.services.namespace), identity);
        return bridged([], [event]);
    }

    private async handleAnnounce(activity: ActivityOf<'Announce'>, identity: BridgedIdentity): Promise<IngestResult> {
        if (!isPublic(activity.to, activity.cc)) {
            return skipped('not public');
        }

        const events: NostrEvent[] = [];
        let target = await this.objects.eventRef(activity.object);
        if (!target) {
            const note = await this.objects.note(activity.object);
            if (!note || note.id !== activity.object || !isPublic(note.to, note.cc)) {
                return skipped('announced object unavailable');
            }
            events.push(...await this.bridgeThread(note));
            target = await this.objects.eventRef(note.id);
        }
        if (!target) {
            return skipped('announced object could not be bridged');
        }

        events.push(await this.publishMapped(activity.id, translateAnnounce(activity, target, this.services.namespace), identity));
        return bridged([], events);
    }

    /**
     * Kind 5 for the event an object was bridged as, when it belongs to the sender
     */
    private async retract(activityId: string, objectId: string, identity: BridgedIdentity): Promise<IngestResult> {
        const { store, namespace } = this.services;
        const mapping = await store.objectMap.getByApId(objectId);
        if (!mapping) {
            return skipped('object was never bridged');
        }
        if (mapping.pubkey !== identity.pubkey) {
            return skipped('object belongs to another actor');
        }
        await store.objectMap.remove(mapping.apId);
        this.services.cache.events.delete(mapping.eventId);
        const event = await this.publish(translateDeletion(activityId, [mapping.eventId], namespace), identity);
        return bridged([], [event]);
    }

    // ============================================
    // FOLLOWS
    // ============================================

    private async handleFollow(activity: ActivityOf<'Follow'>, actor: RemoteActor, identity: BridgedIdentity): Promise<IngestResult> {
        const { identities, delivery } = this.services;
        const pubkey = parseLocalActorUrl(activity.object, identities.domain);
        if (!pubkey) {
            return skipped('follow target is not a bridged user');
        }

        const target = await identities.resolveActor(pubkey);
        await identities.addFollower(pubkey, {
            uri: actor.id,
            inbox: actor.inbox,
            sharedInbox: actor.endpoints?.sharedInbox ?? null,
        });

        const accept = createAcceptActivity(
            target.actorUri,
            createFollowActivity(activity.actor, activity.object, activity.id),
            getActivityUrl(uuidv4(), identities.domain)
        );
        void delivery.deliver(accept, [{ inbox: actor.inbox }], signingKeyOf(target));
        console.log(`[Bridge] ${actor.id} now follows ${target.actorUri}`);

        return bridged([accept], [await this.publishContactList(identity)]);
    }

    private async handleUndo(activity: ActivityOf<'Undo'>, identity: BridgedIdentity): Promise<IngestResult> {
        const object = activity.object;
        if (typeof object === 'string') {
            return this.retract(activity.id, object, identity);
        }
        if (object.actor !== undefined && object.actor !== activity.actor) {
            return skipped('undo of another actor\'s activity');
        }

        if (object.type === 'Follow') {
            const pubkey = parseLocalActorUrl(object.object, this.services.identities.domain);
            if (!pubkey) {
                return skipped('unfollow target is not a bridged user');
            }
            await this.services.identities.removeFollower(pubkey, activity.actor);
            console.log(`[Bridge] ${activity.actor} unfollowed ${object.object}`);
            return bridged([], [await this.publishContactList(identity)]);
        }
        if (object.type === 'Like' || object.type === 'EmojiReact' || object.type === 'Announce') {
            return object.id ? this.retract(activity.id, object.id, identity) : skipped('undo without an activity id');
        }
        return skipped(`undo of ${object.type} is not bridged`);
    }

    private async handleFollowResponse(activity: ActivityOf<'Accept' | 'Reject'>): Promise<IngestResult> {
        const follow = typeof activity.object === 'string' ? null : activity.object;
        const follower = follow?.type === 'Follow' && follow.actor
            ? parseLocalActorUrl(follow.actor, this.services.identities.domain)
            : null;
        if (!follower) {
            return skipped(`${activity.type} of an unknown follow`);
        }

        if (activity.type === 'Reject') {
            await this.services.store.nativeFollows.remove(follower, activity.actor);
            console.log(`[Bridge] ${activity.actor} rejected a follow from ${follower}`);
            return recorded('follow rejected');
        }
        console.log(`[Bridge] ${activity.actor} accepted a follow from ${follower}`);
        return recorded('follow accepted');
    }

    /**
     * Kind 3 of a bridged identity listing every virtual actor it follows
     */
    private async publishContactList(identity: BridgedIdentity): Promise<NostrEvent> {
        const { store, config, namespace } = this.services;
        const records = await store.followers.listByFollower(identity.actorUri, 'federation');
        const follows = records.filter((r) => r.active).map((r) => r.pubkey);
        return this.publish(translateContactList(identity.actorUri, follows, config.contactListLimit, namespace), identity);
    }

    // ============================================
    // PUBLICATION
    // ============================================

    /**
     * Sign and publish, recording the object mapping first
     */
    private async publishMapped(apId: string, template: EventTemplate, identity: BridgedIdentity): Promise<NostrEvent> {
        const event = finalizeEvent(template, identity.secretKey);
        const mapping: ObjectMapping = {
            apId,
            eventId: event.id,
            pubkey: event.pubkey,
            kind: event.kind,
            rootId: threadRefs(event).root ?? null,
            createdAt: new Date(),
        };
        await this.services.store.objectMap.put(mapping);
        return this.broadcast(event);
    }

    private async publish(template: EventTemplate, identity: BridgedIdentity): Promise<NostrEvent> {
        return this.broadcast(finalizeEvent(template, identity.secretKey));
    }

    /**
     * The id is claimed before publication so the relays' echo is dropped
     */
    private async broadcast(event: NostrEvent): Promise<NostrEvent> {
        const { dedup, cache, pool } = this.services;
        if (!(await dedup.claim(event.id))) {
            return event;
        }
        cache.events.set(event.id, event);
        const results = await pool.publish(event);
        if (!results.some((r) => r.ok)) {
            console.warn(`[Bridge] No relay accepted ${event.id}`);
        }
        return event;
    }
}
