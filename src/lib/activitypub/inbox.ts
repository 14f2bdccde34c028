/**
 * ActivityPub Inbox Verification
 *
 * Turns a raw signed POST into a verified, parsed activity. Nothing is
 * written anywhere (not even the actor cache) until the signature checks
 * out; callers dispatch the result.
 */

import { checkSignedRequest, verifySignature } from './signatures';
import { inboundActivitySchema, type InboundActivity, type RemoteActor } from './schemas';
import type { ActivityPubClient } from './fetch';
import { InvalidActivity, SignatureInvalid } from '@/lib/errors';

export interface InboundRequest {
    method: string;
    /** Path including the query string */
    path: string;
    /** Header names in lower case */
    headers: Record<string, string>;
    body: string;
}

export interface VerifiedActivity {
    activity: InboundActivity;
    actor: RemoteActor;
}

export class InboxVerifier {
    constructor(
        private readonly client: ActivityPubClient,
        private readonly now: () => Date = () => new Date()
    ) {}

    async verify(request: InboundRequest): Promise<VerifiedActivity> {
        const check = checkSignedRequest(request.method, request.headers, request.body, this.now());
        if (!check.valid) {
            throw new SignatureInvalid(check.reason);
        }

        const activity = this.parse(request.body);

        const cached = await this.client.fetchActor(activity.actor, { remember: false });
        if (!cached) {
            throw new SignatureInvalid(`could not fetch actor ${activity.actor}`, activity.actor);
        }

        let actor = cached;
        if (!this.signedBy(actor, check.keyId, request)) {
            // The key may have rotated since the document was cached
            const fresh = await this.client.fetchActor(activity.actor, { force: true, remember: false });
            if (!fresh || !this.signedBy(fresh, check.keyId, request)) {
                throw new SignatureInvalid(`signature by ${check.keyId} does not verify`, activity.actor);
            }
            actor = fresh;
        }

        if (actor.id !== activity.actor || actor.publicKey.owner !== activity.actor) {
            throw new SignatureInvalid(`key owner ${actor.publicKey.owner} is not ${activity.actor}`, activity.actor);
        }

        this.client.remember(actor);
        return { activity, actor };
    }

    private parse(body: string): InboundActivity {
        let json: unknown;
        try {
            json = JSON.parse(body);
        } catch {
            throw new InvalidActivity('body is not JSON');
        }

        const parsed = inboundActivitySchema.safeParse(json);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new InvalidActivity(`unsupported activity: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`);
        }
        return parsed.data;
    }

    private signedBy(actor: RemoteActor, keyId: string, request: InboundRequest): boolean {
        return actor.publicKey.id === keyId
            && verifySignature(request.method, request.path, request.headers, actor.publicKey.publicKeyPem);
    }
}
