import { getBridge } from '@/lib/bridge/runtime';
import { errorResponse, jsonResponse } from '@/lib/api/responses';
import { jrdFor, resourcePubkey } from '@/lib/activitypub/webfinger';

export async function GET(request: Request) {
    const resource = new URL(request.url).searchParams.get('resource');
    if (!resource) {
        return jsonResponse({ error: 'Missing resource parameter' }, 400);
    }

    try {
        const bridge = getBridge();
        const { domain } = bridge.config;

        const pubkey = resourcePubkey(resource, domain);
        if (!pubkey || await bridge.identities.bridgedIdentityOf(pubkey)) {
            return jsonResponse({ error: 'Resource not found' }, 404);
        }

        return jsonResponse(jrdFor(pubkey, domain), 200, 'application/jrd+json');
    } catch (error) {
        return errorResponse(error);
    }
}
