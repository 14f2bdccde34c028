/**
 * Response helpers shared by the route handlers
 */

import type { InboundRequest } from '@/lib/activitypub/inbox';
import { InvalidActivity, SignatureInvalid, StoreUnavailable, errorMessage } from '@/lib/errors';

export const ACTIVITY_JSON = 'application/activity+json';

export function jsonResponse(body: unknown, status = 200, contentType = 'application/json'): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: {
            'Content-Type': contentType,
            'Access-Control-Allow-Origin': '*',
        },
    });
}

export function activityResponse(body: unknown, status = 200): Response {
    return jsonResponse(body, status, ACTIVITY_JSON);
}

export function notFound(what = 'Not found'): Response {
    return jsonResponse({ error: what }, 404);
}

/**
 * Map an error thrown by the bridge to an HTTP response
 */
export function errorResponse(error: unknown): Response {
    if (error instanceof SignatureInvalid) {
        return jsonResponse({ error: 'Invalid signature' }, 401);
    }
    if (error instanceof InvalidActivity) {
        return jsonResponse({ error: error.message }, 400);
    }
    if (error instanceof StoreUnavailable) {
        return jsonResponse({ error: 'Service unavailable' }, 503);
    }
    console.error('[API] Request failed:', errorMessage(error));
    return jsonResponse({ error: 'Internal server error' }, 500);
}

/**
 * Raw request as the inbox verifier needs it: lower-case header names
 * and the path with its query string
 */
export async function inboundRequest(request: Request): Promise<InboundRequest> {
    const url = new URL(request.url);
    const headers: Record<string, string> = {};
    request.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
    });
    if (!headers['host']) {
        headers['host'] = url.host;
    }
    return {
        method: request.method,
        path: `${url.pathname}${url.search}`,
        headers,
        body: await request.text(),
    };
}
