/**
 * ActivityPub Shared Inbox Endpoint
 *
 * POST /inbox
 */

import { getBridge } from '@/lib/bridge/runtime';
import { errorResponse, inboundRequest, jsonResponse } from '@/lib/api/responses';

export async function POST(request: Request) {
    try {
        const result = await getBridge().receive(await inboundRequest(request));
        return jsonResponse({ status: result.status }, 202);
    } catch (error) {
        return errorResponse(error);
    }
}
