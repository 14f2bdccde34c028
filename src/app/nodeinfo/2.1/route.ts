import { getBridge } from '@/lib/bridge/runtime';
import { jsonResponse } from '@/lib/api/responses';

export async function GET() {
    const { config } = getBridge();

    return jsonResponse({
        version: '2.1',
        software: {
            name: 'nostr-ap-bridge',
            version: config.version,
        },
        protocols: ['activitypub'],
        services: {
            inbound: [],
            outbound: [],
        },
        usage: {
            users: {},
            localPosts: 0,
        },
        openRegistrations: false,
        metadata: {
            nodeName: config.domain,
            relays: config.relays,
        },
    }, 200, 'application/json; profile="http://nodeinfo.diaspora.software/ns/schema/2.1#"');
}
