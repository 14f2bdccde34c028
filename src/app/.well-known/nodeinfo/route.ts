import { getBridge } from '@/lib/bridge/runtime';
import { jsonResponse } from '@/lib/api/responses';

export async function GET() {
    const nodeDomain = getBridge().config.domain;

    return jsonResponse({
        links: [
            {
                rel: 'http://nodeinfo.diaspora.software/ns/schema/2.1',
                href: `https://${nodeDomain}/nodeinfo/2.1`,
            },
        ],
    });
}
