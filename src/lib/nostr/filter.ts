import type { NostrEvent } from './event';

export interface Filter {
    ids?: string[];
    authors?: string[];
    kinds?: number[];
    '#e'?: string[];
    '#p'?: string[];
    '#l'?: string[];
    since?: number;
    until?: number;
    limit?: number;
}

const TAG_FILTER_KEYS = ['#e', '#p', '#l'] as const;

/**
 * Whether an event satisfies a single filter (NIP-01 semantics)
 */
export function matchFilter(filter: Filter, event: NostrEvent): boolean {
    if (filter.ids && !filter.ids.includes(event.id)) return false;
    if (filter.authors && !filter.authors.includes(event.pubkey)) return false;
    if (filter.kinds && !filter.kinds.includes(event.kind)) return false;
    if (filter.since !== undefined && event.created_at < filter.since) return false;
    if (filter.until !== undefined && event.created_at > filter.until) return false;

    for (const key of TAG_FILTER_KEYS) {
        const wanted = filter[key];
        if (!wanted) continue;
        const tagName = key.slice(1);
        const found = event.tags.some((tag) => tag[0] === tagName && tag[1] !== undefined && wanted.includes(tag[1]));
        if (!found) return false;
    }

    return true;
}
