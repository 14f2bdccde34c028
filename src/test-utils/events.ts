import { finalizeEvent, type NostrEvent } from '@/lib/nostr/event';
import { getPublicKey } from '@/lib/nostr/keys';

export const ALICE_SK = '0000000000000000000000000000000000000000000000000000000000000001';
export const BOB_SK = '0000000000000000000000000000000000000000000000000000000000000002';

export const ALICE_PK = getPublicKey(ALICE_SK);
export const BOB_PK = getPublicKey(BOB_SK);

export function signed(
  secretKey: string,
  partial: { kind?: number; content?: string; tags?: string[][]; created_at?: number } = {}
): NostrEvent {
  return finalizeEvent({
    kind: partial.kind ?? 1,
    content: partial.content ?? 'hello',
    tags: partial.tags ?? [],
    created_at: partial.created_at ?? 1_700_000_000,
  }, secretKey);
}
