import type { BridgeCache } from './index';
import type { DedupPartition } from '@/lib/store/types';
import type { EventClaimer } from '@/lib/nostr/pool';

/**
 * Dedup index: the seen-id cache in front of the store's dedup partition.
 *
 * A cache hit answers "already processed" without touching the store.
 * Concurrent claims for the same id wait on the first one; if it fails,
 * the next waiter claims for itself, so a store error never marks an id
 * as seen.
 */
export class DedupIndex implements EventClaimer {
  private readonly pending = new Map<string, Promise<boolean>>();

  constructor(
    private readonly store: DedupPartition,
    private readonly cache: BridgeCache,
    private readonly retentionMs: number,
    private readonly now: () => Date = () => new Date()
  ) {}

  async claim(id: string): Promise<boolean> {
    if (this.cache.seenIds.has(id)) {
      return false;
    }

    const inFlight = this.pending.get(id);
    if (inFlight) {
      const succeeded = await inFlight.then(() => true, () => false);
      return succeeded ? false : this.claim(id);
    }

    const attempt = this.store.claim(id, this.now(), this.retentionMs);
    this.pending.set(id, attempt);
    try {
      const claimed = await attempt;
      this.cache.seenIds.set(id, true);
      return claimed;
    } finally {
      this.pending.delete(id);
    }
  }

  /**
   * Undo a claim whose processing failed, so a redelivery is processed
   */
  async release(id: string): Promise<void> {
    this.cache.seenIds.delete(id);
    await this.store.release(id);
  }

  /**
   * Drop store entries older than the retention window
   */
  async prune(): Promise<number> {
    return this.store.prune(new Date(this.now().getTime() - this.retentionMs));
  }
}
