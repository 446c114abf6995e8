export const DEFAULT_DEDUP_TTL_MS = 5 * 60 * 1000;

/**
 * Message ids seen by the chat bridge, each with an expiry. Created once per
 * process and injected; expired ids are evicted lazily on access.
 */
export class MessageDedupStore {
  private readonly entries = new Map<string, number>();

  constructor(
    private readonly ttlMs: number = DEFAULT_DEDUP_TTL_MS,
    private readonly now: () => number = Date.now
  ) {}

  get size(): number {
    return this.entries.size;
  }

  /**
   * Evicts expired ids, then records `messageId` if it is not live.
   * Returns false for a duplicate. Runs synchronously, so concurrent
   * handlers on the event loop cannot both claim the same id.
   */
  claim(messageId: string): boolean {
    this.evictExpired();
    if (this.entries.has(messageId)) return false;
    this.entries.set(messageId, this.now() + this.ttlMs);
    return true;
  }

  has(messageId: string): boolean {
    const expiry = this.entries.get(messageId);
    return expiry !== undefined && expiry > this.now();
  }

  evictExpired(): number {
    const now = this.now();
    let evicted = 0;
    for (const [messageId, expiry] of this.entries) {
      if (now >= expiry) {
        this.entries.delete(messageId);
        evicted++;
      }
    }
    return evicted;
  }
}
