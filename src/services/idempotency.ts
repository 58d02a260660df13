const GC_THRESHOLD = 5_000;

/** Drops MAX updates re-delivered after a polling restart. */
export class InMemoryIdempotencyGuard {
  private readonly seen = new Map<string, number>();

  constructor(private readonly ttlMs: number = 60 * 60 * 1000) {}

  tryMark(chatId: number, messageId: string, nowTs: number): boolean {
    this.gc(nowTs);

    const key = `${chatId}:${messageId}`;
    const expiresAt = this.seen.get(key);
    if (expiresAt !== undefined && expiresAt > nowTs) {
      return false;
    }

    this.seen.set(key, nowTs + this.ttlMs);
    return true;
  }

  get size(): number {
    return this.seen.size;
  }

  private gc(nowTs: number): void {
    if (this.seen.size < GC_THRESHOLD) return;

    for (const [key, expiresAt] of this.seen.entries()) {
      if (expiresAt <= nowTs) {
        this.seen.delete(key);
      }
    }
  }
}
