import { BetterSqliteDb } from '../db/sqlite';

export class DedupMarkersRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  exists(chatId: number, contentHash: string, nowTs: number): boolean {
    const row = this.db.prepare(`
      SELECT 1 AS present
      FROM dedup_markers
      WHERE chat_id = ? AND content_hash = ? AND expires_at > ?
    `).get(chatId, contentHash, nowTs);

    return row !== undefined;
  }

  /** Returns false when a live marker already exists for this content. */
  tryMark(chatId: number, contentHash: string, nowTs: number, ttlMs: number): boolean {
    const result = this.db.prepare(`
      INSERT INTO dedup_markers (chat_id, content_hash, expires_at)
      VALUES (?, ?, ?)
      ON CONFLICT(chat_id, content_hash)
      DO UPDATE SET expires_at = excluded.expires_at
      WHERE dedup_markers.expires_at <= ?
    `).run(chatId, contentHash, nowTs + ttlMs, nowTs);

    return result.changes > 0;
  }

  purgeExpired(nowTs: number): number {
    return this.db.prepare('DELETE FROM dedup_markers WHERE expires_at <= ?').run(nowTs).changes;
  }
}
