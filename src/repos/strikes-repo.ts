import { BetterSqliteDb } from '../db/sqlite';

interface StrikeCountRow {
  strike_count: number;
}

export class StrikesRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  getActive(chatId: number, userId: number, nowTs: number): number {
    const row = this.db.prepare(`
      SELECT strike_count
      FROM user_strikes
      WHERE chat_id = ? AND user_id = ? AND expires_at > ?
    `).get(chatId, userId, nowTs) as StrikeCountRow | undefined;

    return row?.strike_count ?? 0;
  }

  /**
   * Adds one strike and pushes the expiry to `nowTs + ttlMs`.
   * An expired counter restarts at 1 instead of continuing.
   */
  increment(chatId: number, userId: number, nowTs: number, ttlMs: number): number {
    const row = this.db.prepare(`
      INSERT INTO user_strikes (chat_id, user_id, strike_count, last_strike_ts, expires_at)
      VALUES (?, ?, 1, ?, ?)
      ON CONFLICT(chat_id, user_id)
      DO UPDATE SET
        strike_count = CASE
          WHEN user_strikes.expires_at <= excluded.last_strike_ts THEN 1
          ELSE user_strikes.strike_count + 1
        END,
        last_strike_ts = excluded.last_strike_ts,
        expires_at = excluded.expires_at
      RETURNING strike_count
    `).get(chatId, userId, nowTs, nowTs + ttlMs) as StrikeCountRow;

    return row.strike_count;
  }

  reset(chatId: number, userId: number): void {
    this.db.prepare('DELETE FROM user_strikes WHERE chat_id = ? AND user_id = ?').run(chatId, userId);
  }

  purgeExpired(nowTs: number): number {
    return this.db.prepare('DELETE FROM user_strikes WHERE expires_at <= ?').run(nowTs).changes;
  }
}
