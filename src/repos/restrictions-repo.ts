import { BetterSqliteDb } from '../db/sqlite';
import { ActiveRestriction, RestrictionType } from '../types';

interface StoredRestriction {
  chat_id: number;
  user_id: number;
  restriction_type: string;
  until_ts: number;
}

interface UntilRow {
  until_ts: number;
}

const RESTRICTION_TYPES: readonly RestrictionType[] = ['mute', 'ban_fallback'];

function isRestrictionType(value: string): value is RestrictionType {
  return RESTRICTION_TYPES.some((type) => type === value);
}

function toActiveRestriction(row: StoredRestriction): ActiveRestriction | null {
  if (!isRestrictionType(row.restriction_type)) return null;

  return {
    chatId: row.chat_id,
    userId: row.user_id,
    type: row.restriction_type,
    untilTs: row.until_ts,
  };
}

/**
 * Time-boxed message blocks. MAX has no timed mute, so both kinds are
 * enforced the same way: every new message from the user is deleted.
 *
 * - `mute`: the third strike.
 * - `ban_fallback`: written when removing the member failed, so a ban the
 *   API refused still silences the user for the fallback window.
 */
export class RestrictionsRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  /**
   * Restricts the user until `untilTs` and returns the effective expiry.
   * A repeated restriction of the same kind never shortens the current one.
   */
  restrict(chatId: number, userId: number, type: RestrictionType, untilTs: number): number {
    const row = this.db.prepare(`
      INSERT INTO user_restrictions (chat_id, user_id, restriction_type, until_ts, created_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(chat_id, user_id, restriction_type)
      DO UPDATE SET until_ts = MAX(user_restrictions.until_ts, excluded.until_ts)
      RETURNING until_ts
    `).get(chatId, userId, type, untilTs, Date.now()) as UntilRow;

    return row.until_ts;
  }

  /** The restriction that runs longest, when any is still in force at `nowTs`. */
  findActive(chatId: number, userId: number, nowTs: number): ActiveRestriction | null {
    const rows = this.db.prepare(`
      SELECT chat_id, user_id, restriction_type, until_ts
      FROM user_restrictions
      WHERE chat_id = ? AND user_id = ? AND until_ts > ?
      ORDER BY until_ts DESC
    `).all(chatId, userId, nowTs) as StoredRestriction[];

    for (const row of rows) {
      const restriction = toActiveRestriction(row);
      if (restriction) return restriction;
    }
    return null;
  }

  purgeExpired(nowTs: number): number {
    return this.db.prepare('DELETE FROM user_restrictions WHERE until_ts <= ?').run(nowTs).changes;
  }
}
