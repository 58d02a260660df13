import { BetterSqliteDb } from '../db/sqlite';
import { UserListKind } from '../types';

interface UserIdRow {
  user_id: number;
}

export class UserListsRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  has(chatId: number, kind: UserListKind, userId: number): boolean {
    const row = this.db.prepare(`
      SELECT 1 AS present
      FROM user_lists
      WHERE chat_id = ? AND list_kind = ? AND user_id = ?
    `).get(chatId, kind, userId);

    return row !== undefined;
  }

  add(chatId: number, kind: UserListKind, userId: number): boolean {
    const result = this.db.prepare(`
      INSERT INTO user_lists (chat_id, list_kind, user_id, created_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(chat_id, list_kind, user_id) DO NOTHING
    `).run(chatId, kind, userId, Date.now());

    return result.changes > 0;
  }

  remove(chatId: number, kind: UserListKind, userId: number): boolean {
    const result = this.db.prepare(`
      DELETE FROM user_lists
      WHERE chat_id = ? AND list_kind = ? AND user_id = ?
    `).run(chatId, kind, userId);

    return result.changes > 0;
  }

  list(chatId: number, kind: UserListKind): number[] {
    const rows = this.db.prepare(`
      SELECT user_id
      FROM user_lists
      WHERE chat_id = ? AND list_kind = ?
      ORDER BY user_id ASC
    `).all(chatId, kind) as UserIdRow[];

    return rows.map((row) => row.user_id);
  }
}
