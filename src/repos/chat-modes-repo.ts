import { BetterSqliteDb } from '../db/sqlite';

interface StrictModeRow {
  strict_mode: number;
}

export class ChatModesRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  isStrict(chatId: number): boolean {
    const row = this.db.prepare(`
      SELECT strict_mode
      FROM chat_modes
      WHERE chat_id = ?
    `).get(chatId) as StrictModeRow | undefined;

    return row?.strict_mode === 1;
  }

  toggleStrict(chatId: number): boolean {
    const row = this.db.prepare(`
      INSERT INTO chat_modes (chat_id, strict_mode, updated_at)
      VALUES (?, 1, ?)
      ON CONFLICT(chat_id)
      DO UPDATE SET
        strict_mode = 1 - chat_modes.strict_mode,
        updated_at = excluded.updated_at
      RETURNING strict_mode
    `).get(chatId, Date.now()) as StrictModeRow;

    return row.strict_mode === 1;
  }
}
