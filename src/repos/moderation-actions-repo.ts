import { BetterSqliteDb } from '../db/sqlite';
import { AuditAction, ModerationAuditRecord } from '../types';

interface ModerationActionRow {
  action: AuditAction;
  score: number;
  reasons: string;
  created_at: number;
}

export interface StoredModerationAction {
  action: AuditAction;
  score: number;
  reasons: string;
  createdAtTs: number;
}

export class ModerationActionsRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  record(entry: ModerationAuditRecord): void {
    this.db.prepare(`
      INSERT INTO moderation_actions (chat_id, user_id, action, score, reasons, meta_json, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      entry.chatId,
      entry.userId,
      entry.action,
      entry.score,
      entry.reasons,
      entry.meta ? JSON.stringify(entry.meta) : null,
      Date.now(),
    );
  }

  latestForUser(chatId: number, userId: number): StoredModerationAction | null {
    const row = this.db.prepare(`
      SELECT action, score, reasons, created_at
      FROM moderation_actions
      WHERE chat_id = ? AND user_id = ? AND action != 'config_update'
      ORDER BY created_at DESC, id DESC
      LIMIT 1
    `).get(chatId, userId) as ModerationActionRow | undefined;

    if (!row) return null;

    return {
      action: row.action,
      score: row.score,
      reasons: row.reasons,
      createdAtTs: row.created_at,
    };
  }

  purgeOlderThan(cutoffTs: number): number {
    return this.db.prepare('DELETE FROM moderation_actions WHERE created_at < ?').run(cutoffTs).changes;
  }
}
