import { vi } from 'vitest';
import { ActionResult } from '../src/errors';
import { ModerationTransport } from '../src/moderation/transport';
import { BotLogger } from '../src/services/logger';
import { ModerationAuditRecord } from '../src/types';

export function silenceConsole(): void {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
}

export function createTestLogger(): BotLogger {
  return new BotLogger(undefined, () => undefined, 'debug');
}

export type TransportCall =
  | { op: 'deleteMessage'; chatId: number; messageId: string }
  | { op: 'sendMessage'; chatId: number; text: string }
  | { op: 'restrictUser'; chatId: number; userId: number; durationSeconds: number }
  | { op: 'banUser'; chatId: number; userId: number };

export class FakeTransport implements ModerationTransport {
  readonly calls: TransportCall[] = [];
  readonly audits: ModerationAuditRecord[] = [];
  readonly adminIds = new Set<number>();

  deleteResult: ActionResult = { ok: true };
  banResult: ActionResult = { ok: true };

  async deleteMessage(chatId: number, messageId: string): Promise<ActionResult> {
    this.calls.push({ op: 'deleteMessage', chatId, messageId });
    return this.deleteResult;
  }

  async sendMessage(chatId: number, text: string): Promise<ActionResult> {
    this.calls.push({ op: 'sendMessage', chatId, text });
    return { ok: true };
  }

  async restrictUser(chatId: number, userId: number, durationSeconds: number): Promise<ActionResult> {
    this.calls.push({ op: 'restrictUser', chatId, userId, durationSeconds });
    return { ok: true };
  }

  async banUser(chatId: number, userId: number): Promise<ActionResult> {
    this.calls.push({ op: 'banUser', chatId, userId });
    return this.banResult;
  }

  async isAdmin(_chatId: number, userId: number): Promise<boolean> {
    return this.adminIds.has(userId);
  }

  async sendAuditLog(record: ModerationAuditRecord): Promise<void> {
    this.audits.push(record);
  }

  ops(): string[] {
    return this.calls.map((call) => call.op);
  }
}
