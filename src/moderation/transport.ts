import { ActionResult } from '../errors';
import { ModerationAuditRecord } from '../types';

/** Side effects the dispatcher asks the chat platform to perform. */
export interface ModerationTransport {
  deleteMessage(chatId: number, messageId: string): Promise<ActionResult>;
  sendMessage(chatId: number, text: string): Promise<ActionResult>;
  restrictUser(chatId: number, userId: number, durationSeconds: number): Promise<ActionResult>;
  banUser(chatId: number, userId: number): Promise<ActionResult>;
  isAdmin(chatId: number, userId: number): Promise<boolean>;
  /** Best effort; never rejects. */
  sendAuditLog(record: ModerationAuditRecord): Promise<void>;
}
