export type RestrictionType = 'mute' | 'ban_fallback';

export type ChatKind = 'dialog' | 'chat' | 'channel';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type UserListKind = 'whitelist' | 'blacklist';

export interface BotConfig {
  botToken: string;
  databasePath: string;
  rulesConfigPath: string;
  logChatId?: number;
  logLevel: LogLevel;
  noticeInChat: boolean;
  strikeTtlHours: number;
  dedupTtlSec: number;
  banFallbackHours: number;
  storeTimeoutMs: number;
  adminCacheTtlSec: number;
  cleanupIntervalSec: number;
}

export interface ActiveRestriction {
  chatId: number;
  userId: number;
  type: RestrictionType;
  untilTs: number;
}

export interface IncomingSender {
  user_id: number;
  is_bot?: boolean;
  name?: string;
  username?: string | null;
}

export interface IncomingRecipient {
  chat_id: number | null;
  chat_type: ChatKind;
}

export interface IncomingBody {
  mid: string;
  text: string | null;
  attachments?: unknown[] | null;
}

export interface IncomingLinkedBody {
  mid?: string;
  text?: string | null;
}

export interface IncomingLink {
  type?: 'forward' | 'reply' | string;
  sender?: IncomingSender | null;
  chat_id?: number;
  message?: IncomingLinkedBody | null;
}

export interface IncomingMessage {
  sender?: IncomingSender | null;
  recipient: IncomingRecipient;
  body: IncomingBody;
  link?: IncomingLink | null;
}

/** Transport-neutral view of a group message handed to the dispatcher. */
export interface InboundMessage {
  chatId: number;
  userId: number;
  messageId: string;
  text: string;
  caption?: string;
  userName?: string;
}

export type AuditAction =
  | 'warn'
  | 'delete_warn'
  | 'delete_mute'
  | 'delete_ban'
  | 'blacklist_ban'
  | 'config_update';

export interface ModerationAuditRecord {
  action: AuditAction;
  chatId: number;
  userId: number;
  userName?: string;
  score: number;
  reasons: string;
  meta?: Record<string, unknown>;
}
