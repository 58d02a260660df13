import { LogLevel, ModerationAuditRecord } from '../types';

export interface LogEvent {
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
}

export type LogChatSender = (chatId: number, text: string) => Promise<unknown>;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const ACTION_LABELS: Record<ModerationAuditRecord['action'], string> = {
  warn: 'WARN',
  delete_warn: 'DELETE+WARN',
  delete_mute: 'DELETE+MUTE',
  delete_ban: 'DELETE+BAN',
  blacklist_ban: 'BAN',
  config_update: 'CONFIG',
};

export class BotLogger {
  constructor(
    private readonly sendToChat: LogChatSender | undefined,
    private readonly getLogChatId: () => number | undefined,
    private readonly minLevel: LogLevel = 'info',
  ) {}

  async debug(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'debug', message, meta });
  }

  async info(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'info', message, meta });
  }

  async warn(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'warn', message, meta });
  }

  async error(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'error', message, meta });
  }

  /** Lifecycle events: an info line plus `logChatText` in the log chat. */
  async notice(message: string, logChatText: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'info', message, meta }, logChatText);
  }

  /** Audit entries always reach stdout and, when configured, the log chat. */
  async moderation(record: ModerationAuditRecord): Promise<void> {
    const userLabel = record.userName?.trim() || String(record.userId);
    const message = `[moderation] chat=${record.chatId} user=${userLabel} action=${record.action} score=${record.score} reasons=${record.reasons}`;

    await this.emit({ level: 'info', message, meta: record.meta }, this.formatAuditText(record, userLabel));
  }

  private async emit(event: LogEvent, logChatText?: string): Promise<void> {
    if (LEVEL_WEIGHT[event.level] >= LEVEL_WEIGHT[this.minLevel] || logChatText !== undefined) {
      this.writeLine(event);
    }

    if (logChatText === undefined || !this.sendToChat) {
      return;
    }

    const logChatId = this.getLogChatId();
    if (!logChatId) return;

    try {
      await this.sendToChat(logChatId, logChatText);
    } catch (error) {
      this.writeLine({
        level: 'warn',
        message: 'Failed to deliver log chat message',
        meta: { logChatId, error: error instanceof Error ? error.message : String(error) },
      });
    }
  }

  private writeLine(event: LogEvent): void {
    const payload = JSON.stringify({
      ts: new Date().toISOString(),
      level: event.level,
      message: event.message,
      ...(event.meta ? { meta: event.meta } : {}),
    });

    if (event.level === 'error') {
      console.error(payload);
    } else if (event.level === 'warn') {
      console.warn(payload);
    } else {
      console.log(payload);
    }
  }

  private formatAuditText(record: ModerationAuditRecord, userLabel: string): string {
    return [
      `[${ACTION_LABELS[record.action]}] Chat:${record.chatId}`,
      `User: ${userLabel} (${record.userId})`,
      `Score: ${record.score} | ${record.reasons}`,
    ].join('\n');
  }
}
