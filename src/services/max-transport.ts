import { ActionResult, errorMessage, toTransportError } from '../errors';
import { ModerationTransport } from '../moderation/transport';
import { Repositories } from '../repos';
import { ModerationAuditRecord } from '../types';
import { hoursToMs, secondsToMs } from '../utils/time';
import { AdminResolver } from './admin-resolver';
import { BotLogger } from './logger';
import { isMessageAlreadyDeleted, MaxChatApi } from './max-chat-api';

export const DELETE_MESSAGE_RETRY_DELAYS_MS: readonly number[] = [350, 1_200];

export interface MaxTransportOptions {
  banFallbackHours: number;
  deleteRetryDelaysMs?: readonly number[];
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * MAX has no timed restriction, so a mute is a row in `user_restrictions`
 * that MuteGuard enforces by deleting the user's messages.
 */
export class MaxTransport implements ModerationTransport {
  private readonly deleteRetryDelaysMs: readonly number[];

  constructor(
    private readonly api: MaxChatApi,
    private readonly repos: Pick<Repositories, 'restrictions' | 'moderationActions'>,
    private readonly admins: AdminResolver,
    private readonly logger: BotLogger,
    private readonly options: MaxTransportOptions,
  ) {
    this.deleteRetryDelaysMs = options.deleteRetryDelaysMs ?? DELETE_MESSAGE_RETRY_DELAYS_MS;
  }

  // Message ids are global in MAX; chatId is only used for logging.
  async deleteMessage(chatId: number, messageId: string): Promise<ActionResult> {
    let lastError: unknown;
    let attempts = 0;

    for (let index = 0; index <= this.deleteRetryDelaysMs.length; index += 1) {
      attempts += 1;

      try {
        await this.api.deleteMessage(messageId);
        return { ok: true };
      } catch (error) {
        const transportError = toTransportError('deleteMessage', error);
        if (isMessageAlreadyDeleted(transportError.status, transportError.message)) {
          return { ok: true };
        }

        lastError = error;

        const retryDelay = this.deleteRetryDelaysMs[index];
        if (retryDelay !== undefined) {
          await sleep(retryDelay);
        }
      }
    }

    const error = toTransportError('deleteMessage', lastError);
    await this.logger.warn('Failed to delete message', { chatId, messageId, attempts, error: error.message });
    return { ok: false, error };
  }

  async sendMessage(chatId: number, text: string): Promise<ActionResult> {
    try {
      await this.api.sendMessageToChat(chatId, text);
      return { ok: true };
    } catch (error) {
      await this.logger.warn('Failed to send chat notice', { chatId, error: errorMessage(error) });
      return { ok: false, error: toTransportError('sendMessage', error) };
    }
  }

  async restrictUser(chatId: number, userId: number, durationSeconds: number): Promise<ActionResult> {
    try {
      this.repos.restrictions.restrict(chatId, userId, 'mute', Date.now() + secondsToMs(durationSeconds));
      return { ok: true };
    } catch (error) {
      await this.logger.error('Failed to record mute', { chatId, userId, error: errorMessage(error) });
      return { ok: false, error: toTransportError('restrictUser', error) };
    }
  }

  async banUser(chatId: number, userId: number): Promise<ActionResult> {
    try {
      await this.api.removeChatMember(chatId, userId, true);
      return { ok: true };
    } catch (error) {
      const transportError = toTransportError('banUser', error);
      const untilTs = Date.now() + hoursToMs(this.options.banFallbackHours);

      try {
        this.repos.restrictions.restrict(chatId, userId, 'ban_fallback', untilTs);
      } catch (fallbackError) {
        await this.logger.error('Failed to record ban fallback', {
          chatId,
          userId,
          error: errorMessage(fallbackError),
        });
      }

      await this.logger.warn('Ban failed; message blocking activated instead', {
        chatId,
        userId,
        untilTs,
        error: transportError.message,
      });

      return { ok: false, error: transportError };
    }
  }

  isAdmin(chatId: number, userId: number): Promise<boolean> {
    return this.admins.isAdmin(chatId, userId);
  }

  async sendAuditLog(record: ModerationAuditRecord): Promise<void> {
    try {
      this.repos.moderationActions.record(record);
    } catch (error) {
      await this.logger.warn('Failed to persist moderation action', {
        chatId: record.chatId,
        userId: record.userId,
        action: record.action,
        error: errorMessage(error),
      });
    }

    await this.logger.moderation(record);
  }
}
