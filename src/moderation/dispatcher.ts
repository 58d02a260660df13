import { describeError, StoreResult } from '../errors';
import { ModerationStore } from '../services/moderation-store';
import { BotLogger } from '../services/logger';
import { InboundMessage } from '../types';
import { joinMessageText } from '../utils/text';
import { EscalationStep, escalationAuditAction, resolveEscalation } from './escalation';
import { RuleSource } from './rule-config';
import { formatSpamScore, scoreMessage, SpamScore } from './scoring';
import { ModerationTransport } from './transport';

export const BLACKLIST_AUDIT_SCORE = 999;
export const BLACKLIST_AUDIT_REASON = 'Blacklisted user';

export type SkipReason = 'empty' | 'admin' | 'whitelisted' | 'duplicate';

export type DispatchOutcome =
  | { kind: 'skipped'; reason: SkipReason; storeDegraded: boolean }
  | { kind: 'blacklisted'; storeDegraded: boolean }
  | { kind: 'clean'; score: SpamScore; storeDegraded: boolean }
  | { kind: 'warned'; score: SpamScore; storeDegraded: boolean }
  | { kind: 'escalated'; score: SpamScore; strikes: number; step: EscalationStep; storeDegraded: boolean };

export interface DispatcherOptions {
  noticeInChat: boolean;
}

function displayName(message: InboundMessage): string {
  const normalized = message.userName?.trim();
  return normalized || `Пользователь ${message.userId}`;
}

function withUserName(message: InboundMessage, text: string): string {
  return `«${displayName(message)}», ${text}`;
}

function escalationNotice(step: EscalationStep, reasons: string): string {
  switch (step.action) {
    case 'warn':
      return `сообщение удалено как спам (${reasons}). Повторное нарушение приведет к муту.`;
    case 'mute':
      return `сообщение удалено как спам (${reasons}). Выдан мут на ${Math.round(step.durationSeconds / 3600)} ч.`;
    case 'ban':
      return `сообщение удалено как спам (${reasons}). Пользователь заблокирован.`;
  }
}

/**
 * Per-message pipeline: bypass checks, dedup, scoring and the strike ladder.
 * Store failures never stop a message from being scored; they only mark the
 * outcome as degraded.
 */
export class ModerationDispatcher {
  constructor(
    private readonly store: ModerationStore,
    private readonly transport: ModerationTransport,
    private readonly rules: RuleSource,
    private readonly logger: BotLogger,
    private readonly options: DispatcherOptions = { noticeInChat: true },
  ) {}

  async handleMessage(message: InboundMessage): Promise<DispatchOutcome> {
    const text = joinMessageText(message.text, message.caption);
    if (text.trim() === '') {
      return { kind: 'skipped', reason: 'empty', storeDegraded: false };
    }

    if (await this.transport.isAdmin(message.chatId, message.userId)) {
      return { kind: 'skipped', reason: 'admin', storeDegraded: false };
    }

    let storeDegraded = false;
    const read = <T>(result: StoreResult<T>): T => {
      if (result.status === 'degraded') {
        storeDegraded = true;
      }
      return result.value;
    };

    if (read(await this.store.isWhitelisted(message.chatId, message.userId))) {
      return { kind: 'skipped', reason: 'whitelisted', storeDegraded };
    }

    if (read(await this.store.isBlacklisted(message.chatId, message.userId))) {
      await this.handleBlacklisted(message);
      return { kind: 'blacklisted', storeDegraded };
    }

    if (read(await this.store.isDuplicate(message.chatId, text))) {
      return { kind: 'skipped', reason: 'duplicate', storeDegraded };
    }

    const strictMode = read(await this.store.isStrictMode(message.chatId));
    const score = scoreMessage(text, strictMode, this.rules.current());

    if (!score.shouldWarn && !score.shouldDelete) {
      return { kind: 'clean', score, storeDegraded };
    }

    // A concurrent copy may have claimed the content since isDuplicate.
    if (!read(await this.store.markProcessed(message.chatId, text))) {
      return { kind: 'skipped', reason: 'duplicate', storeDegraded };
    }

    const reasons = score.reasons.join(', ');

    if (score.shouldDelete) {
      await this.deleteMessage(message);

      const strikes = read(await this.store.incrementStrikes(message.chatId, message.userId));
      const step = resolveEscalation(strikes);
      await this.logger.info('Spam message removed', {
        chatId: message.chatId,
        userId: message.userId,
        score: formatSpamScore(score),
        strikes,
        step: step.action,
      });
      await this.applyStep(message, step, reasons);

      await this.transport.sendAuditLog({
        action: escalationAuditAction(step),
        chatId: message.chatId,
        userId: message.userId,
        userName: message.userName,
        score: score.total,
        reasons,
        meta: { strikes, storeDegraded },
      });

      return { kind: 'escalated', score, strikes, step, storeDegraded };
    }

    await this.notify(message, `ваше сообщение похоже на спам (${reasons}). Пожалуйста, не публикуйте подозрительные ссылки и рекламу.`);
    await this.transport.sendAuditLog({
      action: 'warn',
      chatId: message.chatId,
      userId: message.userId,
      userName: message.userName,
      score: score.total,
      reasons,
    });

    return { kind: 'warned', score, storeDegraded };
  }

  private async handleBlacklisted(message: InboundMessage): Promise<void> {
    await this.deleteMessage(message);

    const banResult = await this.transport.banUser(message.chatId, message.userId);
    if (!banResult.ok) {
      await this.logger.warn('Blacklisted user was not banned', {
        chatId: message.chatId,
        userId: message.userId,
        error: describeError(banResult.error),
      });
    }

    await this.transport.sendAuditLog({
      action: 'blacklist_ban',
      chatId: message.chatId,
      userId: message.userId,
      userName: message.userName,
      score: BLACKLIST_AUDIT_SCORE,
      reasons: BLACKLIST_AUDIT_REASON,
    });
  }

  private async applyStep(message: InboundMessage, step: EscalationStep, reasons: string): Promise<void> {
    await this.notify(message, escalationNotice(step, reasons));

    if (step.action === 'warn') {
      return;
    }

    const result = step.action === 'mute'
      ? await this.transport.restrictUser(message.chatId, message.userId, step.durationSeconds)
      : await this.transport.banUser(message.chatId, message.userId);

    if (!result.ok) {
      await this.logger.warn('Escalation action failed', {
        chatId: message.chatId,
        userId: message.userId,
        step: step.action,
        error: describeError(result.error),
      });
    }
  }

  // Deletion failures are logged and the ladder still advances.
  private async deleteMessage(message: InboundMessage): Promise<void> {
    const result = await this.transport.deleteMessage(message.chatId, message.messageId);
    if (!result.ok) {
      await this.logger.warn('Spam message was not deleted', {
        chatId: message.chatId,
        messageId: message.messageId,
        error: describeError(result.error),
      });
    }
  }

  private async notify(message: InboundMessage, text: string): Promise<void> {
    if (!this.options.noticeInChat) {
      return;
    }

    await this.transport.sendMessage(message.chatId, withUserName(message, text));
  }
}
