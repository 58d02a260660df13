import { describeError, errorMessage } from '../errors';
import { ModerationTransport } from '../moderation/transport';
import { RestrictionsRepo } from '../repos/restrictions-repo';
import { ActiveRestriction, InboundMessage } from '../types';
import { formatUtc } from '../utils/time';
import { BotLogger } from './logger';

export class MuteGuard {
  constructor(
    private readonly restrictions: Pick<RestrictionsRepo, 'findActive'>,
    private readonly transport: Pick<ModerationTransport, 'deleteMessage'>,
    private readonly logger: BotLogger,
  ) {}

  /** Deletes the message when its author is muted. Returns true when it did. */
  async enforce(message: InboundMessage, nowTs: number = Date.now()): Promise<boolean> {
    let restriction: ActiveRestriction | null;
    try {
      restriction = this.restrictions.findActive(message.chatId, message.userId, nowTs);
    } catch (error) {
      await this.logger.error('Failed to read restrictions, letting message through', {
        chatId: message.chatId,
        userId: message.userId,
        error: errorMessage(error),
      });
      return false;
    }

    if (!restriction) {
      return false;
    }

    const result = await this.transport.deleteMessage(message.chatId, message.messageId);
    if (!result.ok) {
      await this.logger.warn('Failed to delete message from restricted user', {
        chatId: message.chatId,
        userId: message.userId,
        error: describeError(result.error),
      });
    }

    await this.logger.debug('Message from restricted user removed', {
      chatId: message.chatId,
      userId: message.userId,
      restriction: restriction.type,
      until: formatUtc(restriction.untilTs),
    });

    return true;
  }
}
