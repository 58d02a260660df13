import { describeError, errorMessage, StoreResult } from '../errors';
import { AdminActor, ChatAdministration } from '../moderation/chat-admin';
import { RuleSource } from '../moderation/rule-config';
import { IncomingMessage, UserListKind } from '../types';
import { BotLogger } from '../services/logger';
import { formatUtc } from '../utils/time';

const ADMIN_COMMANDS = new Set([
  'mod_status',
  'strict_toggle',
  'whitelist_add',
  'whitelist_del',
  'whitelist_list',
  'blacklist_add',
  'blacklist_del',
  'blacklist_list',
  'strikes',
  'strikes_reset',
  'rules_reload',
]);

const STORE_UNAVAILABLE_REPLY = 'Хранилище недоступно, попробуйте позже.';

export interface ParsedCommand {
  command: string;
  rawArgs: string;
}

export interface CommandContext {
  message: IncomingMessage | undefined;
  chatId?: number | null;
  reply(text: string): Promise<unknown>;
}

export interface AdminCheck {
  isAdmin(chatId: number, userId: number): Promise<boolean>;
}

export function parseAdminCommand(text: string): ParsedCommand | null {
  const match = text.trim().match(/^\/([a-z0-9_]+)(?:@[a-z0-9_]+)?(?:\s+(.+))?$/i);
  if (!match) return null;

  const command = match[1].toLowerCase();
  const rawArgs = (match[2] ?? '').trim();

  if (!ADMIN_COMMANDS.has(command)) {
    return null;
  }

  return { command, rawArgs };
}

/** Explicit argument first, then the author of the replied-to message. */
export function resolveTargetUserId(rawArgs: string, message: IncomingMessage): number | null {
  const [firstArg] = rawArgs.split(/\s+/).filter(Boolean);
  if (firstArg !== undefined) {
    if (!/^\d+$/.test(firstArg)) return null;
    const parsed = Number.parseInt(firstArg, 10);
    return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : null;
  }

  if (message.link?.type === 'reply') {
    return message.link.sender?.user_id ?? null;
  }

  return null;
}

function listKindOf(command: string): UserListKind {
  return command.startsWith('whitelist') ? 'whitelist' : 'blacklist';
}

export class AdminCommands {
  constructor(
    private readonly chatAdmin: ChatAdministration,
    private readonly rules: RuleSource,
    private readonly admins: AdminCheck,
    private readonly logger: BotLogger,
    private readonly logChatId?: number,
  ) {}

  async tryHandle(ctx: CommandContext): Promise<boolean> {
    const message = ctx.message;
    if (!message?.body?.text) return false;

    const parsed = parseAdminCommand(message.body.text);
    if (!parsed) return false;

    const chatType = message.recipient?.chat_type;
    const chatId = message.recipient?.chat_id ?? ctx.chatId;
    const userId = message.sender?.user_id;

    if ((chatType !== 'chat' && chatType !== 'channel') || !chatId || !userId) {
      return true;
    }

    const isAdmin = await this.admins.isAdmin(chatId, userId);
    if (!isAdmin) {
      await this.replySafe(ctx, 'Команда доступна только администраторам чата.');
      await this.logger.warn('Admin command denied', { chatId, userId, command: parsed.command });
      return false;
    }

    const actor: AdminActor = { chatId, userId, userName: message.sender?.name };

    try {
      switch (parsed.command) {
        case 'mod_status':
          await this.handleModStatus(ctx, chatId);
          break;
        case 'strict_toggle':
          await this.handleStrictToggle(ctx, actor);
          break;
        case 'whitelist_add':
        case 'blacklist_add':
        case 'whitelist_del':
        case 'blacklist_del':
          await this.handleListChange(ctx, actor, parsed, message);
          break;
        case 'whitelist_list':
        case 'blacklist_list':
          await this.handleList(ctx, chatId, listKindOf(parsed.command));
          break;
        case 'strikes':
          await this.handleStrikes(ctx, chatId, parsed.rawArgs, message);
          break;
        case 'strikes_reset':
          await this.handleStrikesReset(ctx, actor, parsed.rawArgs, message);
          break;
        case 'rules_reload':
          await this.handleRulesReload(ctx, actor);
          break;
        default:
          break;
      }
    } catch (error) {
      await this.replySafe(ctx, 'Не удалось выполнить команду. Проверьте аргументы.');
      await this.logger.error('Admin command failed', {
        chatId,
        userId,
        command: parsed.command,
        error: errorMessage(error),
      });
    }

    return true;
  }

  private async handleModStatus(ctx: CommandContext, chatId: number): Promise<void> {
    const status = await this.chatAdmin.status(chatId);
    const rules = this.rules.current();

    const text = [
      'Текущие настройки модерации:',
      `- store: ${status.storeHealthy ? 'ok' : 'unavailable'}`,
      `- strict_mode: ${this.describeFlag(status.strictMode)}`,
      `- warn_threshold: ${rules.warnThreshold}`,
      `- hard_delete_threshold: ${rules.deleteThreshold}`,
      `- check_non_english: ${rules.checkNonEnglish ? 'on' : 'off'} (${rules.nonEnglishRatioThreshold})`,
      `- suspicious_tlds: ${rules.suspiciousTlds.size}`,
      `- log_chat_id: ${this.logChatId ?? '(не задан)'}`,
    ].join('\n');

    await this.replySafe(ctx, text);
  }

  private async handleStrictToggle(ctx: CommandContext, actor: AdminActor): Promise<void> {
    const result = await this.chatAdmin.toggleStrictMode(actor);
    if (result.status === 'degraded') {
      await this.replySafe(ctx, STORE_UNAVAILABLE_REPLY);
      return;
    }

    await this.replySafe(ctx, result.value ? 'Строгий режим включен.' : 'Строгий режим отключен.');
  }

  private async handleListChange(
    ctx: CommandContext,
    actor: AdminActor,
    parsed: ParsedCommand,
    message: IncomingMessage,
  ): Promise<void> {
    const kind = listKindOf(parsed.command);
    const adding = parsed.command.endsWith('_add');

    const targetUserId = resolveTargetUserId(parsed.rawArgs, message);
    if (targetUserId === null) {
      await this.replySafe(ctx, `Использование: /${parsed.command} <userId> или ответом на сообщение`);
      return;
    }

    const result = adding
      ? await this.chatAdmin.addToList(actor, kind, targetUserId)
      : await this.chatAdmin.removeFromList(actor, kind, targetUserId);

    if (result.status === 'degraded') {
      await this.replySafe(ctx, STORE_UNAVAILABLE_REPLY);
      return;
    }

    if (!result.value) {
      await this.replySafe(ctx, adding
        ? `Пользователь ${targetUserId} уже в ${kind}.`
        : `Пользователя ${targetUserId} нет в ${kind}.`);
      return;
    }

    await this.replySafe(ctx, adding
      ? `Пользователь ${targetUserId} добавлен в ${kind}.`
      : `Пользователь ${targetUserId} удален из ${kind}.`);
  }

  private async handleList(ctx: CommandContext, chatId: number, kind: UserListKind): Promise<void> {
    const result = await this.chatAdmin.listUsers(chatId, kind);
    if (result.status === 'degraded') {
      await this.replySafe(ctx, STORE_UNAVAILABLE_REPLY);
      return;
    }

    const text = result.value.length > 0
      ? `${kind}:\n${result.value.map((userId) => `- ${userId}`).join('\n')}`
      : `${kind} пуст.`;

    await this.replySafe(ctx, text);
  }

  private async handleStrikes(ctx: CommandContext, chatId: number, rawArgs: string, message: IncomingMessage): Promise<void> {
    const targetUserId = resolveTargetUserId(rawArgs, message);
    if (targetUserId === null) {
      await this.replySafe(ctx, 'Использование: /strikes <userId> или ответом на сообщение');
      return;
    }

    const { strikes, lastAction } = await this.chatAdmin.strikes(chatId, targetUserId);
    if (strikes.status === 'degraded') {
      await this.replySafe(ctx, STORE_UNAVAILABLE_REPLY);
      return;
    }

    const lines = [`Страйки пользователя ${targetUserId}: ${strikes.value}`];
    if (lastAction) {
      lines.push(`Последнее действие: ${lastAction.action} (score ${lastAction.score}) ${formatUtc(lastAction.createdAtTs)}`);
    }

    await this.replySafe(ctx, lines.join('\n'));
  }

  private async handleStrikesReset(ctx: CommandContext, actor: AdminActor, rawArgs: string, message: IncomingMessage): Promise<void> {
    const targetUserId = resolveTargetUserId(rawArgs, message);
    if (targetUserId === null) {
      await this.replySafe(ctx, 'Использование: /strikes_reset <userId> или ответом на сообщение');
      return;
    }

    const result = await this.chatAdmin.resetStrikes(actor, targetUserId);
    if (result.status === 'degraded') {
      await this.replySafe(ctx, STORE_UNAVAILABLE_REPLY);
      return;
    }

    await this.replySafe(ctx, `Страйки пользователя ${targetUserId} сброшены.`);
  }

  private async handleRulesReload(ctx: CommandContext, actor: AdminActor): Promise<void> {
    const result = await this.chatAdmin.reloadRules(actor);

    if (result.source === 'invalid') {
      await this.replySafe(ctx, [
        'Файл правил не прочитан, действуют прежние правила:',
        ...result.errors.map((error) => `- ${describeError(error)}`),
      ].join('\n'));
      return;
    }

    const rules = this.rules.current();
    const lines = [
      result.source === 'missing'
        ? 'Файл правил не найден, используются значения по умолчанию.'
        : 'Правила перечитаны.',
      `warn_threshold=${rules.warnThreshold}, hard_delete_threshold=${rules.deleteThreshold}`,
      ...result.errors.map((error) => `- ${describeError(error)}`),
    ];

    await this.replySafe(ctx, lines.join('\n'));
  }

  private describeFlag(result: StoreResult<boolean>): string {
    if (result.status === 'degraded') return 'unknown';
    return result.value ? 'on' : 'off';
  }

  private async replySafe(ctx: CommandContext, text: string): Promise<void> {
    try {
      await ctx.reply(text);
    } catch (error) {
      await this.logger.warn('Failed to reply to admin command', { error: errorMessage(error) });
    }
  }
}
