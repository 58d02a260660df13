import { Api, Bot } from '@maxhub/max-bot-api';
import { BotConfig, IncomingMessage } from './types';
import { SqliteDatabase } from './db/sqlite';
import { createRepositories } from './repos';
import { describeError, errorMessage } from './errors';
import { BotLogger } from './services/logger';
import { AdminResolver } from './services/admin-resolver';
import { InMemoryIdempotencyGuard } from './services/idempotency';
import { MaxChatApi } from './services/max-chat-api';
import { MaxTransport } from './services/max-transport';
import { SqliteModerationStore } from './services/moderation-store';
import { MuteGuard } from './services/mute-guard';
import { CleanupService } from './services/cleanup';
import { ChatAdministration } from './moderation/chat-admin';
import { ModerationDispatcher } from './moderation/dispatcher';
import { toInboundMessage } from './moderation/inbound';
import { loadRuleConfig, RuleConfigHolder } from './moderation/rule-config';
import { AdminCommands } from './commands/admin';
import { hoursToMs, secondsToMs } from './utils/time';

export interface Runtime {
  bot: Bot;
  db: SqliteDatabase;
  logger: BotLogger;
  cleanupService: CleanupService;
}

const COMMANDS = [
  { name: 'mod_status', description: 'Показать настройки антиспама' },
  { name: 'strict_toggle', description: 'Переключить строгий режим' },
  { name: 'whitelist_add', description: 'Добавить пользователя в whitelist' },
  { name: 'whitelist_del', description: 'Удалить пользователя из whitelist' },
  { name: 'whitelist_list', description: 'Список whitelist' },
  { name: 'blacklist_add', description: 'Добавить пользователя в blacklist' },
  { name: 'blacklist_del', description: 'Удалить пользователя из blacklist' },
  { name: 'blacklist_list', description: 'Список blacklist' },
  { name: 'strikes', description: 'Показать страйки пользователя' },
  { name: 'strikes_reset', description: 'Сбросить страйки пользователя' },
  { name: 'rules_reload', description: 'Перечитать файл правил' },
];

export function createMaxChatApi(api: Api): MaxChatApi {
  return {
    deleteMessage: (messageId) => api.deleteMessage(messageId),
    sendMessageToChat: (chatId, text) => api.sendMessageToChat(chatId, text),
    getChatAdmins: (chatId) => api.getChatAdmins(chatId),
    getChatMembers: (chatId, userIds) => api.getChatMembers(chatId, { user_ids: userIds }),
    removeChatMember: (chatId, userId, block) => api.raw.chats.removeChatMember({
      chat_id: chatId,
      user_id: userId,
      block,
    }),
  };
}

export async function createRuntime(config: BotConfig): Promise<Runtime> {
  const db = new SqliteDatabase(config.databasePath, { busyTimeoutMs: config.storeTimeoutMs });
  const repos = createRepositories(db.db);

  const bot = new Bot(config.botToken);
  const chatApi = createMaxChatApi(bot.api);

  const logger = new BotLogger(
    (chatId, text) => chatApi.sendMessageToChat(chatId, text),
    () => config.logChatId,
    config.logLevel,
  );

  const initialRules = loadRuleConfig(config.rulesConfigPath);
  for (const error of initialRules.errors) {
    await logger.warn('Rule config problem, using defaults for the field', { error: describeError(error) });
  }
  const rules = new RuleConfigHolder(config.rulesConfigPath, loadRuleConfig, initialRules);

  const adminResolver = new AdminResolver(chatApi, secondsToMs(config.adminCacheTtlSec), (message, meta) => {
    void logger.warn(message, meta);
  });
  const store = new SqliteModerationStore(db, repos, logger, {
    strikeTtlMs: hoursToMs(config.strikeTtlHours),
    dedupTtlMs: secondsToMs(config.dedupTtlSec),
  });
  const transport = new MaxTransport(chatApi, repos, adminResolver, logger, {
    banFallbackHours: config.banFallbackHours,
  });
  const dispatcher = new ModerationDispatcher(store, transport, rules, logger, {
    noticeInChat: config.noticeInChat,
  });
  const chatAdmin = new ChatAdministration(store, transport, rules, repos.moderationActions, logger);
  const adminCommands = new AdminCommands(chatAdmin, rules, adminResolver, logger, config.logChatId);
  const muteGuard = new MuteGuard(repos.restrictions, transport, logger);
  const idempotencyGuard = new InMemoryIdempotencyGuard();
  const cleanupService = new CleanupService(repos, logger);

  bot.catch(async (error, ctx) => {
    await logger.error('Unhandled bot middleware error', {
      updateType: ctx.updateType,
      error: errorMessage(error),
    });

    throw error;
  });

  bot.on('message_created', async (ctx) => {
    const message = ctx.message as IncomingMessage | undefined;

    if (await adminCommands.tryHandle({ message, chatId: ctx.chatId, reply: (text) => ctx.reply(text) })) {
      return;
    }

    const inbound = toInboundMessage(message, { chatId: ctx.chatId, myId: ctx.myId });
    if (!inbound) return;

    if (!idempotencyGuard.tryMark(inbound.chatId, inbound.messageId, Date.now())) {
      return;
    }

    if (await muteGuard.enforce(inbound)) {
      return;
    }

    const outcome = await dispatcher.handleMessage(inbound);
    await logger.debug('Message dispatched', {
      chatId: inbound.chatId,
      messageId: inbound.messageId,
      outcome: outcome.kind,
      storeDegraded: outcome.storeDegraded,
    });
  });

  try {
    await bot.api.setMyCommands(COMMANDS);
  } catch (error) {
    await logger.warn('Failed to set bot commands', { error: errorMessage(error) });
  }

  return {
    bot,
    db,
    logger,
    cleanupService,
  };
}
