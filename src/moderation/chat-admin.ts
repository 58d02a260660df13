import { errorMessage, StoreResult } from '../errors';
import { StoredModerationAction } from '../repos/moderation-actions-repo';
import { BotLogger } from '../services/logger';
import { ModerationStore } from '../services/moderation-store';
import { UserListKind } from '../types';
import { RuleConfigHolder, RuleConfigLoadResult } from './rule-config';
import { ModerationTransport } from './transport';

export interface ChatStatus {
  storeHealthy: boolean;
  strictMode: StoreResult<boolean>;
}

export interface UserStrikes {
  strikes: StoreResult<number>;
  lastAction: StoredModerationAction | null;
}

export interface ModerationHistory {
  latestForUser(chatId: number, userId: number): StoredModerationAction | null;
}

/** Identifies the admin who issued a change; recorded in the audit trail. */
export interface AdminActor {
  chatId: number;
  userId: number;
  userName?: string;
}

export class ChatAdministration {
  constructor(
    private readonly store: ModerationStore,
    private readonly transport: Pick<ModerationTransport, 'sendAuditLog'>,
    private readonly rules: RuleConfigHolder,
    private readonly history: ModerationHistory,
    private readonly logger: BotLogger,
  ) {}

  async status(chatId: number): Promise<ChatStatus> {
    const [storeHealthy, strictMode] = await Promise.all([
      this.store.healthy(),
      this.store.isStrictMode(chatId),
    ]);
    return { storeHealthy, strictMode };
  }

  async toggleStrictMode(actor: AdminActor): Promise<StoreResult<boolean>> {
    const result = await this.store.toggleStrictMode(actor.chatId);
    if (result.status === 'ok') {
      await this.audit(actor, `strict_mode=${result.value ? 'on' : 'off'}`);
    }
    return result;
  }

  addToList(actor: AdminActor, kind: UserListKind, userId: number): Promise<StoreResult<boolean>> {
    return this.changeList(actor, kind, 'add', userId);
  }

  removeFromList(actor: AdminActor, kind: UserListKind, userId: number): Promise<StoreResult<boolean>> {
    return this.changeList(actor, kind, 'del', userId);
  }

  listUsers(chatId: number, kind: UserListKind): Promise<StoreResult<number[]>> {
    return kind === 'whitelist' ? this.store.listWhitelist(chatId) : this.store.listBlacklist(chatId);
  }

  async strikes(chatId: number, userId: number): Promise<UserStrikes> {
    const strikes = await this.store.getStrikes(chatId, userId);

    let lastAction: StoredModerationAction | null = null;
    try {
      lastAction = this.history.latestForUser(chatId, userId);
    } catch (error) {
      await this.logger.warn('Failed to read moderation history', { chatId, userId, error: errorMessage(error) });
    }

    return { strikes, lastAction };
  }

  async resetStrikes(actor: AdminActor, userId: number): Promise<StoreResult<void>> {
    const result = await this.store.resetStrikes(actor.chatId, userId);
    if (result.status === 'ok') {
      await this.audit(actor, `strikes_reset ${userId}`, { targetUserId: userId });
    }
    return result;
  }

  async reloadRules(actor: AdminActor): Promise<RuleConfigLoadResult> {
    const result = this.rules.reload();
    const config = this.rules.current();

    await this.audit(actor, `rules_reload source=${result.source} errors=${result.errors.length}`, {
      warnThreshold: config.warnThreshold,
      deleteThreshold: config.deleteThreshold,
    });

    return result;
  }

  private async changeList(
    actor: AdminActor,
    kind: UserListKind,
    change: 'add' | 'del',
    userId: number,
  ): Promise<StoreResult<boolean>> {
    let result: StoreResult<boolean>;
    if (kind === 'whitelist') {
      result = change === 'add'
        ? await this.store.addWhitelist(actor.chatId, userId)
        : await this.store.removeWhitelist(actor.chatId, userId);
    } else {
      result = change === 'add'
        ? await this.store.addBlacklist(actor.chatId, userId)
        : await this.store.removeBlacklist(actor.chatId, userId);
    }

    if (result.status === 'ok' && result.value) {
      await this.audit(actor, `${kind}_${change} ${userId}`, { targetUserId: userId });
    }

    return result;
  }

  private audit(actor: AdminActor, reasons: string, meta?: Record<string, unknown>): Promise<void> {
    return this.transport.sendAuditLog({
      action: 'config_update',
      chatId: actor.chatId,
      userId: actor.userId,
      userName: actor.userName,
      score: 0,
      reasons,
      meta,
    });
  }
}
