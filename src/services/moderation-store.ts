import { SqliteDatabase } from '../db/sqlite';
import { errorMessage, isBusyError, StoreResult, StoreUnavailable } from '../errors';
import { Repositories } from '../repos';
import { UserListKind } from '../types';
import { hashContent } from '../utils/text';
import { BotLogger } from './logger';

/**
 * Durable moderation state. Every call resolves, never rejects: when the
 * backend fails the result is `degraded` and carries a permissive default.
 */
export interface ModerationStore {
  getStrikes(chatId: number, userId: number): Promise<StoreResult<number>>;
  incrementStrikes(chatId: number, userId: number): Promise<StoreResult<number>>;
  resetStrikes(chatId: number, userId: number): Promise<StoreResult<void>>;

  isDuplicate(chatId: number, text: string): Promise<StoreResult<boolean>>;
  /** `true` when this call created the marker. */
  markProcessed(chatId: number, text: string): Promise<StoreResult<boolean>>;

  isStrictMode(chatId: number): Promise<StoreResult<boolean>>;
  toggleStrictMode(chatId: number): Promise<StoreResult<boolean>>;

  isWhitelisted(chatId: number, userId: number): Promise<StoreResult<boolean>>;
  addWhitelist(chatId: number, userId: number): Promise<StoreResult<boolean>>;
  removeWhitelist(chatId: number, userId: number): Promise<StoreResult<boolean>>;
  listWhitelist(chatId: number): Promise<StoreResult<number[]>>;

  isBlacklisted(chatId: number, userId: number): Promise<StoreResult<boolean>>;
  addBlacklist(chatId: number, userId: number): Promise<StoreResult<boolean>>;
  removeBlacklist(chatId: number, userId: number): Promise<StoreResult<boolean>>;
  listBlacklist(chatId: number): Promise<StoreResult<number[]>>;

  healthy(): Promise<boolean>;
}

export interface ModerationStoreOptions {
  strikeTtlMs: number;
  dedupTtlMs: number;
}

export class SqliteModerationStore implements ModerationStore {
  constructor(
    private readonly database: SqliteDatabase,
    private readonly repos: Repositories,
    private readonly logger: BotLogger,
    private readonly options: ModerationStoreOptions,
  ) {}

  getStrikes(chatId: number, userId: number): Promise<StoreResult<number>> {
    return this.guard('getStrikes', 0, () => this.repos.strikes.getActive(chatId, userId, Date.now()));
  }

  // A failed increment reports 0 so escalation never jumps past a warning.
  incrementStrikes(chatId: number, userId: number): Promise<StoreResult<number>> {
    return this.guard('incrementStrikes', 0, () =>
      this.repos.strikes.increment(chatId, userId, Date.now(), this.options.strikeTtlMs));
  }

  resetStrikes(chatId: number, userId: number): Promise<StoreResult<void>> {
    return this.guard('resetStrikes', undefined, () => this.repos.strikes.reset(chatId, userId));
  }

  isDuplicate(chatId: number, text: string): Promise<StoreResult<boolean>> {
    return this.guard('isDuplicate', false, () =>
      this.repos.dedupMarkers.exists(chatId, hashContent(text), Date.now()));
  }

  markProcessed(chatId: number, text: string): Promise<StoreResult<boolean>> {
    return this.guard('markProcessed', true, () =>
      this.repos.dedupMarkers.tryMark(chatId, hashContent(text), Date.now(), this.options.dedupTtlMs));
  }

  isStrictMode(chatId: number): Promise<StoreResult<boolean>> {
    return this.guard('isStrictMode', false, () => this.repos.chatModes.isStrict(chatId));
  }

  toggleStrictMode(chatId: number): Promise<StoreResult<boolean>> {
    return this.guard('toggleStrictMode', false, () => this.repos.chatModes.toggleStrict(chatId));
  }

  isWhitelisted(chatId: number, userId: number): Promise<StoreResult<boolean>> {
    return this.isListed('whitelist', chatId, userId);
  }

  addWhitelist(chatId: number, userId: number): Promise<StoreResult<boolean>> {
    return this.addToList('whitelist', chatId, userId);
  }

  removeWhitelist(chatId: number, userId: number): Promise<StoreResult<boolean>> {
    return this.removeFromList('whitelist', chatId, userId);
  }

  listWhitelist(chatId: number): Promise<StoreResult<number[]>> {
    return this.listUsers('whitelist', chatId);
  }

  isBlacklisted(chatId: number, userId: number): Promise<StoreResult<boolean>> {
    return this.isListed('blacklist', chatId, userId);
  }

  addBlacklist(chatId: number, userId: number): Promise<StoreResult<boolean>> {
    return this.addToList('blacklist', chatId, userId);
  }

  removeBlacklist(chatId: number, userId: number): Promise<StoreResult<boolean>> {
    return this.removeFromList('blacklist', chatId, userId);
  }

  listBlacklist(chatId: number): Promise<StoreResult<number[]>> {
    return this.listUsers('blacklist', chatId);
  }

  async healthy(): Promise<boolean> {
    const result = await this.guard('healthy', false, () => {
      this.database.db.prepare('SELECT 1').get();
      return true;
    });
    return result.status === 'ok' && result.value;
  }

  private isListed(kind: UserListKind, chatId: number, userId: number): Promise<StoreResult<boolean>> {
    return this.guard(`${kind}.has`, false, () => this.repos.userLists.has(chatId, kind, userId));
  }

  private addToList(kind: UserListKind, chatId: number, userId: number): Promise<StoreResult<boolean>> {
    return this.guard(`${kind}.add`, false, () => this.repos.userLists.add(chatId, kind, userId));
  }

  private removeFromList(kind: UserListKind, chatId: number, userId: number): Promise<StoreResult<boolean>> {
    return this.guard(`${kind}.remove`, false, () => this.repos.userLists.remove(chatId, kind, userId));
  }

  private listUsers(kind: UserListKind, chatId: number): Promise<StoreResult<number[]>> {
    return this.guard(`${kind}.list`, [], () => this.repos.userLists.list(chatId, kind));
  }

  // Lock waits are bounded by the connection's busy_timeout.
  private async guard<T>(operation: string, fallback: T, run: () => T): Promise<StoreResult<T>> {
    try {
      return { status: 'ok', value: run() };
    } catch (error) {
      const unavailable: StoreUnavailable = {
        kind: 'store_unavailable',
        operation,
        message: errorMessage(error),
        timedOut: isBusyError(error),
      };

      await this.logger.error('Moderation store unavailable', {
        operation,
        timedOut: unavailable.timedOut,
        error: unavailable.message,
      });

      return { status: 'degraded', value: fallback, error: unavailable };
    }
  }
}
