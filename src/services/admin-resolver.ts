import { errorMessage } from '../errors';
import { isPrivileged, MaxChatApi, readMembers } from './max-chat-api';

interface CacheItem {
  isAdmin: boolean;
  expiresAt: number;
}

const FAILURE_CACHE_MAX_MS = 20_000;

export class AdminResolver {
  private readonly cache = new Map<string, CacheItem>();

  constructor(
    private readonly api: Pick<MaxChatApi, 'getChatAdmins' | 'getChatMembers'>,
    private readonly ttlMs: number = 60_000,
    private readonly onWarn?: (message: string, meta?: Record<string, unknown>) => void,
  ) {}

  async isAdmin(chatId: number, userId: number): Promise<boolean> {
    const key = `${chatId}:${userId}`;
    const cached = this.cache.get(key);
    const now = Date.now();

    if (cached && cached.expiresAt > now) {
      return cached.isAdmin;
    }

    // Primary source of truth for permissions.
    try {
      const admins = readMembers(await this.api.getChatAdmins(chatId));
      const isAdmin = isPrivileged(admins.find((item) => item.user_id === userId));
      this.cache.set(key, { isAdmin, expiresAt: now + this.ttlMs });
      if (isAdmin) {
        return true;
      }
    } catch (error) {
      this.onWarn?.('getChatAdmins failed in AdminResolver', { chatId, userId, error: errorMessage(error) });
    }

    // Fallback: query a specific member by id.
    try {
      const members = readMembers(await this.api.getChatMembers(chatId, [userId]));
      const isAdmin = isPrivileged(members.find((item) => item.user_id === userId));
      this.cache.set(key, { isAdmin, expiresAt: now + this.ttlMs });
      return isAdmin;
    } catch (error) {
      this.onWarn?.('getChatMembers failed in AdminResolver', { chatId, userId, error: errorMessage(error) });
      this.cache.set(key, { isAdmin: false, expiresAt: now + Math.min(this.ttlMs, FAILURE_CACHE_MAX_MS) });
      return false;
    }
  }
}
