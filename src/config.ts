import path from 'node:path';
import { BotConfig, LogLevel } from './types';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parsePositiveInt(value: string | undefined, fallback: number, key: string): number {
  if (!value || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Environment variable ${key} must be a positive integer`);
  }
  return parsed;
}

function parseOptionalInt(value: string | undefined, key: string): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${key} must be an integer`);
  }
  return parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return fallback;
}

function parseLogLevel(value: string | undefined): LogLevel {
  if (!value || value.trim() === '') return 'info';
  const normalized = value.trim().toLowerCase();
  const level = LOG_LEVELS.find((item) => item === normalized);
  if (!level) {
    throw new Error(`Environment variable LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const botToken = env.BOT_TOKEN?.trim();
  if (!botToken) {
    throw new Error('BOT_TOKEN is required');
  }

  return {
    botToken,
    databasePath: env.DATABASE_PATH?.trim() || path.resolve(process.cwd(), 'data/spam-guard.sqlite'),
    rulesConfigPath: env.RULES_CONFIG_PATH?.trim() || path.resolve(process.cwd(), 'data/rules.json'),
    logChatId: parseOptionalInt(env.LOG_CHAT_ID, 'LOG_CHAT_ID'),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    noticeInChat: parseBoolean(env.NOTICE_IN_CHAT, true),
    strikeTtlHours: parsePositiveInt(env.STRIKE_TTL_HOURS, 7 * 24, 'STRIKE_TTL_HOURS'),
    dedupTtlSec: parsePositiveInt(env.DEDUP_TTL_SEC, 60 * 60, 'DEDUP_TTL_SEC'),
    banFallbackHours: parsePositiveInt(env.BAN_FALLBACK_HOURS, 30 * 24, 'BAN_FALLBACK_HOURS'),
    storeTimeoutMs: parsePositiveInt(env.STORE_TIMEOUT_MS, 2_000, 'STORE_TIMEOUT_MS'),
    adminCacheTtlSec: parsePositiveInt(env.ADMIN_CACHE_TTL_SEC, 60, 'ADMIN_CACHE_TTL_SEC'),
    cleanupIntervalSec: parsePositiveInt(env.CLEANUP_INTERVAL_SEC, 300, 'CLEANUP_INTERVAL_SEC'),
  };
}
