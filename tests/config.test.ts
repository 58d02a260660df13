import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('fills defaults around the token', () => {
    const config = loadConfig({ BOT_TOKEN: ' test-token ' });

    expect(config).toEqual({
      botToken: 'test-token',
      databasePath: path.resolve(process.cwd(), 'data/spam-guard.sqlite'),
      rulesConfigPath: path.resolve(process.cwd(), 'data/rules.json'),
      logChatId: undefined,
      logLevel: 'info',
      noticeInChat: true,
      strikeTtlHours: 168,
      dedupTtlSec: 3_600,
      banFallbackHours: 720,
      storeTimeoutMs: 2_000,
      adminCacheTtlSec: 60,
      cleanupIntervalSec: 300,
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      BOT_TOKEN: 'test-token',
      LOG_CHAT_ID: '-5001',
      LOG_LEVEL: 'DEBUG',
      NOTICE_IN_CHAT: 'off',
      STRIKE_TTL_HOURS: '24',
      DEDUP_TTL_SEC: '120',
    });

    expect(config).toMatchObject({
      logChatId: -5001,
      logLevel: 'debug',
      noticeInChat: false,
      strikeTtlHours: 24,
      dedupTtlSec: 120,
    });
  });

  it('rejects a missing token and bad numbers', () => {
    expect(() => loadConfig({})).toThrow('BOT_TOKEN is required');
    expect(() => loadConfig({ BOT_TOKEN: 'test-token', STORE_TIMEOUT_MS: '0' }))
      .toThrow('Environment variable STORE_TIMEOUT_MS must be a positive integer');
    expect(() => loadConfig({ BOT_TOKEN: 'test-token', LOG_LEVEL: 'loud' }))
      .toThrow('Environment variable LOG_LEVEL must be one of debug, info, warn, error');
  });
});
