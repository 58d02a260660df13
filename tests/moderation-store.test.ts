import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SqliteDatabase } from '../src/db/sqlite';
import { createRepositories, Repositories } from '../src/repos';
import { SqliteModerationStore } from '../src/services/moderation-store';
import { hoursToMs, secondsToMs } from '../src/utils/time';
import { createTestLogger, silenceConsole } from './helpers';

const STRIKE_TTL_MS = hoursToMs(168);
const DEDUP_TTL_MS = secondsToMs(3_600);
const T0 = 1_700_000_000_000;

let database: SqliteDatabase;
let repos: Repositories;
let store: SqliteModerationStore;

function setNow(ts: number): void {
  vi.spyOn(Date, 'now').mockReturnValue(ts);
}

beforeEach(() => {
  silenceConsole();
  database = new SqliteDatabase(':memory:');
  repos = createRepositories(database.db);
  store = new SqliteModerationStore(database, repos, createTestLogger(), {
    strikeTtlMs: STRIKE_TTL_MS,
    dedupTtlMs: DEDUP_TTL_MS,
  });
});

afterEach(() => {
  database.close();
  vi.restoreAllMocks();
});

describe('strikes', () => {
  it('increments, reads and resets', async () => {
    expect(await store.incrementStrikes(1, 2)).toEqual({ status: 'ok', value: 1 });
    expect(await store.incrementStrikes(1, 2)).toEqual({ status: 'ok', value: 2 });
    expect(await store.getStrikes(1, 2)).toEqual({ status: 'ok', value: 2 });

    expect((await store.resetStrikes(1, 2)).status).toBe('ok');
    expect(await store.getStrikes(1, 2)).toEqual({ status: 'ok', value: 0 });
  });

  it('expires a week after the last increment', async () => {
    setNow(T0);
    await store.incrementStrikes(1, 2);

    setNow(T0 + STRIKE_TTL_MS - 1_000);
    expect((await store.incrementStrikes(1, 2)).value).toBe(2);

    // Still live: the second increment pushed the expiry forward.
    setNow(T0 + STRIKE_TTL_MS + 1_000);
    expect((await store.getStrikes(1, 2)).value).toBe(2);

    setNow(T0 + 2 * STRIKE_TTL_MS);
    expect((await store.getStrikes(1, 2)).value).toBe(0);
    expect((await store.incrementStrikes(1, 2)).value).toBe(1);
  });
});

describe('dedup markers', () => {
  it('claims content once and reports duplicates after that', async () => {
    setNow(T0);

    expect((await store.isDuplicate(1, 'Buy now')).value).toBe(false);
    expect((await store.markProcessed(1, 'Buy now')).value).toBe(true);
    expect((await store.isDuplicate(1, 'Buy now')).value).toBe(true);
    expect((await store.markProcessed(1, 'Buy now')).value).toBe(false);
    expect((await store.isDuplicate(2, 'Buy now')).value).toBe(false);
  });

  it('normalizes case, outer whitespace and invisible characters', async () => {
    setNow(T0);
    await store.markProcessed(1, 'Buy now');

    expect((await store.isDuplicate(1, '  BUY NOW ')).value).toBe(true);
    expect((await store.isDuplicate(1, 'Buy\u200b now')).value).toBe(true);
    expect((await store.isDuplicate(1, 'Buy  now')).value).toBe(false);
  });

  it('forgets content after an hour', async () => {
    setNow(T0);
    await store.markProcessed(1, 'Buy now');

    setNow(T0 + DEDUP_TTL_MS - 1);
    expect((await store.isDuplicate(1, 'Buy now')).value).toBe(true);

    setNow(T0 + DEDUP_TTL_MS);
    expect((await store.isDuplicate(1, 'Buy now')).value).toBe(false);
    expect((await store.markProcessed(1, 'Buy now')).value).toBe(true);
  });
});

describe('chat flags and lists', () => {
  it('toggles strict mode', async () => {
    expect((await store.isStrictMode(5)).value).toBe(false);
    expect((await store.toggleStrictMode(5)).value).toBe(true);
    expect((await store.isStrictMode(5)).value).toBe(true);
    expect((await store.toggleStrictMode(5)).value).toBe(false);
  });

  it('manages whitelist and blacklist separately', async () => {
    expect((await store.addWhitelist(5, 10)).value).toBe(true);
    expect((await store.addBlacklist(5, 11)).value).toBe(true);

    expect((await store.isWhitelisted(5, 10)).value).toBe(true);
    expect((await store.isBlacklisted(5, 10)).value).toBe(false);
    expect((await store.listWhitelist(5)).value).toEqual([10]);
    expect((await store.listBlacklist(5)).value).toEqual([11]);

    expect((await store.removeBlacklist(5, 11)).value).toBe(true);
    expect((await store.removeWhitelist(5, 11)).value).toBe(false);
    expect((await store.isBlacklisted(5, 11)).value).toBe(false);
  });
});

describe('degraded mode', () => {
  it('returns permissive defaults when the database is gone', async () => {
    database.close();

    expect(await store.healthy()).toBe(false);

    const strikes = await store.getStrikes(1, 2);
    expect(strikes.status).toBe('degraded');
    expect(strikes.value).toBe(0);

    expect((await store.incrementStrikes(1, 2)).value).toBe(0);
    expect((await store.isDuplicate(1, 'x')).value).toBe(false);
    expect((await store.markProcessed(1, 'x')).value).toBe(true);
    expect((await store.isStrictMode(1)).value).toBe(false);
    expect((await store.isWhitelisted(1, 2)).value).toBe(false);
    expect((await store.isBlacklisted(1, 2)).value).toBe(false);
    expect((await store.listWhitelist(1)).value).toEqual([]);
    expect((await store.resetStrikes(1, 2)).status).toBe('degraded');
  });

  it('describes the failure and logs it', async () => {
    database.close();

    const result = await store.listBlacklist(1);

    expect(result.status).toBe('degraded');
    if (result.status === 'degraded') {
      expect(result.error.kind).toBe('store_unavailable');
      expect(result.error.operation).toBe('blacklist.list');
      expect(result.error.timedOut).toBe(false);
    }
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('"operation":"blacklist.list"'));
  });

  it('marks lock timeouts as timed out', async () => {
    vi.spyOn(repos.strikes, 'getActive').mockImplementation(() => {
      throw Object.assign(new Error('database is locked'), { code: 'SQLITE_BUSY' });
    });

    const result = await store.getStrikes(1, 2);

    expect(result).toEqual({
      status: 'degraded',
      value: 0,
      error: {
        kind: 'store_unavailable',
        operation: 'getStrikes',
        message: 'database is locked',
        timedOut: true,
      },
    });
  });

  it('reports healthy while the database is open', async () => {
    expect(await store.healthy()).toBe(true);
  });
});
