import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SqliteDatabase } from '../src/db/sqlite';
import { createRepositories, Repositories } from '../src/repos';
import { CleanupService, MODERATION_ACTIONS_RETENTION_MS } from '../src/services/cleanup';
import { createTestLogger, silenceConsole } from './helpers';

const NOW = 1_700_000_000_000;

let db: SqliteDatabase;
let repos: Repositories;

beforeEach(() => {
  silenceConsole();
  db = new SqliteDatabase(':memory:');
  repos = createRepositories(db.db);
});

afterEach(() => {
  db.close();
  vi.restoreAllMocks();
});

describe('cleanup service', () => {
  it('purges expired rows from every table', async () => {
    repos.strikes.increment(1, 2, NOW - 10_000, 5_000);
    repos.strikes.increment(1, 3, NOW, 60_000);
    repos.dedupMarkers.tryMark(1, 'old', NOW - 10_000, 5_000);
    repos.dedupMarkers.tryMark(1, 'fresh', NOW, 60_000);
    repos.restrictions.restrict(1, 2, 'mute', NOW - 1);
    repos.restrictions.restrict(1, 3, 'mute', NOW + 60_000);

    const nowSpy = vi.spyOn(Date, 'now').mockReturnValue(NOW - MODERATION_ACTIONS_RETENTION_MS - 1);
    repos.moderationActions.record({ action: 'warn', chatId: 1, userId: 2, score: 5, reasons: 'old' });
    nowSpy.mockReturnValue(NOW);
    repos.moderationActions.record({ action: 'warn', chatId: 1, userId: 3, score: 5, reasons: 'fresh' });

    const report = await new CleanupService(repos, createTestLogger()).run(NOW);

    expect(report).toEqual({ strikes: 1, dedupMarkers: 1, restrictions: 1, moderationActions: 1 });
    expect(repos.strikes.getActive(1, 3, NOW)).toBe(1);
    expect(repos.dedupMarkers.exists(1, 'fresh', NOW)).toBe(true);
    expect(repos.restrictions.findActive(1, 3, NOW)?.type).toBe('mute');
    expect(repos.moderationActions.latestForUser(1, 3)?.reasons).toBe('fresh');
    expect(repos.moderationActions.latestForUser(1, 2)).toBeNull();
  });

  it('reports failures instead of throwing', async () => {
    db.close();

    const report = await new CleanupService(repos, createTestLogger()).run(NOW);

    expect(report).toBeNull();
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Cleanup job failed'));
  });

  it('skips a run while the previous one is in progress', async () => {
    const service = new CleanupService(repos, createTestLogger());

    const first = service.run(NOW);
    const second = service.run(NOW);

    expect(await second).toBeNull();
    expect(await first).toEqual({ strikes: 0, dedupMarkers: 0, restrictions: 0, moderationActions: 0 });
    expect(await service.run(NOW)).not.toBeNull();
  });
});
