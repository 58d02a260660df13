import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SqliteDatabase } from '../src/db/sqlite';
import { AdminActor, ChatAdministration } from '../src/moderation/chat-admin';
import { RuleConfigHolder } from '../src/moderation/rule-config';
import { createRepositories, Repositories } from '../src/repos';
import { SqliteModerationStore } from '../src/services/moderation-store';
import { hoursToMs, secondsToMs } from '../src/utils/time';
import { createTestLogger, FakeTransport, silenceConsole } from './helpers';

const actor: AdminActor = { chatId: 100, userId: 1, userName: 'Admin' };

let tempDir: string;
let rulesPath: string;
let database: SqliteDatabase;
let repos: Repositories;
let store: SqliteModerationStore;
let transport: FakeTransport;
let rules: RuleConfigHolder;
let admin: ChatAdministration;

beforeEach(() => {
  silenceConsole();
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'spam-guard-admin-'));
  rulesPath = path.join(tempDir, 'rules.json');
  fs.writeFileSync(rulesPath, JSON.stringify({ warn_threshold: 3, hard_delete_threshold: 6 }), 'utf8');

  database = new SqliteDatabase(':memory:');
  repos = createRepositories(database.db);
  store = new SqliteModerationStore(database, repos, createTestLogger(), {
    strikeTtlMs: hoursToMs(168),
    dedupTtlMs: secondsToMs(3_600),
  });
  transport = new FakeTransport();
  rules = new RuleConfigHolder(rulesPath);
  admin = new ChatAdministration(store, transport, rules, repos.moderationActions, createTestLogger());
});

afterEach(() => {
  database.close();
  fs.rmSync(tempDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('status and strict mode', () => {
  it('reports store health and the strict flag', async () => {
    await store.toggleStrictMode(100);

    expect(await admin.status(100)).toEqual({
      storeHealthy: true,
      strictMode: { status: 'ok', value: true },
    });
  });

  it('toggles strict mode and audits the new value', async () => {
    expect((await admin.toggleStrictMode(actor)).value).toBe(true);
    expect((await admin.toggleStrictMode(actor)).value).toBe(false);

    expect(transport.audits.map((record) => record.reasons)).toEqual(['strict_mode=on', 'strict_mode=off']);
    expect(transport.audits[0]).toMatchObject({ action: 'config_update', chatId: 100, userId: 1, userName: 'Admin', score: 0 });
  });

  it('does not audit a toggle the store could not apply', async () => {
    database.close();

    const result = await admin.toggleStrictMode(actor);

    expect(result.status).toBe('degraded');
    expect(transport.audits).toEqual([]);
  });
});

describe('user lists', () => {
  it('audits only changes that happened', async () => {
    expect((await admin.addToList(actor, 'whitelist', 7)).value).toBe(true);
    expect((await admin.addToList(actor, 'whitelist', 7)).value).toBe(false);
    expect((await admin.removeFromList(actor, 'whitelist', 7)).value).toBe(true);
    expect((await admin.removeFromList(actor, 'blacklist', 7)).value).toBe(false);

    expect(transport.audits).toEqual([
      {
        action: 'config_update',
        chatId: 100,
        userId: 1,
        userName: 'Admin',
        score: 0,
        reasons: 'whitelist_add 7',
        meta: { targetUserId: 7 },
      },
      {
        action: 'config_update',
        chatId: 100,
        userId: 1,
        userName: 'Admin',
        score: 0,
        reasons: 'whitelist_del 7',
        meta: { targetUserId: 7 },
      },
    ]);
  });

  it('lists each kind separately', async () => {
    await admin.addToList(actor, 'blacklist', 9);
    await admin.addToList(actor, 'whitelist', 3);

    expect((await admin.listUsers(100, 'blacklist')).value).toEqual([9]);
    expect((await admin.listUsers(100, 'whitelist')).value).toEqual([3]);
    expect(await store.isBlacklisted(100, 9)).toEqual({ status: 'ok', value: true });
  });
});

describe('strikes', () => {
  it('returns the count with the latest moderation entry', async () => {
    await store.incrementStrikes(100, 42);
    await store.incrementStrikes(100, 42);
    repos.moderationActions.record({ action: 'delete_mute', chatId: 100, userId: 42, score: 12, reasons: 'Invite link (+4)' });

    const result = await admin.strikes(100, 42);

    expect(result.strikes).toEqual({ status: 'ok', value: 2 });
    expect(result.lastAction).toMatchObject({ action: 'delete_mute', score: 12, reasons: 'Invite link (+4)' });
  });

  it('returns no history for a user without actions', async () => {
    const result = await admin.strikes(100, 42);

    expect(result).toEqual({ strikes: { status: 'ok', value: 0 }, lastAction: null });
  });

  it('survives an unreadable history', async () => {
    const failing = new ChatAdministration(store, transport, rules, {
      latestForUser: () => {
        throw new Error('history offline');
      },
    }, createTestLogger());

    const result = await failing.strikes(100, 42);

    expect(result.lastAction).toBeNull();
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('"error":"history offline"'));
  });

  it('resets strikes and audits the target', async () => {
    await store.incrementStrikes(100, 42);

    expect((await admin.resetStrikes(actor, 42)).status).toBe('ok');
    expect((await store.getStrikes(100, 42)).value).toBe(0);
    expect(transport.audits[0]).toMatchObject({ reasons: 'strikes_reset 42', meta: { targetUserId: 42 } });
  });
});

describe('rule reload', () => {
  it('applies the new file and audits the thresholds', async () => {
    expect(rules.current().warnThreshold).toBe(3);
    fs.writeFileSync(rulesPath, JSON.stringify({ warn_threshold: 5, hard_delete_threshold: 10 }), 'utf8');

    const result = await admin.reloadRules(actor);

    expect(result.source).toBe('file');
    expect(rules.current().deleteThreshold).toBe(10);
    expect(transport.audits[0]).toMatchObject({
      action: 'config_update',
      reasons: 'rules_reload source=file errors=0',
      meta: { warnThreshold: 5, deleteThreshold: 10 },
    });
  });

  it('keeps the active rules when the file is broken', async () => {
    fs.writeFileSync(rulesPath, '{ not json', 'utf8');

    const result = await admin.reloadRules(actor);

    expect(result.source).toBe('invalid');
    expect(rules.current().warnThreshold).toBe(3);
    expect(transport.audits[0]).toMatchObject({
      reasons: 'rules_reload source=invalid errors=1',
      meta: { warnThreshold: 3, deleteThreshold: 6 },
    });
  });
});
