import fs from 'fs';
import os from 'os';
import path from 'path';
import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SqliteChatStore } from '../src/services/SqliteChatStore';

describe('SqliteChatStore', () => {
  let store: SqliteChatStore;

  beforeEach(() => {
    store = new SqliteChatStore({ filename: ':memory:', defaultThreshold: 0.6 });
  });

  afterEach(() => {
    store.close();
  });

  describe('toxicity threshold', () => {
    it('falls back to the default when unset or unreadable', async () => {
      expect(await store.getToxicityThreshold()).toBe(0.6);

      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'livechat-store-'));
      const filename = path.join(dir, 'chat.db');
      const onDisk = new SqliteChatStore({ filename, defaultThreshold: 0.6 });
      const raw = new Database(filename);
      const writeRaw = raw.prepare(
        `INSERT INTO settings (key, value, updated_at) VALUES ('toxicity_threshold', ?, '2026-01-01T00:00:00.000Z')
         ON CONFLICT(key) DO UPDATE SET value = excluded.value`
      );
      try {
        writeRaw.run('abc');
        expect(await onDisk.getToxicityThreshold()).toBe(0.6);

        writeRaw.run('1.7');
        expect(await onDisk.getToxicityThreshold()).toBe(0.6);

        writeRaw.run('0.45');
        expect(await onDisk.getToxicityThreshold()).toBe(0.45);
      } finally {
        raw.close();
        onDisk.close();
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });

    it('stores values within range and refuses the rest', async () => {
      await store.setToxicityThreshold(0.25);
      expect(await store.getToxicityThreshold()).toBe(0.25);

      await expect(store.setToxicityThreshold(2)).rejects.toBeInstanceOf(RangeError);
      expect(await store.getToxicityThreshold()).toBe(0.25);
    });
  });

  describe('users', () => {
    it('ensures a user exactly once', async () => {
      const first = await store.ensureUser('alice');
      const second = await store.ensureUser('alice');

      expect(second.id).toBe(first.id);
      expect(first).toMatchObject({ username: 'alice', email: null, isActive: true });
    });

    it('does not create a username twice', async () => {
      expect(await store.createUser('alice', null, 'hash')).toMatchObject({ ok: true, user: { username: 'alice' } });
      expect(await store.createUser('alice', 'other@example.com', 'hash')).toEqual({ ok: false, conflict: 'username' });
    });

    it('reports an email already in use as its own conflict', async () => {
      await store.createUser('alice', 'alice@example.com', 'hash');

      expect(await store.createUser('bob', 'alice@example.com', 'hash')).toEqual({ ok: false, conflict: 'email' });
      expect(await store.getUserByUsername('bob')).toBeNull();
    });

    it('lets users without an email coexist', async () => {
      await store.createUser('alice', null, 'hash');
      await store.ensureUser('bob');

      expect(await store.createUser('carol', null, 'hash')).toMatchObject({ ok: true });
      expect((await store.ensureUser('dave')).email).toBeNull();
    });

    it('creates an implicit user whatever emails registered users hold', async () => {
      await store.createUser('mallory', 'alice@livechat.local', 'hash');

      expect(await store.ensureUser('alice')).toMatchObject({ username: 'alice', email: null });
    });

    it('removes a user with their messages but keeps audit targets readable', async () => {
      const mod = await store.ensureUser('mod');
      const alice = await store.ensureUser('alice');
      await store.saveMessage({ userId: alice.id, text: 'hello', toxic: false, score: 0.1, type: 'chat' });
      await store.logAdminAction({ adminUserId: mod.id, action: 'kick', targetUsername: 'alice' });

      expect(await store.deleteUser(alice.id)).toBe(true);
      expect(await store.deleteUser(alice.id)).toBe(false);
      expect(await store.getRecentMessages(10)).toEqual([]);

      const [action] = await store.listAdminActions(10);
      expect(action).toMatchObject({ adminUsername: 'mod', action: 'kick', targetUsername: 'alice', details: null });
    });
  });

  it('returns recent messages newest first', async () => {
    const alice = await store.ensureUser('alice');
    await store.saveMessage({ userId: alice.id, text: 'first', toxic: false, score: 0.1, type: 'chat' });
    await store.saveMessage({ userId: alice.id, text: 'second', toxic: true, score: 0.8, type: 'chat' });
    await store.saveMessage({ userId: alice.id, text: 'third', toxic: false, score: 0, type: 'chat' });

    const recent = await store.getRecentMessages(2);
    expect(recent.map((message) => [message.id, message.text, message.toxic])).toEqual([
      [3, 'third', false],
      [2, 'second', true],
    ]);
    expect(recent[0].username).toBe('alice');
  });

  it('records gift events', async () => {
    const bot = await store.ensureUser('bot');
    const gift = await store.saveGiftEvent(bot.id, 123, 3);
    expect(gift).toMatchObject({ id: 1, fromUserId: bot.id, giftId: 123, amount: 3 });
  });

  describe('sessions', () => {
    const now = new Date('2026-01-01T12:00:00.000Z');

    it('keeps one active session per user', async () => {
      const user = await store.ensureUser('alice');
      const first = await store.createSession(user.id, { durationHours: 24, now, userAgent: 'vitest' });
      const second = await store.createSession(user.id, { durationHours: 24, now });

      expect(first).toMatchObject({
        userId: user.id,
        isActive: true,
        userAgent: 'vitest',
        ipAddress: null,
        createdAt: '2026-01-01T12:00:00.000Z',
        expiresAt: '2026-01-02T12:00:00.000Z',
      });
      expect(await store.getActiveSessionByToken(first.sessionToken, now)).toBeNull();
      expect(await store.getActiveSessionByToken(second.sessionToken, now)).toMatchObject({ id: second.id });
    });

    it('treats a session past its expiry as inactive', async () => {
      const user = await store.ensureUser('alice');
      const session = await store.createSession(user.id, { durationHours: 1, now });

      expect(await store.getActiveSessionByToken(session.sessionToken, new Date('2026-01-01T13:00:00.000Z'))).toBeNull();
    });

    it('invalidates a single session once', async () => {
      const user = await store.ensureUser('alice');
      const session = await store.createSession(user.id, { durationHours: 24, now });

      expect(await store.invalidateSession(session.sessionToken)).toBe(true);
      expect(await store.invalidateSession(session.sessionToken)).toBe(false);
    });

    it('records activity on touch', async () => {
      const user = await store.ensureUser('alice');
      const session = await store.createSession(user.id, { durationHours: 24, now });

      await store.touchSession(session.sessionToken, new Date('2026-01-01T12:30:00.000Z'));
      expect(await store.getActiveSessionByToken(session.sessionToken, now)).toMatchObject({
        lastActivity: '2026-01-01T12:30:00.000Z',
      });
    });
  });

  it('replaces an existing mute', async () => {
    const user = await store.ensureUser('bob');
    await store.setUserMute(user.id, new Date('2026-01-01T12:05:00.000Z'));
    await store.setUserMute(user.id, new Date('2026-01-01T12:10:00.000Z'));

    expect(await store.getUserMute(user.id)).toEqual(new Date('2026-01-01T12:10:00.000Z'));
    expect(await store.clearUserMute(user.id)).toBe(true);
    expect(await store.clearUserMute(user.id)).toBe(false);
  });
});
