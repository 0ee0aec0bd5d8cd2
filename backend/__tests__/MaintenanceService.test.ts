import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MaintenanceService } from '../src/services/MaintenanceService';
import { ConnectionRegistry, type RemovalReason } from '../src/services/ConnectionRegistry';
import { SqliteChatStore } from '../src/services/SqliteChatStore';
import { FakeConnection, FIXED_NOW, testLogger } from './helpers';

describe('MaintenanceService', () => {
  let store: SqliteChatStore;
  let registry: ConnectionRegistry;
  let maintenance: MaintenanceService;
  let removals: Array<[string, RemovalReason]>;

  beforeEach(() => {
    store = new SqliteChatStore({ filename: ':memory:' });
    registry = new ConnectionRegistry(10, testLogger());
    maintenance = new MaintenanceService({
      store,
      registry,
      logger: testLogger(),
      options: { cleanupIntervalSecs: 300, cleanupRetrySecs: 60 },
      now: () => FIXED_NOW,
    });
    removals = [];
    registry.onRemoved((connection, reason) => removals.push([connection.identity, reason]));
  });

  afterEach(() => {
    store.close();
  });

  it('removes only the connections that fail their probe', async () => {
    const healthy = new FakeConnection('healthy');
    const silent = new FakeConnection('silent');
    silent.alive = false;
    const broken = new FakeConnection('broken');
    broken.throwOnProbe = true;
    [healthy, silent, broken].forEach((connection) => registry.register(connection));

    expect(await maintenance.reapStaleConnections()).toBe(2);
    expect(registry.snapshot()).toEqual([healthy]);
    expect(removals).toEqual([
      ['silent', 'stale'],
      ['broken', 'stale'],
    ]);
  });

  it('expires old sessions and elapsed mutes', async () => {
    const alice = await store.ensureUser('alice');
    const bob = await store.ensureUser('bob');
    const expired = await store.createSession(alice.id, {
      durationHours: 1,
      now: new Date('2026-01-01T09:00:00.000Z'),
    });
    const current = await store.createSession(bob.id, { durationHours: 24, now: FIXED_NOW });
    await store.setUserMute(alice.id, new Date('2026-01-01T11:00:00.000Z'));
    await store.setUserMute(bob.id, new Date('2026-01-01T13:00:00.000Z'));
    registry.register(new FakeConnection('bob'));

    const report = await maintenance.sweep();

    expect(report).toEqual({ staleConnections: 0, expiredSessions: 1, expiredMutes: 1 });
    expect(await store.getActiveSessionByToken(expired.sessionToken, new Date('2026-01-01T09:30:00.000Z'))).toBeNull();
    expect(await store.getActiveSessionByToken(current.sessionToken, FIXED_NOW)).not.toBeNull();
    expect(await store.getUserMute(alice.id)).toBeNull();
    expect(await store.getUserMute(bob.id)).toEqual(new Date('2026-01-01T13:00:00.000Z'));
    expect(registry.countLive()).toBe(1);
  });

  it('reports an empty sweep', async () => {
    expect(await maintenance.sweep()).toEqual({ staleConnections: 0, expiredSessions: 0, expiredMutes: 0 });
  });
});
