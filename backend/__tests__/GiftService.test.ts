import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { GiftService, type GiftProducerOptions, type RandomInt } from '../src/services/GiftService';
import { ConnectionRegistry } from '../src/services/ConnectionRegistry';
import { MetricsService } from '../src/services/MetricsService';
import { SqliteChatStore } from '../src/services/SqliteChatStore';
import { FakeConnection, FIXED_NOW, testLogger } from './helpers';

const OPTIONS: GiftProducerOptions = {
  intervalSecs: 15,
  jitterSecs: 5,
  backoffSecs: 5,
  sender: 'bot',
  maxGiftId: 999,
  maxAmount: 10,
};

describe('GiftService', () => {
  let store: SqliteChatStore;
  let registry: ConnectionRegistry;
  let metrics: MetricsService;

  function createService(randomInt: RandomInt, options: Partial<GiftProducerOptions> = {}): GiftService {
    return new GiftService({
      store,
      registry,
      metrics,
      logger: testLogger(),
      options: { ...OPTIONS, ...options },
      randomInt,
      now: () => FIXED_NOW,
    });
  }

  beforeEach(() => {
    store = new SqliteChatStore({ filename: ':memory:' });
    registry = new ConnectionRegistry(10, testLogger());
    metrics = new MetricsService();
  });

  afterEach(() => {
    vi.useRealTimers();
    store.close();
  });

  it('broadcasts a random gift from the bot to every viewer', async () => {
    const randomInt = vi.fn<RandomInt>().mockReturnValueOnce(123).mockReturnValueOnce(3);
    const gifts = createService(randomInt);
    const alice = new FakeConnection('alice');
    const bob = new FakeConnection('bob');
    registry.register(alice);
    registry.register(bob);

    const event = await gifts.produceRandomGift();

    const expected = { type: 'gift', from: 'bot', gift_id: 123, amount: 3, ts: '2026-01-01T12:00:00.000Z' };
    expect(event).toEqual(expected);
    expect(randomInt.mock.calls).toEqual([
      [1, 999],
      [1, 10],
    ]);
    expect(alice.payloadsOf('gift')).toEqual([expected]);
    expect(bob.payloadsOf('gift')).toEqual([expected]);
    expect(metrics.snapshot(registry.countLive())).toEqual({ viewer_count: 2, gift_count: 1, toxic_pct: 0 });
    expect(await store.getUserByUsername('bot')).not.toBeNull();
  });

  it('emits a gift on behalf of a named sender', async () => {
    const gifts = createService(() => 0);
    const viewer = new FakeConnection('viewer');
    viewer.failSends = true;
    registry.register(viewer);

    const result = await gifts.emitGift('carol', 42, 2);

    expect(result).toEqual({
      type: 'gift',
      from: 'carol',
      gift_id: 42,
      amount: 2,
      ts: '2026-01-01T12:00:00.000Z',
      broadcast: { delivered: 0, failed: 1 },
    });
    expect(registry.countLive()).toBe(0);
    expect(metrics.snapshot(0).gift_count).toBe(1);
  });

  describe('nextDelayMs', () => {
    it('spreads the interval by the jitter', () => {
      expect(createService(() => -5).nextDelayMs()).toBe(10_000);
      expect(createService(() => 5).nextDelayMs()).toBe(20_000);
      expect(createService(() => 0).nextDelayMs()).toBe(15_000);
    });

    it('never goes below one second', () => {
      expect(createService(() => -5, { intervalSecs: 2 }).nextDelayMs()).toBe(1_000);
    });

    it('skips the random draw without jitter', () => {
      const randomInt = vi.fn<RandomInt>(() => 4);
      expect(createService(randomInt, { jitterSecs: 0 }).nextDelayMs()).toBe(15_000);
      expect(randomInt).not.toHaveBeenCalled();
    });
  });

  it('produces gifts on a schedule until stopped', async () => {
    vi.useFakeTimers({ now: FIXED_NOW });
    const gifts = createService(() => 0);

    gifts.start();
    expect(gifts.isRunning()).toBe(true);

    await vi.advanceTimersByTimeAsync(15_000);
    await vi.waitFor(() => expect(metrics.snapshot(0).gift_count).toBe(1));

    await gifts.stop();
    expect(gifts.isRunning()).toBe(false);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(metrics.snapshot(0).gift_count).toBe(1);
  });
});
