import { describe, expect, it } from 'vitest';
import { MetricsService } from '../src/services/MetricsService';

describe('MetricsService', () => {
  it('reports zero toxicity before any message', () => {
    expect(new MetricsService().snapshot(0)).toEqual({ viewer_count: 0, gift_count: 0, toxic_pct: 0 });
  });

  it('computes the toxic share as a percentage', () => {
    const metrics = new MetricsService();
    metrics.recordChatMessage(true);
    metrics.recordChatMessage(false);
    metrics.recordChatMessage(false);
    metrics.recordChatMessage(false);
    metrics.recordGift();
    metrics.recordGift();

    expect(metrics.toxicPercentage()).toBe(25);
    expect(metrics.snapshot(5)).toEqual({ viewer_count: 5, gift_count: 2, toxic_pct: 25 });
  });

  it('starts over after a reset', () => {
    const metrics = new MetricsService();
    metrics.recordChatMessage(true);
    metrics.recordGift();
    metrics.reset();

    expect(metrics.snapshot(1)).toEqual({ viewer_count: 1, gift_count: 0, toxic_pct: 0 });
  });
});
