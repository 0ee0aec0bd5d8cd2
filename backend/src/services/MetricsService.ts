export interface MetricsSnapshot {
  viewer_count: number;
  gift_count: number;
  toxic_pct: number;
}

/**
 * Cumulative chat and gift counters since the last reset. The viewer count
 * is not stored here; callers pass the registry's live count.
 */
export class MetricsService {
  private giftCount = 0;
  private chatMessageTotal = 0;
  private toxicMessageTotal = 0;

  recordGift(): void {
    this.giftCount += 1;
  }

  recordChatMessage(toxic: boolean): void {
    this.chatMessageTotal += 1;
    if (toxic) {
      this.toxicMessageTotal += 1;
    }
  }

  // 0-100
  toxicPercentage(): number {
    if (this.chatMessageTotal === 0) return 0;
    return (this.toxicMessageTotal / this.chatMessageTotal) * 100;
  }

  snapshot(viewerCount: number): MetricsSnapshot {
    return {
      viewer_count: viewerCount,
      gift_count: this.giftCount,
      toxic_pct: this.toxicPercentage(),
    };
  }

  reset(): void {
    this.giftCount = 0;
    this.chatMessageTotal = 0;
    this.toxicMessageTotal = 0;
  }
}
