import { randomInt as cryptoRandomInt } from 'crypto';
import type { GiftEventOut } from '../models/ChatMessage';
import type { ChatStore } from './ChatStore';
import type { ConnectionRegistry, BroadcastResult } from './ConnectionRegistry';
import type { MetricsService } from './MetricsService';
import { BackgroundTask } from './BackgroundTask';
import { LoggerService } from './LoggerService';

// Inclusive on both ends
export type RandomInt = (min: number, max: number) => number;

const defaultRandomInt: RandomInt = (min, max) => cryptoRandomInt(min, max + 1);

export interface GiftProducerOptions {
  intervalSecs: number;
  jitterSecs: number;
  backoffSecs: number;
  sender: string;
  maxGiftId: number;
  maxAmount: number;
}

export interface GiftServiceDeps {
  store: ChatStore;
  registry: ConnectionRegistry;
  metrics: MetricsService;
  logger: LoggerService;
  options: GiftProducerOptions;
  randomInt?: RandomInt;
  now?: () => Date;
}

/**
 * Gift events: the periodic synthetic producer and the API-triggered path.
 * Both persist the gift, count it and fan it out to every live connection.
 */
export class GiftService {
  private store: ChatStore;
  private registry: ConnectionRegistry;
  private metrics: MetricsService;
  private logger: LoggerService;
  private options: GiftProducerOptions;
  private randomInt: RandomInt;
  private now: () => Date;
  private task: BackgroundTask;

  constructor(deps: GiftServiceDeps) {
    this.store = deps.store;
    this.registry = deps.registry;
    this.metrics = deps.metrics;
    this.logger = deps.logger;
    this.options = deps.options;
    this.randomInt = deps.randomInt ?? defaultRandomInt;
    this.now = deps.now ?? (() => new Date());

    this.task = new BackgroundTask(
      {
        name: 'gift producer',
        nextDelayMs: () => this.nextDelayMs(),
        backoffMs: this.options.backoffSecs * 1000,
        run: () => this.produceRandomGift().then(() => undefined),
      },
      this.logger
    );
  }

  /**
   * Interval plus or minus the jitter, never under one second
   */
  nextDelayMs(): number {
    const { intervalSecs, jitterSecs } = this.options;
    const jitter = jitterSecs > 0 ? this.randomInt(-jitterSecs, jitterSecs) : 0;
    return Math.max(1, intervalSecs + jitter) * 1000;
  }

  async emitGift(from: string, giftId: number, amount: number): Promise<GiftEventOut & { broadcast: BroadcastResult }> {
    const sender = await this.store.ensureUser(from);
    await this.store.saveGiftEvent(sender.id, giftId, amount);
    this.metrics.recordGift();

    const event: GiftEventOut = {
      type: 'gift',
      from,
      gift_id: giftId,
      amount,
      ts: this.now().toISOString(),
    };
    const broadcast = await this.registry.broadcast('gift', event);
    return { ...event, broadcast };
  }

  async produceRandomGift(): Promise<GiftEventOut> {
    const giftId = this.randomInt(1, this.options.maxGiftId);
    const amount = this.randomInt(1, this.options.maxAmount);
    const { broadcast, ...event } = await this.emitGift(this.options.sender, giftId, amount);
    this.logger.info(`Broadcast gift ${giftId} x${amount} to ${broadcast.delivered} clients`);
    return event;
  }

  start(): void {
    this.task.start();
  }

  stop(): Promise<void> {
    return this.task.stop();
  }

  isRunning(): boolean {
    return this.task.isRunning();
  }
}
