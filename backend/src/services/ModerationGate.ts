import { chatMessageInSchema, describeIssues } from '../models/schemas';
import type { ChatMessageOut, OutboundEvent, OutboundPayload } from '../models/ChatMessage';
import type { ChatStore } from './ChatStore';
import type { ChatConnection, DeliveryResult } from './SocketConnection';
import type { ConnectionRegistry } from './ConnectionRegistry';
import type { ToxicityScorer } from './ToxicityScorer';
import type { MetricsService } from './MetricsService';
import { LoggerService } from './LoggerService';

export type ModerationOutcome =
  | { kind: 'invalid'; detail: string }
  | { kind: 'muted'; mutedUntil: Date }
  | { kind: 'blocked'; message: ChatMessageOut }
  | { kind: 'broadcast'; message: ChatMessageOut; delivered: number; failed: number }
  | { kind: 'failed'; detail: string }
  | { kind: 'closed' };

export interface ModerationGateDeps {
  store: ChatStore;
  registry: ConnectionRegistry;
  scorer: ToxicityScorer;
  metrics: MetricsService;
  logger: LoggerService;
  now?: () => Date;
}

function parseInbound(raw: unknown): unknown {
  if (typeof raw !== 'string') return raw;
  return JSON.parse(raw);
}

/**
 * Decides the fate of every inbound chat message:
 * mute check, score, compare against the threshold, persist, then either
 * hand it back to the sender as blocked or broadcast it to everyone.
 */
export class ModerationGate {
  private store: ChatStore;
  private registry: ConnectionRegistry;
  private scorer: ToxicityScorer;
  private metrics: MetricsService;
  private logger: LoggerService;
  private now: () => Date;

  constructor(deps: ModerationGateDeps) {
    this.store = deps.store;
    this.registry = deps.registry;
    this.scorer = deps.scorer;
    this.metrics = deps.metrics;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  async handle(connection: ChatConnection, raw: unknown): Promise<ModerationOutcome> {
    // A kick may have landed while this frame waited in the queue
    if (!this.isRegistered(connection)) {
      return { kind: 'closed' };
    }

    let payload: unknown;
    try {
      payload = parseInbound(raw);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      await this.reply(connection, 'error', { error: 'Invalid message format', detail });
      return { kind: 'invalid', detail };
    }

    const parsed = chatMessageInSchema.safeParse(payload);
    if (!parsed.success) {
      const detail = describeIssues(parsed.error);
      await this.reply(connection, 'error', { error: 'Invalid message format', detail });
      return { kind: 'invalid', detail };
    }

    try {
      return await this.moderate(connection, parsed.data.message);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.error(`Moderation failed for message from ${connection.identity}`, error);
      await this.reply(connection, 'error', { error: 'Message could not be processed', detail });
      return { kind: 'failed', detail };
    }
  }

  private async moderate(connection: ChatConnection, text: string): Promise<ModerationOutcome> {
    const user = await this.store.ensureUser(connection.identity);

    const mutedUntil = await this.store.getUserMute(user.id);
    if (mutedUntil) {
      if (this.now() < mutedUntil) {
        await this.reply(connection, 'muted', {
          type: 'muted',
          message: `You are muted until ${mutedUntil.toISOString()}`,
          muted_until: mutedUntil.toISOString(),
        });
        return { kind: 'muted', mutedUntil };
      }
      await this.store.clearUserMute(user.id);
    }

    // One read; the same value decides both "toxic" and "blocked"
    const threshold = await this.store.getToxicityThreshold();
    const score = await this.scorer.score(text);
    const toxic = score >= threshold;

    if (!this.isRegistered(connection)) {
      this.logger.debug(`Dropped message from ${connection.identity}: connection closed while scoring`);
      return { kind: 'closed' };
    }
    const saved = await this.store.saveMessage({ userId: user.id, text, toxic, score, type: 'chat' });
    const outgoing: ChatMessageOut = {
      type: 'chat',
      id: saved.id,
      user: connection.identity,
      message: text,
      toxic,
      score,
      ts: saved.timestamp,
      blocked: toxic,
    };

    if (toxic) {
      this.logger.info(`Blocked message ${saved.id} from ${connection.identity} (score ${score} >= ${threshold})`);
      await this.reply(connection, 'chat', outgoing);
      this.metrics.recordChatMessage(true);
      return { kind: 'blocked', message: outgoing };
    }

    const { delivered, failed } = await this.registry.broadcast('chat', outgoing);
    this.metrics.recordChatMessage(false);
    this.logger.debug(`Message ${saved.id} from ${connection.identity} broadcast to ${delivered} clients`);
    return { kind: 'broadcast', message: outgoing, delivered, failed };
  }

  private isRegistered(connection: ChatConnection): boolean {
    return this.registry.lookup(connection.identity) === connection;
  }

  /**
   * Send to the sender only; a failed send ends the connection
   */
  private async reply<E extends OutboundEvent>(
    connection: ChatConnection,
    event: E,
    payload: OutboundPayload<E>
  ): Promise<DeliveryResult> {
    const result = await connection.send(event, payload);
    if (result.status === 'failed') {
      this.logger.warn(`Could not reach ${connection.identity}: ${result.reason}`);
      this.registry.unregister(connection, 'send_failed');
    }
    return result;
  }
}
