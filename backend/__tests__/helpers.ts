import type { CloseCode, OutboundEvent, OutboundPayload } from '../src/models/ChatMessage';
import type { ChatConnection, DeliveryResult } from '../src/services/SocketConnection';
import type { ToxicityScorer } from '../src/services/ToxicityScorer';
import { LoggerService } from '../src/services/LoggerService';

export const FIXED_NOW = new Date('2026-01-01T12:00:00.000Z');

export function testLogger(scope = 'Test'): LoggerService {
  return new LoggerService(scope, { logToFile: false, debug: false });
}

export interface SentEvent {
  event: OutboundEvent;
  payload: unknown;
}

/**
 * In-memory ChatConnection that records what it was sent
 */
export class FakeConnection implements ChatConnection {
  private static nextId = 1;

  readonly id: string;
  readonly identity: string;
  readonly sessionToken: string | null;
  readonly connectedAt = new Date();

  sent: SentEvent[] = [];
  closedWith: CloseCode[] = [];
  alive = true;
  failSends = false;
  throwOnProbe = false;
  onSend?: () => void;

  constructor(identity: string, sessionToken: string | null = null) {
    this.id = `fake-${FakeConnection.nextId++}`;
    this.identity = identity;
    this.sessionToken = sessionToken;
  }

  async send<E extends OutboundEvent>(event: E, payload: OutboundPayload<E>): Promise<DeliveryResult> {
    this.onSend?.();
    if (this.failSends) {
      return { status: 'failed', reason: 'peer gone' };
    }
    this.sent.push({ event, payload });
    return { status: 'delivered' };
  }

  async probe(): Promise<boolean> {
    if (this.throwOnProbe) {
      throw new Error('probe exploded');
    }
    return this.alive;
  }

  close(code: CloseCode): void {
    this.closedWith.push(code);
  }

  payloadsOf(event: OutboundEvent): unknown[] {
    return this.sent.filter((entry) => entry.event === event).map((entry) => entry.payload);
  }
}

/**
 * Scores by exact text; anything unlisted gets the fallback
 */
export class FakeScorer implements ToxicityScorer {
  calls: string[] = [];
  private scores: Map<string, number>;
  private fallback: number;
  failWith: Error | null = null;

  constructor(scores: Record<string, number> = {}, fallback = 0.1) {
    this.scores = new Map(Object.entries(scores));
    this.fallback = fallback;
  }

  async score(text: string): Promise<number> {
    this.calls.push(text);
    if (this.failWith) throw this.failWith;
    return this.scores.get(text) ?? this.fallback;
  }

  async warmup(): Promise<void> {}
}
