import { EventEmitter } from 'events';
import type { ChatConnection, DeliveryResult } from './SocketConnection';
import type { OutboundEvent, OutboundPayload } from '../models/ChatMessage';
import { LoggerService } from './LoggerService';

export type RemovalReason = 'disconnect' | 'send_failed' | 'stale' | 'kicked' | 'replaced' | 'error';

export type RegisterResult =
  | { ok: true; replaced?: ChatConnection }
  | { ok: false; reason: 'capacity_exceeded' };

export interface BroadcastResult {
  delivered: number;
  failed: number;
}

/**
 * Who is connected right now. One entry per identity; a new connection for
 * a connected identity replaces the old one, which is reported through a
 * `removed` event with reason `replaced`.
 *
 * Every actual removal emits `removed` exactly once, so listeners can hang
 * per-connection cleanup on it.
 */
export class ConnectionRegistry extends EventEmitter {
  private connections: Map<string, ChatConnection> = new Map();
  private maxConnections: number;
  private logger: LoggerService;

  constructor(maxConnections: number, logger: LoggerService) {
    super();
    this.maxConnections = maxConnections;
    this.logger = logger;
  }

  /**
   * Whether a new connection for this identity would be turned away
   */
  isFull(identity: string): boolean {
    return !this.connections.has(identity) && this.connections.size >= this.maxConnections;
  }

  register(connection: ChatConnection): RegisterResult {
    if (this.isFull(connection.identity)) {
      return { ok: false, reason: 'capacity_exceeded' };
    }

    const previous = this.connections.get(connection.identity);
    this.connections.set(connection.identity, connection);

    if (previous && previous !== connection) {
      this.emit('removed', previous, 'replaced');
      return { ok: true, replaced: previous };
    }
    return { ok: true };
  }

  /**
   * Remove a connection. Returns false (and does nothing) when it is not the
   * registered connection for its identity, e.g. already removed or replaced.
   */
  unregister(connection: ChatConnection, reason: RemovalReason): boolean {
    if (this.connections.get(connection.identity) !== connection) {
      return false;
    }
    this.connections.delete(connection.identity);
    this.emit('removed', connection, reason);
    return true;
  }

  lookup(identity: string): ChatConnection | undefined {
    return this.connections.get(identity);
  }

  lookupAll(identity: string): ChatConnection[] {
    return this.snapshot().filter((connection) => connection.identity === identity);
  }

  /**
   * Point-in-time copy; safe to iterate while the registry changes
   */
  snapshot(): ChatConnection[] {
    return Array.from(this.connections.values());
  }

  countLive(): number {
    return this.connections.size;
  }

  /**
   * Unregister every connection bound to an identity
   */
  evict(identity: string, reason: RemovalReason): number {
    let removed = 0;
    for (const connection of this.lookupAll(identity)) {
      if (this.unregister(connection, reason)) {
        removed += 1;
      }
    }
    return removed;
  }

  /**
   * Send to every live connection. A failed send evicts that connection and
   * the rest of the fan-out carries on.
   */
  async broadcast<E extends OutboundEvent>(event: E, payload: OutboundPayload<E>): Promise<BroadcastResult> {
    const targets = this.snapshot();
    const results = await Promise.all(
      targets.map((connection) =>
        connection.send(event, payload).catch(
          (error: unknown): DeliveryResult => ({
            status: 'failed',
            reason: error instanceof Error ? error.message : String(error),
          })
        )
      )
    );

    let delivered = 0;
    let failed = 0;
    results.forEach((result, index) => {
      if (result.status === 'delivered') {
        delivered += 1;
        return;
      }
      failed += 1;
      const connection = targets[index];
      this.logger.warn(`Failed to deliver ${event} to ${connection.identity}: ${result.reason}`);
      this.unregister(connection, 'send_failed');
    });

    return { delivered, failed };
  }

  onRemoved(listener: (connection: ChatConnection, reason: RemovalReason) => void): () => void {
    this.on('removed', listener);
    return () => {
      this.off('removed', listener);
    };
  }
}
