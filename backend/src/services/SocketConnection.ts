import type { Socket } from 'socket.io';
import { CloseCode, CLOSE_REASONS, type ClosingNotice, type OutboundEvent, type OutboundPayload } from '../models/ChatMessage';

export type DeliveryResult =
  | { status: 'delivered' }
  | { status: 'failed'; reason: string };

/**
 * A live channel bound to one identity for its whole lifetime
 */
export interface ChatConnection {
  readonly id: string;
  readonly identity: string;
  readonly sessionToken: string | null;
  readonly connectedAt: Date;
  send<E extends OutboundEvent>(event: E, payload: OutboundPayload<E>): Promise<DeliveryResult>;
  // Liveness check used by the stale-connection reaper
  probe(): Promise<boolean>;
  close(code: CloseCode): void;
}

/**
 * ChatConnection over a socket.io socket. Liveness comes from engine.io's
 * ping/pong heartbeat, which drops the transport when pongs stop arriving.
 */
export class SocketConnection implements ChatConnection {
  readonly id: string;
  readonly identity: string;
  readonly sessionToken: string | null;
  readonly connectedAt: Date;
  private socket: Socket;

  constructor(socket: Socket, identity: string, sessionToken: string | null) {
    this.socket = socket;
    this.id = socket.id;
    this.identity = identity;
    this.sessionToken = sessionToken;
    this.connectedAt = new Date();
  }

  async send<E extends OutboundEvent>(event: E, payload: OutboundPayload<E>): Promise<DeliveryResult> {
    if (!this.socket.connected) {
      return { status: 'failed', reason: 'disconnected' };
    }
    try {
      this.socket.emit(event, payload);
      return { status: 'delivered' };
    } catch (error) {
      return { status: 'failed', reason: error instanceof Error ? error.message : String(error) };
    }
  }

  async probe(): Promise<boolean> {
    return this.socket.connected;
  }

  close(code: CloseCode): void {
    if (!this.socket.connected) return;
    const notice: ClosingNotice = { code, reason: CLOSE_REASONS[code] };
    this.socket.emit('closing', notice);
    this.socket.disconnect(true);
  }
}
