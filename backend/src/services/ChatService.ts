import { Server as HttpServer } from 'http';
import type { ParsedUrlQuery } from 'querystring';
import { Server as SocketIOServer, type DefaultEventsMap, type Socket } from 'socket.io';
import { CloseCode, CLOSE_REASONS, type ClientToServerEvents } from '../models/ChatMessage';
import type { AuthService } from './AuthService';
import type { ChatStore } from './ChatStore';
import type { ChatConnection } from './SocketConnection';
import { SocketConnection } from './SocketConnection';
import type { ConnectionRegistry, RemovalReason } from './ConnectionRegistry';
import type { ModerationGate } from './ModerationGate';
import { LoggerService } from './LoggerService';

/**
 * Rejected handshake. socket.io hands `data` to the client's connect_error.
 */
export class HandshakeError extends Error {
  readonly data: { code: CloseCode; reason: string };

  constructor(code: CloseCode) {
    super(CLOSE_REASONS[code]);
    this.name = 'HandshakeError';
    this.data = { code, reason: CLOSE_REASONS[code] };
  }
}

export interface HandshakeCredentials {
  token?: unknown;
  username?: unknown;
}

export interface AcceptedHandshake {
  identity: string;
  sessionToken: string;
}

export interface HandshakeDeps {
  auth: AuthService;
  registry: ConnectionRegistry;
}

/**
 * Credential, then impersonation, then identity format, then capacity.
 * Throws HandshakeError on the first failed check.
 */
export async function resolveHandshake(
  credentials: HandshakeCredentials,
  deps: HandshakeDeps
): Promise<AcceptedHandshake> {
  const { token, username } = credentials;
  if (typeof token !== 'string' || token.length === 0) {
    throw new HandshakeError(CloseCode.AUTH_REQUIRED);
  }

  const verified = await deps.auth.verifyToken(token);
  if (!verified) {
    throw new HandshakeError(CloseCode.INVALID_AUTH);
  }
  if (typeof username === 'string' && username !== verified.username) {
    throw new HandshakeError(CloseCode.INVALID_AUTH);
  }
  if (typeof username !== 'string' || !deps.auth.isValidUsername(username)) {
    throw new HandshakeError(CloseCode.INVALID_USERNAME);
  }

  if (deps.registry.isFull(username)) {
    throw new HandshakeError(CloseCode.CAPACITY_EXCEEDED);
  }

  return { identity: username, sessionToken: verified.sessionToken };
}

// Per-socket data; set by the handshake middleware, read on 'connection'
export interface ConnectionData {
  accepted?: AcceptedHandshake;
}

type GatewayServer = SocketIOServer<DefaultEventsMap, DefaultEventsMap, DefaultEventsMap, ConnectionData>;
type GatewaySocket = Socket<DefaultEventsMap, DefaultEventsMap, DefaultEventsMap, ConnectionData>;

// Query values arrive as string | string[]; only a single string counts
function firstQueryValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

// The parts of a socket.io socket the handshake middleware touches
export interface HandshakeSocket {
  id: string;
  handshake: {
    auth: Record<string, unknown>;
    query: ParsedUrlQuery;
  };
  data: ConnectionData;
}

/**
 * socket.io middleware: resolves the handshake and leaves the result on
 * `socket.data` for the 'connection' handler, or fails the connect.
 */
export function createHandshakeMiddleware(deps: HandshakeDeps, logger: LoggerService) {
  return (socket: HandshakeSocket, next: (error?: HandshakeError) => void): void => {
    const { auth, query } = socket.handshake;
    const credentials: HandshakeCredentials = {
      token: auth.token ?? firstQueryValue(query.token),
      username: auth.username ?? firstQueryValue(query.username),
    };

    resolveHandshake(credentials, deps).then(
      (accepted) => {
        socket.data.accepted = accepted;
        next();
      },
      (error: unknown) => {
        if (error instanceof HandshakeError) {
          logger.info(`Handshake rejected for ${socket.id}: ${error.data.code} ${error.data.reason}`);
          next(error);
          return;
        }
        logger.error(`Handshake failed for ${socket.id}`, error);
        next(new HandshakeError(CloseCode.INTERNAL_ERROR));
      }
    );
  };
}

const CLOSE_CODE_FOR: Record<Exclude<RemovalReason, 'disconnect'>, CloseCode> = {
  kicked: CloseCode.KICKED,
  replaced: CloseCode.REPLACED,
  stale: CloseCode.STALE,
  send_failed: CloseCode.INTERNAL_ERROR,
  error: CloseCode.INTERNAL_ERROR,
};

export interface ChatServiceDeps {
  auth: AuthService;
  store: ChatStore;
  registry: ConnectionRegistry;
  gate: ModerationGate;
  logger: LoggerService;
  corsOrigin: string;
}

/**
 * The socket.io side of the gateway: authenticates the handshake, binds each
 * accepted socket to a registry entry and feeds its messages to the gate.
 */
export class ChatService {
  private io: GatewayServer;
  private auth: AuthService;
  private store: ChatStore;
  private registry: ConnectionRegistry;
  private gate: ModerationGate;
  private logger: LoggerService;
  private detachRemoved: () => void;

  constructor(httpServer: HttpServer, deps: ChatServiceDeps) {
    this.auth = deps.auth;
    this.store = deps.store;
    this.registry = deps.registry;
    this.gate = deps.gate;
    this.logger = deps.logger;

    this.io = new SocketIOServer<DefaultEventsMap, DefaultEventsMap, DefaultEventsMap, ConnectionData>(httpServer, {
      cors: {
        origin: deps.corsOrigin,
        methods: ['GET', 'POST'],
      },
    });

    this.detachRemoved = this.registry.onRemoved((connection, reason) => this.handleRemoved(connection, reason));
    this.setupSocketHandlers();
    this.logger.info('Initialized');
  }

  private setupSocketHandlers(): void {
    this.io.use(createHandshakeMiddleware({ auth: this.auth, registry: this.registry }, this.logger));
    this.io.on('connection', (socket) => this.onConnection(socket));
  }

  private onConnection(socket: GatewaySocket): void {
    const { accepted } = socket.data;
    if (!accepted) {
      socket.emit('closing', { code: CloseCode.AUTH_REQUIRED, reason: CLOSE_REASONS[CloseCode.AUTH_REQUIRED] });
      socket.disconnect(true);
      return;
    }

    const connection = new SocketConnection(socket, accepted.identity, accepted.sessionToken);
    const registered = this.registry.register(connection);
    if (!registered.ok) {
      this.logger.warn(`Connection limit reached, rejecting ${accepted.identity}`);
      connection.close(CloseCode.CAPACITY_EXCEEDED);
      return;
    }

    this.logger.info(`${accepted.identity} connected (${this.registry.countLive()} live)`);

    // One message at a time per connection, in arrival order
    let queue: Promise<void> = Promise.resolve();
    const onMessage: ClientToServerEvents['message'] = (payload) => {
      queue = queue
        .then(() => this.gate.handle(connection, payload))
        .then(
          () => undefined,
          (error: unknown) => {
            this.logger.error(`Unhandled error processing message from ${connection.identity}`, error);
          }
        );
    };
    socket.on('message', onMessage);

    socket.on('disconnect', (reason: string) => {
      if (this.registry.unregister(connection, 'disconnect')) {
        this.logger.info(`${connection.identity} disconnected: ${reason}`);
      }
    });

    socket.on('error', (error: Error) => {
      this.logger.error(`Socket error for ${connection.identity}`, error);
      this.registry.unregister(connection, 'error');
    });
  }

  /**
   * Runs once per removal: close the socket if it is still open and, unless
   * a newer connection took over, end the session it was opened with.
   */
  private handleRemoved(connection: ChatConnection, reason: RemovalReason): void {
    if (reason !== 'disconnect') {
      connection.close(CLOSE_CODE_FOR[reason]);
    }
    if (reason === 'replaced' || !connection.sessionToken) return;

    this.store.invalidateSession(connection.sessionToken).then(
      (invalidated) => {
        if (invalidated) {
          this.logger.debug(`Invalidated session for ${connection.identity} (${reason})`);
        }
      },
      (error: unknown) => {
        this.logger.error(`Failed to invalidate session for ${connection.identity}`, error);
      }
    );
  }

  /**
   * Close every live connection, then socket.io and the HTTP server under it
   */
  close(): Promise<void> {
    this.detachRemoved();
    for (const connection of this.registry.snapshot()) {
      this.registry.unregister(connection, 'disconnect');
      connection.close(CloseCode.INTERNAL_ERROR);
    }
    return new Promise((resolve, reject) => {
      this.io
        .close((error) => {
          if (error) {
            this.logger.warn(`HTTP server was not running: ${error.message}`);
          }
          resolve();
        })
        .catch(reject);
    });
  }
}
