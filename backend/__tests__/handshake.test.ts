import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  createHandshakeMiddleware,
  HandshakeError,
  resolveHandshake,
  type HandshakeDeps,
  type HandshakeSocket,
} from '../src/services/ChatService';
import { AuthService } from '../src/services/AuthService';
import { ConnectionRegistry } from '../src/services/ConnectionRegistry';
import { SqliteChatStore } from '../src/services/SqliteChatStore';
import { CloseCode } from '../src/models/ChatMessage';
import { FakeConnection, testLogger } from './helpers';

describe('resolveHandshake', () => {
  let store: SqliteChatStore;
  let deps: HandshakeDeps;
  let token: string;

  beforeEach(async () => {
    store = new SqliteChatStore({ filename: ':memory:' });
    const auth = new AuthService(store, testLogger(), {
      jwtSecret: 'test-secret',
      tokenExpiryMinutes: 30,
      sessionDurationHours: 24,
      saltRounds: 4,
      maxUsernameLength: 50,
    });
    deps = { auth, registry: new ConnectionRegistry(1, testLogger()) };

    await auth.registerUser('alice', 'test-password');
    const issued = await auth.loginUser({ username: 'alice', password: 'test-password' });
    if (!issued) throw new Error('login failed');
    token = issued;
  });

  afterEach(() => {
    store.close();
  });

  it('accepts a matching credential and identity', async () => {
    const accepted = await resolveHandshake({ token, username: 'alice' }, deps);
    expect(accepted.identity).toBe('alice');
    expect(accepted.sessionToken).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('requires a credential', async () => {
    await expect(resolveHandshake({ username: 'alice' }, deps)).rejects.toMatchObject({
      data: { code: CloseCode.AUTH_REQUIRED, reason: 'Authentication required' },
    });
    await expect(resolveHandshake({ token: '', username: 'alice' }, deps)).rejects.toBeInstanceOf(HandshakeError);
  });

  it('rejects a credential that does not verify', async () => {
    await expect(resolveHandshake({ token: 'forged', username: 'alice' }, deps)).rejects.toMatchObject({
      data: { code: CloseCode.INVALID_AUTH, reason: 'Invalid authentication' },
    });
  });

  it('rejects impersonation', async () => {
    await expect(resolveHandshake({ token, username: 'mallory' }, deps)).rejects.toMatchObject({
      data: { code: CloseCode.INVALID_AUTH },
    });
  });

  it('rejects a missing identity', async () => {
    await expect(resolveHandshake({ token }, deps)).rejects.toMatchObject({
      data: { code: CloseCode.INVALID_USERNAME, reason: 'Invalid username' },
    });
  });

  it('turns new identities away at capacity', async () => {
    deps.registry.register(new FakeConnection('carol'));

    await expect(resolveHandshake({ token, username: 'alice' }, deps)).rejects.toMatchObject({
      data: { code: CloseCode.CAPACITY_EXCEEDED, reason: 'Server at capacity' },
    });
  });

  it('lets a connected identity reconnect at capacity', async () => {
    deps.registry.register(new FakeConnection('alice'));

    await expect(resolveHandshake({ token, username: 'alice' }, deps)).resolves.toMatchObject({ identity: 'alice' });
  });
});

describe('createHandshakeMiddleware', () => {
  let store: SqliteChatStore;
  let deps: HandshakeDeps;
  let token: string;

  beforeEach(async () => {
    store = new SqliteChatStore({ filename: ':memory:' });
    const auth = new AuthService(store, testLogger(), {
      jwtSecret: 'test-secret',
      tokenExpiryMinutes: 30,
      sessionDurationHours: 24,
      saltRounds: 4,
      maxUsernameLength: 50,
    });
    deps = { auth, registry: new ConnectionRegistry(5, testLogger()) };

    await auth.registerUser('alice', 'test-password');
    const issued = await auth.loginUser({ username: 'alice', password: 'test-password' });
    if (!issued) throw new Error('login failed');
    token = issued;
  });

  afterEach(() => {
    store.close();
  });

  function socketWith(auth: Record<string, unknown>, query: Record<string, string | string[]> = {}): HandshakeSocket {
    return { id: 'socket-1', handshake: { auth, query }, data: {} };
  }

  it('leaves the accepted handshake on the socket itself', async () => {
    const middleware = createHandshakeMiddleware(deps, testLogger());
    const socket = socketWith({ token, username: 'alice' });
    const next = vi.fn();

    middleware(socket, next);

    await vi.waitFor(() => expect(next).toHaveBeenCalledWith());
    expect(socket.data.accepted).toMatchObject({ identity: 'alice' });
  });

  it('reads credentials from the query when the auth payload has none', async () => {
    const middleware = createHandshakeMiddleware(deps, testLogger());
    const socket = socketWith({}, { token, username: ['alice', 'ignored'] });
    const next = vi.fn();

    middleware(socket, next);

    await vi.waitFor(() => expect(next).toHaveBeenCalledWith());
    expect(socket.data.accepted).toMatchObject({ identity: 'alice' });
  });

  it('fails the connect and stores nothing on rejection', async () => {
    const middleware = createHandshakeMiddleware(deps, testLogger());
    const socket = socketWith({ username: 'alice' });
    const next = vi.fn();

    middleware(socket, next);

    await vi.waitFor(() => expect(next).toHaveBeenCalledTimes(1));
    expect(next.mock.calls[0][0]).toMatchObject({ data: { code: CloseCode.AUTH_REQUIRED } });
    expect(socket.data).toEqual({});
  });
});
