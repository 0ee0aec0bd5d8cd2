// File: AuthService.ts
import bcrypt from 'bcrypt';
import jwt from 'jsonwebtoken';
import type { ChatStore } from './ChatStore';
import { LoggerService } from './LoggerService';
import type { AuthIdentity, SessionOrigin, StoredUser, TokenPayload, UserCredentials } from '../models/User';

const USERNAME_PATTERN = /^[a-zA-Z0-9._-]+$/;

export interface AuthOptions {
  jwtSecret: string;
  tokenExpiryMinutes: number;
  sessionDurationHours: number;
  saltRounds: number;
  maxUsernameLength: number;
}

export type RegisterResult =
  | { success: true; user: StoredUser }
  | { success: false; error: 'invalid_username' | 'username_taken' | 'email_taken' };

export class AuthService {
  private store: ChatStore;
  private logger: LoggerService;
  private options: AuthOptions;
  private now: () => Date;

  constructor(store: ChatStore, logger: LoggerService, options: AuthOptions, now: () => Date = () => new Date()) {
    this.store = store;
    this.logger = logger;
    this.options = options;
    this.now = now;
  }

  /**
   * Bounded length, letters, digits, dot, underscore and hyphen only
   */
  isValidUsername(username: string): boolean {
    if (!username || username.length > this.options.maxUsernameLength) {
      return false;
    }
    return USERNAME_PATTERN.test(username);
  }

  /**
   * Register a new user
   */
  async registerUser(username: string, password: string, email?: string): Promise<RegisterResult> {
    if (!this.isValidUsername(username)) {
      return { success: false, error: 'invalid_username' };
    }

    const passwordHash = await bcrypt.hash(password, this.options.saltRounds);
    const created = await this.store.createUser(username, email ?? null, passwordHash);

    if (!created.ok) {
      return { success: false, error: created.conflict === 'email' ? 'email_taken' : 'username_taken' };
    }
    this.logger.info(`Registered user ${username}`);
    return { success: true, user: created.user };
  }

  /**
   * Authenticate a user and return a JWT bound to a fresh session. Any session
   * the user still had open is superseded.
   */
  async loginUser(credentials: UserCredentials, origin: SessionOrigin = {}): Promise<string | null> {
    const user = await this.store.getUserByUsername(credentials.username);
    if (!user || !user.isActive || !user.passwordHash.startsWith('$2')) {
      return null;
    }

    const passwordMatch = await bcrypt.compare(credentials.password, user.passwordHash);
    if (!passwordMatch) {
      return null;
    }

    const token = await this.openSession(user, origin);
    this.logger.info(`User ${user.username} logged in from ${origin.ipAddress ?? 'unknown address'}`);
    return token;
  }

  /**
   * Start a session for an already authenticated user and sign a token for it
   */
  async openSession(user: StoredUser, origin: SessionOrigin = {}): Promise<string> {
    const session = await this.store.createSession(user.id, {
      durationHours: this.options.sessionDurationHours,
      userAgent: origin.userAgent,
      ipAddress: origin.ipAddress,
      now: this.now(),
    });
    return this.issueToken(user.username, session.sessionToken);
  }

  getUser(username: string): Promise<StoredUser | null> {
    return this.store.getUserByUsername(username);
  }

  issueToken(username: string, sessionToken: string): string {
    const claims: TokenPayload = { sub: username, sid: sessionToken };
    return jwt.sign(claims, this.options.jwtSecret, {
      expiresIn: this.options.tokenExpiryMinutes * 60,
    });
  }

  /**
   * Verify a JWT and the session it names; returns null for anything invalid
   */
  async verifyToken(token: string): Promise<AuthIdentity | null> {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.jwtSecret);
    } catch (error) {
      this.logger.debug('Token verification failed', { reason: error instanceof Error ? error.message : String(error) });
      return null;
    }

    if (typeof decoded === 'string' || typeof decoded.sub !== 'string' || typeof decoded.sid !== 'string') {
      return null;
    }
    const username: string = decoded.sub;
    const sessionToken: string = decoded.sid;

    const user = await this.store.getUserByUsername(username);
    if (!user || !user.isActive) {
      return null;
    }

    const now = this.now();
    const session = await this.store.getActiveSessionByToken(sessionToken, now);
    if (!session || session.userId !== user.id) {
      return null;
    }

    await this.store.touchSession(sessionToken, now);
    return { userId: user.id, username: user.username, sessionToken };
  }

  /**
   * Invalidate every session the user holds
   */
  async logout(username: string): Promise<boolean> {
    const user = await this.store.getUserByUsername(username);
    if (!user) {
      return false;
    }
    const invalidated = await this.store.invalidateUserSessions(user.id);
    return invalidated > 0;
  }
}
