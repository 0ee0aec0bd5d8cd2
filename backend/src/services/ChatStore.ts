import type { StoredUser, UserSessionRecord, SessionOrigin } from '../models/User';
import type {
  NewChatMessage,
  StoredMessage,
  StoredGiftEvent,
  NewAdminAction,
  AdminActionRecord,
} from '../models/ChatMessage';

export interface CreateSessionOptions extends SessionOrigin {
  durationHours: number;
  now?: Date;
}

export type CreateUserResult =
  | { ok: true; user: StoredUser }
  | { ok: false; conflict: 'username' | 'email' };

/**
 * Durable state behind the gateway: users, chat history, gifts, the admin
 * audit log, mutes, login sessions and the toxicity threshold setting.
 */
export interface ChatStore {
  // Users
  ensureUser(username: string): Promise<StoredUser>;
  createUser(username: string, email: string | null, passwordHash: string): Promise<CreateUserResult>;
  getUserByUsername(username: string): Promise<StoredUser | null>;
  deleteUser(userId: number): Promise<boolean>;

  // Messages and gifts
  saveMessage(message: NewChatMessage): Promise<StoredMessage>;
  getRecentMessages(limit: number): Promise<Array<StoredMessage & { username: string }>>;
  saveGiftEvent(fromUserId: number, giftId: number, amount: number): Promise<StoredGiftEvent>;

  // Audit log
  logAdminAction(action: NewAdminAction): Promise<AdminActionRecord>;
  listAdminActions(limit: number): Promise<AdminActionRecord[]>;

  // Mutes
  setUserMute(userId: number, until: Date): Promise<void>;
  getUserMute(userId: number): Promise<Date | null>;
  clearUserMute(userId: number): Promise<boolean>;
  cleanupExpiredMutes(now: Date): Promise<number>;

  // Sessions
  createSession(userId: number, options: CreateSessionOptions): Promise<UserSessionRecord>;
  getActiveSessionByToken(sessionToken: string, now: Date): Promise<UserSessionRecord | null>;
  touchSession(sessionToken: string, now: Date): Promise<void>;
  invalidateSession(sessionToken: string): Promise<boolean>;
  invalidateUserSessions(userId: number): Promise<number>;
  cleanupExpiredSessions(now: Date): Promise<number>;

  // Settings
  getToxicityThreshold(): Promise<number>;
  setToxicityThreshold(value: number): Promise<void>;

  close(): void;
}

export function isValidThreshold(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}
