import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { ChatStore, CreateSessionOptions, CreateUserResult } from './ChatStore';
import { isValidThreshold } from './ChatStore';
import type { StoredUser, UserSessionRecord } from '../models/User';
import type {
  AdminActionKind,
  AdminActionRecord,
  MessageType,
  NewAdminAction,
  NewChatMessage,
  StoredGiftEvent,
  StoredMessage,
} from '../models/ChatMessage';

const THRESHOLD_KEY = 'toxicity_threshold';

// Hash stored for users created implicitly; never matches a bcrypt hash
const UNUSABLE_PASSWORD = '!';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL UNIQUE,
    email TEXT UNIQUE,
    password_hash TEXT NOT NULL,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS messages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    message_text TEXT NOT NULL,
    toxicity_flag INTEGER NOT NULL DEFAULT 0,
    toxicity_score REAL,
    message_type TEXT NOT NULL DEFAULT 'chat',
    timestamp TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_messages_user_timestamp ON messages(user_id, timestamp);

  CREATE TABLE IF NOT EXISTS gift_events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    from_user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    gift_id INTEGER NOT NULL,
    amount INTEGER NOT NULL DEFAULT 1,
    timestamp TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS admin_actions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    admin_user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    action TEXT NOT NULL,
    target_username TEXT,
    action_details TEXT,
    timestamp TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_admin_actions_timestamp ON admin_actions(timestamp);

  CREATE TABLE IF NOT EXISTS user_mutes (
    user_id INTEGER PRIMARY KEY REFERENCES users(id) ON DELETE CASCADE,
    muted_until TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS user_sessions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    session_token TEXT NOT NULL UNIQUE,
    is_active INTEGER NOT NULL DEFAULT 1,
    user_agent TEXT,
    ip_address TEXT,
    created_at TEXT NOT NULL,
    last_activity TEXT NOT NULL,
    expires_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_user_sessions_user_active ON user_sessions(user_id, is_active);

  CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
`;

interface UserRow {
  id: number;
  username: string;
  email: string | null;
  password_hash: string;
  is_active: number;
  created_at: string;
  updated_at: string;
}

interface MessageRow {
  id: number;
  user_id: number;
  username: string;
  message_text: string;
  toxicity_flag: number;
  toxicity_score: number | null;
  message_type: MessageType;
  timestamp: string;
}

interface AdminActionRow {
  id: number;
  admin_username: string;
  action: AdminActionKind;
  target_username: string | null;
  action_details: string | null;
  timestamp: string;
}

interface SessionRow {
  id: number;
  user_id: number;
  session_token: string;
  is_active: number;
  user_agent: string | null;
  ip_address: string | null;
  created_at: string;
  last_activity: string;
  expires_at: string;
}

function toUser(row: UserRow): StoredUser {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    isActive: row.is_active === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toSession(row: SessionRow): UserSessionRecord {
  return {
    id: row.id,
    userId: row.user_id,
    sessionToken: row.session_token,
    isActive: row.is_active === 1,
    userAgent: row.user_agent,
    ipAddress: row.ip_address,
    createdAt: row.created_at,
    lastActivity: row.last_activity,
    expiresAt: row.expires_at,
  };
}

function toAdminAction(row: AdminActionRow): AdminActionRecord {
  return {
    id: row.id,
    adminUsername: row.admin_username,
    action: row.action,
    targetUsername: row.target_username,
    details: row.action_details,
    timestamp: row.timestamp,
  };
}

export interface SqliteChatStoreOptions {
  // ':memory:' for a throwaway database
  filename: string;
  defaultThreshold?: number;
}

/**
 * ChatStore on a single SQLite file. Calls are synchronous underneath; the
 * async signatures keep the interface open to networked stores.
 */
export class SqliteChatStore implements ChatStore {
  private db: Database.Database;
  private defaultThreshold: number;

  constructor(options: SqliteChatStoreOptions) {
    if (options.filename !== ':memory:') {
      const dir = path.dirname(path.resolve(options.filename));
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(options.filename);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA);
    this.defaultThreshold = options.defaultThreshold ?? 0.6;
  }

  // Users

  async ensureUser(username: string): Promise<StoredUser> {
    const now = new Date().toISOString();
    // Implicit users carry no email, so only the username can conflict
    this.db
      .prepare(
        `INSERT INTO users (username, email, password_hash, is_active, created_at, updated_at)
         VALUES (?, NULL, ?, 1, ?, ?)
         ON CONFLICT(username) DO NOTHING`
      )
      .run(username, UNUSABLE_PASSWORD, now, now);

    const row = this.db.prepare<[string], UserRow>('SELECT * FROM users WHERE username = ?').get(username);
    if (!row) {
      throw new Error(`User ${username} could not be created`);
    }
    return toUser(row);
  }

  async createUser(username: string, email: string | null, passwordHash: string): Promise<CreateUserResult> {
    const now = new Date().toISOString();
    const create = this.db.transaction((): CreateUserResult => {
      if (this.db.prepare('SELECT 1 FROM users WHERE username = ?').get(username)) {
        return { ok: false, conflict: 'username' };
      }
      if (email && this.db.prepare('SELECT 1 FROM users WHERE email = ?').get(email)) {
        return { ok: false, conflict: 'email' };
      }
      const result = this.db
        .prepare(
          `INSERT INTO users (username, email, password_hash, is_active, created_at, updated_at)
           VALUES (?, ?, ?, 1, ?, ?)`
        )
        .run(username, email || null, passwordHash, now, now);

      const row = this.db
        .prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?')
        .get(Number(result.lastInsertRowid));
      if (!row) {
        throw new Error(`User ${username} was not created`);
      }
      return { ok: true, user: toUser(row) };
    });
    return create();
  }

  async getUserByUsername(username: string): Promise<StoredUser | null> {
    const row = this.db.prepare<[string], UserRow>('SELECT * FROM users WHERE username = ?').get(username);
    return row ? toUser(row) : null;
  }

  async deleteUser(userId: number): Promise<boolean> {
    const result = this.db.prepare('DELETE FROM users WHERE id = ?').run(userId);
    return result.changes > 0;
  }

  // Messages and gifts

  async saveMessage(message: NewChatMessage): Promise<StoredMessage> {
    const timestamp = new Date().toISOString();
    const result = this.db
      .prepare(
        `INSERT INTO messages (user_id, message_text, toxicity_flag, toxicity_score, message_type, timestamp)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(message.userId, message.text, message.toxic ? 1 : 0, message.score, message.type, timestamp);

    return { ...message, id: Number(result.lastInsertRowid), timestamp };
  }

  async getRecentMessages(limit: number): Promise<Array<StoredMessage & { username: string }>> {
    const rows = this.db
      .prepare<[number], MessageRow>(
        `SELECT m.*, u.username FROM messages m
         JOIN users u ON u.id = m.user_id
         ORDER BY m.id DESC LIMIT ?`
      )
      .all(limit);

    return rows.map((row) => ({
      id: row.id,
      userId: row.user_id,
      username: row.username,
      text: row.message_text,
      toxic: row.toxicity_flag === 1,
      score: row.toxicity_score ?? 0,
      type: row.message_type,
      timestamp: row.timestamp,
    }));
  }

  async saveGiftEvent(fromUserId: number, giftId: number, amount: number): Promise<StoredGiftEvent> {
    const timestamp = new Date().toISOString();
    const result = this.db
      .prepare('INSERT INTO gift_events (from_user_id, gift_id, amount, timestamp) VALUES (?, ?, ?, ?)')
      .run(fromUserId, giftId, amount, timestamp);

    return { id: Number(result.lastInsertRowid), fromUserId, giftId, amount, timestamp };
  }

  // Audit log

  async logAdminAction(action: NewAdminAction): Promise<AdminActionRecord> {
    const timestamp = new Date().toISOString();
    const result = this.db
      .prepare(
        `INSERT INTO admin_actions (admin_user_id, action, target_username, action_details, timestamp)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(action.adminUserId, action.action, action.targetUsername ?? null, action.details ?? null, timestamp);

    const row = this.db
      .prepare<[number], AdminActionRow>(
        `SELECT a.id, u.username AS admin_username, a.action, a.target_username, a.action_details, a.timestamp
         FROM admin_actions a JOIN users u ON u.id = a.admin_user_id
         WHERE a.id = ?`
      )
      .get(Number(result.lastInsertRowid));
    if (!row) {
      throw new Error('Admin action was not recorded');
    }
    return toAdminAction(row);
  }

  async listAdminActions(limit: number): Promise<AdminActionRecord[]> {
    const rows = this.db
      .prepare<[number], AdminActionRow>(
        `SELECT a.id, u.username AS admin_username, a.action, a.target_username, a.action_details, a.timestamp
         FROM admin_actions a JOIN users u ON u.id = a.admin_user_id
         ORDER BY a.id DESC LIMIT ?`
      )
      .all(limit);
    return rows.map(toAdminAction);
  }

  // Mutes

  async setUserMute(userId: number, until: Date): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO user_mutes (user_id, muted_until) VALUES (?, ?)
         ON CONFLICT(user_id) DO UPDATE SET muted_until = excluded.muted_until`
      )
      .run(userId, until.toISOString());
  }

  async getUserMute(userId: number): Promise<Date | null> {
    const row = this.db
      .prepare<[number], { muted_until: string }>('SELECT muted_until FROM user_mutes WHERE user_id = ?')
      .get(userId);
    return row ? new Date(row.muted_until) : null;
  }

  async clearUserMute(userId: number): Promise<boolean> {
    return this.db.prepare('DELETE FROM user_mutes WHERE user_id = ?').run(userId).changes > 0;
  }

  async cleanupExpiredMutes(now: Date): Promise<number> {
    return this.db.prepare('DELETE FROM user_mutes WHERE muted_until <= ?').run(now.toISOString()).changes;
  }

  // Sessions

  async createSession(userId: number, options: CreateSessionOptions): Promise<UserSessionRecord> {
    const now = options.now ?? new Date();
    const expiresAt = new Date(now.getTime() + options.durationHours * 60 * 60 * 1000);
    const sessionToken = uuidv4();

    const create = this.db.transaction(() => {
      // Newest login supersedes any session still open for the user
      this.db.prepare('UPDATE user_sessions SET is_active = 0 WHERE user_id = ? AND is_active = 1').run(userId);
      this.db
        .prepare(
          `INSERT INTO user_sessions
             (user_id, session_token, is_active, user_agent, ip_address, created_at, last_activity, expires_at)
           VALUES (?, ?, 1, ?, ?, ?, ?, ?)`
        )
        .run(
          userId,
          sessionToken,
          options.userAgent ?? null,
          options.ipAddress ?? null,
          now.toISOString(),
          now.toISOString(),
          expiresAt.toISOString()
        );
    });
    create();

    const row = this.db
      .prepare<[string], SessionRow>('SELECT * FROM user_sessions WHERE session_token = ?')
      .get(sessionToken);
    if (!row) {
      throw new Error('Session was not created');
    }
    return toSession(row);
  }

  async getActiveSessionByToken(sessionToken: string, now: Date): Promise<UserSessionRecord | null> {
    const row = this.db
      .prepare<[string, string], SessionRow>(
        'SELECT * FROM user_sessions WHERE session_token = ? AND is_active = 1 AND expires_at > ?'
      )
      .get(sessionToken, now.toISOString());
    return row ? toSession(row) : null;
  }

  async touchSession(sessionToken: string, now: Date): Promise<void> {
    this.db
      .prepare('UPDATE user_sessions SET last_activity = ? WHERE session_token = ?')
      .run(now.toISOString(), sessionToken);
  }

  async invalidateSession(sessionToken: string): Promise<boolean> {
    return (
      this.db
        .prepare('UPDATE user_sessions SET is_active = 0 WHERE session_token = ? AND is_active = 1')
        .run(sessionToken).changes > 0
    );
  }

  async invalidateUserSessions(userId: number): Promise<number> {
    return this.db
      .prepare('UPDATE user_sessions SET is_active = 0 WHERE user_id = ? AND is_active = 1')
      .run(userId).changes;
  }

  async cleanupExpiredSessions(now: Date): Promise<number> {
    return this.db
      .prepare('UPDATE user_sessions SET is_active = 0 WHERE is_active = 1 AND expires_at <= ?')
      .run(now.toISOString()).changes;
  }

  // Settings

  async getToxicityThreshold(): Promise<number> {
    const row = this.db
      .prepare<[string], { value: string }>('SELECT value FROM settings WHERE key = ?')
      .get(THRESHOLD_KEY);
    if (!row) return this.defaultThreshold;

    const value = parseFloat(row.value);
    return isValidThreshold(value) ? value : this.defaultThreshold;
  }

  async setToxicityThreshold(value: number): Promise<void> {
    if (!isValidThreshold(value)) {
      throw new RangeError(`Toxicity threshold must be between 0.0 and 1.0, got ${value}`);
    }
    this.db
      .prepare(
        `INSERT INTO settings (key, value, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`
      )
      .run(THRESHOLD_KEY, String(value), new Date().toISOString());
  }

  close(): void {
    this.db.close();
  }
}
