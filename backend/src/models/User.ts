// File: User.ts

export interface UserCredentials {
  username: string;
  password: string;
}

/**
 * Durable user record as the store returns it
 */
export interface StoredUser {
  id: number;
  username: string;
  email: string | null;
  passwordHash: string;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

/**
 * One login; at most one is active per user
 */
export interface UserSessionRecord {
  id: number;
  userId: number;
  sessionToken: string;
  isActive: boolean;
  userAgent: string | null;
  ipAddress: string | null;
  createdAt: string;
  lastActivity: string;
  expiresAt: string;
}

export interface SessionOrigin {
  userAgent?: string | null;
  ipAddress?: string | null;
}

// Claims carried in the bearer token
export interface TokenPayload {
  sub: string;
  sid: string;
}

/**
 * Result of verifying a credential
 */
export interface AuthIdentity {
  userId: number;
  username: string;
  sessionToken: string;
}

export function toPublicUser(user: StoredUser) {
  return {
    username: user.username,
    email: user.email,
    created_at: user.createdAt,
  };
}
