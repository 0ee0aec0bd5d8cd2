import dotenv from 'dotenv';

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function floatFromEnv(name: string, fallback: number): number {
  const parsed = parseFloat(process.env[name] || '');
  return Number.isNaN(parsed) ? fallback : parsed;
}

function boolFromEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  return raw.toLowerCase() === 'true';
}

/**
 * Configuration for the chat gateway
 */
const appConfig = {
  // HTTP + socket.io port
  port: intFromEnv('PORT', 8000),

  corsOrigin: process.env.CORS_ORIGIN || '*',

  auth: {
    // Secret for signing JWTs - override in every real deployment
    jwtSecret: process.env.JWT_SECRET_KEY || 'change-me-in-production',
    tokenExpiryMinutes: intFromEnv('JWT_EXPIRE_MINUTES', 30),
    sessionDurationHours: intFromEnv('SESSION_DURATION_HOURS', 24),
    saltRounds: 10,
    maxUsernameLength: intFromEnv('MAX_USERNAME_LENGTH', 50),
  },

  // SQLite file; ':memory:' keeps everything in process
  databasePath: process.env.DATABASE_PATH || './data/chat.db',

  connections: {
    maxConnections: intFromEnv('MAX_CONNECTIONS', 1000),
  },

  moderation: {
    defaultThreshold: floatFromEnv('TOXIC_THRESHOLD', 0.6),
    muteDurationSecs: 300,
  },

  maintenance: {
    cleanupIntervalSecs: intFromEnv('CLEANUP_INTERVAL', 300),
    // Wait after a failed sweep before trying again
    cleanupRetrySecs: intFromEnv('CLEANUP_RETRY_SECS', 60),
  },

  gifts: {
    intervalSecs: intFromEnv('GIFT_INTERVAL_SECS', 15),
    jitterSecs: intFromEnv('GIFT_JITTER_SECS', 5),
    backoffSecs: intFromEnv('GIFT_BACKOFF_SECS', 5),
    sender: process.env.GIFT_SENDER || 'bot',
    maxGiftId: 999,
    maxAmount: 10,
  },

  logging: {
    logDir: process.env.LOG_DIR || './logs',
    logToFile: boolFromEnv('LOG_TO_FILE', true),
    debug: boolFromEnv('DEBUG', false),
  },
};

export type AppConfig = typeof appConfig;

export default appConfig;
