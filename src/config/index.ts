import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config({
  quiet: process.env.NODE_ENV === 'test' || process.env.DOTENV_CONFIG_QUIET === 'true',
});

export type WakeSenderMode = 'auto' | 'command' | 'library';

function getEnvNumber(key: string, defaultValue: number): number {
  const rawValue = process.env[key];
  const parsedValue = rawValue ? parseInt(rawValue, 10) : defaultValue;
  return Number.isNaN(parsedValue) ? defaultValue : parsedValue;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const rawValue = process.env[key];
  if (rawValue === undefined) {
    return defaultValue;
  }

  return ['1', 'true', 'yes', 'on'].includes(rawValue.toLowerCase());
}

export function parseWakeSenderMode(value: string | undefined): WakeSenderMode {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'command' || normalized === 'library') {
    return normalized;
  }

  return 'auto';
}

const parsedCorsOrigins = process.env.CORS_ORIGINS
  ?.split(',')
  .map((origin) => origin.trim())
  .filter((origin) => origin.length > 0);

export const config = {
  server: {
    // The listen port lives in the registry document; a restart is needed to change it.
    host: process.env.HOST || '0.0.0.0',
    env: process.env.NODE_ENV || 'development',
    trustProxy: getEnvBoolean('TRUST_PROXY', false),
  },
  registry: {
    path: process.env.REGISTRY_PATH || './data/servers.json',
  },
  database: {
    path: process.env.ADMIN_DB_PATH || './db/admin.db',
  },
  session: {
    secret: process.env.SESSION_SECRET || '',
    cookieSecure: getEnvBoolean('SESSION_COOKIE_SECURE', false),
    unlockTtlMs: getEnvNumber('UNLOCK_TTL_HOURS', 24) * 60 * 60 * 1000,
  },
  wake: {
    sender: parseWakeSenderMode(process.env.WOL_SENDER),
    commandTimeoutMs: getEnvNumber('WOL_COMMAND_TIMEOUT_MS', 5000),
  },
  readiness: {
    probeTimeoutMs: getEnvNumber('PROBE_TIMEOUT_MS', 1000),
    pollIntervalSeconds: getEnvNumber('POLL_INTERVAL_SECONDS', 2),
  },
  admin: {
    enabled: getEnvBoolean('ADMIN_ENABLED', false),
    bootstrapUsername: process.env.ADMIN_USERNAME || '',
    bootstrapPassword: process.env.ADMIN_PASSWORD || '',
  },
  cors: {
    origins: parsedCorsOrigins ?? [],
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    toFile: getEnvBoolean('LOG_TO_FILE', true),
    dir: process.env.LOG_DIR || './logs',
  },
};
