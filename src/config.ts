import dotenv from 'dotenv';

import { ConfigError } from './errors.js';
import { isIntegrityCheckName, type IntegrityCheckName } from './protocol/checksum.js';
import {
  DEFAULT_DENY_DISPLAY_SECONDS,
  DEFAULT_GRANT_DISPLAY_SECONDS,
  DEFAULT_MAX_FRAME_SIZE,
  DEFAULT_ONLINE_TIMEOUT_MS,
  MAX_ONLINE_TIMEOUT_MS,
  MIN_ONLINE_TIMEOUT_MS
} from './protocol/constants.js';
import type { ValidationMode } from './types.js';

dotenv.config();

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export type StoreDriver = 'postgres' | 'memory';

type Env = Record<string, string | undefined>;

export const parsePort = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0 || parsed > 65535) {
    return fallback;
  }

  return parsed;
};

export const parseNonNegativeInt = (value: string | undefined, fallback: number): number => {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    return fallback;
  }

  return parsed;
};

/** Like {@link parseNonNegativeInt}, then clamped into `[min, max]`. */
export const parseBoundedInt = (value: string | undefined, fallback: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, parseNonNegativeInt(value, fallback)));

export const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
};

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

const parseLogLevel = (value: string | undefined, fallback: LogLevel): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
};

const parseValidationMode = (value: string | undefined, fallback: ValidationMode): ValidationMode => {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'online' || normalized === 'offline') {
    return normalized;
  }
  return fallback;
};

const parseStoreDriver = (value: string | undefined, fallback: StoreDriver): StoreDriver => {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'postgres' || normalized === 'pg') {
    return 'postgres';
  }
  if (normalized === 'memory') {
    return 'memory';
  }
  return fallback;
};

const parseIntegrityCheck = (value: string | undefined): IntegrityCheckName => {
  if (!value) {
    return 'xor8';
  }

  const normalized = value.trim().toLowerCase();
  if (!isIntegrityCheckName(normalized)) {
    throw new ConfigError(`PROTOCOL_INTEGRITY_CHECK must be xor8, sum8 or crc16, got '${value}'`);
  }
  return normalized;
};

const normalizeBasePath = (value: string | undefined): string => {
  if (!value) {
    return '/';
  }

  let normalized = value.trim();
  if (normalized === '') {
    return '/';
  }

  if (!normalized.startsWith('/')) {
    normalized = `/${normalized}`;
  }

  if (normalized.length > 1 && normalized.endsWith('/')) {
    normalized = normalized.replace(/\/+$/, '');
  }

  return normalized;
};

const optionalString = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const loadConfig = (env: Env = process.env) => {
  const mode = parseValidationMode(env.VALIDATION_MODE, 'offline');
  const remoteUrl = optionalString(env.REMOTE_AUTH_URL);
  if (mode === 'online' && !remoteUrl) {
    throw new ConfigError('VALIDATION_MODE=online requires REMOTE_AUTH_URL');
  }

  return {
    logLevel: parseLogLevel(env.LOG_LEVEL, 'info'),
    server: {
      host: env.TURNSTILE_HOST || '0.0.0.0',
      port: parsePort(env.TURNSTILE_PORT, 3000),
      maxConnections: Math.max(1, parseNonNegativeInt(env.TURNSTILE_MAX_CONNECTIONS, 100)),
      maxConsecutiveErrors: Math.max(1, parseNonNegativeInt(env.TURNSTILE_MAX_CONSECUTIVE_ERRORS, 10)),
      idleTimeoutMs: parseNonNegativeInt(env.TURNSTILE_IDLE_TIMEOUT_MS, 0)
    },
    protocol: {
      integrityCheck: parseIntegrityCheck(env.PROTOCOL_INTEGRITY_CHECK),
      maxFrameSize: parseBoundedInt(env.PROTOCOL_MAX_FRAME_SIZE, DEFAULT_MAX_FRAME_SIZE, 64, 1024 * 1024),
      grantDisplaySeconds: parseBoundedInt(env.GRANT_DISPLAY_SECONDS, DEFAULT_GRANT_DISPLAY_SECONDS, 0, 255),
      denyDisplaySeconds: parseBoundedInt(env.DENY_DISPLAY_SECONDS, DEFAULT_DENY_DISPLAY_SECONDS, 0, 255)
    },
    turnstile: {
      rotationTimeoutMs: Math.max(1, parseNonNegativeInt(env.ROTATION_TIMEOUT_MS, 10000)),
      historyLimit: Math.max(1, parseNonNegativeInt(env.TURNSTILE_HISTORY_LIMIT, 100))
    },
    validation: {
      mode,
      antiPassbackWindowMs: parseNonNegativeInt(env.ANTI_PASSBACK_WINDOW_MS, 5 * 60 * 1000),
      logDenials: parseBoolean(env.LOG_DENIALS, true),
      online: {
        url: remoteUrl ?? '',
        apiKey: optionalString(env.REMOTE_AUTH_API_KEY),
        timeoutMs: parseBoundedInt(
          env.REMOTE_AUTH_TIMEOUT_MS,
          DEFAULT_ONLINE_TIMEOUT_MS,
          MIN_ONLINE_TIMEOUT_MS,
          MAX_ONLINE_TIMEOUT_MS
        ),
        retries: parseBoundedInt(env.REMOTE_AUTH_RETRIES, 2, 0, 10),
        retryDelayMs: parseNonNegativeInt(env.REMOTE_AUTH_RETRY_DELAY_MS, 100)
      }
    },
    store: {
      driver: parseStoreDriver(env.ACCESS_STORE, 'postgres'),
      seedFile: optionalString(env.ACCESS_SEED_FILE)
    },
    db: {
      host: env.DB_HOST || 'localhost',
      port: parsePort(env.DB_PORT, 5432),
      user: env.DB_USER || 'turnstile',
      password: env.DB_PASSWORD || 'turnstile',
      database: env.DB_NAME || 'turnstile_access',
      ssl: parseBoolean(env.DB_SSL, false)
    },
    webInterface: {
      enabled: parseBoolean(env.WEB_ENABLED, false),
      port: parsePort(env.HTTP_PORT, 3001),
      basePath: normalizeBasePath(env.BASE_PATH),
      apiKey: optionalString(env.WEB_API_KEY),
      historySize: Math.max(1, parseNonNegativeInt(env.WEB_HISTORY_SIZE, 50))
    }
  };
};

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig();
