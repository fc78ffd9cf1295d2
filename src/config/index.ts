// src/config/index.ts
import { ConfigurationError } from '../utils/errors';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: string;
  databasePath: string;
  accessTokenExpireMinutes: number;
  bcryptSaltRounds: number;
  gemini: {
    apiKey: string | undefined;
    model: string;
    baseUrl: string;
    timeoutMs: number;
  };
}

const parseInteger = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

// Read on every call so tests can adjust process.env between cases.
export const getConfig = (): AppConfig => ({
  port: parseInteger(process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV || 'development',
  logLevel: process.env.LOG_LEVEL || 'info',
  databasePath: process.env.DATABASE_PATH || 'ledger.db',
  accessTokenExpireMinutes: parseInteger(process.env.ACCESS_TOKEN_EXPIRE_MINUTES, 60 * 24 * 7),
  bcryptSaltRounds: parseInteger(process.env.BCRYPT_SALT_ROUNDS, 10),
  gemini: {
    apiKey: process.env.GEMINI_API_KEY || undefined,
    model: process.env.GEMINI_MODEL || 'gemini-2.0-flash',
    baseUrl: process.env.GEMINI_API_BASE_URL || 'https://generativelanguage.googleapis.com',
    timeoutMs: parseInteger(process.env.AI_TIMEOUT_MS, 30000),
  },
});

export const getJwtSecret = (): string => {
  const jwtSecret = process.env.JWT_SECRET;
  if (!jwtSecret) {
    throw new ConfigurationError('JWT_SECRET is not defined in environment variables.');
  }
  return jwtSecret;
};
