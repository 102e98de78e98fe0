import * as dotenv from 'dotenv';
import { ConfigError } from './models/errors';
import { DEFAULT_GEMINI_MODEL } from './services/geminiService';

export interface AppConfig {
  botToken: string;
  geminiApiKey: string;
  geminiModel: string;
  /** PostgreSQL connection string */
  databaseUrl: string;
  /** How many genres a user may pick (1..3) */
  maxGenres: number;
  redisUrl?: string;
  sessionTtlSeconds: number;
  webhookSecret?: string;
}

export const MAX_GENRES_LIMIT = 3;

function required(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigError(`Environment variable ${name} is not set`);
  }
  return value;
}

// ioredis speaks the Redis protocol only; REST endpoints (https://) are not usable.
function redisUrl(env: NodeJS.ProcessEnv): string | undefined {
  const raw = env.REDIS_URL?.trim();
  if (!raw) return undefined;
  if (!/^rediss?:\/\//.test(raw)) {
    throw new ConfigError(`REDIS_URL must start with redis:// or rediss://, got "${raw}"`);
  }
  return raw;
}

function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw) || Number(raw) === 0) {
    throw new ConfigError(`Environment variable ${name} must be a positive integer, got "${raw}"`);
  }
  return Number(raw);
}

/**
 * Reads configuration from the environment.  Pass an explicit env object in
 * tests; the default populates process.env from `.env` first.
 *
 * Throws ConfigError when credentials are missing – the caller must abort.
 */
export function loadConfig(env: NodeJS.ProcessEnv = loadDotenv()): AppConfig {
  const maxGenres = positiveInt(env, 'MAX_GENRES', 1);
  if (maxGenres > MAX_GENRES_LIMIT) {
    throw new ConfigError(`MAX_GENRES must be between 1 and ${MAX_GENRES_LIMIT}, got ${maxGenres}`);
  }

  return {
    botToken: required(env, 'BOT_TOKEN'),
    geminiApiKey: required(env, 'GEMINI_API_KEY'),
    geminiModel: env.GEMINI_MODEL?.trim() || DEFAULT_GEMINI_MODEL,
    databaseUrl: required(env, 'DATABASE_URL'),
    maxGenres,
    redisUrl: redisUrl(env),
    sessionTtlSeconds: positiveInt(env, 'SESSION_TTL_SECONDS', 60 * 60 * 24),
    webhookSecret: env.WEBHOOK_SECRET || undefined,
  };
}

function loadDotenv(): NodeJS.ProcessEnv {
  dotenv.config();
  return process.env;
}
