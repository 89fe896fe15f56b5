// Filename: config/configService.ts

import dotenv from 'dotenv';
import { resolve } from 'path';
import { log, parseLogLevel, setLogLevel, WARN } from '../utils/log.js';

const LOG_EMOJI = '⚙️';

export const DEFAULT_SOURCE_BASE_URL = 'http://vitibrasil.cnpuv.embrapa.br/index.php';

export interface StoreCredentials {
  url: string;
  token: string;
}

export interface ApiUser {
  username: string;
  password: string;
}

export interface ServiceConfig {
  port: number;
  /** Short-term tier TTL in seconds */
  shortTtlSeconds: number;
  /** Long-term tier TTL in seconds */
  longTtlSeconds: number;
  fetchTimeoutMs: number;
  storeReprobeIntervalMs: number;
  /** Upper bound on a single volatile store call */
  storeTimeoutMs: number;
  healthCheckTimeoutMs: number;
  staticDir: string;
  staticCacheMaxSize: number;
  /** Static result cache TTL in seconds */
  staticCacheTtlSeconds: number;
  sourceBaseUrl: string;
  store: StoreCredentials | null;
  users: ApiUser[];
}

let envLoaded = false;

/**
 * Loads `.env.local` then `.env` from the working directory. Values already present
 * in the environment win. Safe to call more than once.
 */
export function loadEnvFiles(): void {
  if (envLoaded) return;
  envLoaded = true;
  for (const file of ['.env.local', '.env']) {
    // A missing file only means the variables are set another way
    dotenv.config({ path: resolve(process.cwd(), file) });
  }
  setLogLevel(parseLogLevel(process.env.LOG_LEVEL));
}

function readInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min = 0
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    log(`${LOG_EMOJI} Config: ${name}="${raw}" is not an integer, using ${fallback}`, WARN);
    return fallback;
  }
  if (value < min) {
    log(`${LOG_EMOJI} Config: ${name}=${value} is below ${min}, using ${min}`, WARN);
    return min;
  }
  return value;
}

/**
 * Parses API_USERS ("alice:secret,bob:other") into credentials.
 * Entries without a colon or with an empty username are skipped.
 */
export function parseApiUsers(raw: string | undefined): ApiUser[] {
  if (!raw) return [];
  const users: ApiUser[] = [];
  for (const entry of raw.split(',')) {
    const separator = entry.indexOf(':');
    if (separator <= 0) {
      if (entry.trim() !== '') {
        log(`${LOG_EMOJI} Config: ignoring malformed API_USERS entry`, WARN);
      }
      continue;
    }
    users.push({
      username: entry.slice(0, separator).trim(),
      password: entry.slice(separator + 1).trim(),
    });
  }
  return users;
}

function readStoreCredentials(env: NodeJS.ProcessEnv): StoreCredentials | null {
  const url = env.KV_REST_API_URL || env.KV_URL;
  const token = env.KV_REST_API_TOKEN || env.KV_TOKEN;
  if (!url || !token) {
    log(`${LOG_EMOJI} Config: KV_REST_API_URL / KV_REST_API_TOKEN not set, volatile tiers disabled`, WARN);
    return null;
  }
  return { url, token };
}

/**
 * Builds the typed service configuration from an environment map.
 * @param env - Defaults to process.env
 */
export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  return {
    port: readInt(env, 'PORT', 5000, 1),
    shortTtlSeconds: readInt(env, 'SHORT_CACHE_TTL', 300, 1),
    longTtlSeconds: readInt(env, 'FALLBACK_CACHE_TTL', 2592000, 1),
    fetchTimeoutMs: readInt(env, 'FETCH_TIMEOUT_MS', 30000, 1),
    storeReprobeIntervalMs: readInt(env, 'STORE_REPROBE_INTERVAL_MS', 5000),
    storeTimeoutMs: readInt(env, 'STORE_TIMEOUT_MS', 5000, 1),
    healthCheckTimeoutMs: readInt(env, 'HEALTH_CHECK_TIMEOUT_MS', 2000, 1),
    staticDir: resolve(process.cwd(), env.CSV_FALLBACK_DIR || 'data/fallback'),
    staticCacheMaxSize: readInt(env, 'CSV_CACHE_MAX_SIZE', 100, 1),
    staticCacheTtlSeconds: readInt(env, 'CSV_CACHE_TTL', 3600, 60),
    sourceBaseUrl: env.SOURCE_BASE_URL || DEFAULT_SOURCE_BASE_URL,
    store: readStoreCredentials(env),
    users: parseApiUsers(env.API_USERS),
  };
}
