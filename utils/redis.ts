// Filename: utils/redis.ts

import { Redis } from "@upstash/redis";
import type { StoreCredentials } from "../config/configService.js";
import type { KeyValueTransport } from "../core/VolatileStoreClient.js";
import { log, TMI, WARN } from "./log.js";

// Redis Client specific emoji
const LOG_EMOJI = "💾";

// The volatile store is an Upstash Redis instance reached over its REST API.
// Credentials come from KV_REST_API_URL / KV_REST_API_TOKEN (or KV_URL / KV_TOKEN).

let redisClient: Redis | null = null;

/**
 * Returns the shared Upstash client for the given credentials, creating it on first use.
 * Values are kept as raw strings; the envelope is (de)serialized by the caller.
 */
export function getRedisClient(credentials: StoreCredentials): Redis {
  if (redisClient) {
    return redisClient;
  }

  redisClient = new Redis({
    url: credentials.url,
    token: credentials.token,
    automaticDeserialization: false,
    // Keep failures fast; the volatile client backs off on its own
    retry: { retries: 1 },
  });

  log(`${LOG_EMOJI} Redis Client initialized.`, TMI);
  return redisClient;
}

/**
 * Adapts the Upstash client to the transport interface the volatile store client expects.
 */
export function createRedisTransport(redis: Redis): KeyValueTransport {
  return {
    get: (key) => redis.get<string>(key),
    setex: async (key, ttlSeconds, value) => {
      await redis.setex(key, ttlSeconds, value);
    },
    ping: async () => {
      await redis.ping();
    },
    keys: (pattern) => redis.keys(pattern),
    del: async (keys) => (keys.length === 0 ? 0 : redis.del(...keys)),
  };
}

/**
 * Builds a transport from configuration, or null when no store is configured.
 */
export function createConfiguredTransport(credentials: StoreCredentials | null): KeyValueTransport | null {
  if (!credentials) {
    log(`${LOG_EMOJI} Redis credentials missing, running without volatile tiers.`, WARN);
    return null;
  }
  return createRedisTransport(getRedisClient(credentials));
}
