// Filename: services/CacheKeyService.ts

import { createHash } from "crypto";
import { EndpointName, KEY_PARAM_ALLOW_LIST } from "../constants/EndpointNames.js";
import type { RequestParams } from "../core/types.js";
import { log, TMI } from "../utils/log.js";

// Key Service specific emoji
const LOG_EMOJI = "🔑";

// --- Volatile Store Key Prefixes ---
export const KEY_PREFIXES = {
  SHORT_TERM: "short:",
  LONG_TERM: "fallback:",
} as const;

export type VolatileTier = keyof typeof KEY_PREFIXES;

// --- Private Utility ---

/**
 * Reduces request params to the allow-listed, normalized [name, value] pairs,
 * sorted by name. Names are trimmed and lower-cased; values are stringified and
 * trimmed. Empty values are dropped.
 */
function getNormalizedEntries(endpoint: EndpointName, params: RequestParams): [string, string][] {
  const allowed = KEY_PARAM_ALLOW_LIST[endpoint];
  const normalized = new Map<string, string>();

  // Iterate supplied names in sorted order so case-colliding names resolve the same way
  for (const rawName of Object.keys(params).sort()) {
    const name = rawName.trim().toLowerCase();
    if (!allowed.includes(name)) continue;
    const rawValue = params[rawName];
    if (rawValue === null || rawValue === undefined) continue;
    const value = String(rawValue).trim();
    if (value === "") continue;
    normalized.set(name, value);
  }

  return [...normalized.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

// --- Public Key Generation Functions ---

/**
 * Builds the tier-agnostic cache key for a request.
 * The same endpoint and parameter values always map to the same key, whatever the
 * order or name casing of the supplied params.
 * @returns `<endpoint>:<sha256 hex>`
 */
export function buildCacheKey(endpoint: EndpointName, params: RequestParams): string {
  const canonical = JSON.stringify(getNormalizedEntries(endpoint, params));
  const digest = createHash("sha256").update(canonical).digest("hex");
  const key = `${endpoint}:${digest}`;
  log(`${LOG_EMOJI} Key Service: ${endpoint} ${canonical} -> ${key}`, TMI);
  return key;
}

/**
 * Namespaces a cache key for one volatile tier.
 */
export function getTierKey(tier: VolatileTier, key: string): string {
  return `${KEY_PREFIXES[tier]}${key}`;
}

/**
 * Key pattern matching every entry of a tier, optionally for one endpoint only.
 */
export function getTierPattern(tier: VolatileTier, endpoint?: EndpointName): string {
  return endpoint ? `${KEY_PREFIXES[tier]}${endpoint}:*` : `${KEY_PREFIXES[tier]}*`;
}
