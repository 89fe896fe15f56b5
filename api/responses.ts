// Filename: api/responses.ts

import type { EndpointName } from '../constants/EndpointNames.js';
import { toCachedFlag, type CachedFlag, type Provenance } from '../constants/Provenance.js';
import type { Unavailable, TierAttempt } from '../core/TieredCacheCoordinator.js';
import type { CacheEntry, StatisticsQuery, TableRecord } from '../core/types.js';

interface LayerInfo {
  layer: string;
  description: string;
  dataSource: string;
  freshness: string;
}

const LAYER_INFO: Readonly<Record<Provenance, LayerInfo>> = {
  FRESH: {
    layer: 'fresh_data',
    description: 'Real-time web scraping',
    dataSource: 'Fresh web scraping',
    freshness: 'Real-time data',
  },
  SHORT_TERM: {
    layer: 'short_term',
    description: 'Fast cache',
    dataSource: 'Redis short_term cache',
    freshness: 'Cached data',
  },
  LONG_TERM: {
    layer: 'fallback',
    description: 'Backup cache',
    dataSource: 'Redis fallback cache',
    freshness: 'Cached data',
  },
  STATIC_FALLBACK: {
    layer: 'csv_fallback',
    description: 'Local file fallback',
    dataSource: 'Local CSV files',
    freshness: 'Static data from local files',
  },
};

export interface SuccessBody {
  data: TableRecord;
  cached: CachedFlag;
  endpoint: EndpointName;
  status: 'success';
  year: number | 'unknown';
  sub_option: string | null;
  data_source: string;
  freshness: string;
  cache_info: {
    active_cache_layer: string;
    layer_description: string;
    stored_at: string;
    expires_in_seconds: number | null;
  };
}

export interface UnavailableBody {
  error: 'Data temporarily unavailable';
  message: string;
  endpoint: EndpointName;
  requested_params: Record<string, string>;
  status: 'data_unavailable';
  attempts: TierAttempt[];
  troubleshooting: string[];
}

/**
 * Seconds until a volatile-tier entry expires; null for fresh and static data.
 */
export function expiresInSeconds(
  entry: CacheEntry,
  ttls: { shortTermSeconds: number; longTermSeconds: number },
  now: number
): number | null {
  const ttl =
    entry.provenance === 'SHORT_TERM' ? ttls.shortTermSeconds
    : entry.provenance === 'LONG_TERM' ? ttls.longTermSeconds
    : null;
  if (ttl === null) return null;
  const ageSeconds = Math.floor((now - entry.storedAt) / 1000);
  return Math.max(0, ttl - ageSeconds);
}

export function formatSuccess(
  entry: CacheEntry,
  query: StatisticsQuery,
  ttls: { shortTermSeconds: number; longTermSeconds: number },
  now: number = Date.now()
): SuccessBody {
  const info = LAYER_INFO[entry.provenance];
  return {
    data: entry.payload,
    cached: toCachedFlag(entry.provenance),
    endpoint: query.endpoint,
    status: 'success',
    year: query.year ?? 'unknown',
    sub_option: query.subOption ?? null,
    data_source: info.dataSource,
    freshness: info.freshness,
    cache_info: {
      active_cache_layer: info.layer,
      layer_description: info.description,
      stored_at: new Date(entry.storedAt).toISOString(),
      expires_in_seconds: expiresInSeconds(entry, ttls, now),
    },
  };
}

export function formatUnavailable(
  unavailable: Unavailable,
  requestedParams: Record<string, string>
): UnavailableBody {
  return {
    error: 'Data temporarily unavailable',
    message: `No data source could serve ${unavailable.endpoint} right now. Please try again later.`,
    endpoint: unavailable.endpoint,
    requested_params: requestedParams,
    status: 'data_unavailable',
    attempts: unavailable.attempts,
    troubleshooting: [
      'The upstream site may be down or slow',
      'The cache store may be unreachable',
      'No static file may exist for this endpoint and sub-option',
      'Check GET /cache/stats for tier status',
    ],
  };
}

export function formatError(
  endpoint: string,
  error: string,
  status: string,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  return { error, endpoint, status, ...extra };
}
