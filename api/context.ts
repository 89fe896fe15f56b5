// Filename: api/context.ts

import { ENDPOINT_SOURCE_MAP } from '../config/configEndpointSources.js';
import type { ServiceConfig } from '../config/configService.js';
import { CacheStatistics } from '../core/CacheStatistics.js';
import { HealthReporter } from '../core/HealthReporter.js';
import { StaticFallbackStore } from '../core/StaticFallbackStore.js';
import { TieredCacheCoordinator } from '../core/TieredCacheCoordinator.js';
import { VolatileStoreClient, type KeyValueTransport } from '../core/VolatileStoreClient.js';
import { createLiveFetcher, type LiveFetcherFactory } from '../features/scraper/liveFetcher.js';
import { createConfiguredTransport } from '../utils/redis.js';

/**
 * Everything a request handler needs, built once per process.
 */
export interface ServiceContext {
  config: ServiceConfig;
  statistics: CacheStatistics;
  store: VolatileStoreClient;
  staticStore: StaticFallbackStore;
  coordinator: TieredCacheCoordinator;
  health: HealthReporter;
  liveFetcher: LiveFetcherFactory;
}

export interface ContextOverrides {
  /** Replaces the Redis transport (null disables the volatile tiers) */
  transport?: KeyValueTransport | null;
  liveFetcher?: LiveFetcherFactory;
  now?: () => number;
}

export function createServiceContext(config: ServiceConfig, overrides: ContextOverrides = {}): ServiceContext {
  const statistics = new CacheStatistics(overrides.now);
  const transport =
    overrides.transport !== undefined ? overrides.transport : createConfiguredTransport(config.store);
  const store = new VolatileStoreClient(transport, {
    reprobeIntervalMs: config.storeReprobeIntervalMs,
    timeoutMs: config.storeTimeoutMs,
    now: overrides.now,
  });
  const staticStore = new StaticFallbackStore({
    directory: config.staticDir,
    mapping: ENDPOINT_SOURCE_MAP,
    maxSize: config.staticCacheMaxSize,
    ttlSeconds: config.staticCacheTtlSeconds,
    statistics,
    now: overrides.now,
  });
  const coordinator = new TieredCacheCoordinator({
    store,
    staticStore,
    statistics,
    shortTtlSeconds: config.shortTtlSeconds,
    longTtlSeconds: config.longTtlSeconds,
    fetchTimeoutMs: config.fetchTimeoutMs,
    now: overrides.now,
  });
  const health = new HealthReporter({
    store,
    staticStore,
    coordinator,
    statistics,
    timeoutMs: config.healthCheckTimeoutMs,
  });

  return {
    config,
    statistics,
    store,
    staticStore,
    coordinator,
    health,
    liveFetcher: overrides.liveFetcher ?? createLiveFetcher({ baseUrl: config.sourceBaseUrl }),
  };
}
