// Filename: test/cache/endToEnd/tieredResolution.test.ts

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ENDPOINT_SOURCE_MAP } from '../../../config/configEndpointSources.js';
import { toCachedFlag } from '../../../constants/Provenance.js';
import { buildCacheKey } from '../../../services/CacheKeyService.js';
import { CacheStatistics } from '../../../core/CacheStatistics.js';
import { StaticFallbackStore } from '../../../core/StaticFallbackStore.js';
import { TieredCacheCoordinator, type LiveFetch } from '../../../core/TieredCacheCoordinator.js';
import type { TableRecord } from '../../../core/types.js';
import { VolatileStoreClient, type KeyValueTransport } from '../../../core/VolatileStoreClient.js';
import { FIXTURES_DIR } from '../../helpers/apiFixtures.js';
import { envelope, InMemoryTransport } from '../../helpers/InMemoryTransport.js';

vi.mock('../../../utils/log.js', () => ({
  log: vi.fn(),
  ERR: 1,
  WARN: 3,
  LOG: 5,
  INFO: 7,
  TMI: 9,
}));

const SCRAPED: TableRecord = {
  header: [['Produto', 'Quantidade (L.)']],
  body: [{ item_data: ['VINHO DE MESA', '1100'], sub_items: [['Tinto', '900']] }],
  footer: [['Total', '1100']],
};

const PARAMS = { year: 2023 };

describe('tiered resolution end to end', () => {
  let clock: number;
  let transport: InMemoryTransport;
  let statistics: CacheStatistics;
  let coordinator: TieredCacheCoordinator;

  beforeEach(() => {
    vi.clearAllMocks();
    clock = 1_700_000_000_000;
    transport = new InMemoryTransport();
    statistics = new CacheStatistics(() => clock);
    const now = (): number => clock;
    coordinator = new TieredCacheCoordinator({
      store: new VolatileStoreClient(transport, { reprobeIntervalMs: 0, now }),
      staticStore: new StaticFallbackStore({ directory: FIXTURES_DIR, mapping: ENDPOINT_SOURCE_MAP, statistics, now }),
      statistics,
      now,
    });
  });

  it('should fetch once and answer the repeat from the short-term tier', async () => {
    const fetch = vi.fn<LiveFetch>(async () => ({ ok: true, record: SCRAPED }));

    const first = await coordinator.resolve('producao', PARAMS, fetch);
    clock += 10_000;
    const second = await coordinator.resolve('producao', PARAMS, fetch);

    expect(first.ok && toCachedFlag(first.entry.provenance)).toBe(false);
    expect(second.ok && toCachedFlag(second.entry.provenance)).toBe('short_term');
    expect(second.ok && second.entry.payload).toEqual(SCRAPED);
    expect(second.ok && second.entry.storedAt).toBe(1_700_000_000_000);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('should answer from the long-term tier once the short-term copy is gone', async () => {
    const fetch = vi.fn<LiveFetch>(async () => ({ ok: true, record: SCRAPED }));
    await coordinator.resolve('producao', PARAMS, fetch);

    transport.entries.delete(`short:${buildCacheKey('producao', PARAMS)}`);
    fetch.mockResolvedValue({ ok: false, error: { kind: 'timeout', message: 'no response within 30000ms' } });
    const result = await coordinator.resolve('producao', PARAMS, fetch);

    expect(result.ok && toCachedFlag(result.entry.provenance)).toBe('fallback');
    expect(result.ok && result.entry.payload).toEqual(SCRAPED);
  });

  it('should keep serving a seeded long-term entry when the upstream is down', async () => {
    const older: TableRecord = { header: [['Produto']], body: [], footer: [['Total', '1']] };
    transport.seed(`fallback:${buildCacheKey('producao', PARAMS)}`, envelope(older, 1_600_000_000_000));
    const fetch = vi.fn<LiveFetch>(async () => ({ ok: false, error: { kind: 'http', message: 'bad gateway', status: 502 } }));

    const result = await coordinator.resolve('producao', PARAMS, fetch);

    expect(result.ok && result.entry).toEqual({ payload: older, provenance: 'LONG_TERM', storedAt: 1_600_000_000_000 });
  });

  it('should fall back to the static file when the store and upstream are both down', async () => {
    transport.failure = new Error('ECONNREFUSED');
    const fetch = vi.fn<LiveFetch>(async () => ({ ok: false, error: { kind: 'network', message: 'ENOTFOUND' } }));

    const result = await coordinator.resolve('producao', PARAMS, fetch);

    expect(result.ok && toCachedFlag(result.entry.provenance)).toBe('csv_fallback');
    expect(result.ok && result.entry.payload.footer).toEqual([['Total', '1000', '1100']]);
    expect(statistics.snapshot().resolutions).toEqual({ FRESH: 0, SHORT_TERM: 0, LONG_TERM: 0, STATIC_FALLBACK: 1 });
  });

  it('should reach the static file when the store stops answering', async () => {
    const pending = <T>(): Promise<T> => new Promise<T>(() => undefined);
    const unresponsive: KeyValueTransport = {
      get: () => pending(),
      setex: () => pending(),
      ping: () => pending(),
      keys: () => pending(),
      del: () => pending(),
    };
    const now = (): number => clock;
    const stalled = new TieredCacheCoordinator({
      store: new VolatileStoreClient(unresponsive, { timeoutMs: 20, now }),
      staticStore: new StaticFallbackStore({ directory: FIXTURES_DIR, mapping: ENDPOINT_SOURCE_MAP, statistics, now }),
      statistics,
      now,
    });
    const fetch = vi.fn<LiveFetch>(async () => ({ ok: false, error: { kind: 'network', message: 'ENOTFOUND' } }));

    const result = await stalled.resolve('producao', PARAMS, fetch);

    expect(result.ok && result.entry.provenance).toBe('STATIC_FALLBACK');
    expect(statistics.snapshot().tiers.SHORT_TERM.unavailable).toBe(1);
    expect(statistics.snapshot().tiers.LONG_TERM.unavailable).toBe(1);
  });
});
