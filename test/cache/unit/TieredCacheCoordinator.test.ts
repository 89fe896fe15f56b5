// Filename: test/cache/unit/TieredCacheCoordinator.test.ts

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { buildCacheKey } from '../../../services/CacheKeyService.js';
import { CacheStatistics } from '../../../core/CacheStatistics.js';
import type { StaticFallbackSource } from '../../../core/StaticFallbackStore.js';
import { TieredCacheCoordinator, type FetchResult, type LiveFetch } from '../../../core/TieredCacheCoordinator.js';
import type { TableRecord } from '../../../core/types.js';
import { VolatileStoreClient } from '../../../core/VolatileStoreClient.js';
import { envelope, InMemoryTransport } from '../../helpers/InMemoryTransport.js';

vi.mock('../../../utils/log.js', () => ({
  log: vi.fn(),
  ERR: 1,
  WARN: 3,
  LOG: 5,
  INFO: 7,
  TMI: 9,
}));

const FRESH_RECORD: TableRecord = {
  header: [['Produto', 'Quantidade (L.)']],
  body: [{ item_data: ['VINHO DE MESA', '169.762.429'], sub_items: [['Tinto', '139.320.884']] }],
  footer: [['Total', '169.762.429']],
};
const CACHED_RECORD: TableRecord = { header: [['Produto']], body: [], footer: [['Total', '1']] };
const STATIC_RECORD: TableRecord = { header: [['produto']], body: [{ item_data: ['Tinto'], sub_items: [] }], footer: [] };

const NOW = 1_700_000_000_000;

describe('TieredCacheCoordinator', () => {
  let transport: InMemoryTransport;
  let statistics: CacheStatistics;
  let staticLookup: Mock<StaticFallbackSource['lookup']>;
  let coordinator: TieredCacheCoordinator;
  const key = buildCacheKey('producao', { year: 2023 });

  const succeeding = (): Mock<LiveFetch> =>
    vi.fn<LiveFetch>(async () => ({ ok: true, record: FRESH_RECORD }));
  const failing = (): Mock<LiveFetch> =>
    vi.fn<LiveFetch>(async () => ({ ok: false, error: { kind: 'http', message: 'upstream 502', status: 502 } }));

  beforeEach(() => {
    vi.clearAllMocks();
    transport = new InMemoryTransport();
    statistics = new CacheStatistics(() => NOW);
    staticLookup = vi.fn<StaticFallbackSource['lookup']>(async () => null);
    coordinator = new TieredCacheCoordinator({
      store: new VolatileStoreClient(transport, { reprobeIntervalMs: 0, now: () => NOW }),
      staticStore: { lookup: staticLookup },
      statistics,
      shortTtlSeconds: 300,
      longTtlSeconds: 2592000,
      fetchTimeoutMs: 1000,
      now: () => NOW,
    });
  });

  describe('resolve', () => {
    it('should serve the short-term tier without fetching', async () => {
      transport.seed(`short:${key}`, envelope(CACHED_RECORD, NOW - 1000));
      const fetch = succeeding();

      const result = await coordinator.resolve('producao', { year: 2023 }, fetch);

      expect(result).toEqual({
        ok: true,
        entry: { payload: CACHED_RECORD, provenance: 'SHORT_TERM', storedAt: NOW - 1000 },
        attempts: [{ step: 'SHORT_TERM', outcome: 'hit' }],
      });
      expect(fetch).not.toHaveBeenCalled();
    });

    it('should fetch on a short-term miss and write both tiers', async () => {
      const fetch = succeeding();

      const result = await coordinator.resolve('producao', { year: 2023 }, fetch);

      expect(result.ok && result.entry).toEqual({ payload: FRESH_RECORD, provenance: 'FRESH', storedAt: NOW });
      expect(fetch).toHaveBeenCalledTimes(1);
      const stored = JSON.stringify({ data: FRESH_RECORD, timestamp: NOW });
      expect(transport.entries.get(`short:${key}`)).toEqual({ value: stored, ttlSeconds: 300 });
      expect(transport.entries.get(`fallback:${key}`)).toEqual({ value: stored, ttlSeconds: 2592000 });
      expect(statistics.snapshot().writes).toEqual({ succeeded: 2, failed: 0 });
    });

    it('should serve the long-term tier when the fetch fails', async () => {
      transport.seed(`fallback:${key}`, envelope(CACHED_RECORD, NOW - 86_400_000));

      const result = await coordinator.resolve('producao', { year: 2023 }, failing());

      expect(result).toEqual({
        ok: true,
        entry: { payload: CACHED_RECORD, provenance: 'LONG_TERM', storedAt: NOW - 86_400_000 },
        attempts: [
          { step: 'SHORT_TERM', outcome: 'miss', detail: undefined },
          { step: 'LIVE_FETCH', outcome: 'failed', detail: 'http: upstream 502' },
          { step: 'LONG_TERM', outcome: 'hit' },
        ],
      });
      expect(staticLookup).not.toHaveBeenCalled();
    });

    it('should fall through to the static source with the requested sub-option', async () => {
      staticLookup.mockResolvedValue(STATIC_RECORD);

      const result = await coordinator.resolve('exportacao', { year: 2020, sub_option: 'uva' }, failing());

      expect(result.ok && result.entry).toEqual({ payload: STATIC_RECORD, provenance: 'STATIC_FALLBACK', storedAt: NOW });
      expect(staticLookup).toHaveBeenCalledWith('exportacao', 'uva');
    });

    it('should return Unavailable with every attempt when all tiers miss', async () => {
      const result = await coordinator.resolve('producao', { year: 2023 }, failing());

      expect(result).toEqual({
        ok: false,
        unavailable: {
          endpoint: 'producao',
          key,
          attempts: [
            { step: 'SHORT_TERM', outcome: 'miss', detail: undefined },
            { step: 'LIVE_FETCH', outcome: 'failed', detail: 'http: upstream 502' },
            { step: 'LONG_TERM', outcome: 'miss', detail: undefined },
            { step: 'STATIC_FALLBACK', outcome: 'miss', detail: 'no static source for request' },
          ],
        },
      });
      expect(statistics.snapshot().exhausted).toBe(1);
    });

    it('should treat an undecodable short-term entry as a miss', async () => {
      transport.seed(`short:${key}`, '{"data":"not a table","timestamp":1}');
      const fetch = succeeding();

      const result = await coordinator.resolve('producao', { year: 2023 }, fetch);

      expect(result.ok && result.entry.provenance).toBe('FRESH');
      expect(result.ok && result.attempts[0]).toEqual({
        step: 'SHORT_TERM',
        outcome: 'corrupt',
        detail: 'stored value is not a valid envelope',
      });
      expect(statistics.snapshot().tiers.SHORT_TERM.corrupt).toBe(1);
    });

    it('should treat a thrown fetch as a network failure', async () => {
      const fetch = vi.fn<LiveFetch>(async () => {
        throw new Error('socket hang up');
      });

      const result = await coordinator.resolve('producao', { year: 2023 }, fetch);

      expect(result.ok).toBe(false);
      expect(!result.ok && result.unavailable.attempts[1]).toEqual({
        step: 'LIVE_FETCH',
        outcome: 'failed',
        detail: 'network: socket hang up',
      });
    });

    it('should time out a slow fetch and abort its signal', async () => {
      const impatient = new TieredCacheCoordinator({
        store: new VolatileStoreClient(transport, { now: () => NOW }),
        staticStore: { lookup: staticLookup },
        statistics,
        fetchTimeoutMs: 20,
        now: () => NOW,
      });
      const seen: { signal?: AbortSignal } = {};
      const fetch = vi.fn<LiveFetch>(
        (signal) =>
          new Promise<FetchResult>(() => {
            seen.signal = signal;
          })
      );

      const result = await impatient.resolve('producao', { year: 2023 }, fetch);

      expect(!result.ok && result.unavailable.attempts[1]).toEqual({
        step: 'LIVE_FETCH',
        outcome: 'failed',
        detail: 'timeout: no response within 20ms',
      });
      expect(seen.signal?.aborted).toBe(true);
    });

    it('should stop the fetch when the caller aborts', async () => {
      const caller = new AbortController();
      const fetch = vi.fn<LiveFetch>(
        (signal) =>
          new Promise<FetchResult>(() => {
            caller.abort();
          })
      );

      const result = await coordinator.resolve('producao', { year: 2023 }, fetch, { signal: caller.signal });

      expect(!result.ok && result.unavailable.attempts[1]).toEqual({
        step: 'LIVE_FETCH',
        outcome: 'failed',
        detail: 'aborted: request cancelled',
      });
    });

    it('should not fetch when the caller has already aborted', async () => {
      const caller = new AbortController();
      caller.abort();
      const fetch = succeeding();

      await coordinator.resolve('producao', { year: 2023 }, fetch, { signal: caller.signal });

      expect(fetch).not.toHaveBeenCalled();
    });

    it('should still serve fresh data when the store is down', async () => {
      transport.failure = new Error('ECONNREFUSED');

      const result = await coordinator.resolve('producao', { year: 2023 }, succeeding());

      expect(result.ok && result.entry.provenance).toBe('FRESH');
      expect(result.ok && result.attempts[0]).toEqual({
        step: 'SHORT_TERM',
        outcome: 'unavailable',
        detail: 'ECONNREFUSED',
      });
      expect(statistics.snapshot().writes).toEqual({ succeeded: 0, failed: 2 });
    });

    it('should serve static data when both volatile tiers are unavailable', async () => {
      transport.failure = new Error('ECONNREFUSED');
      staticLookup.mockResolvedValue(STATIC_RECORD);

      const result = await coordinator.resolve('producao', { year: 2023 }, failing());

      expect(result.ok && result.entry.provenance).toBe('STATIC_FALLBACK');
      expect(statistics.snapshot().tiers.LONG_TERM.unavailable).toBe(1);
      expect(statistics.snapshot().resolutions.STATIC_FALLBACK).toBe(1);
    });
  });

  describe('clearTier', () => {
    it('should delete keys of one tier and endpoint', async () => {
      transport.seed('short:producao:a', 'x');
      transport.seed('short:exportacao:b', 'x');
      transport.seed('fallback:producao:a', 'x');

      const report = await coordinator.clearTier('SHORT_TERM', 'producao');

      expect(report).toEqual({
        tier: 'SHORT_TERM',
        pattern: 'short:producao:*',
        result: { status: 'ok', count: 1 },
      });
      expect([...transport.entries.keys()]).toEqual(['short:exportacao:b', 'fallback:producao:a']);
    });
  });
});
