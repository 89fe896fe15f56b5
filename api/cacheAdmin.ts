// Filename: api/cacheAdmin.ts
/**
 * Cache inspection and clearing.
 * GET    /cache/stats
 * DELETE /cache?tier=short|fallback|all&endpoint=<name>
 */

import { isEndpointName, type EndpointName } from '../constants/EndpointNames.js';
import type { ClearTierReport } from '../core/TieredCacheCoordinator.js';
import type { VolatileTier } from '../services/CacheKeyService.js';
import { log, LOG } from '../utils/log.js';
import type { ServiceContext } from './context.js';
import type { ApiRequest, ApiResponse } from './http.js';

const LOG_EMOJI = '🧹';

const TIER_SELECTIONS: ReadonlyMap<string, readonly VolatileTier[]> = new Map<string, readonly VolatileTier[]>([
  ['short', ['SHORT_TERM']],
  ['fallback', ['LONG_TERM']],
  ['all', ['SHORT_TERM', 'LONG_TERM']],
]);

export async function handleCacheStats(ctx: ServiceContext, _req: ApiRequest, res: ApiResponse): Promise<void> {
  const report = await ctx.health.report();
  res.status(200).json(report);
}

export async function handleCacheClear(ctx: ServiceContext, req: ApiRequest, res: ApiResponse): Promise<void> {
  const tierParam = req.query.get('tier') ?? 'all';
  const tiers = TIER_SELECTIONS.get(tierParam);
  if (!tiers) {
    res.status(400).json({
      error: `Invalid tier "${tierParam}". Use one of: ${[...TIER_SELECTIONS.keys()].join(', ')}`,
      status: 'parameter_error',
    });
    return;
  }

  const endpointParam = req.query.get('endpoint');
  let endpoint: EndpointName | undefined;
  if (endpointParam) {
    if (!isEndpointName(endpointParam)) {
      res.status(400).json({ error: `Unknown endpoint "${endpointParam}"`, status: 'parameter_error' });
      return;
    }
    endpoint = endpointParam;
  }

  const cleared: ClearTierReport[] = [];
  for (const tier of tiers) {
    cleared.push(await ctx.coordinator.clearTier(tier, endpoint));
  }
  const staticEntriesCleared = tierParam === 'all' ? ctx.staticStore.clearCache() : 0;

  const failed = cleared.some((report) => report.result.status === 'unavailable');
  log(`${LOG_EMOJI} Cache clear tier=${tierParam} endpoint=${endpoint ?? '*'} failed=${failed}`, LOG);
  res.status(failed ? 503 : 200).json({
    status: failed ? 'partial' : 'success',
    tier: tierParam,
    endpoint: endpoint ?? null,
    cleared,
    static_entries_cleared: staticEntriesCleared,
  });
}
