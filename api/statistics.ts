// Filename: api/statistics.ts
/**
 * Statistics endpoints (/producao, /processamento, ...).
 * Supports query parameters: year, sub_option
 */

import type { EndpointName } from '../constants/EndpointNames.js';
import { log, ERR, LOG } from '../utils/log.js';
import type { ServiceContext } from './context.js';
import type { ApiRequest, ApiResponse } from './http.js';
import { parseStatisticsParams } from './params.js';
import { formatError, formatSuccess, formatUnavailable } from './responses.js';

const LOG_EMOJI = '📊';

export async function handleStatistics(
  ctx: ServiceContext,
  endpoint: EndpointName,
  req: ApiRequest,
  res: ApiResponse
): Promise<void> {
  const parsed = parseStatisticsParams(endpoint, req.query);
  if (!parsed.ok) {
    res.status(400).json(formatError(endpoint, parsed.error, 'parameter_error', { provided_params: parsed.provided }));
    return;
  }

  try {
    const fetch = ctx.liveFetcher(endpoint, parsed.params);
    const result = await ctx.coordinator.resolve(endpoint, parsed.params, fetch, { signal: req.signal });

    if (!result.ok) {
      const requested: Record<string, string> = {};
      for (const [name, value] of req.query) requested[name] = value;
      res.status(503).json(formatUnavailable(result.unavailable, requested));
      return;
    }

    const body = formatSuccess(result.entry, parsed.query, ctx.coordinator.ttls);
    log(`${LOG_EMOJI} Served ${endpoint} year=${body.year} (source: ${body.data_source})`, LOG);
    res.status(200).json(body);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    log(`${LOG_EMOJI} ❌ Failed to serve ${endpoint}: ${message}`, ERR);
    res.status(500).json(formatError(endpoint, 'Internal server error', 'internal_error', { message }));
  }
}
