// Filename: api/params.ts

import { MAX_YEAR, MIN_YEAR, VALID_SUB_OPTIONS, type EndpointName } from '../constants/EndpointNames.js';
import type { RequestParams, StatisticsQuery } from '../core/types.js';

export type ParamsResult =
  | { ok: true; query: StatisticsQuery; params: RequestParams }
  | { ok: false; error: string; provided: Record<string, string> };

/**
 * Validates `year` and `sub_option` for an endpoint.
 * `params` carries only the validated values, so the cache key and the live
 * fetch always see the same request. Any other name, including a case variant
 * such as `Year`, is ignored.
 */
export function parseStatisticsParams(endpoint: EndpointName, query: URLSearchParams): ParamsResult {
  const provided: Record<string, string> = {};
  for (const [name, value] of query) provided[name] = value;

  const params: RequestParams = {};
  const statisticsQuery: StatisticsQuery = { endpoint };

  const rawYear = query.get('year');
  if (rawYear !== null && rawYear.trim() !== '') {
    const trimmed = rawYear.trim();
    if (!/^-?\d+$/.test(trimmed)) {
      return { ok: false, error: 'Year must be a valid integer.', provided };
    }
    const year = Number.parseInt(trimmed, 10);
    if (year < MIN_YEAR || year > MAX_YEAR) {
      return { ok: false, error: `Invalid year. Must be between ${MIN_YEAR} and ${MAX_YEAR}.`, provided };
    }
    statisticsQuery.year = year;
    params.year = year;
  }

  const subOption = query.get('sub_option');
  if (subOption !== null && subOption !== '') {
    const allowed = VALID_SUB_OPTIONS[endpoint];
    if (!allowed.includes(subOption)) {
      return {
        ok: false,
        error: `Invalid sub_option for ${endpoint}. Valid options: ${allowed.join(', ')}`,
        provided,
      };
    }
    statisticsQuery.subOption = subOption;
    params.sub_option = subOption;
  }

  return { ok: true, query: statisticsQuery, params };
}
