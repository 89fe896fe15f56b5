// Filename: features/scraper/liveFetcher.ts

import type { EndpointName } from '../../constants/EndpointNames.js';
import type { FetchResult, LiveFetch } from '../../core/TieredCacheCoordinator.js';
import type { RequestParams } from '../../core/types.js';
import { fetchText, HttpError } from '../../utils/httpClient.js';
import { log, TMI, WARN } from '../../utils/log.js';
import { buildSourceUrl } from './sourceUrl.js';
import { parseStatisticsTable } from './tableParser.js';

const LOG_EMOJI = '🍇';

export interface LiveFetcherOptions {
  baseUrl: string;
}

/** Builds the live fetch for one request. */
export type LiveFetcherFactory = (endpoint: EndpointName, params: RequestParams) => LiveFetch;

/**
 * Creates the scraper-backed live fetch collaborator.
 * Upstream failures are mapped to typed fetch errors; nothing is thrown.
 */
export function createLiveFetcher(options: LiveFetcherOptions): LiveFetcherFactory {
  return (endpoint, params) => async (signal): Promise<FetchResult> => {
    const url = buildSourceUrl(endpoint, params, options.baseUrl);

    let html: string;
    try {
      html = await fetchText(url, { signal, context: 'Source site' });
    } catch (error) {
      if (signal.aborted) {
        return { ok: false, error: { kind: 'aborted', message: 'fetch aborted' } };
      }
      if (error instanceof HttpError && error.status > 0) {
        return { ok: false, error: { kind: 'http', message: error.message, status: error.status } };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, error: { kind: 'network', message } };
    }

    const record = parseStatisticsTable(html);
    if (!record) {
      log(`${LOG_EMOJI} Scraper: no statistics table at ${url}`, WARN);
      return { ok: false, error: { kind: 'parse', message: 'statistics table not found in page' } };
    }

    log(`${LOG_EMOJI} Scraper: ${endpoint} parsed (${record.body.length} groups)`, TMI);
    return { ok: true, record };
  };
}
