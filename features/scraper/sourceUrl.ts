// Filename: features/scraper/sourceUrl.ts

import { ROUTE_OPTION_MAP, type EndpointName } from '../../constants/EndpointNames.js';
import type { RequestParams } from '../../core/types.js';

/**
 * Builds the upstream page URL for an endpoint.
 * `opcao` selects the page; `ano` and `subopcao` are added only when given.
 * @param baseUrl - Upstream index page, e.g. http://host/index.php
 */
export function buildSourceUrl(endpoint: EndpointName, params: RequestParams, baseUrl: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set('opcao', ROUTE_OPTION_MAP[endpoint]);

  const year = params.year;
  if (year !== null && year !== undefined && String(year).trim() !== '') {
    url.searchParams.set('ano', String(year).trim());
  }
  const subOption = params.sub_option;
  if (subOption !== null && subOption !== undefined && String(subOption).trim() !== '') {
    url.searchParams.set('subopcao', String(subOption).trim());
  }
  return url.toString();
}
