// Filename: utils/httpClient.ts
/**
 * Outbound HTTP for the scraper: fetches upstream pages and decodes them.
 * Every failure surfaces as an HttpError.
 */

import { log, ERR, LOG, TMI } from './log.js';

// HTTP Client specific emoji
const LOG_EMOJI = '🌐';

const HTML_ACCEPT = 'text/html,application/xhtml+xml';
const ERROR_PREVIEW_LENGTH = 200;

/**
 * Failed outbound request. `status` is the upstream status code, or 0 when no
 * response arrived (DNS, connection reset, abort).
 */
export class HttpError extends Error {
  constructor(
    public status: number,
    public message: string,
    public url: string,
    public details?: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export interface PageRequestOptions {
  headers?: Record<string, string>;
  /** Cancels the request when aborted */
  signal?: AbortSignal;
  /** Label for log lines and error messages, e.g. 'Source site' */
  context?: string;
}

/**
 * Reads the charset parameter of a Content-Type header.
 * @returns the lower-cased charset, or 'utf-8' when none is declared
 */
export function charsetFromContentType(contentType: string | null): string {
  const match = contentType?.match(/charset=["']?([^;"'\s]+)/i);
  return match ? match[1].toLowerCase() : 'utf-8';
}

function decodeBody(bytes: ArrayBuffer, charset: string, url: string): string {
  try {
    return new TextDecoder(charset).decode(bytes);
  } catch {
    // TextDecoder throws a RangeError for labels it does not know
    log(`${LOG_EMOJI} Unknown charset "${charset}" from ${url}, decoding as UTF-8`, TMI);
    return new TextDecoder('utf-8').decode(bytes);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * GETs a page and returns its body decoded with the charset the server declares.
 *
 * @throws HttpError with status 0 when the request itself fails,
 *   or with the upstream status when the response is not OK
 */
export async function fetchText(url: string, options: PageRequestOptions = {}): Promise<string> {
  const context = options.context ?? 'HTTP';

  log(`${LOG_EMOJI} [${context}] GET ${url}`, LOG);
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: HTML_ACCEPT, ...options.headers },
      signal: options.signal,
    });
  } catch (error) {
    const reason = describe(error);
    log(`${LOG_EMOJI} [${context}] Network/Request Error: ${reason}`, ERR);
    throw new HttpError(0, `Failed to fetch from ${context}: ${reason}`, url, reason);
  }

  log(`${LOG_EMOJI} [${context}] Response: ${response.status} ${response.statusText}`, LOG);
  if (!response.ok) {
    const body = await response.text().catch(() => 'Unable to read error response');
    log(`${LOG_EMOJI} [${context}] ❌ Error Response: ${body.substring(0, ERROR_PREVIEW_LENGTH)}`, ERR);
    throw new HttpError(
      response.status,
      `${context} responded with status ${response.status}: ${response.statusText}`,
      url,
      body
    );
  }

  let bytes: ArrayBuffer;
  try {
    bytes = await response.arrayBuffer();
  } catch (error) {
    const reason = describe(error);
    log(`${LOG_EMOJI} [${context}] Failed to read body from ${url}: ${reason}`, ERR);
    throw new HttpError(0, `Failed to read response from ${context}: ${reason}`, url, reason);
  }

  return decodeBody(bytes, charsetFromContentType(response.headers.get('content-type')), url);
}
