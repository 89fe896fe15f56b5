// Filename: api/http.ts
/**
 * Request/response shapes the handlers work against, plus adapters from node:http.
 * Handlers stay independent of the server so they can be exercised with plain objects.
 */

import type { IncomingHttpHeaders, IncomingMessage, ServerResponse } from 'http';

export interface ApiRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  headers: IncomingHttpHeaders;
  /** Aborted when the client goes away before the response is written */
  signal: AbortSignal;
}

export interface ApiResponse {
  status(code: number): ApiResponse;
  setHeader(name: string, value: string): ApiResponse;
  json(body: unknown): void;
}

export type ApiHandler = (req: ApiRequest, res: ApiResponse) => Promise<void>;

/**
 * Builds an ApiRequest from a node request. The returned signal aborts when the
 * connection closes before the response has been fully written.
 */
export function adaptRequest(req: IncomingMessage, res: ServerResponse): ApiRequest {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });

  const url = new URL(req.url ?? '/', 'http://localhost');
  return {
    method: (req.method ?? 'GET').toUpperCase(),
    path: url.pathname.replace(/\/+$/, '') || '/',
    query: url.searchParams,
    headers: req.headers,
    signal: controller.signal,
  };
}

export function adaptResponse(res: ServerResponse): ApiResponse {
  const api: ApiResponse = {
    status(code) {
      res.statusCode = code;
      return api;
    },
    setHeader(name, value) {
      res.setHeader(name, value);
      return api;
    },
    json(body) {
      if (res.writableEnded) return;
      const payload = JSON.stringify(body);
      res.setHeader('Content-Type', 'application/json; charset=utf-8');
      res.setHeader('Content-Length', Buffer.byteLength(payload));
      res.end(payload);
    },
  };
  return api;
}
