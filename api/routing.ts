// Filename: api/routing.ts

import { isEndpointName } from '../constants/EndpointNames.js';
import { log, ERR, TMI } from '../utils/log.js';
import { authenticate, AUTH_REALM } from './auth.js';
import { handleCacheClear, handleCacheStats } from './cacheAdmin.js';
import type { ServiceContext } from './context.js';
import { handleHeartbeat } from './heartbeat.js';
import type { ApiRequest, ApiResponse } from './http.js';
import { handleStatistics } from './statistics.js';

const LOG_EMOJI = '📎';

type RouteHandler = (ctx: ServiceContext, req: ApiRequest, res: ApiResponse) => Promise<void>;

interface Route {
  methods: Partial<Record<string, RouteHandler>>;
  requiresAuth: boolean;
}

function matchRoute(path: string): Route | null {
  if (path === '/heartbeat') {
    return { methods: { GET: handleHeartbeat }, requiresAuth: false };
  }
  if (path === '/cache/stats') {
    return { methods: { GET: handleCacheStats }, requiresAuth: true };
  }
  if (path === '/cache') {
    return { methods: { DELETE: handleCacheClear }, requiresAuth: true };
  }
  const endpoint = path.slice(1);
  if (isEndpointName(endpoint)) {
    return {
      methods: { GET: (ctx, req, res) => handleStatistics(ctx, endpoint, req, res) },
      requiresAuth: true,
    };
  }
  return null;
}

/**
 * 📎 Routes requests by path and method
 * - /heartbeat        -> liveness (no auth)
 * - /cache/stats      -> operational report
 * - /cache (DELETE)   -> clear cache tiers
 * - /{endpoint}       -> statistics
 */
export async function routeRequest(ctx: ServiceContext, req: ApiRequest, res: ApiResponse): Promise<void> {
  log(`${LOG_EMOJI} ${req.method} ${req.path}`, TMI);

  const route = matchRoute(req.path);
  if (!route) {
    res.status(404).json({ error: 'Not found', path: req.path, status: 'not_found' });
    return;
  }

  const handler = route.methods[req.method];
  if (!handler) {
    res
      .setHeader('Allow', Object.keys(route.methods).join(', '))
      .status(405)
      .json({ error: 'Method not allowed', status: 'method_not_allowed' });
    return;
  }

  if (route.requiresAuth && !authenticate(req.headers.authorization, ctx.config.users)) {
    res
      .setHeader('WWW-Authenticate', `Basic realm="${AUTH_REALM}"`)
      .status(401)
      .json({ error: 'Unauthorized', status: 'unauthorized' });
    return;
  }

  try {
    await handler(ctx, req, res);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    log(`${LOG_EMOJI} ❌ Unhandled error on ${req.method} ${req.path}: ${message}`, ERR);
    res.status(500).json({ error: 'Internal server error', message, status: 'internal_error' });
  }
}
