// Filename: api/server.ts

import { createServer, type Server } from 'http';
import type { ServiceConfig } from '../config/configService.js';
import { log, ERR, LOG } from '../utils/log.js';
import { createServiceContext, type ServiceContext } from './context.js';
import { adaptRequest, adaptResponse } from './http.js';
import { routeRequest } from './routing.js';

const LOG_EMOJI = '🚀';

const SHUTDOWN_GRACE_MS = 10_000;

/**
 * Creates the HTTP server for a service context. Does not listen.
 */
export function createApiServer(ctx: ServiceContext): Server {
  return createServer((req, res) => {
    const apiRequest = adaptRequest(req, res);
    const apiResponse = adaptResponse(res);
    routeRequest(ctx, apiRequest, apiResponse).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      log(`${LOG_EMOJI} ❌ Request failed outside the router: ${message}`, ERR);
      if (!res.headersSent) {
        apiResponse.status(500).json({ error: 'Internal server error', status: 'internal_error' });
      } else {
        res.end();
      }
    });
  });
}

/**
 * Starts listening and installs SIGINT/SIGTERM handlers that close the server.
 */
export function startServer(config: ServiceConfig): Server {
  const ctx = createServiceContext(config);
  const server = createApiServer(ctx);

  const shutdown = (signal: string) => {
    log(`${LOG_EMOJI} ${signal} received, shutting down...`, LOG);
    server.close(() => {
      log(`${LOG_EMOJI} Server closed.`, LOG);
      process.exit(0);
    });
    setTimeout(() => process.exit(1), SHUTDOWN_GRACE_MS).unref();
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  server.listen(config.port, () => {
    log(`${LOG_EMOJI} Statistics API listening on http://localhost:${config.port}`, LOG);
    log(`${LOG_EMOJI} Static fallback directory: ${config.staticDir}`, LOG);
    if (config.users.length === 0) {
      log(`${LOG_EMOJI} ⚠️ API_USERS is empty; every authenticated route will answer 401`, LOG);
    }
  });
  return server;
}
