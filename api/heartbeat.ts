// Filename: api/heartbeat.ts

import type { ServiceContext } from './context.js';
import type { ApiRequest, ApiResponse } from './http.js';

/**
 * Liveness check. Always 200; dependency state is reported, not enforced.
 */
export async function handleHeartbeat(ctx: ServiceContext, _req: ApiRequest, res: ApiResponse): Promise<void> {
  const heartbeat = await ctx.health.heartbeat();
  res.status(200).json(heartbeat);
}
