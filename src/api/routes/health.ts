/**
 * Health Route
 * Public liveness endpoint; reports which backends this instance runs on
 */

import { Hono } from 'hono';

export interface HealthInfo {
  authEnabled: boolean;
  /** 'supabase' when conversations persist, 'memory' otherwise */
  store: 'supabase' | 'memory';
  /** 'redis' when the conversation lock is distributed */
  lock: 'redis' | 'memory';
}

export function createHealthRoutes(info: HealthInfo): Hono {
  const app = new Hono();

  app.get('/health', (c) =>
    c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: 'v1',
      ...info,
    })
  );

  return app;
}
