/**
 * Health Check Route
 *
 * Lightweight liveness endpoint; performs no database access.
 *
 * @example
 * ```bash
 * curl http://localhost:3000/health
 * # { "success": true, "data": { "status": "ok", "timestamp": "...", "environment": "development",
 * #   "version": "0.1.0", "accelerationFactor": 1 } }
 * ```
 */

import { Hono } from 'hono';
import type { Clock } from '@/core/scheduler';
import { success } from '../utils/response';

export interface HealthCheckData {
  status: 'ok';

  /** ISO 8601 timestamp of when the check was performed */
  timestamp: string;

  environment: string;

  version: string;

  /** 1 normally, 1000 in test mode */
  accelerationFactor: number;
}

export const APP_VERSION = '0.1.0';

/**
 * Creates the health check router.
 */
export function healthRoutes(clock: Clock): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const healthData: HealthCheckData = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV || 'development',
      version: APP_VERSION,
      accelerationFactor: clock.accelerationFactor,
    };

    return success(c, healthData);
  });

  return router;
}
