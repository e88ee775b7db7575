/**
 * Health Check Routes
 *
 * No authentication required.
 *
 * Endpoints:
 * - GET /health - Overall status with per-check results
 * - GET /health/ready - Readiness probe
 * - GET /health/live - Liveness probe
 */

import { Hono } from 'hono';

export interface HealthCheckResult {
  status: 'healthy' | 'unhealthy' | 'degraded';
  message?: string;
  latencyMs?: number;
}

export type HealthCheckFn = () => Promise<HealthCheckResult>;

type OverallStatus = HealthCheckResult['status'];

export interface HealthRouteOptions {
  version: string;
  checks: Record<string, HealthCheckFn>;
}

/**
 * Wrap a boolean probe (e.g. a storage ping) as a health check
 */
export function probeCheck(probe: () => Promise<boolean>): HealthCheckFn {
  return async () => {
    const start = Date.now();
    try {
      const ok = await probe();
      return { status: ok ? 'healthy' : 'unhealthy', latencyMs: Date.now() - start };
    } catch (error) {
      return {
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown error',
        latencyMs: Date.now() - start,
      };
    }
  };
}

async function runHealthChecks(checks: Record<string, HealthCheckFn>): Promise<{
  status: OverallStatus;
  checks: Record<string, HealthCheckResult>;
  totalLatencyMs: number;
}> {
  const results: Record<string, HealthCheckResult> = {};
  const startTime = Date.now();

  await Promise.all(
    Object.entries(checks).map(async ([name, fn]) => {
      try {
        results[name] = await fn();
      } catch (error) {
        results[name] = {
          status: 'unhealthy',
          message: error instanceof Error ? error.message : 'Check failed',
        };
      }
    })
  );

  const statuses = Object.values(results).map((r) => r.status);
  let status: OverallStatus = 'healthy';
  if (statuses.includes('unhealthy')) {
    status = 'unhealthy';
  } else if (statuses.includes('degraded')) {
    status = 'degraded';
  }

  return { status, checks: results, totalLatencyMs: Date.now() - startTime };
}

export function createHealthRoutes(options: HealthRouteOptions): Hono {
  const health = new Hono();

  health.get('/', async (c) => {
    const { status, checks, totalLatencyMs } = await runHealthChecks(options.checks);

    const mem = process.memoryUsage();
    const response = {
      status,
      version: options.version,
      uptime: Math.floor(process.uptime()),
      checks,
      memory: {
        heapUsed: Math.round(mem.heapUsed / 1024 / 1024),
        heapTotal: Math.round(mem.heapTotal / 1024 / 1024),
        rss: Math.round(mem.rss / 1024 / 1024),
      },
      responseTime: totalLatencyMs,
    };

    return c.json(response, status === 'unhealthy' ? 503 : 200);
  });

  health.get('/ready', async (c) => {
    const { status, checks } = await runHealthChecks(options.checks);
    const summary = Object.fromEntries(Object.entries(checks).map(([k, v]) => [k, v.status]));
    const ready = status !== 'unhealthy';

    return c.json({ ready, status, checks: summary }, ready ? 200 : 503);
  });

  health.get('/live', (c) => {
    return c.json({
      alive: true,
      uptime: Math.floor(process.uptime()),
    });
  });

  return health;
}
