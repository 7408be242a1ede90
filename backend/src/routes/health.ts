import { Router, Request, Response } from 'express';
import { getCatalogStore } from '../lib/catalog.js';
import { describeError } from '../lib/errors.js';
import { checkRedisHealth } from '../lib/redis.js';

const router = Router();

interface HealthStatus {
  status: 'ok' | 'degraded' | 'error';
  timestamp: string;
  uptime: number;
  version: string;
  environment: string;
  services: {
    catalog: { status: string; latencyMs?: number; entries?: number; error?: string };
    redis: { status: string; error?: string };
  };
}

/**
 * GET /api/health
 * Liveness plus catalog store and Redis status
 */
router.get('/', async (_req: Request, res: Response) => {
  const healthcheck: HealthStatus = {
    status: 'ok',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    version: process.env.npm_package_version || '0.1.0',
    environment: process.env.NODE_ENV || 'development',
    services: {
      catalog: { status: 'unknown' },
      redis: { status: 'unknown' },
    },
  };

  // Check catalog store
  const storeStart = Date.now();
  try {
    const store = await getCatalogStore();
    const entries = await store.loadAll();
    healthcheck.services.catalog = {
      status: 'ok',
      latencyMs: Date.now() - storeStart,
      entries: entries.length,
    };
  } catch (error) {
    healthcheck.services.catalog = {
      status: 'error',
      error: describeError(error),
    };
    healthcheck.status = 'degraded';
  }

  const redisHealth = checkRedisHealth();
  healthcheck.services.redis = {
    status: redisHealth.status,
    ...(redisHealth.error ? { error: redisHealth.error } : {}),
  };

  if (!redisHealth.ok) {
    healthcheck.status = 'degraded';
  }

  const statusCode = healthcheck.status === 'ok' ? 200 : 503;
  res.status(statusCode).json(healthcheck);
});

export default router;
