import { FastifyReply, FastifyRequest } from 'fastify';

/**
 * Health check controllers
 */

export interface HealthProbe {
  healthCheck(): Promise<boolean>;
}

export interface ReadinessProbes {
  database: HealthProbe;
  cache: HealthProbe;
  /** Connection pool counters, when storage is pooled */
  poolStatus?: () => Record<string, number>;
}

/**
 * GET /health - Basic health check
 * Returns 200 if service is running
 */
export async function healthCheck(_request: FastifyRequest, reply: FastifyReply): Promise<void> {
  reply.code(200).send({
    status: 'ok',
    timestamp: new Date().toISOString(),
  });
}

/**
 * GET /ready - Readiness check
 * Checks database and cache connectivity
 */
export function createReadinessCheck(probes: ReadinessProbes) {
  return async function readinessCheck(
    _request: FastifyRequest,
    reply: FastifyReply
  ): Promise<void> {
    try {
      const [dbHealthy, cacheHealthy] = await Promise.all([
        probes.database.healthCheck(),
        probes.cache.healthCheck(),
      ]);

      if (!dbHealthy) {
        reply.code(503).send({
          status: 'unhealthy',
          database: 'down',
          cache: cacheHealthy ? 'up' : 'down',
          timestamp: new Date().toISOString(),
        });
        return;
      }

      reply.code(200).send({
        status: 'ready',
        database: 'up',
        cache: cacheHealthy ? 'up' : 'degraded',
        ...(probes.poolStatus ? { pool: probes.poolStatus() } : {}),
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      reply.code(503).send({
        status: 'error',
        message: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      });
    }
  };
}
