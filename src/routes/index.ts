import { FastifyInstance } from 'fastify';
import { AcademicController } from '../controllers/academic.controller';
import { createReadinessCheck, healthCheck, ReadinessProbes } from '../controllers/health.controller';

/**
 * API version prefix
 */
const API_VERSION = '/v1';

export interface RouteDependencies {
  academic: AcademicController;
  readiness: ReadinessProbes;
}

/**
 * Register all application routes
 */
export async function registerRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies
): Promise<void> {
  // Health endpoints (no version prefix)
  fastify.get('/health', healthCheck);
  fastify.get('/ready', createReadinessCheck(deps.readiness));

  // Versioned API routes
  await fastify.register(
    async api => {
      api.get('/academic/health', deps.academic.health);
      api.post('/academic/login', deps.academic.login);
      api.post('/academic/logout', deps.academic.logout);
      api.get('/academic/me', deps.academic.me);
      api.get('/academic/semesters', deps.academic.semesters);
      api.get('/academic/grades', deps.academic.grades);
      api.get('/academic/schedule', deps.academic.schedule);
    },
    { prefix: API_VERSION }
  );
}
