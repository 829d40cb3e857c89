import Fastify, { FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import formbody from '@fastify/formbody';
import { PORTAL } from './constants';
import { createAcademicController } from './controllers/academic.controller';
import { ReadinessProbes } from './controllers/health.controller';
import { registerRoutes } from './routes';
import { AcademicService } from './services/academic.service';
import { generateRequestId } from './utils/crypto-helpers';
import { logger } from './utils/logger';

export interface AppDependencies {
  academic: AcademicService;
  readiness: ReadinessProbes;
}

export interface AppOptions {
  requestTimeoutMs?: number;
  connectionTimeoutMs?: number;
  bodyLimitBytes?: number;
}

// Store request start time for duration calculation
declare module 'fastify' {
  interface FastifyRequest {
    startTime?: number;
  }
}

/**
 * Build the Fastify application: plugins, request logging, routes.
 * Request ids come from X-Request-ID when the caller sends one and are echoed back.
 */
export async function buildServer(
  deps: AppDependencies,
  options: AppOptions = {}
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false, // Use custom Winston logger instead
    requestIdHeader: PORTAL.REQUEST_ID_HEADER.toLowerCase(),
    genReqId: () => generateRequestId(),
    trustProxy: true,
    ...(options.requestTimeoutMs !== undefined ? { requestTimeout: options.requestTimeoutMs } : {}),
    ...(options.connectionTimeoutMs !== undefined
      ? { connectionTimeout: options.connectionTimeoutMs }
      : {}),
    ...(options.bodyLimitBytes !== undefined ? { bodyLimit: options.bodyLimitBytes } : {}),
  });

  // Request logging hook - log incoming requests
  fastify.addHook('onRequest', async (request, reply) => {
    request.startTime = Date.now();
    reply.header(PORTAL.REQUEST_ID_HEADER, request.id);
    logger.info('HTTP', `--> ${request.method} ${request.url}`, {
      requestId: request.id,
      method: request.method,
      url: request.url,
      userAgent: request.headers['user-agent'],
      ip: request.ip,
    });
  });

  // Response logging hook - log outgoing responses
  fastify.addHook('onResponse', async (request, reply) => {
    const duration = request.startTime ? Date.now() - request.startTime : 0;
    const meta = {
      requestId: request.id,
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      durationMs: duration,
    };
    const message = `<-- ${request.method} ${request.url} ${reply.statusCode} ${duration}ms`;

    if (reply.statusCode >= 400) {
      logger.warn('HTTP', message, meta);
    } else {
      logger.info('HTTP', message, meta);
    }
  });

  // Security headers
  await fastify.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
      },
    },
  });

  // CORS is handled by the gateway in front of the service
  await fastify.register(cors, {
    origin: false,
  });

  // Login accepts form posts as well as JSON
  await fastify.register(formbody);

  await registerRoutes(fastify, {
    academic: createAcademicController(deps.academic),
    readiness: deps.readiness,
  });

  return fastify;
}
