import { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { SESSION } from '../constants';
import { HTTP_STATUS_BY_CODE, PortalErrorCode } from '../errors/portal.errors';
import { AcademicService } from '../services/academic.service';
import { FetchFailure } from '../types/portal.types';
import { logger } from '../utils/logger';

/**
 * Academic controller - HTTP handlers over AcademicService
 * The portal session travels in the X-Portal-Session header.
 */

const loginBodySchema = z.object({
  username: z.string().trim().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
});

/** Term scopes are stored in 64-character columns */
const SCOPE_MAX_LENGTH = 64;

const fetchQuerySchema = z.object({
  refresh: z.string().optional(),
  semester: z.string().max(SCOPE_MAX_LENGTH, `semester must be at most ${SCOPE_MAX_LENGTH} characters`).optional(),
  xnxq: z.string().max(SCOPE_MAX_LENGTH, `xnxq must be at most ${SCOPE_MAX_LENGTH} characters`).optional(),
});

type FetchQuery = z.infer<typeof fetchQuerySchema>;

function headerValue(value: string | string[] | undefined): string {
  return (Array.isArray(value) ? value[0] : value)?.trim() ?? '';
}

function sessionIdOf(request: FastifyRequest): string {
  return headerValue(request.headers[SESSION.HEADER]);
}

function isTruthyFlag(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

function sendResult(reply: FastifyReply, result: { success: true } | FetchFailure): void {
  if (result.success) {
    reply.code(200).send(result);
    return;
  }
  reply.code(HTTP_STATUS_BY_CODE[result.error.code]).send(result);
}

function sendBadRequest(reply: FastifyReply, message: string): void {
  reply.code(400).send({
    success: false,
    error: { code: PortalErrorCode.BAD_REQUEST, message },
  });
}

function sendInternalError(reply: FastifyReply, context: string, error: unknown, requestId: string): void {
  logger.error('AcademicController', `${context} failed`, error, { requestId });
  reply.code(500).send({
    success: false,
    error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
  });
}

export function createAcademicController(service: AcademicService) {
  /**
   * Wrap a read that needs the session and the parsed query
   */
  const sessionRead =
    (
      context: string,
      read: (sessionId: string, query: FetchQuery, requestId: string, refresh: boolean) => Promise<{ success: true } | FetchFailure>
    ) =>
    async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
      const query = fetchQuerySchema.safeParse(request.query ?? {});
      if (!query.success) {
        sendBadRequest(reply, query.error.issues[0]?.message ?? 'Invalid query parameters');
        return;
      }
      try {
        const result = await read(
          sessionIdOf(request),
          query.data,
          request.id,
          isTruthyFlag(query.data.refresh)
        );
        sendResult(reply, result);
      } catch (error) {
        sendInternalError(reply, context, error, request.id);
      }
    };

  return {
    /**
     * GET /v1/academic/health - Portal reachability probe
     */
    async health(request: FastifyRequest, reply: FastifyReply): Promise<void> {
      try {
        const result = await service.health(request.id);
        reply.code(200).send(result);
      } catch (error) {
        sendInternalError(reply, 'Portal health', error, request.id);
      }
    },

    /**
     * POST /v1/academic/login - Portal login, opens a session
     */
    async login(request: FastifyRequest, reply: FastifyReply): Promise<void> {
      const body = loginBodySchema.safeParse(request.body ?? {});
      if (!body.success) {
        sendBadRequest(reply, body.error.issues[0]?.message ?? 'Invalid request body');
        return;
      }

      try {
        const result = await service.login(body.data.username, body.data.password, request.id);
        if (result.success) {
          reply.header(SESSION.HEADER, result.sessionId);
        }
        sendResult(reply, result);
      } catch (error) {
        sendInternalError(reply, 'Login', error, request.id);
      }
    },

    /**
     * POST /v1/academic/logout - Drop the session
     */
    async logout(request: FastifyRequest, reply: FastifyReply): Promise<void> {
      try {
        sendResult(reply, await service.logout(sessionIdOf(request)));
      } catch (error) {
        sendInternalError(reply, 'Logout', error, request.id);
      }
    },

    /**
     * GET /v1/academic/me
     */
    me: sessionRead('Profile', (sessionId, _query, requestId, refresh) =>
      service.me(sessionId, requestId, refresh)
    ),

    /**
     * GET /v1/academic/semesters
     */
    semesters: sessionRead('Semesters', (sessionId, _query, requestId, refresh) =>
      service.semesters(sessionId, requestId, refresh)
    ),

    /**
     * GET /v1/academic/grades?semester=
     */
    grades: sessionRead('Grades', (sessionId, query, requestId, refresh) =>
      service.grades(sessionId, query.semester ?? '', requestId, refresh)
    ),

    /**
     * GET /v1/academic/schedule?xnxq=
     */
    schedule: sessionRead('Schedule', (sessionId, query, requestId, refresh) =>
      service.schedule(sessionId, query.xnxq ?? '', requestId, refresh)
    ),
  };
}

export type AcademicController = ReturnType<typeof createAcademicController>;
