/**
 * API Routes
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import {
  AuthorizationError,
  RemedyOpsError,
  createChildLogger,
  httpStatusForError,
} from '@remedyops/shared';
import { incidentsRoutes } from './incidents.js';
import { healthRoutes } from './health.js';
import { activityRoutes } from './activity.js';
import { agentRoutes } from './agent.js';
import { learningRoutes } from './learning.js';
import { usersRoutes } from './users.js';
import { serviceRoutes } from './service.js';

const logger = createChildLogger({ component: 'API' });

/**
 * Map thrown errors onto JSON error responses
 */
export function apiErrorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply): FastifyReply {
  if (error instanceof ZodError) {
    return reply.status(400).send({ error: 'Invalid request', issues: error.issues });
  }

  if (error instanceof RemedyOpsError) {
    const status = httpStatusForError(error);
    const body: Record<string, unknown> = { error: error.message, code: error.code };
    if (error instanceof AuthorizationError) {
      body.requiredRole = error.requiredRole;
      body.actorRole = error.actorRole;
    }
    logger.warn({ url: request.url, status, code: error.code }, error.message);
    return reply.status(status).send(body);
  }

  // Fastify's own errors (bad JSON, unsupported media type) carry their status
  const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;
  if (statusCode >= 500) {
    logger.error({ url: request.url, error: error.message }, 'Unhandled route error');
  }
  return reply.status(statusCode).send({ error: statusCode >= 500 ? 'Internal server error' : error.message });
}

export async function registerRoutes(app: FastifyInstance): Promise<void> {
  // API version prefix
  await app.register(
    async (api) => {
      api.setErrorHandler(apiErrorHandler);

      api.register(healthRoutes);

      // Incidents, human actions, approvals history and comments
      api.register(incidentsRoutes, { prefix: '/incidents' });

      api.register(activityRoutes);

      // Agent control, stats and voice summary
      api.register(agentRoutes);

      api.register(learningRoutes);
      api.register(usersRoutes);
      api.register(serviceRoutes);
    },
    { prefix: '/api/v1' }
  );
}
