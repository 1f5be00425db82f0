/**
 * Activity feed routes
 */
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { activityLogRepository } from '@remedyops/database';

const activityQuerySchema = z.object({
  incidentId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export async function activityRoutes(app: FastifyInstance): Promise<void> {
  // Newest first
  app.get('/activity', async (request: FastifyRequest) => {
    const query = activityQuerySchema.parse(request.query);
    const entries = await activityLogRepository.list({ incidentId: query.incidentId }, query.limit);
    return { data: entries };
  });
}
