/**
 * Incidents API Routes
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { approvalRepository, incidentRepository } from '@remedyops/database';
import { INCIDENT_STATUS_VALUES, isFaultType, type FaultType } from '@remedyops/shared';

// Request schemas
const listIncidentsSchema = z.object({
  status: z.enum(INCIDENT_STATUS_VALUES).optional(),
  faultType: z.custom<FaultType>(isFaultType, { message: 'Unknown fault type' }).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const actionSchema = z.object({
  userName: z.string().min(1),
  action: z.string().min(1),
  comment: z.string().default(''),
});

const commentSchema = z.object({
  userName: z.string().min(1),
  content: z.string(),
});

type IdRequest = FastifyRequest<{ Params: { id: string } }>;

export async function incidentsRoutes(app: FastifyInstance): Promise<void> {
  const { orchestrator } = app.services;

  // List incidents, newest first
  app.get('/', async (request: FastifyRequest) => {
    const query = listIncidentsSchema.parse(request.query);
    const incidents = await incidentRepository.list(
      { status: query.status, faultType: query.faultType },
      query.limit,
      query.offset
    );
    return { data: incidents };
  });

  // Get incident by ID
  app.get('/:id', async (request: IdRequest, reply: FastifyReply) => {
    const incident = await incidentRepository.getById(request.params.id);
    if (!incident) {
      return reply.status(404).send({ error: 'Incident not found' });
    }
    return { data: incident };
  });

  // Human action: approve, reject, override or request_changes
  app.post('/:id/actions', async (request: IdRequest) => {
    const body = actionSchema.parse(request.body);
    const result = await orchestrator.submitAction(request.params.id, body.userName, body.action, body.comment);
    return { data: result };
  });

  // Approval history, newest first
  app.get('/:id/approvals', async (request: IdRequest, reply: FastifyReply) => {
    const incident = await incidentRepository.getById(request.params.id);
    if (!incident) {
      return reply.status(404).send({ error: 'Incident not found' });
    }
    return { data: await approvalRepository.getByIncident(incident.id) };
  });

  app.post('/:id/comments', async (request: IdRequest, reply: FastifyReply) => {
    const body = commentSchema.parse(request.body);
    const comment = await orchestrator.addComment(request.params.id, body.userName, body.content);
    return reply.status(201).send({ data: comment });
  });

  app.get('/:id/comments', async (request: IdRequest) => {
    return { data: await orchestrator.listComments(request.params.id) };
  });
}
