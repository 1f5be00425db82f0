/**
 * Monitored service routes
 */
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { BROADCAST_EVENTS, INJECTABLE_FAULTS } from '@remedyops/shared';

const LOG_TAIL_LINES = 10;

const injectSchema = z.object({
  faultType: z.enum(INJECTABLE_FAULTS),
});

export async function serviceRoutes(app: FastifyInstance): Promise<void> {
  const { service, broadcaster } = app.services;

  app.get('/service', async () => {
    return {
      data: {
        name: service.name,
        running: service.isRunning(),
        healthUrl: service.healthUrl,
        activeFault: service.getActiveFault(),
        lastRecovery: service.getLastRecovery(),
        logsTail: await service.getLogs(LOG_TAIL_LINES),
      },
    };
  });

  // Break the service on purpose; the monitor picks the fault up on its next tick
  app.post('/service/inject', async (request: FastifyRequest) => {
    const { faultType } = injectSchema.parse(request.body);
    const injection = await service.injectFault(faultType);
    broadcaster.broadcast(BROADCAST_EVENTS.FAULT_INJECTED, injection);
    return { data: injection };
  });

  // Undo the last injected fault without going through an incident
  app.post('/service/clear', async () => {
    return { data: await service.clearFault() };
  });
}
