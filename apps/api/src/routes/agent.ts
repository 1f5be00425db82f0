/**
 * Agent control and status routes
 */
import type { FastifyInstance } from 'fastify';

export async function agentRoutes(app: FastifyInstance): Promise<void> {
  const { orchestrator, voice } = app.services;

  app.get('/agent/status', async () => {
    return { data: await orchestrator.getStats() };
  });

  // Resolves after the first monitor tick
  app.post('/agent/start', async () => {
    await orchestrator.start();
    return { data: { running: orchestrator.running } };
  });

  app.post('/agent/stop', async () => {
    await orchestrator.stop();
    return { data: { running: orchestrator.running } };
  });

  app.get('/voice/summary', async () => {
    const stats = await orchestrator.getStats();
    return { data: await voice.summary(stats) };
  });
}
