/**
 * Fastify application factory
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import websocket from '@fastify/websocket';
import { getConfig } from '@remedyops/shared';
import { registerRoutes } from './routes/index.js';
import { registerWebSocket } from './websocket/index.js';
import type { AppServices } from './services/index.js';

export async function buildApp(services: AppServices, corsOrigin = getConfig().server.corsOrigin): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own logger
  });

  // Decorate app with services for dependency injection
  app.decorate('services', services);

  await app.register(cors, {
    origin: corsOrigin === '*' ? true : corsOrigin.split(','),
    credentials: true,
  });
  await app.register(websocket);

  await registerRoutes(app);
  await registerWebSocket(app);

  return app;
}
