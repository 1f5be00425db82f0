/**
 * WebSocket Handlers
 * One socket per named observer. The broadcaster owns fan-out and presence;
 * this module only adapts sockets to it and relays client messages.
 */

import type { FastifyInstance } from 'fastify';
import type { SocketStream } from '@fastify/websocket';
import type { WebSocket } from 'ws';
import { z } from 'zod';
import { BROADCAST_EVENTS, createChildLogger, errorMessage } from '@remedyops/shared';
import type { EventBroadcaster, ObserverSink } from '@remedyops/core';

const logger = createChildLogger({ component: 'WebSocket' });

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('viewing'), incident_id: z.string().nullable().optional() }),
  z.object({ type: z.literal('typing'), incident_id: z.string() }),
  z.object({ type: z.literal('ping') }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

export function createSocketSink(socket: WebSocket): ObserverSink {
  return {
    send(envelope) {
      if (socket.readyState !== socket.OPEN) {
        throw new Error('Socket is not open');
      }
      socket.send(JSON.stringify(envelope));
    },
  };
}

/**
 * Apply one client message on behalf of `userName`
 */
export function handleClientMessage(
  broadcaster: EventBroadcaster,
  userName: string,
  message: ClientMessage,
  reply: (payload: unknown) => void
): void {
  switch (message.type) {
    case 'viewing':
      broadcaster.setViewing(userName, message.incident_id ?? null);
      broadcaster.broadcastPresence();
      break;

    case 'typing':
      broadcaster.broadcast(BROADCAST_EVENTS.USER_TYPING, { user: userName, incident_id: message.incident_id });
      break;

    case 'ping':
      reply({ type: 'pong', timestamp: new Date().toISOString() });
      break;
  }
}

export function parseClientMessage(raw: string): ClientMessage | null {
  try {
    const parsed = clientMessageSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    logger.warn({ error: errorMessage(error) }, 'Unparseable WebSocket message');
    return null;
  }
}

export async function registerWebSocket(app: FastifyInstance): Promise<void> {
  const { broadcaster } = app.services;

  app.get<{ Params: { userName: string } }>(
    '/ws/:userName',
    { websocket: true },
    (connection: SocketStream, req) => {
      const socket = connection.socket;
      const { userName } = req.params;
      const sink = createSocketSink(socket);
      logger.info({ userName, ip: req.ip }, 'WebSocket client connected');

      broadcaster.register(userName, sink);

      socket.on('message', (data) => {
        const message = parseClientMessage(data.toString());
        if (!message) {
          socket.send(JSON.stringify({ type: 'error', message: 'Invalid message' }));
          return;
        }
        handleClientMessage(broadcaster, userName, message, (payload) => socket.send(JSON.stringify(payload)));
      });

      socket.on('close', () => {
        broadcaster.unregister(userName, sink);
        logger.info({ userName }, 'WebSocket client disconnected');
      });

      socket.on('error', (err) => {
        logger.error({ userName, error: err.message }, 'WebSocket error');
        broadcaster.unregister(userName, sink);
      });
    }
  );
}
