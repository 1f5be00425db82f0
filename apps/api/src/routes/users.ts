/**
 * User routes
 */
import type { FastifyInstance } from 'fastify';
import { userRepository } from '@remedyops/database';

export async function usersRoutes(app: FastifyInstance): Promise<void> {
  const { broadcaster } = app.services;

  app.get('/users', async () => {
    const users = await userRepository.list();
    return {
      data: users.map((user) => ({ ...user, online: broadcaster.isOnline(user.name) })),
    };
  });

  app.get('/presence', async () => {
    return { data: broadcaster.getPresence() };
  });
}
