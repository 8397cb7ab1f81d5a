import type { FastifyInstance } from 'fastify';
import { currentUsername, requireAuth } from '../middleware/auth.js';

export async function userRoutes(app: FastifyInstance): Promise<void> {
  const { users } = app.services;

  // GET /user_info/:username: own record, or anyone's for admins
  app.get<{ Params: { username: string } }>(
    '/user_info/:username',
    { preHandler: [requireAuth] },
    async (request, reply) => {
      const info = await users.getUserInfo(currentUsername(request), request.params.username);
      return reply.status(200).send(info);
    },
  );
}
