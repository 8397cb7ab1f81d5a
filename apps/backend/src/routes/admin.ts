import type { FastifyInstance } from 'fastify';
import {
  baseUriSchema,
  registerUsersSchema,
  setIsAdminSchema,
  updatePermissionsSchema,
} from '@dataset-lookup/shared';
import type {
  BaseUriInput,
  RegisterUsersInput,
  SetIsAdminInput,
  UpdatePermissionsInput,
} from '@dataset-lookup/shared';
import { requireAdmin, requireAuth } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';

const adminOnly = [requireAuth, requireAdmin];

export async function adminRoutes(app: FastifyInstance): Promise<void> {
  const { users, baseUris, permissions, query } = app.services;

  // POST /user/register: bulk registration; existing users are skipped
  app.post<{ Body: RegisterUsersInput }>(
    '/user/register',
    { preHandler: [...adminOnly, validate(registerUsersSchema)] },
    async (request, reply) => {
      const result = await users.registerUsers(request.body);
      return reply.status(201).send(result);
    },
  );

  // GET /user/list
  app.get('/user/list', { preHandler: adminOnly }, async (_request, reply) => {
    return reply.status(200).send(await users.listUsers());
  });

  // PUT /user/:username/is_admin
  app.put<{ Params: { username: string }; Body: SetIsAdminInput }>(
    '/user/:username/is_admin',
    { preHandler: [...adminOnly, validate(setIsAdminSchema)] },
    async (request, reply) => {
      await users.setIsAdmin(request.params.username, request.body.is_admin);
      return reply
        .status(200)
        .send({ username: request.params.username, is_admin: request.body.is_admin });
    },
  );

  // POST /base_uri/register: stored without trailing slash
  app.post<{ Body: BaseUriInput }>(
    '/base_uri/register',
    { preHandler: [...adminOnly, validate(baseUriSchema)] },
    async (request, reply) => {
      const baseUri = await baseUris.registerBaseUri(request.body.base_uri);
      return reply.status(201).send({ base_uri: baseUri });
    },
  );

  // GET /base_uri/list
  app.get('/base_uri/list', { preHandler: adminOnly }, async (_request, reply) => {
    return reply.status(200).send(await baseUris.listBaseUris());
  });

  // POST /base_uri/datasets: admin records registered under a base URI
  app.post<{ Body: BaseUriInput }>(
    '/base_uri/datasets',
    { preHandler: [...adminOnly, validate(baseUriSchema)] },
    async (request, reply) => {
      const datasets = await query.listAdminMetadataInBaseUri(request.body.base_uri);
      return reply.status(200).send(datasets);
    },
  );

  // POST /permission/info
  app.post<{ Body: BaseUriInput }>(
    '/permission/info',
    { preHandler: [...adminOnly, validate(baseUriSchema)] },
    async (request, reply) => {
      return reply.status(200).send(await permissions.showPermissions(request.body.base_uri));
    },
  );

  // POST /permission/update_on_base_uri: additive grants
  app.post<{ Body: UpdatePermissionsInput }>(
    '/permission/update_on_base_uri',
    { preHandler: [...adminOnly, validate(updatePermissionsSchema)] },
    async (request, reply) => {
      const result = await permissions.updatePermissions(request.body);
      return reply.status(200).send(result);
    },
  );
}
