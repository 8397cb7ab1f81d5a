import type { FastifyInstance } from 'fastify';
import { readmeRequestSchema, searchQuerySchema } from '@dataset-lookup/shared';
import type { ReadmeRequestInput, SearchQuery } from '@dataset-lookup/shared';
import { currentUsername, requireAuth } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { forbidden } from '../utils/errors.js';

export async function datasetRoutes(app: FastifyInstance): Promise<void> {
  const { query, registration, permissions } = app.services;

  // GET /: number of registered datasets, as plain text
  app.get('/', async (_request, reply) => {
    const count = await query.countDatasets();
    return reply.status(200).type('text/plain').send(`${count} registered datasets`);
  });

  // GET /lookup_datasets/:uuid: admin records with this UUID visible to the caller
  app.get<{ Params: { uuid: string } }>(
    '/lookup_datasets/:uuid',
    { preHandler: [requireAuth] },
    async (request, reply) => {
      const datasets = await query.lookupByUuid(currentUsername(request), request.params.uuid);
      return reply.status(200).send(datasets);
    },
  );

  // GET /list_datasets: every admin record in the caller's search scope
  app.get(
    '/list_datasets',
    { preHandler: [requireAuth] },
    async (request, reply) => {
      const datasets = await query.listForUser(currentUsername(request));
      return reply.status(200).send(datasets);
    },
  );

  // POST /register_dataset: returns the dataset URI as plain text
  app.post(
    '/register_dataset',
    { preHandler: [requireAuth] },
    async (request, reply) => {
      const username = currentUsername(request);
      const info = await registration.validate(request.body);

      if (!(await permissions.checkRegister(username, info.base_uri))) {
        throw forbidden(`No register permission on base URI ${info.base_uri}`);
      }

      const uri = await registration.registerDataset(info);
      return reply.status(200).type('text/plain').send(uri);
    },
  );

  // POST /search_for_datasets: descriptive documents matching the query, scoped to the caller
  app.post<{ Body: SearchQuery }>(
    '/search_for_datasets',
    { preHandler: [requireAuth, validate(searchQuerySchema)] },
    async (request, reply) => {
      const datasets = await query.searchForUser(currentUsername(request), request.body);
      return reply.status(200).send(datasets);
    },
  );

  // POST /get_readme: README of a dataset the caller can search
  app.post<{ Body: ReadmeRequestInput }>(
    '/get_readme',
    { preHandler: [requireAuth, validate(readmeRequestSchema)] },
    async (request, reply) => {
      const readme = await query.getReadme(currentUsername(request), request.body.uri);
      return reply.status(200).send({ readme });
    },
  );
}
