import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fastifyCors from '@fastify/cors';
import { config } from './config/index.js';
import { errorHandler } from './middleware/error-handler.js';
import type { Authenticator } from './middleware/auth.js';
import { createServices } from './services/index.js';
import type { Stores } from './services/index.js';
import { datasetRoutes } from './routes/datasets.js';
import { userRoutes } from './routes/users.js';
import { adminRoutes } from './routes/admin.js';

export interface AppOptions extends Stores {
  authenticate: Authenticator;
  // Disable request logging (tests)
  logger?: boolean;
}

export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
  });

  // Decorate request with the caller's username (null until requireAuth sets it)
  app.decorateRequest('username', null);

  // Store handles are injected; services are built once per app instance
  app.decorate('services', createServices(options));
  app.decorate('authenticate', options.authenticate);

  await app.register(fastifyCors, {
    origin: config.corsOrigin,
  });

  // Global error handler
  app.setErrorHandler(errorHandler);

  // Health check
  app.get('/health', async (_request, reply) => {
    return reply.status(200).send({ status: 'ok' });
  });

  // Route registrations
  await app.register(datasetRoutes);
  await app.register(userRoutes);
  await app.register(adminRoutes, { prefix: '/admin' });

  return app;
}
