import Fastify, { type FastifyInstance, type FastifyBaseLogger } from 'fastify';
import cors from '@fastify/cors';
import { healthRoute } from './routes/health.js';
import { locationsRoute } from './routes/locations.js';
import { config } from './lib/config.js';
import { registerErrorHandler } from './lib/errors.js';
import { logger } from './lib/logger.js';

export interface AppOptions {
  logger?: boolean;
}

export async function createApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const useLogger = options.logger ?? true;
  const app = Fastify({
    ...(useLogger ? { loggerInstance: logger as unknown as FastifyBaseLogger } : { logger: false }),
  });

  await app.register(cors, {
    origin: config.corsOrigins,
    methods: ['GET', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['content-type', config.productHeader],
  });

  registerErrorHandler(app);

  // Routes
  await app.register(healthRoute);
  await app.register(locationsRoute);

  return app;
}
