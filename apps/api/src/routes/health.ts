import type { FastifyInstance } from 'fastify';
import { HEALTH_STATUS, type HealthResponse } from '@geofence/shared';
import { config } from '../lib/config.js';
import { SERVICE_NAME } from '../lib/logger.js';

export function healthRoute(app: FastifyInstance): void {
  app.get('/health', (): HealthResponse => {
    return {
      status: HEALTH_STATUS.HEALTHY,
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      version: config.appVersion,
    };
  });
}
