import pino from 'pino';
import { config } from './config.js';

export const SERVICE_NAME = 'geofence-locations';

export const logger = pino({
  level: config.logLevel,
  base: {
    service: SERVICE_NAME,
    stage: config.stage,
  },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
});
