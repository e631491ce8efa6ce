import { z } from 'zod';
import { DEFAULT_MAX_RESULTS_CEILING } from '@geofence/shared';

const DEFAULT_CORS_ORIGINS: Record<string, string[]> = {
  dev: ['http://localhost:5173', 'http://localhost:3000'],
  staging: [],
  prod: [],
};

const ConfigSchema = z.object({
  STAGE: z.enum(['dev', 'staging', 'prod']).default('dev'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  HOST: z.string().min(1).default('0.0.0.0'),
  TABLE_NAME: z.string().min(1).default('GeofenceLocations-dev'),
  APP_VERSION: z.string().min(1).default('0.1.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PRODUCT_HEADER: z
    .string()
    .min(1)
    .default('x-product')
    .transform((header) => header.toLowerCase()),
  NEARBY_MAX_RESULTS_CEILING: z.coerce.number().int().positive().default(DEFAULT_MAX_RESULTS_CEILING),
  CORS_ORIGINS: z
    .string()
    .optional()
    .transform((raw) =>
      raw
        ?.split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    ),
});

export interface AppConfig {
  stage: 'dev' | 'staging' | 'prod';
  port: number;
  host: string;
  tableName: string;
  appVersion: string;
  logLevel: string;
  productHeader: string;
  maxResultsCeiling: number;
  corsOrigins: string[];
}

/**
 * Read the service configuration from environment variables.
 * Throws with the offending variables listed when the environment is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Invalid configuration: ${fields}`);
  }

  const parsed = result.data;
  return {
    stage: parsed.STAGE,
    port: parsed.PORT,
    host: parsed.HOST,
    tableName: parsed.TABLE_NAME,
    appVersion: parsed.APP_VERSION,
    logLevel: parsed.LOG_LEVEL,
    productHeader: parsed.PRODUCT_HEADER,
    maxResultsCeiling: parsed.NEARBY_MAX_RESULTS_CEILING,
    corsOrigins: parsed.CORS_ORIGINS ?? DEFAULT_CORS_ORIGINS[parsed.STAGE] ?? [],
  };
}

export const config = loadConfig();
