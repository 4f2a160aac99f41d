import { config } from 'dotenv';
import { z } from 'zod';
import type { AppConfig } from '../types/index.js';

config();

export const COMPRESSION_MODES = ['none', 'gzip', 'zstd', 'lz4'] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Qdrant connection
  QDRANT_URL: z.string().optional(),
  QDRANT_API_KEY: z.string().optional(),
  QDRANT_COLLECTION_NAME: z.string().default('documents'),
  QDRANT_TIMEOUT: z.string().default('30').transform(Number),
  QDRANT_POOL_SIZE: z.string().default('3').transform(Number),
  QDRANT_COMPRESSION: z.enum(COMPRESSION_MODES).default('none'),

  // Ingestion
  INPUT_FILE: z.string().optional(),
  VECTOR_DIMENSION: z.string().default('768').transform(Number),
  BATCH_SIZE: z.string().default('100').transform(Number),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    observability: {
      logLevel: parsed.LOG_LEVEL,
      environment: parsed.NODE_ENV,
    },
    defaults: {
      url: parsed.QDRANT_URL,
      apiKey: parsed.QDRANT_API_KEY,
      input: parsed.INPUT_FILE,
      collection: parsed.QDRANT_COLLECTION_NAME,
      dimensions: parsed.VECTOR_DIMENSION,
      batchSize: parsed.BATCH_SIZE,
      timeoutSeconds: parsed.QDRANT_TIMEOUT,
      poolSize: parsed.QDRANT_POOL_SIZE,
      compression: parsed.QDRANT_COMPRESSION,
    },
  };
}

export const appConfig: AppConfig = loadConfig();

export default appConfig;
