import chalk from 'chalk';
import { z } from 'zod';
import { COMPRESSION_MODES } from '../../config/index.js';
import { ConfigurationError, IngestError, UpsertError, isIngestError } from '../../errors/index.js';
import { logger } from '../../observability/logger.js';
import { runIngestion, type PipelineDependencies } from '../../services/ingestion-pipeline.js';
import type { PipelineConfig } from '../../types/index.js';
import { StdoutProgressReporter } from '../utils/progress-reporter.js';

export interface UploadOptions {
  url?: string;
  apiKey?: string;
  input?: string;
  collection?: string;
  dimensions?: string;
  batchSize?: string;
  timeout?: string;
  poolSize?: string;
  compression?: string;
}

const UploadOptionsSchema = z.object({
  url: z.string({ required_error: 'required (--url or QDRANT_URL)' }).min(1),
  apiKey: z.string({ required_error: 'required (--api-key or QDRANT_API_KEY)' }).min(1),
  input: z.string({ required_error: 'required (--input or INPUT_FILE)' }).min(1),
  collection: z.string().min(1),
  dimensions: z.coerce.number().int().positive(),
  batchSize: z.coerce.number().int().min(1, 'must be at least 1'),
  timeout: z.coerce.number().positive(),
  poolSize: z.coerce.number().int().positive(),
  compression: z.enum(COMPRESSION_MODES),
});

/**
 * Validate raw CLI options into a pipeline configuration
 *
 * @throws ConfigurationError listing every invalid option
 */
export function resolvePipelineConfig(options: UploadOptions): PipelineConfig {
  const result = UploadOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid options', issues);
  }

  const parsed = result.data;
  return Object.freeze({
    url: parsed.url,
    apiKey: parsed.apiKey,
    input: parsed.input,
    collection: parsed.collection,
    dimensions: parsed.dimensions,
    batchSize: parsed.batchSize,
    timeoutSeconds: parsed.timeout,
    poolSize: parsed.poolSize,
    compression: parsed.compression,
  });
}

/**
 * Run an upload and map the outcome to a process exit code
 */
export async function executeUpload(
  options: UploadOptions,
  deps: Partial<PipelineDependencies> = {},
): Promise<number> {
  try {
    const config = resolvePipelineConfig(options);
    await runIngestion(config, {
      ...deps,
      reporter: deps.reporter ?? new StdoutProgressReporter(),
    });
    return 0;
  } catch (error) {
    reportFailure(error);
    return 1;
  }
}

export async function uploadCommand(options: UploadOptions): Promise<void> {
  process.exitCode = await executeUpload(options);
}

function reportFailure(error: unknown): void {
  if (error instanceof ConfigurationError && error.issues.length > 0) {
    console.error(chalk.red(`❌ ${error.message}:`));
    for (const issue of error.issues) {
      console.error(chalk.red(`   ${issue}`));
    }
    return;
  }

  if (isIngestError(error)) {
    logger.error(failureContext(error), error.message);
    console.error(chalk.red(`❌ ${error.message}`));
    return;
  }

  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error({ error: errorMessage }, 'Unexpected failure');
  console.error(chalk.red(`❌ ${errorMessage}`));
}

function failureContext(error: IngestError): Record<string, unknown> {
  const context: Record<string, unknown> = { stage: error.stage };
  if (error instanceof UpsertError) {
    context.batch = error.batchIndex;
    context.totalBatches = error.totalBatches;
  }
  if (error.cause instanceof Error) {
    context.cause = error.cause.message;
  }
  return context;
}
