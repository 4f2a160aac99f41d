import type { IngestionResult, PipelineConfig } from '../types/index.js';
import type { IVectorStore } from '../interfaces/vector-store.interface.js';
import type { IProgressReporter } from '../interfaces/progress-reporter.interface.js';
import { createVectorStore, type VectorStoreFactory } from '../factories/vector-store.factory.js';
import { ensureDataPort } from '../utils/endpoint.js';
import { loadInput, type ReadInput } from './input-loader.js';
import { ensureCollection } from './collection-provisioner.js';
import { assertBatchSize, upsertInBatches } from './batch-upsert-engine.js';
import { createContextLogger } from '../observability/logger.js';

export interface PipelineDependencies {
  reporter: IProgressReporter;
  readInput?: ReadInput;
  createStore?: VectorStoreFactory;
}

/**
 * Load → connect → provision → upsert. Any stage failure aborts the run.
 */
export async function runIngestion(
  config: PipelineConfig,
  deps: PipelineDependencies,
): Promise<IngestionResult> {
  const contextLogger = createContextLogger({ operation: 'ingest', collection: config.collection });
  const startTime = Date.now();

  assertBatchSize(config.batchSize);

  const dataset = await loadInput(config.input, deps.readInput);

  contextLogger.info(
    { timeoutSeconds: config.timeoutSeconds, poolSize: config.poolSize, compression: config.compression },
    `Timeout: ${config.timeoutSeconds}s, Pool size: ${config.poolSize}, Compression: ${config.compression}`,
  );

  const url = ensureDataPort(config.url);
  const createStore = deps.createStore ?? ((connection) => createVectorStore(connection));
  const store: IVectorStore = createStore({
    url,
    apiKey: config.apiKey,
    timeoutMs: config.timeoutSeconds * 1000,
    poolSize: config.poolSize,
    compression: config.compression,
  });

  try {
    const { created } = await ensureCollection(store, config.collection, config.dimensions);
    const batches = await upsertInBatches(store, config.collection, dataset, config.batchSize, deps.reporter);

    const duration = Date.now() - startTime;
    contextLogger.info({ points: dataset.points.length, batches, duration }, 'Ingestion completed');

    return {
      totalPoints: dataset.points.length,
      batches,
      collectionCreated: created,
    };
  } finally {
    try {
      await store.close();
    } catch (closeError) {
      const errorMessage = closeError instanceof Error ? closeError.message : 'Unknown error';
      contextLogger.warn({ error: errorMessage }, 'Failed to close store connection');
    }
  }
}
