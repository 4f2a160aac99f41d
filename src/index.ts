export * from './types/index.js';
export * from './errors/index.js';
export type { IVectorStore } from './interfaces/vector-store.interface.js';
export type { IProgressReporter } from './interfaces/progress-reporter.interface.js';
export { createVectorStore, type VectorStoreFactory } from './factories/vector-store.factory.js';
export { QdrantVectorStore } from './stores/qdrant-vector-store.js';
export { ensureDataPort, DATA_TRANSFER_PORT } from './utils/endpoint.js';
export { resolveCompression } from './utils/compression.js';
export { loadInput, parseInput } from './services/input-loader.js';
export { ensureCollection } from './services/collection-provisioner.js';
export { upsertInBatches, countBatches, chunkPoints } from './services/batch-upsert-engine.js';
export { runIngestion } from './services/ingestion-pipeline.js';
export { StdoutProgressReporter } from './cli/utils/progress-reporter.js';
