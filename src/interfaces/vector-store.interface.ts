import type { CollectionParams, UpsertRecord } from '../types/index.js';

/**
 * Capabilities the pipeline needs from a vector store.
 * The Qdrant adapter implements it for real runs; tests use an in-memory fake.
 */
export interface IVectorStore {
  /**
   * Check whether a collection with this name exists
   */
  collectionExists(name: string): Promise<boolean>;

  /**
   * Create a collection with the given vector parameters
   */
  createCollection(name: string, params: CollectionParams): Promise<void>;

  /**
   * Insert or replace a batch of points. Resolves once the store has applied it.
   */
  upsertPoints(collection: string, records: UpsertRecord[]): Promise<void>;

  /**
   * Release pooled connections
   */
  close(): Promise<void>;
}
