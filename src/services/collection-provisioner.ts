import type { IVectorStore } from '../interfaces/vector-store.interface.js';
import { ProvisioningError } from '../errors/index.js';
import { createContextLogger } from '../observability/logger.js';

export interface ProvisionResult {
  created: boolean;
}

/**
 * Make sure the collection exists before any upsert.
 *
 * An existing collection is left exactly as it is, even when its dimension
 * or distance differs from the requested one.
 */
export async function ensureCollection(
  store: IVectorStore,
  name: string,
  dimensions: number,
): Promise<ProvisionResult> {
  const contextLogger = createContextLogger({ operation: 'provision', collection: name });

  let exists: boolean;
  try {
    exists = await store.collectionExists(name);
  } catch (error) {
    throw new ProvisioningError(name, 'exists', { cause: error });
  }

  if (exists) {
    contextLogger.debug('Using existing collection');
    return { created: false };
  }

  try {
    await store.createCollection(name, { size: dimensions, distance: 'Cosine' });
  } catch (error) {
    throw new ProvisioningError(name, 'create', { cause: error });
  }

  contextLogger.info({ dimensions }, 'Created collection');
  return { created: true };
}
