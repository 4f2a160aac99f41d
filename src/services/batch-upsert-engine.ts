import type { IVectorStore } from '../interfaces/vector-store.interface.js';
import type { IProgressReporter } from '../interfaces/progress-reporter.interface.js';
import type { InputDataset, Point, UpsertRecord } from '../types/index.js';
import { ConfigurationError, UpsertError } from '../errors/index.js';
import { createContextLogger } from '../observability/logger.js';

export function assertBatchSize(batchSize: number): void {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ConfigurationError(`Batch size must be a positive integer, got ${batchSize}`);
  }
}

export function countBatches(pointCount: number, batchSize: number): number {
  assertBatchSize(batchSize);
  return Math.ceil(pointCount / batchSize);
}

/**
 * Contiguous, non-overlapping slices in input order. The last one may be shorter.
 */
export function* chunkPoints(points: readonly Point[], batchSize: number): Generator<readonly Point[]> {
  assertBatchSize(batchSize);
  for (let start = 0; start < points.length; start += batchSize) {
    yield points.slice(start, start + batchSize);
  }
}

export function toUpsertRecord(point: Point): UpsertRecord {
  return {
    id: point.id,
    vector: point.vector,
    payload: point.payload,
  };
}

/**
 * Upsert every point, one batch at a time.
 *
 * Batches are sent strictly in sequence; the first failure stops the run
 * without retrying and without reporting completion.
 *
 * @returns number of batches sent
 * @throws ConfigurationError for a batch size below 1
 * @throws UpsertError carrying the 1-based index of the failed batch
 */
export async function upsertInBatches(
  store: IVectorStore,
  collection: string,
  dataset: InputDataset,
  batchSize: number,
  reporter: IProgressReporter,
): Promise<number> {
  const total = countBatches(dataset.points.length, batchSize);
  const contextLogger = createContextLogger({ operation: 'upsert', collection });

  contextLogger.debug({ points: dataset.points.length, batchSize, total }, 'Starting batch upsert');

  let batch = 0;
  for (const chunk of chunkPoints(dataset.points, batchSize)) {
    batch += 1;
    const records = chunk.map(toUpsertRecord);

    try {
      await store.upsertPoints(collection, records);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      contextLogger.error({ batch, total, error: errorMessage }, 'Batch upsert failed');
      throw new UpsertError(batch, total, { cause: error });
    }

    reporter.progress({ batch, total, points: chunk.length });
  }

  reporter.done({ totalPoints: dataset.points.length });
  return total;
}
