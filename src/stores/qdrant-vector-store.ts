import type { QdrantClient } from '@qdrant/js-client-rest';
import { trace, SpanStatusCode, type Span } from '@opentelemetry/api';
import type { CollectionParams, UpsertRecord } from '../types/index.js';
import type { IVectorStore } from '../interfaces/vector-store.interface.js';
import { createContextLogger } from '../observability/logger.js';
import type { PointsTransport } from './points-transport.js';

const tracer = trace.getTracer('qdrant-vector-store');

/** Control-plane calls the adapter makes through the SDK */
export type QdrantControlClient = Pick<QdrantClient, 'collectionExists' | 'createCollection'>;

/**
 * Qdrant implementation of the vector store interface.
 * Collection management goes through the REST SDK, bulk upserts through the
 * pooled points transport.
 */
export class QdrantVectorStore implements IVectorStore {
  constructor(
    private readonly client: QdrantControlClient,
    private readonly transport: PointsTransport,
  ) {}

  async collectionExists(name: string): Promise<boolean> {
    return this.traced('qdrant_collection_exists', { collection: name }, async () => {
      const { exists } = await this.client.collectionExists(name);
      return exists;
    });
  }

  async createCollection(name: string, params: CollectionParams): Promise<void> {
    const contextLogger = createContextLogger({ operation: 'createCollection', collection: name });

    await this.traced('qdrant_create_collection', { collection: name, size: params.size }, async () => {
      contextLogger.info({ size: params.size, distance: params.distance }, `Creating collection: ${name}`);
      await this.client.createCollection(name, {
        vectors: {
          size: params.size,
          distance: params.distance,
        },
      });
    });
  }

  async upsertPoints(collection: string, records: UpsertRecord[]): Promise<void> {
    await this.traced(
      'qdrant_upsert_points',
      { collection, count: records.length, encoding: this.transport.encoding },
      () => this.transport.upsert(collection, records),
    );
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  private async traced<T>(
    name: string,
    attributes: Record<string, string | number>,
    fn: (span: Span) => Promise<T>,
  ): Promise<T> {
    const span = tracer.startSpan(name, { attributes });

    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage });
      throw error;
    } finally {
      span.end();
    }
  }
}
