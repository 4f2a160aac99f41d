import { QdrantClient } from '@qdrant/js-client-rest';
import type { Dispatcher } from 'undici';
import type { IVectorStore } from '../interfaces/vector-store.interface.js';
import type { StoreConnectionConfig } from '../types/index.js';
import { QdrantVectorStore, type QdrantControlClient } from '../stores/qdrant-vector-store.js';
import { PointsTransport } from '../stores/points-transport.js';
import { ConnectionError } from '../errors/index.js';
import { resolveCompression } from '../utils/compression.js';
import { splitEndpoint, type StoreEndpoint } from '../utils/endpoint.js';
import { createContextLogger } from '../observability/logger.js';

export interface VectorStoreOverrides {
  /** Replace the SDK client (tests) */
  client?: QdrantControlClient;
  /** Replace the undici dispatcher (tests) */
  dispatcher?: Dispatcher;
}

export type VectorStoreFactory = (config: StoreConnectionConfig) => IVectorStore;

export type QdrantClientOptions = NonNullable<ConstructorParameters<typeof QdrantClient>[0]>;

/**
 * SDK client options for a store endpoint. The SDK ignores any path in
 * `url`, so the mount path goes through `prefix`.
 */
export function buildClientOptions(
  endpoint: StoreEndpoint,
  config: Pick<StoreConnectionConfig, 'apiKey' | 'timeoutMs'>,
): QdrantClientOptions {
  return {
    url: endpoint.origin,
    ...(endpoint.prefix !== '' && { prefix: endpoint.prefix }),
    apiKey: config.apiKey,
    timeout: config.timeoutMs,
    // Trust the declared protocol version instead of asking the server
    checkCompatibility: false,
  };
}

/**
 * Build a ready-to-use Qdrant store handle.
 * No network call happens here; connections are opened lazily by the first request.
 *
 * @throws ConnectionError if the configuration cannot produce a client
 */
export function createVectorStore(
  config: StoreConnectionConfig,
  overrides: VectorStoreOverrides = {},
): IVectorStore {
  const contextLogger = createContextLogger({ operation: 'connect', store: 'qdrant' });

  if (!Number.isInteger(config.poolSize) || config.poolSize < 1) {
    throw new ConnectionError(`pool size must be a positive integer, got ${config.poolSize}`);
  }
  if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
    throw new ConnectionError(`timeout must be positive, got ${config.timeoutMs}ms`);
  }

  const compression = resolveCompression(config.compression);
  if (compression.substituted) {
    contextLogger.warn(
      { requested: compression.requested, using: compression.encoding },
      `${compression.requested} compression not available, using gzip`,
    );
  }

  contextLogger.info(`Connecting to: ${config.url}`);

  let client: QdrantControlClient;
  let transport: PointsTransport;
  try {
    const endpoint = splitEndpoint(config.url);
    client = overrides.client ?? new QdrantClient(buildClientOptions(endpoint, config));

    transport = new PointsTransport({
      baseUrl: `${endpoint.origin}${endpoint.prefix}/`,
      apiKey: config.apiKey,
      timeoutMs: config.timeoutMs,
      poolSize: config.poolSize,
      encoding: compression.encoding,
      dispatcher: overrides.dispatcher,
    });
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new ConnectionError(errorMessage, { cause: error });
  }

  return new QdrantVectorStore(client, transport);
}
