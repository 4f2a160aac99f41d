// ============================================================================
// Input Types
// ============================================================================

/**
 * A single vector record read from the input file
 */
export interface Point {
  /** Caller-supplied identifier, forwarded to the store as-is */
  id: string;
  vector: number[];
  /** Arbitrary JSON document attached to the point */
  payload: Record<string, unknown>;
}

/**
 * Parsed input file. Built once by the loader and read-only afterwards.
 */
export interface InputDataset {
  readonly points: readonly Point[];
}

// ============================================================================
// Store Types
// ============================================================================

export type DistanceMetric = 'Cosine';

export interface CollectionParams {
  size: number;
  distance: DistanceMetric;
}

/**
 * Record sent to the store in an upsert batch
 */
export interface UpsertRecord {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
}

export type CompressionMode = 'none' | 'gzip' | 'zstd' | 'lz4';

/** Encodings the REST transport can actually put on the wire */
export type WireEncoding = 'none' | 'gzip';

// ============================================================================
// Pipeline Types
// ============================================================================

export interface PipelineConfig {
  readonly url: string;
  readonly apiKey: string;
  readonly input: string;
  readonly collection: string;
  readonly dimensions: number;
  readonly batchSize: number;
  /** Per-request timeout, in seconds */
  readonly timeoutSeconds: number;
  readonly poolSize: number;
  readonly compression: CompressionMode;
}

export interface StoreConnectionConfig {
  /** Normalized endpoint, always carrying an explicit port */
  url: string;
  apiKey: string;
  timeoutMs: number;
  poolSize: number;
  compression: CompressionMode;
}

/**
 * Emitted once per successfully upserted batch
 */
export interface ProgressEvent {
  /** 1-based */
  batch: number;
  total: number;
  points: number;
}

export interface CompletionEvent {
  totalPoints: number;
}

export interface IngestionResult {
  totalPoints: number;
  batches: number;
  collectionCreated: boolean;
}

// ============================================================================
// Configuration Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ObservabilityConfig {
  logLevel: LogLevel;
  environment: 'development' | 'production' | 'test';
}

/**
 * Values resolved from the environment. Every field is optional on the
 * pipeline side: CLI flags take precedence.
 */
export interface EnvDefaults {
  url?: string;
  apiKey?: string;
  input?: string;
  collection: string;
  dimensions: number;
  batchSize: number;
  timeoutSeconds: number;
  poolSize: number;
  compression: CompressionMode;
}

export interface AppConfig {
  observability: ObservabilityConfig;
  defaults: EnvDefaults;
}
