/**
 * Error hierarchy for the ingestion pipeline.
 * Every error is fatal to the run; the stage tells the caller where it stopped.
 */

export type IngestStage =
  | 'config'
  | 'load'
  | 'parse'
  | 'endpoint'
  | 'connect'
  | 'provision'
  | 'upsert';

/**
 * Base class for all pipeline errors
 */
export class IngestError extends Error {
  public readonly stage: IngestStage;

  constructor(stage: IngestStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IngestError';
    this.stage = stage;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      stage: this.stage,
      message: this.message,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Resolved options are out of range (e.g. a batch size of 0)
 */
export class ConfigurationError extends IngestError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('config', message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Input file could not be read
 */
export class LoadError extends IngestError {
  public readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super('load', `Failed to read input file: ${path}`, options);
    this.name = 'LoadError';
    this.path = path;
  }
}

/**
 * Input content is not JSON or does not have the expected shape
 */
export class ParseError extends IngestError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super('parse', `Failed to parse input JSON: ${detail}`, options);
    this.name = 'ParseError';
  }
}

export class InvalidEndpointError extends IngestError {
  public readonly endpoint: string;

  constructor(endpoint: string, reason: string, options?: { cause?: unknown }) {
    super('endpoint', `Invalid URL "${endpoint}": ${reason}`, options);
    this.name = 'InvalidEndpointError';
    this.endpoint = endpoint;
  }
}

/**
 * Store handle could not be constructed
 */
export class ConnectionError extends IngestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('connect', `Failed to create Qdrant client: ${message}`, options);
    this.name = 'ConnectionError';
  }
}

export class ProvisioningError extends IngestError {
  public readonly collection: string;
  public readonly step: 'exists' | 'create';

  constructor(collection: string, step: 'exists' | 'create', options?: { cause?: unknown }) {
    const action = step === 'exists' ? 'check existence of' : 'create';
    super('provision', `Failed to ${action} collection "${collection}"${causeSuffix(options?.cause)}`, options);
    this.name = 'ProvisioningError';
    this.collection = collection;
    this.step = step;
  }
}

export class UpsertError extends IngestError {
  /** 1-based index of the batch that failed */
  public readonly batchIndex: number;
  public readonly totalBatches: number;

  constructor(batchIndex: number, totalBatches: number, options?: { cause?: unknown }) {
    super('upsert', `Failed to upsert batch ${batchIndex}/${totalBatches}${causeSuffix(options?.cause)}`, options);
    this.name = 'UpsertError';
    this.batchIndex = batchIndex;
    this.totalBatches = totalBatches;
  }
}

/**
 * Non-2xx answer from the store's REST data path
 */
export class StoreRequestError extends Error {
  public readonly statusCode: number;
  public readonly body: string;

  constructor(statusCode: number, body: string) {
    const excerpt = body.length > 300 ? `${body.slice(0, 297)}...` : body;
    super(`Qdrant responded with status ${statusCode}${excerpt ? `: ${excerpt}` : ''}`);
    this.name = 'StoreRequestError';
    this.statusCode = statusCode;
    this.body = body;
  }
}

export function isIngestError(error: unknown): error is IngestError {
  return error instanceof IngestError;
}

function causeSuffix(cause: unknown): string {
  if (cause instanceof Error) return `: ${cause.message}`;
  if (typeof cause === 'string') return `: ${cause}`;
  return '';
}
