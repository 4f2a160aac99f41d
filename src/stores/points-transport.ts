import { gzipSync } from 'node:zlib';
import { Agent, request, type Dispatcher } from 'undici';
import { StoreRequestError } from '../errors/index.js';
import type { UpsertRecord, WireEncoding } from '../types/index.js';

/** Idle connections stay open this long between batches */
const IDLE_KEEP_ALIVE_MS = 10 * 60 * 1000;

export interface PointsTransportOptions {
  /** Normalized endpoint, e.g. https://host:6334/ */
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  poolSize: number;
  encoding: WireEncoding;
  /** Injected dispatcher (tests use undici's MockAgent) */
  dispatcher?: Dispatcher;
}

/**
 * Build the pooled keep-alive agent used for bulk upserts
 */
export function createKeepAliveAgent(options: Pick<PointsTransportOptions, 'timeoutMs' | 'poolSize'>): Agent {
  return new Agent({
    connections: options.poolSize,
    keepAliveTimeout: IDLE_KEEP_ALIVE_MS,
    keepAliveMaxTimeout: IDLE_KEEP_ALIVE_MS,
    headersTimeout: options.timeoutMs,
    bodyTimeout: options.timeoutMs,
    connect: { timeout: options.timeoutMs },
  });
}

/**
 * Data path to Qdrant's points endpoint.
 * Uses undici directly so the request body can be gzip-encoded and
 * connections are reused from a sized pool.
 */
export class PointsTransport {
  private readonly baseUrl: string;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(private readonly options: PointsTransportOptions) {
    this.baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`;
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher = options.dispatcher ?? createKeepAliveAgent(options);
  }

  get encoding(): WireEncoding {
    return this.options.encoding;
  }

  async upsert(collection: string, records: UpsertRecord[]): Promise<void> {
    const url = new URL(`collections/${encodeURIComponent(collection)}/points?wait=true`, this.baseUrl);
    const json = JSON.stringify({ points: records });

    const headers: Record<string, string> = {
      'content-type': 'application/json',
      'api-key': this.options.apiKey,
    };

    let body: string | Buffer = json;
    if (this.options.encoding === 'gzip') {
      body = gzipSync(json);
      headers['content-encoding'] = 'gzip';
    }

    const response = await request(url, {
      method: 'PUT',
      headers,
      body,
      dispatcher: this.dispatcher,
      headersTimeout: this.options.timeoutMs,
      bodyTimeout: this.options.timeoutMs,
    });

    // The body must always be consumed so the connection returns to the pool
    const text = await response.body.text();

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new StoreRequestError(response.statusCode, text);
    }
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
