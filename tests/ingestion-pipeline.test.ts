import { describe, it, expect, vi } from 'vitest';
import { runIngestion } from '../src/services/ingestion-pipeline.js';
import { InvalidEndpointError, LoadError, UpsertError } from '../src/errors/index.js';
import type { PipelineConfig, StoreConnectionConfig } from '../src/types/index.js';
import { InMemoryVectorStore, RecordingReporter, makePoints } from './fakes/in-memory-vector-store.js';

const baseConfig: PipelineConfig = {
  url: 'https://cluster.example.test',
  apiKey: 'test-secret',
  input: '/data/points.json',
  collection: 'documents',
  dimensions: 3,
  batchSize: 100,
  timeoutSeconds: 30,
  poolSize: 3,
  compression: 'none',
};

function inputOf(count: number) {
  return vi.fn().mockResolvedValue(JSON.stringify({ points: makePoints(count) }));
}

describe('runIngestion', () => {
  it('provisions, uploads and reports completion', async () => {
    const store = new InMemoryVectorStore();
    const reporter = new RecordingReporter();
    const createStore = vi.fn((_config: StoreConnectionConfig) => store);

    const result = await runIngestion(baseConfig, { reporter, readInput: inputOf(250), createStore });

    expect(result).toEqual({ totalPoints: 250, batches: 3, collectionCreated: true });
    expect(store.calls.map((call) => call.op)).toEqual(['exists', 'create', 'upsert', 'upsert', 'upsert', 'close']);
    expect(reporter.events.map((e) => e.batch)).toEqual([1, 2, 3]);
    expect(reporter.completions).toEqual([{ totalPoints: 250 }]);
    expect(store.collections.get('documents')?.points.size).toBe(250);
  });

  it('connects with the normalized endpoint and converted timeout', async () => {
    const createStore = vi.fn((_config: StoreConnectionConfig) => new InMemoryVectorStore());

    await runIngestion(
      { ...baseConfig, compression: 'lz4', poolSize: 5, timeoutSeconds: 12 },
      { reporter: new RecordingReporter(), readInput: inputOf(1), createStore },
    );

    expect(createStore).toHaveBeenCalledWith({
      url: 'https://cluster.example.test:6334/',
      apiKey: 'test-secret',
      timeoutMs: 12000,
      poolSize: 5,
      compression: 'lz4',
    });
  });

  it('skips creation when the collection exists', async () => {
    const store = new InMemoryVectorStore({ existing: ['documents'] });

    const result = await runIngestion(baseConfig, {
      reporter: new RecordingReporter(),
      readInput: inputOf(5),
      createStore: () => store,
    });

    expect(result.collectionCreated).toBe(false);
    expect(store.calls.some((call) => call.op === 'create')).toBe(false);
  });

  it('handles an empty input file', async () => {
    const store = new InMemoryVectorStore();
    const reporter = new RecordingReporter();

    const result = await runIngestion(baseConfig, { reporter, readInput: inputOf(0), createStore: () => store });

    expect(result).toEqual({ totalPoints: 0, batches: 0, collectionCreated: true });
    expect(reporter.events).toEqual([]);
    expect(reporter.completions).toEqual([{ totalPoints: 0 }]);
  });

  it('aborts on the failing batch and still closes the store', async () => {
    const store = new InMemoryVectorStore({ failOnUpsert: 2 });
    const reporter = new RecordingReporter();

    const error = await runIngestion(baseConfig, {
      reporter,
      readInput: inputOf(250),
      createStore: () => store,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpsertError);
    if (error instanceof UpsertError) {
      expect(error.batchIndex).toBe(2);
    }
    expect(reporter.events).toEqual([{ batch: 1, total: 3, points: 100 }]);
    expect(reporter.completions).toEqual([]);
    expect(store.calls.at(-1)).toEqual({ op: 'close' });
  });

  it('keeps the batch error when closing the store also fails', async () => {
    const store = new InMemoryVectorStore({ failOnUpsert: 3, failOnClose: true });

    const error = await runIngestion(baseConfig, {
      reporter: new RecordingReporter(),
      readInput: inputOf(250),
      createStore: () => store,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpsertError);
    if (error instanceof UpsertError) {
      expect(error.batchIndex).toBe(3);
      expect(error.totalBatches).toBe(3);
    }
    expect(store.calls.at(-1)).toEqual({ op: 'close' });
  });

  it('completes when only closing the store fails', async () => {
    const store = new InMemoryVectorStore({ failOnClose: true });

    const result = await runIngestion(baseConfig, {
      reporter: new RecordingReporter(),
      readInput: inputOf(5),
      createStore: () => store,
    });

    expect(result).toEqual({ totalPoints: 5, batches: 1, collectionCreated: true });
  });

  it('does not connect when the input cannot be read', async () => {
    const createStore = vi.fn(() => new InMemoryVectorStore());

    await expect(runIngestion(baseConfig, {
      reporter: new RecordingReporter(),
      readInput: vi.fn().mockRejectedValue(new Error('EACCES')),
      createStore,
    })).rejects.toBeInstanceOf(LoadError);
    expect(createStore).not.toHaveBeenCalled();
  });

  it('does not connect when the endpoint is invalid', async () => {
    const createStore = vi.fn(() => new InMemoryVectorStore());

    await expect(runIngestion({ ...baseConfig, url: 'localhost:6333' }, {
      reporter: new RecordingReporter(),
      readInput: inputOf(1),
      createStore,
    })).rejects.toBeInstanceOf(InvalidEndpointError);
    expect(createStore).not.toHaveBeenCalled();
  });
});
