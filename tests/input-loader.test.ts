import { describe, it, expect, vi } from 'vitest';
import { loadInput, parseInput } from '../src/services/input-loader.js';
import { LoadError, ParseError } from '../src/errors/index.js';

const validDocument = JSON.stringify({
  points: [
    { id: 'a', vector: [0.1, 0.2], payload: { text: 'first', tags: ['x'] } },
    { id: 'b', vector: [0.3, 0.4], payload: {} },
  ],
  generator: 'ignored',
});

describe('parseInput', () => {
  it('parses points in input order', () => {
    const dataset = parseInput(validDocument);

    expect(dataset.points.map((p) => p.id)).toEqual(['a', 'b']);
    expect(dataset.points[0]).toEqual({ id: 'a', vector: [0.1, 0.2], payload: { text: 'first', tags: ['x'] } });
  });

  it('decodes UTF-8 bytes', () => {
    const dataset = parseInput(new TextEncoder().encode(validDocument));
    expect(dataset.points).toHaveLength(2);
  });

  it('does not check vector length', () => {
    const dataset = parseInput('{"points":[{"id":"a","vector":[],"payload":{}},{"id":"b","vector":[1,2,3],"payload":{}}]}');
    expect(dataset.points.map((p) => p.vector.length)).toEqual([0, 3]);
  });

  it('accepts an empty point list', () => {
    expect(parseInput('{"points":[]}').points).toEqual([]);
  });

  it('rejects malformed JSON', () => {
    expect(() => parseInput('{"points": [')).toThrow(ParseError);
  });

  it('rejects a document without points', () => {
    expect(() => parseInput('{"items":[]}')).toThrow('Failed to parse input JSON: points: Required');
  });

  it('names the path of a mismatched field', () => {
    expect(() => parseInput('{"points":[{"id":7,"vector":[1],"payload":{}}]}'))
      .toThrow('Failed to parse input JSON: points.0.id: Expected string, received number');
  });

  it('rejects non-numeric vector components', () => {
    expect(() => parseInput('{"points":[{"id":"a","vector":[1,"2"],"payload":{}}]}'))
      .toThrow('points.0.vector.1: Expected number, received string');
  });

  it('rejects a payload that is not an object', () => {
    expect(() => parseInput('{"points":[{"id":"a","vector":[1],"payload":[1,2]}]}'))
      .toThrow('points.0.payload: Expected object, received array');
  });
});

describe('loadInput', () => {
  it('reads through the injected reader', async () => {
    const readInput = vi.fn().mockResolvedValue(validDocument);

    const dataset = await loadInput('/data/points.json', readInput);

    expect(readInput).toHaveBeenCalledWith('/data/points.json');
    expect(dataset.points).toHaveLength(2);
  });

  it('wraps read failures in LoadError', async () => {
    const cause = new Error('ENOENT: no such file or directory');
    const readInput = vi.fn().mockRejectedValue(cause);

    const error = await loadInput('/missing.json', readInput).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LoadError);
    if (error instanceof LoadError) {
      expect(error.stage).toBe('load');
      expect(error.path).toBe('/missing.json');
      expect(error.message).toBe('Failed to read input file: /missing.json');
      expect(error.cause).toBe(cause);
    }
  });

  it('fails with ParseError when the file content is invalid', async () => {
    const readInput = vi.fn().mockResolvedValue('not json');
    await expect(loadInput('/bad.json', readInput)).rejects.toBeInstanceOf(ParseError);
  });
});
