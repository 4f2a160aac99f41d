import fs from 'fs/promises';
import { z } from 'zod';
import type { InputDataset } from '../types/index.js';
import { LoadError, ParseError } from '../errors/index.js';
import { createContextLogger } from '../observability/logger.js';

export const PointSchema = z.object({
  id: z.string(),
  vector: z.array(z.number()),
  payload: z.record(z.unknown()),
});

export const InputFileSchema = z.object({
  points: z.array(PointSchema),
});

export type ReadInput = (path: string) => Promise<Uint8Array | string>;

const readFromDisk: ReadInput = (path) => fs.readFile(path);

/**
 * Parse input file contents into a dataset.
 *
 * @throws ParseError when the content is not JSON or not `{ points: [...] }`
 */
export function parseInput(content: Uint8Array | string): InputDataset {
  const text = typeof content === 'string' ? content : new TextDecoder('utf-8').decode(content);

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new ParseError(errorMessage, { cause: error });
  }

  const result = InputFileSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ParseError(detail, { cause: result.error });
  }

  return { points: result.data.points };
}

/**
 * Read and parse the input file. Nothing is returned unless every point is valid.
 */
export async function loadInput(path: string, readInput: ReadInput = readFromDisk): Promise<InputDataset> {
  const contextLogger = createContextLogger({ operation: 'load', path });

  let content: Uint8Array | string;
  try {
    content = await readInput(path);
  } catch (error) {
    throw new LoadError(path, { cause: error });
  }

  const dataset = parseInput(content);
  contextLogger.info(`Loaded ${dataset.points.length} points from input file`);
  return dataset;
}
