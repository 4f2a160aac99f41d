#!/usr/bin/env node

import { Command, Option } from 'commander';
import { appConfig, COMPRESSION_MODES } from '../config/index.js';
import { uploadCommand } from './commands/upload.js';

const defaults = appConfig.defaults;

const program = new Command();

program
  .name('vector-uplink')
  .description('Upload precomputed embeddings to a Qdrant collection in batches')
  .version('1.0.0')
  .option('--url <url>', 'Qdrant endpoint (port 6334 is added when none is given) (or set QDRANT_URL)', defaults.url)
  .option('--api-key <key>', 'Qdrant API key (or set QDRANT_API_KEY)', defaults.apiKey)
  .option('--input <path>', 'JSON file with a "points" array (or set INPUT_FILE)', defaults.input)
  .option('--collection <name>', 'Target collection name', defaults.collection)
  .option('--dimensions <size>', 'Vector size used when the collection is created', String(defaults.dimensions))
  .option('--batch-size <size>', 'Points per upsert request', String(defaults.batchSize))
  .option('--timeout <seconds>', 'Per-request timeout in seconds', String(defaults.timeoutSeconds))
  .option('--pool-size <count>', 'Maximum pooled connections to the store', String(defaults.poolSize))
  .addOption(
    new Option('--compression <mode>', 'Request body compression (zstd and lz4 fall back to gzip)')
      .choices(COMPRESSION_MODES)
      .default(defaults.compression),
  )
  .action(uploadCommand);

await program.parseAsync();
