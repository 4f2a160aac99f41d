import type { CompressionMode, WireEncoding } from '../types/index.js';

export interface ResolvedCompression {
  requested: CompressionMode;
  encoding: WireEncoding;
  /** True when the requested mode has no native transport support and gzip stands in */
  substituted: boolean;
}

/**
 * Map a requested compression mode onto what the transport can encode.
 * zstd and lz4 are recognized but fall back to gzip.
 */
export function resolveCompression(mode: CompressionMode): ResolvedCompression {
  switch (mode) {
    case 'none':
      return { requested: mode, encoding: 'none', substituted: false };
    case 'gzip':
      return { requested: mode, encoding: 'gzip', substituted: false };
    case 'zstd':
    case 'lz4':
      return { requested: mode, encoding: 'gzip', substituted: true };
  }
}
