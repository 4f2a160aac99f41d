import { InvalidEndpointError } from '../errors/index.js';

/**
 * Port of the data-transfer endpoint on managed Qdrant clusters.
 * The control endpoint operators usually copy from the console differs only by port.
 */
export const DATA_TRANSFER_PORT = 6334;

/**
 * Canonicalize an endpoint so it targets the data-transfer port.
 *
 * A URL without an explicit port gets `port`; an explicit port is kept.
 * `URL` treats a scheme's default port (443 for https, 80 for http) as
 * absent, so those are replaced as well.
 *
 * @throws InvalidEndpointError when the string is not a URL or cannot carry a port
 */
export function ensureDataPort(endpoint: string, port: number = DATA_TRANSFER_PORT): string {
  let parsed: URL;
  try {
    parsed = new URL(endpoint.trim());
  } catch (error) {
    throw new InvalidEndpointError(endpoint, 'not a valid URL', { cause: error });
  }

  if (parsed.port !== '') {
    return parsed.toString();
  }

  // `URL` silently ignores port assignment on host-less and file: URLs
  if (parsed.hostname === '' || parsed.protocol === 'file:') {
    throw new InvalidEndpointError(endpoint, 'failed to set port');
  }

  parsed.port = String(port);
  if (parsed.port !== String(port)) {
    throw new InvalidEndpointError(endpoint, 'failed to set port');
  }

  return parsed.toString();
}

export interface StoreEndpoint {
  /** scheme://host:port */
  origin: string;
  /** Path the store is mounted under, without a trailing slash; '' at the root */
  prefix: string;
}

/**
 * Split a normalized endpoint into origin and path prefix so every client
 * talking to the store resolves requests under the same path.
 */
export function splitEndpoint(endpoint: string): StoreEndpoint {
  let parsed: URL;
  try {
    parsed = new URL(endpoint);
  } catch (error) {
    throw new InvalidEndpointError(endpoint, 'not a valid URL', { cause: error });
  }

  return {
    origin: parsed.origin,
    prefix: parsed.pathname.replace(/\/+$/, ''),
  };
}
