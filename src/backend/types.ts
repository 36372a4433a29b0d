import type { Endpoint, StreamEndpoint } from '../endpoint/Endpoint.ts';

/** Namespaced backend identifier, e.g. "vcdiff/xdelta3" */
export type BackendId = string;

/**
 * The two operations every codec backend provides.
 *
 * Without an output endpoint the result resolves as a Buffer; with one, the
 * result is written to it incrementally and the promise resolves undefined.
 * A source endpoint that is not random access must be rejected before any
 * output is written.
 */
export interface Backend {
  readonly id: BackendId;
  diff(source: Endpoint, target: Endpoint, output?: StreamEndpoint): Promise<Buffer | undefined>;
  patch(source: Endpoint, delta: Endpoint, output?: StreamEndpoint): Promise<Buffer | undefined>;
}

/** Creates a backend, or throws when its implementation is not installed. */
export type BackendFactory = () => Backend | Promise<Backend>;
