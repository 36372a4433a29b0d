/**
 * Endpoint Abstraction
 *
 * Every diff/patch argument is either an in-memory buffer or a borrowed
 * stream handle tagged with the role it plays in the call:
 *
 *   source  random access required (regular file descriptor or FileHandle)
 *   input   target for diff, delta for patch; read once, start to finish
 *   output  written once, start to finish
 *
 * Checks that can be made synchronously happen here; the fstat check for
 * descriptors and FileHandles happens when the source is opened (see io.ts),
 * which every backend does before writing any output.
 */

import type { FileHandle } from 'fs/promises';
import { Readable, Writable } from 'stream';
import { InvalidEndpointError, UnsuitableSourceHandleError } from '../errors.ts';

export type EndpointRole = 'source' | 'input' | 'output';

export type StreamHandle = number | FileHandle | Readable | Writable;

export interface BufferEndpoint {
  readonly kind: 'buffer';
  readonly bytes: Buffer;
}

export interface StreamEndpoint {
  readonly kind: 'stream';
  readonly handle: StreamHandle;
  readonly role: EndpointRole;
}

export type Endpoint = BufferEndpoint | StreamEndpoint;

/** Anything the façade accepts in an input position. */
export type EndpointLike = Endpoint | Uint8Array | string | StreamHandle;

/** Anything the façade accepts as an output; omit it to get a Buffer back. */
export type OutputLike = StreamEndpoint | StreamHandle;

export function isFileHandle(value: unknown): value is FileHandle {
  if (typeof value !== 'object' || value === null) return false;
  if (!('fd' in value && 'read' in value && 'write' in value && 'stat' in value)) return false;
  return typeof value.fd === 'number' && typeof value.read === 'function' && typeof value.write === 'function' && typeof value.stat === 'function';
}

export function isEndpoint(value: unknown): value is Endpoint {
  if (typeof value !== 'object' || value === null || Buffer.isBuffer(value) || value instanceof Uint8Array) return false;
  if (!('kind' in value)) return false;
  return value.kind === 'buffer' || value.kind === 'stream';
}

function isStreamHandle(value: unknown): value is StreamHandle {
  return typeof value === 'number' || isFileHandle(value) || value instanceof Readable || value instanceof Writable;
}

function describe(handle: StreamHandle): string {
  if (typeof handle === 'number') return `file descriptor ${handle}`;
  if (isFileHandle(handle)) return `file handle ${handle.fd}`;
  return handle.constructor.name;
}

function validateRole(handle: StreamHandle, role: EndpointRole): void {
  if (typeof handle === 'number') {
    if (!Number.isInteger(handle) || handle < 0) throw new InvalidEndpointError(`Invalid file descriptor ${handle} for ${role}`);
    return;
  }
  if (isFileHandle(handle)) return;

  switch (role) {
    case 'source':
      // pipes and sockets can only be read forward
      throw new UnsuitableSourceHandleError(describe(handle));
    case 'input':
      if (!(handle instanceof Readable)) throw new InvalidEndpointError(`${describe(handle)} is not readable`);
      return;
    case 'output':
      if (!(handle instanceof Writable)) throw new InvalidEndpointError(`${describe(handle)} is not writable`);
      return;
  }
}

function fromBuffer(bytes: Uint8Array | string): BufferEndpoint {
  if (typeof bytes === 'string') return { kind: 'buffer', bytes: Buffer.from(bytes, 'utf8') };
  return { kind: 'buffer', bytes: Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength) };
}

function fromStream(handle: StreamHandle, role: EndpointRole): StreamEndpoint {
  validateRole(handle, role);
  return { kind: 'stream', handle, role };
}

export const Endpoint = {
  fromBuffer,
  fromStream,
};

/**
 * Coerce a façade argument into an Endpoint for the given role.
 *
 * Strings are encoded as UTF-8. Existing stream endpoints are re-tagged with
 * the role of the position they are passed in.
 */
export function toEndpoint(value: EndpointLike, role: EndpointRole): Endpoint {
  if (typeof value === 'string' || value instanceof Uint8Array) return fromBuffer(value);
  if (isEndpoint(value)) {
    if (value.kind === 'buffer') return value;
    return value.role === role ? value : fromStream(value.handle, role);
  }
  if (isStreamHandle(value)) return fromStream(value, role);
  throw new InvalidEndpointError(`Unsupported ${role} argument`);
}

export function toOutputEndpoint(value: OutputLike | undefined): StreamEndpoint | undefined {
  if (value === undefined) return undefined;
  if (isEndpoint(value)) {
    if (value.kind !== 'stream') throw new InvalidEndpointError('Output endpoint must be a stream; omit it to receive a Buffer');
    return value.role === 'output' ? value : fromStream(value.handle, 'output');
  }
  return fromStream(value, 'output');
}
