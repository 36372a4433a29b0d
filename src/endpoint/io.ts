/**
 * Endpoint I/O Adapters
 *
 * Backends never touch handles directly. They open each argument through one
 * of three adapters, matched exhaustively on the endpoint kind:
 *
 *   openSource()  random access reader (size + positional reads)
 *   openInput()   sequential chunk reader
 *   openOutput()  sink that either collects a Buffer or writes to the handle
 *
 * Descriptors and FileHandles are borrowed: nothing here closes them, and
 * Writables are never ended.
 */

import { once } from 'events';
import fs from 'fs';
import type { FileHandle } from 'fs/promises';
import { Readable, Writable } from 'stream';
import { InvalidEndpointError, UnsuitableSourceHandleError } from '../errors.ts';
import { type Endpoint, isFileHandle, type StreamEndpoint } from './Endpoint.ts';

export const CHUNK_SIZE = 64 * 1024;

export interface SourceReader {
  readonly size: number;
  read(position: number, length: number): Promise<Buffer>;
}

export interface InputReader {
  /** Next chunk, or null once the input is exhausted. */
  next(): Promise<Buffer | null>;
}

export interface OutputSink {
  write(chunk: Buffer): Promise<void>;
  /** Collected bytes for an in-memory sink, undefined for a stream sink. */
  finish(): Buffer | undefined;
}

function fstat(fd: number): Promise<fs.Stats> {
  return new Promise((resolve, reject) => fs.fstat(fd, (err, stats) => (err ? reject(err) : resolve(stats))));
}

function readFd(fd: number, buffer: Buffer, offset: number, length: number, position: number | null): Promise<number> {
  return new Promise((resolve, reject) => fs.read(fd, buffer, offset, length, position, (err, bytesRead) => (err ? reject(err) : resolve(bytesRead))));
}

function writeFd(fd: number, buffer: Buffer, offset: number, length: number): Promise<number> {
  return new Promise((resolve, reject) => fs.write(fd, buffer, offset, length, null, (err, written) => (err ? reject(err) : resolve(written))));
}

type ReadAt = (buffer: Buffer, offset: number, length: number, position: number | null) => Promise<number>;

function readerFor(handle: number | FileHandle): ReadAt {
  if (typeof handle === 'number') return (buffer, offset, length, position) => readFd(handle, buffer, offset, length, position);
  return async (buffer, offset, length, position) => (await handle.read(buffer, offset, length, position)).bytesRead;
}

function bufferSource(bytes: Buffer): SourceReader {
  return {
    size: bytes.length,
    read: async (position, length) => {
      if (position < 0 || position + length > bytes.length) throw new RangeError(`Source read out of range (${position}+${length} > ${bytes.length})`);
      return bytes.subarray(position, position + length);
    },
  };
}

/**
 * Open the source argument for random access.
 * Rejects with UnsuitableSourceHandleError for anything but a regular file.
 */
export async function openSource(endpoint: Endpoint): Promise<SourceReader> {
  if (endpoint.kind === 'buffer') return bufferSource(endpoint.bytes);

  const { handle } = endpoint;
  if (typeof handle !== 'number' && !isFileHandle(handle)) throw new UnsuitableSourceHandleError(handle.constructor.name);

  const stats = typeof handle === 'number' ? await fstat(handle) : await handle.stat();
  if (!stats.isFile()) {
    const kind = stats.isFIFO() ? 'pipe' : stats.isSocket() ? 'socket' : stats.isDirectory() ? 'directory' : stats.isCharacterDevice() ? 'character device' : 'special file';
    throw new UnsuitableSourceHandleError(kind);
  }

  const readAt = readerFor(handle);
  const size = stats.size;
  return {
    size,
    read: async (position, length) => {
      if (position < 0 || position + length > size) throw new RangeError(`Source read out of range (${position}+${length} > ${size})`);
      const buffer = Buffer.allocUnsafe(length);
      let filled = 0;
      while (filled < length) {
        const bytesRead = await readAt(buffer, filled, length - filled, position + filled);
        if (bytesRead === 0) throw new RangeError(`Source file shrank while reading (${position + filled} of ${size})`);
        filled += bytesRead;
      }
      return buffer;
    },
  };
}

function readableInput(stream: Readable): InputReader {
  const iterator: AsyncIterator<unknown> = stream[Symbol.asyncIterator]();
  return {
    next: async () => {
      for (;;) {
        const result = await iterator.next();
        if (result.done) return null;
        const chunk: unknown = result.value;
        const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk instanceof Uint8Array ? Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength) : null;
        if (buffer === null) throw new InvalidEndpointError('Input stream produced a non-binary chunk');
        if (buffer.length > 0) return buffer;
      }
    },
  };
}

/**
 * Open the target (diff) or delta (patch) argument for a single forward pass.
 */
export function openInput(endpoint: Endpoint): InputReader {
  if (endpoint.kind === 'buffer') {
    let pending: Buffer | null = endpoint.bytes.length > 0 ? endpoint.bytes : null;
    return {
      next: async () => {
        const chunk = pending;
        pending = null;
        return chunk;
      },
    };
  }

  const { handle } = endpoint;
  if (handle instanceof Readable) return readableInput(handle);
  if (typeof handle !== 'number' && !isFileHandle(handle)) throw new InvalidEndpointError(`${handle.constructor.name} is not readable`);

  const readAt = readerFor(handle);
  let done = false;
  return {
    next: async () => {
      if (done) return null;
      const buffer = Buffer.allocUnsafe(CHUNK_SIZE);
      const bytesRead = await readAt(buffer, 0, CHUNK_SIZE, null);
      if (bytesRead === 0) {
        done = true;
        return null;
      }
      return buffer.subarray(0, bytesRead);
    },
  };
}

export async function readAll(input: InputReader): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for (let chunk = await input.next(); chunk !== null; chunk = await input.next()) chunks.push(chunk);
  return chunks.length === 1 ? chunks[0] : Buffer.concat(chunks);
}

async function writeWritable(stream: Writable, chunk: Buffer): Promise<void> {
  if (stream.destroyed || stream.writableEnded) throw new InvalidEndpointError('Output stream is closed');
  if (!stream.write(chunk)) await once(stream, 'drain');
}

/**
 * Open the output argument. Without one, bytes are collected and handed back
 * by finish().
 */
export function openOutput(endpoint: StreamEndpoint | undefined): OutputSink {
  if (endpoint === undefined) {
    const chunks: Buffer[] = [];
    return {
      write: async (chunk) => {
        chunks.push(chunk);
      },
      finish: () => (chunks.length === 1 ? chunks[0] : Buffer.concat(chunks)),
    };
  }

  const { handle } = endpoint;
  let write: (chunk: Buffer) => Promise<void>;
  if (typeof handle === 'number' || isFileHandle(handle)) {
    const writeAt = typeof handle === 'number' ? (buffer: Buffer, offset: number) => writeFd(handle, buffer, offset, buffer.length - offset) : async (buffer: Buffer, offset: number) => (await handle.write(buffer, offset, buffer.length - offset, null)).bytesWritten;
    write = async (chunk) => {
      let offset = 0;
      while (offset < chunk.length) offset += await writeAt(chunk, offset);
    };
  } else if (handle instanceof Writable) {
    write = (chunk) => writeWritable(handle, chunk);
  } else {
    throw new InvalidEndpointError(`${handle.constructor.name} is not writable`);
  }

  return {
    write: (chunk) => (chunk.length > 0 ? write(chunk) : Promise.resolve()),
    finish: () => undefined,
  };
}
