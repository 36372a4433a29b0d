import type { Endpoint, StreamEndpoint } from '../endpoint/Endpoint.ts';
import { openInput, openOutput, openSource, readAll } from '../endpoint/io.ts';
import type { Backend, BackendId } from './types.ts';

type BufferOperation = (source: Buffer, input: Buffer) => Buffer | Uint8Array;

export interface BufferingOperations {
  diff: BufferOperation;
  patch: BufferOperation;
}

function toBuffer(bytes: Buffer | Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Helper to adapt a codec that only works on complete buffers
 *
 * Source and input are read whole, the operation runs synchronously and its
 * result goes to the output endpoint in one write. Suitable for bindings that
 * have no streaming API; peak memory is source + input + result.
 */
export default function createBufferingBackend(id: BackendId, operations: BufferingOperations): Backend {
  const run = async (operation: BufferOperation, source: Endpoint, input: Endpoint, output?: StreamEndpoint): Promise<Buffer | undefined> => {
    const reader = await openSource(source);
    const sourceBytes = await reader.read(0, reader.size);
    const inputBytes = await readAll(openInput(input));
    const result = toBuffer(operation(sourceBytes, inputBytes));

    const sink = openOutput(output);
    await sink.write(result);
    return sink.finish();
  };

  return {
    id,
    diff: (source, target, output) => run(operations.diff, source, target, output),
    patch: (source, delta, output) => run(operations.patch, source, delta, output),
  };
}
