/**
 * vcdiff-switch: diff and patch for binary data
 *
 * One interface over several VCDIFF (RFC 3284) implementations. The backend
 * is picked at first use: an explicit choice (setBackend/withBackend or
 * VCDIFF_BACKEND) wins, then a backend some other code already loaded, then
 * the first installed of xdelta3-wasm, vcdiff-wasm and the bundled pure
 * TypeScript codec.
 *
 * Every argument may be a Buffer/string or a stream handle; the source must
 * be a seekable file when streamed.
 */

// ============================================================================
// High-Level APIs (Recommended)
// ============================================================================

export { createFacade, type DeltaOperation, diff, type Facade, type OperationCallback, patch, setBackend, whichBackend, withBackend } from './facade.ts';

// ============================================================================
// Endpoints
// ============================================================================

export { Endpoint, type EndpointLike, type EndpointRole, type OutputLike, type StreamHandle, toEndpoint } from './endpoint/Endpoint.ts';
export { openInput, openOutput, openSource, readAll, type InputReader, type OutputSink, type SourceReader } from './endpoint/io.ts';

// ============================================================================
// Backends and Resolution
// ============================================================================

export { default as createBufferingBackend, type BufferingOperations } from './backend/createBufferingBackend.ts';
export { Registry, type RegistryOptions } from './backend/Registry.ts';
export type { Backend, BackendFactory, BackendId } from './backend/types.ts';
export * from './backends/index.ts';
export { createDefaultRegistry, defaultRegistry } from './defaultRegistry.ts';

// ============================================================================
// Supporting APIs
// ============================================================================

export { loadConfig, type VcdiffConfig } from './config.ts';
export * from './errors.ts';
