/**
 * diff/patch façade
 *
 * Resolves a backend through a Registry and hands it the arguments as
 * Endpoints. Nothing is buffered or transformed here; errors from the backend
 * reach the caller exactly as thrown. Only resolution errors
 * (NoBackendAvailableError, BackendLoadError) originate in this layer, plus
 * InvalidEndpointError/UnsuitableSourceHandleError for arguments that can be
 * rejected before dispatch.
 *
 * Promise API by default; pass a callback as the last argument for a
 * Node-style callback instead.
 */

import type { Registry } from './backend/Registry.ts';
import type { BackendId } from './backend/types.ts';
import { defaultRegistry } from './defaultRegistry.ts';
import { type EndpointLike, type OutputLike, toEndpoint, toOutputEndpoint } from './endpoint/Endpoint.ts';
import { type OperationCallback, runOperation } from './utils/runOperation.ts';

export type { OperationCallback } from './utils/runOperation.ts';

export interface DeltaOperation {
  (source: EndpointLike, input: EndpointLike): Promise<Buffer>;
  (source: EndpointLike, input: EndpointLike, output: OutputLike | undefined): Promise<Buffer | undefined>;
  (source: EndpointLike, input: EndpointLike, output: OutputLike | undefined, callback: OperationCallback<Buffer | undefined>): void;
}

export interface Facade {
  /** Compute a delta turning source into target */
  diff: DeltaOperation;
  /** Reconstruct the target from source and delta */
  patch: DeltaOperation;
  /** Id of the backend that services calls, resolving it if needed */
  whichBackend(): Promise<BackendId>;
  /** Force a backend for subsequent calls; null restores automatic selection */
  setBackend(id: BackendId | null): void;
  /** Run fn with a backend forced, restoring the previous choice afterwards */
  withBackend<T>(id: BackendId, fn: () => T | Promise<T>): Promise<T>;
}

export function createFacade(registry: Registry): Facade {
  function dispatch(operation: 'diff' | 'patch', source: EndpointLike, input: EndpointLike, output: OutputLike | undefined, callback?: OperationCallback<Buffer | undefined>): Promise<Buffer | undefined> | void {
    return runOperation(async () => {
      const backend = await registry.resolve();
      const sourceEndpoint = toEndpoint(source, 'source');
      const inputEndpoint = toEndpoint(input, 'input');
      const outputEndpoint = toOutputEndpoint(output);
      return operation === 'diff' ? backend.diff(sourceEndpoint, inputEndpoint, outputEndpoint) : backend.patch(sourceEndpoint, inputEndpoint, outputEndpoint);
    }, callback);
  }

  function diff(source: EndpointLike, target: EndpointLike): Promise<Buffer>;
  function diff(source: EndpointLike, target: EndpointLike, output: OutputLike | undefined): Promise<Buffer | undefined>;
  function diff(source: EndpointLike, target: EndpointLike, output: OutputLike | undefined, callback: OperationCallback<Buffer | undefined>): void;
  function diff(source: EndpointLike, target: EndpointLike, output?: OutputLike, callback?: OperationCallback<Buffer | undefined>): Promise<Buffer | undefined> | void {
    return dispatch('diff', source, target, output, callback);
  }

  function patch(source: EndpointLike, delta: EndpointLike): Promise<Buffer>;
  function patch(source: EndpointLike, delta: EndpointLike, output: OutputLike | undefined): Promise<Buffer | undefined>;
  function patch(source: EndpointLike, delta: EndpointLike, output: OutputLike | undefined, callback: OperationCallback<Buffer | undefined>): void;
  function patch(source: EndpointLike, delta: EndpointLike, output?: OutputLike, callback?: OperationCallback<Buffer | undefined>): Promise<Buffer | undefined> | void {
    return dispatch('patch', source, delta, output, callback);
  }

  return {
    diff,
    patch,
    whichBackend: () => registry.which(),
    setBackend: (id) => registry.setOverride(id),
    withBackend: (id, fn) => registry.withOverride(id, fn),
  };
}

const facade = createFacade(defaultRegistry);

export const diff: DeltaOperation = facade.diff;
export const patch: DeltaOperation = facade.patch;
export const whichBackend = facade.whichBackend;
export const setBackend = facade.setBackend;
export const withBackend = facade.withBackend;
