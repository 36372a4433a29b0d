import type { BackendFactory, BackendId } from '../backend/types.ts';
import { createJsBackend, JS_BACKEND } from './js.ts';
import { createOpenVcdiffBackend, OPEN_VCDIFF_BACKEND } from './openVcdiff.ts';
import { createStoreBackend, STORE_BACKEND } from './store.ts';
import { createXdelta3Backend, XDELTA3_BACKEND } from './xdelta3.ts';

export { createJsBackend, JS_BACKEND } from './js.ts';
export { createOpenVcdiffBackend, OPEN_VCDIFF_BACKEND } from './openVcdiff.ts';
export { createStoreBackend, STORE_BACKEND } from './store.ts';
export { createXdelta3Backend, XDELTA3_BACKEND } from './xdelta3.ts';

export const BUILTIN_FACTORIES: Record<BackendId, BackendFactory> = {
  [XDELTA3_BACKEND]: createXdelta3Backend,
  [OPEN_VCDIFF_BACKEND]: createOpenVcdiffBackend,
  [JS_BACKEND]: () => createJsBackend(),
  [STORE_BACKEND]: () => createStoreBackend(),
};

// Probed in this order when nothing is forced or already loaded. The store
// backend is never picked implicitly since it does no delta compression.
export const DEFAULT_CANDIDATES: BackendId[] = [XDELTA3_BACKEND, OPEN_VCDIFF_BACKEND, JS_BACKEND];
