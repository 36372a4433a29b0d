/**
 * Store backend
 *
 * Ignores the source and embeds the whole target as literal data. The delta
 * is ordinary VCDIFF that every backend can apply; it is as large as the
 * target but costs almost nothing to produce. Useful when content is mostly
 * replaced wholesale, and as a second backend for compatibility checks.
 */

import type { Backend } from '../backend/types.ts';
import { createJsBackend } from './js.ts';

export const STORE_BACKEND = 'vcdiff/store';

export function createStoreBackend(windowSize?: number): Backend {
  return createJsBackend({ matchSource: false, windowSize }, STORE_BACKEND);
}
