import { Registry } from './backend/Registry.ts';
import { BUILTIN_FACTORIES, DEFAULT_CANDIDATES } from './backends/index.ts';
import { loadConfig } from './config.ts';
import { TEST_BACKEND } from './testing/constants.ts';

const config = loadConfig();

/**
 * Process-wide registry behind the top-level diff/patch functions.
 * VCDIFF_BACKEND and VCDIFF_DISABLE are read once, when this module loads.
 */
export const defaultRegistry = new Registry({
  factories: BUILTIN_FACTORIES,
  candidates: DEFAULT_CANDIDATES,
  reserved: [TEST_BACKEND],
  disabled: config.disabled,
  override: config.backend,
});

export function createDefaultRegistry(): Registry {
  return new Registry({ factories: BUILTIN_FACTORIES, candidates: DEFAULT_CANDIDATES, reserved: [TEST_BACKEND] });
}
