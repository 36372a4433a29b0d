/**
 * xdelta3 backend (via the optional xdelta3-wasm package)
 *
 * The wasm build only exposes whole-buffer encode/decode with a caller-sized
 * output buffer, so it runs through createBufferingBackend. Output size for
 * patch comes from the window headers of the delta itself.
 */

import createBufferingBackend from '../backend/createBufferingBackend.ts';
import { importOptional, isRecord } from '../backend/loadOptional.ts';
import type { Backend } from '../backend/types.ts';
import { readTargetSize } from '../vcdiff/index.ts';

export const XDELTA3_BACKEND = 'vcdiff/xdelta3';
const MODULE_NAME = 'xdelta3-wasm';

interface Xd3Result {
  str: string;
  output: Uint8Array;
}

interface Xdelta3Wasm {
  init(): Promise<unknown>;
  xd3_encode_memory(input: Uint8Array, source: Uint8Array, outputSize: number, config: number): Xd3Result;
  xd3_decode_memory(delta: Uint8Array, source: Uint8Array, outputSize: number): Xd3Result;
  xd3_smatch_cfg: Record<string, number>;
}

function isXdelta3Wasm(value: unknown): value is Xdelta3Wasm {
  if (!isRecord(value)) return false;
  return typeof value.init === 'function' && typeof value.xd3_encode_memory === 'function' && typeof value.xd3_decode_memory === 'function' && isRecord(value.xd3_smatch_cfg);
}

function checkResult(result: Xd3Result, operation: string): Uint8Array {
  if (result.str !== 'SUCCESS') throw new Error(`xdelta3 ${operation} failed: ${result.str}`);
  return result.output;
}

export async function createXdelta3Backend(): Promise<Backend> {
  const namespace = await importOptional(MODULE_NAME);
  const bindings = isXdelta3Wasm(namespace) ? namespace : isXdelta3Wasm(namespace.default) ? namespace.default : null;
  if (!bindings) throw new Error(`Module ${MODULE_NAME} does not look like xdelta3-wasm`);
  await bindings.init();

  const config = bindings.xd3_smatch_cfg.DEFAULT ?? 0;
  return createBufferingBackend(XDELTA3_BACKEND, {
    // no-source deltas are target plus a few header bytes per window
    diff: (source, target) => checkResult(bindings.xd3_encode_memory(target, source, Math.max(4096, target.length * 2 + 1024), config), 'encode'),
    patch: (source, delta) => checkResult(bindings.xd3_decode_memory(delta, source, Math.max(1, readTargetSize(delta))), 'decode'),
  });
}
