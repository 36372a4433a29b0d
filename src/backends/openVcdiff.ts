/**
 * open-vcdiff backend (via the optional vcdiff-wasm package)
 */

import createBufferingBackend from '../backend/createBufferingBackend.ts';
import { importOptional, isRecord } from '../backend/loadOptional.ts';
import type { Backend } from '../backend/types.ts';

export const OPEN_VCDIFF_BACKEND = 'vcdiff/open-vcdiff';
const MODULE_NAME = 'vcdiff-wasm';

type Coder = (source: Uint8Array, input: Uint8Array) => Uint8Array;

interface OpenVcdiffInstance {
  encoder: Coder;
  decoder: Coder;
}

function isInstance(value: unknown): value is OpenVcdiffInstance {
  return isRecord(value) && typeof value.encoder === 'function' && typeof value.decoder === 'function';
}

function findFactory(namespace: Record<string, unknown>): (() => Promise<unknown>) | null {
  const candidates: unknown[] = [namespace.default, isRecord(namespace.default) ? namespace.default.default : undefined];
  for (let i = 0; i < candidates.length; i++) {
    const candidate = candidates[i];
    if (typeof candidate === 'function') return async () => candidate();
  }
  return null;
}

export async function createOpenVcdiffBackend(): Promise<Backend> {
  const factory = findFactory(await importOptional(MODULE_NAME));
  if (!factory) throw new Error(`Module ${MODULE_NAME} has no default factory`);

  const instance = await factory();
  if (!isInstance(instance)) throw new Error(`Module ${MODULE_NAME} did not provide an encoder and decoder`);

  return createBufferingBackend(OPEN_VCDIFF_BACKEND, {
    diff: (source, target) => instance.encoder(source, target),
    patch: (source, delta) => instance.decoder(source, delta),
  });
}
