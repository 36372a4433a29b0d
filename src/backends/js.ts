/**
 * Pure TypeScript backend
 *
 * Always available. Streams the target (diff) or delta (patch) window by
 * window, so memory stays at one window plus the source for diff, and one
 * window plus its source segment for patch.
 */

import type { Backend } from '../backend/types.ts';
import { openInput, openOutput, openSource } from '../endpoint/io.ts';
import { decodeVcdiff, type EncoderOptions, encodeVcdiff } from '../vcdiff/index.ts';

export const JS_BACKEND = 'vcdiff/js';

export function createJsBackend(options: EncoderOptions = {}, id = JS_BACKEND): Backend {
  return {
    id,
    diff: async (source, target, output) => {
      const reader = await openSource(source);
      const sink = openOutput(output);
      await encodeVcdiff(reader, openInput(target), sink, options);
      return sink.finish();
    },
    patch: async (source, delta, output) => {
      const reader = await openSource(source);
      const sink = openOutput(output);
      await decodeVcdiff(reader, openInput(delta), sink);
      return sink.finish();
    },
  };
}
