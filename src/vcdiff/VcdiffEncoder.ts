/**
 * VCDIFF Encoder
 *
 * Streams the target through in fixed-size windows. The source is read once
 * up front and indexed by 4-byte prefix; each window then declares as its
 * source segment only the span its COPY instructions reference, so a decoder
 * holds one window's worth of source at a time. Only single-instruction
 * opcodes with VCD_SELF addresses are emitted: the output is valid RFC 3284
 * that any conforming decoder reads, without the pairing and cache tricks a
 * tuned encoder uses.
 *
 * With matchSource disabled the source is ignored and every window is one ADD
 * of the target bytes.
 */

import type { InputReader, OutputSink, SourceReader } from '../endpoint/io.ts';
import { ByteBuilder } from './lib/integers.ts';
import { KEY_SIZE, SourceIndex } from './lib/SourceIndex.ts';
import { addOpcode, copyOpcode, InstructionType, MAX_TARGET_WINDOW_SIZE, OP_RUN, VCD_SELF, VCD_SOURCE, VCDIFF_MAGIC, VCDIFF_VERSION } from './types.ts';

export const DEFAULT_WINDOW_SIZE = 256 * 1024;

const MIN_COPY = KEY_SIZE;
const MIN_RUN = 8;

export interface EncoderOptions {
  /** Target bytes per window */
  windowSize?: number;
  /** Search the source for matches (default true) */
  matchSource?: boolean;
}

type Operation = { type: InstructionType.ADD; start: number; end: number } | { type: InstructionType.RUN; value: number; size: number } | { type: InstructionType.COPY; address: number; size: number };

function runLength(window: Buffer, start: number): number {
  const value = window[start];
  let end = start + 1;
  while (end < window.length && window[end] === value) end++;
  return end - start;
}

function matchLength(source: Buffer, sourceStart: number, window: Buffer, start: number): number {
  let length = 0;
  while (sourceStart + length < source.length && start + length < window.length && source[sourceStart + length] === window[start + length]) length++;
  return length;
}

function findOperations(window: Buffer, source: Buffer | null, index: SourceIndex | null): Operation[] {
  const operations: Operation[] = [];
  const add = (start: number, end: number) => {
    if (end > start) operations.push({ type: InstructionType.ADD, start, end });
  };
  let pending = 0;
  let i = 0;

  while (i < window.length) {
    if (i + MIN_RUN <= window.length) {
      const run = runLength(window, i);
      if (run >= MIN_RUN) {
        add(pending, i);
        operations.push({ type: InstructionType.RUN, value: window[i], size: run });
        i += run;
        pending = i;
        continue;
      }
    }

    if (source && index && i + MIN_COPY <= window.length) {
      const candidate = index.find(window.readUInt32BE(i));
      if (candidate >= 0) {
        const length = matchLength(source, candidate, window, i);
        if (length >= MIN_COPY) {
          add(pending, i);
          operations.push({ type: InstructionType.COPY, address: candidate, size: length });
          i += length;
          pending = i;
          continue;
        }
      }
    }

    i++;
  }
  add(pending, window.length);
  return operations;
}

export function encodeWindow(window: Buffer, source: Buffer | null, index: SourceIndex | null): Buffer {
  const operations = findOperations(window, source, index);

  // source span referenced by this window
  let segmentStart = Infinity;
  let segmentEnd = 0;
  for (let i = 0; i < operations.length; i++) {
    const operation = operations[i];
    if (operation.type !== InstructionType.COPY) continue;
    segmentStart = Math.min(segmentStart, operation.address);
    segmentEnd = Math.max(segmentEnd, operation.address + operation.size);
  }
  const hasSegment = segmentEnd > 0;

  const data = new ByteBuilder();
  const instructions = new ByteBuilder();
  const addresses = new ByteBuilder();
  for (let i = 0; i < operations.length; i++) {
    const operation = operations[i];
    switch (operation.type) {
      case InstructionType.ADD: {
        const size = operation.end - operation.start;
        instructions.byte(addOpcode(size));
        if (addOpcode(size) === 1) instructions.integer(size);
        data.bytes(window, operation.start, operation.end);
        break;
      }
      case InstructionType.RUN:
        instructions.byte(OP_RUN);
        instructions.integer(operation.size);
        data.byte(operation.value);
        break;
      case InstructionType.COPY:
        instructions.byte(copyOpcode(operation.size, VCD_SELF));
        if (operation.size < 4 || operation.size > 18) instructions.integer(operation.size);
        addresses.integer(operation.address - segmentStart);
        break;
    }
  }

  const body = new ByteBuilder(window.length + 16);
  body.integer(window.length);
  body.byte(0); // Delta_Indicator: no secondary compression
  body.integer(data.length);
  body.integer(instructions.length);
  body.integer(addresses.length);
  body.bytes(data.toBuffer());
  body.bytes(instructions.toBuffer());
  body.bytes(addresses.toBuffer());

  const out = new ByteBuilder(body.length + 16);
  if (hasSegment) {
    out.byte(VCD_SOURCE);
    out.integer(segmentEnd - segmentStart);
    out.integer(segmentStart);
  } else {
    out.byte(0);
  }
  out.integer(body.length);
  out.bytes(body.toBuffer());
  return out.toBuffer();
}

export function encodeHeader(): Buffer {
  return Buffer.from([...VCDIFF_MAGIC, VCDIFF_VERSION, 0]);
}

/**
 * Encode target against source, writing header and windows to the sink as
 * they are produced.
 */
export async function encodeVcdiff(source: SourceReader, target: InputReader, sink: OutputSink, options: EncoderOptions = {}): Promise<void> {
  const windowSize = options.windowSize ?? DEFAULT_WINDOW_SIZE;
  if (!Number.isInteger(windowSize) || windowSize < 1 || windowSize > MAX_TARGET_WINDOW_SIZE) throw new RangeError(`Invalid window size ${windowSize}`);

  const matchSource = options.matchSource !== false && source.size > 0;
  const sourceBytes = matchSource ? await source.read(0, source.size) : null;
  const index = sourceBytes ? new SourceIndex(sourceBytes) : null;

  await sink.write(encodeHeader());

  let pending: Buffer = Buffer.alloc(0);
  for (let chunk = await target.next(); chunk !== null; chunk = await target.next()) {
    pending = pending.length ? Buffer.concat([pending, chunk]) : chunk;
    while (pending.length >= windowSize) {
      await sink.write(encodeWindow(pending.subarray(0, windowSize), sourceBytes, index));
      pending = pending.subarray(windowSize);
    }
  }
  if (pending.length > 0) await sink.write(encodeWindow(pending, sourceBytes, index));
}
