/**
 * VCDIFF Decoder
 *
 * Reads the delta in a single forward pass: window headers are parsed from
 * the stream, each window's delta encoding is buffered whole (its length is
 * declared up front) and decoded, and the reconstructed target window is
 * written to the sink before the next one is read. Source segments are
 * fetched with positional reads, so only the segment a window declares is
 * resident. Target windows above MAX_TARGET_WINDOW_SIZE are rejected before
 * anything is allocated for them.
 *
 * Supported: default code table, VCD_SOURCE windows, the application header
 * and Adler-32 window checksum extensions. Rejected: secondary compression,
 * custom code tables and VCD_TARGET windows.
 */

import { constants } from 'buffer';
import type { InputReader, OutputSink, SourceReader } from '../endpoint/io.ts';
import { DeltaFormatError } from '../errors.ts';
import { adler32 } from './lib/adler32.ts';
import { AddressCache } from './lib/AddressCache.ts';
import { ByteCursor } from './lib/integers.ts';
import { DEFAULT_CODE_TABLE, type Instruction, InstructionType, MAX_TARGET_WINDOW_SIZE, VCD_ADLER32, VCD_APPHEADER, VCD_CODETABLE, VCD_DECOMPRESS, VCD_SOURCE, VCD_TARGET, VCDIFF_MAGIC, VCDIFF_VERSION } from './types.ts';

const TARGET_WINDOW_LIMIT = Math.min(MAX_TARGET_WINDOW_SIZE, constants.MAX_LENGTH);

/**
 * Pulls bytes from an InputReader on demand
 */
class StreamCursor {
  private readonly input: InputReader;
  private buffer: Buffer = Buffer.alloc(0);
  private offset = 0;
  private exhausted = false;
  consumed = 0;

  constructor(input: InputReader) {
    this.input = input;
  }

  private async fill(length: number): Promise<boolean> {
    let available = this.buffer.length - this.offset;
    if (available >= length || this.exhausted) return available >= length;

    // gather chunks and join once, so a large section is not copied per chunk
    const chunks: Buffer[] = [this.buffer.subarray(this.offset)];
    while (available < length) {
      const chunk = await this.input.next();
      if (chunk === null) {
        this.exhausted = true;
        break;
      }
      chunks.push(chunk);
      available += chunk.length;
    }
    this.buffer = chunks.length === 1 ? chunks[0] : Buffer.concat(chunks, available);
    this.offset = 0;
    return available >= length;
  }

  async atEnd(): Promise<boolean> {
    return !(await this.fill(1));
  }

  async bytes(length: number, what: string): Promise<Buffer> {
    if (!(await this.fill(length))) throw new DeltaFormatError(`Truncated delta: expected ${length} bytes of ${what} at offset ${this.consumed}`);
    const slice = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    this.consumed += length;
    return slice;
  }

  async byte(what: string): Promise<number> {
    return (await this.bytes(1, what))[0];
  }

  async integer(what: string): Promise<number> {
    let value = 0;
    for (let i = 0; i < 8; i++) {
      const digit = await this.byte(what);
      value = value * 128 + (digit & 0x7f);
      if ((digit & 0x80) === 0) return value;
    }
    throw new DeltaFormatError(`Integer overflow reading ${what}`);
  }
}

export interface WindowHeader {
  indicator: number;
  segmentLength: number;
  segmentPosition: number;
  deltaLength: number;
}

async function readFileHeader(cursor: StreamCursor): Promise<void> {
  const magic = await cursor.bytes(4, 'header');
  for (let i = 0; i < VCDIFF_MAGIC.length; i++) {
    if (magic[i] !== VCDIFF_MAGIC[i]) throw new DeltaFormatError('Invalid VCDIFF magic bytes');
  }
  if (magic[3] !== VCDIFF_VERSION) throw new DeltaFormatError(`Unsupported VCDIFF version ${magic[3]}`);

  const indicator = await cursor.byte('header indicator');
  if (indicator & ~(VCD_DECOMPRESS | VCD_CODETABLE | VCD_APPHEADER)) throw new DeltaFormatError(`Invalid header indicator 0x${indicator.toString(16)}`);
  if (indicator & VCD_DECOMPRESS) throw new DeltaFormatError('Secondary compression is not supported');
  if (indicator & VCD_CODETABLE) throw new DeltaFormatError('Application-defined code tables are not supported');
  if (indicator & VCD_APPHEADER) {
    const length = await cursor.integer('application header length');
    await cursor.bytes(length, 'application header');
  }
}

async function readWindowHeader(cursor: StreamCursor): Promise<WindowHeader> {
  const indicator = await cursor.byte('window indicator');
  if (indicator & ~(VCD_SOURCE | VCD_TARGET | VCD_ADLER32)) throw new DeltaFormatError(`Invalid window indicator 0x${indicator.toString(16)}`);
  if ((indicator & VCD_SOURCE) && (indicator & VCD_TARGET)) throw new DeltaFormatError('Window cannot use both source and target segments');

  let segmentLength = 0;
  let segmentPosition = 0;
  if (indicator & (VCD_SOURCE | VCD_TARGET)) {
    segmentLength = await cursor.integer('source segment length');
    segmentPosition = await cursor.integer('source segment position');
  }
  const deltaLength = await cursor.integer('delta encoding length');
  return { indicator, segmentLength, segmentPosition, deltaLength };
}

function copyBytes(segment: Buffer, out: Buffer, address: number, position: number, size: number): void {
  // byte by byte: a target-window copy may overlap its own output
  for (let k = 0; k < size; k++) {
    const from = address + k;
    out[position + k] = from < segment.length ? segment[from] : out[from - segment.length];
  }
}

/**
 * Decode one window's delta encoding against its source segment
 */
export function decodeWindow(header: WindowHeader, body: Buffer, segment: Buffer, cache: AddressCache = new AddressCache()): Buffer {
  const cursor = new ByteCursor(body, 'delta encoding');
  const targetLength = cursor.integer();
  if (targetLength > TARGET_WINDOW_LIMIT) throw new DeltaFormatError(`Target window size ${targetLength} exceeds limit ${TARGET_WINDOW_LIMIT}`);
  const deltaIndicator = cursor.byte();
  if (deltaIndicator !== 0) throw new DeltaFormatError('Compressed window sections are not supported');
  const dataLength = cursor.integer();
  const instructionsLength = cursor.integer();
  const addressesLength = cursor.integer();
  const checksum = header.indicator & VCD_ADLER32 ? cursor.bytes(4).readUInt32BE(0) : null;

  if (dataLength + instructionsLength + addressesLength !== cursor.remaining) throw new DeltaFormatError('Window section lengths do not match delta encoding length');

  const data = new ByteCursor(body, 'data section', cursor.position, cursor.position + dataLength);
  const instructions = new ByteCursor(body, 'instruction section', data.end, data.end + instructionsLength);
  const addresses = new ByteCursor(body, 'address section', instructions.end, instructions.end + addressesLength);

  const out = Buffer.alloc(targetLength);
  let position = 0;
  cache.reset();

  const execute = (instruction: Instruction): void => {
    if (instruction.type === InstructionType.NOOP) return;
    const size = instruction.size === 0 ? instructions.integer() : instruction.size;
    if (position + size > targetLength) throw new DeltaFormatError(`Instruction overruns target window (${position + size} > ${targetLength})`);

    switch (instruction.type) {
      case InstructionType.ADD:
        data.bytes(size).copy(out, position);
        break;
      case InstructionType.RUN:
        out.fill(data.byte(), position, position + size);
        break;
      case InstructionType.COPY: {
        const here = segment.length + position;
        const address = cache.decode(here, instruction.mode, addresses);
        copyBytes(segment, out, address, position, size);
        break;
      }
    }
    position += size;
  };

  while (instructions.remaining > 0) {
    const [first, second] = DEFAULT_CODE_TABLE[instructions.byte()];
    execute(first);
    execute(second);
  }

  if (position !== targetLength) throw new DeltaFormatError(`Target window decoded to ${position} bytes, expected ${targetLength}`);
  if (data.remaining !== 0 || addresses.remaining !== 0) throw new DeltaFormatError('Unused bytes in window sections');
  if (checksum !== null && adler32(out) !== checksum) throw new DeltaFormatError('Target window checksum mismatch');
  return out;
}

/**
 * Apply a delta read from `delta` to `source`, writing target windows to the sink.
 */
export async function decodeVcdiff(source: SourceReader, delta: InputReader, sink: OutputSink): Promise<void> {
  const cursor = new StreamCursor(delta);
  const cache = new AddressCache();
  await readFileHeader(cursor);

  while (!(await cursor.atEnd())) {
    const header = await readWindowHeader(cursor);
    if (header.indicator & VCD_TARGET) throw new DeltaFormatError('VCD_TARGET windows are not supported');

    let segment: Buffer = Buffer.alloc(0);
    if (header.indicator & VCD_SOURCE) {
      if (header.segmentPosition + header.segmentLength > source.size) {
        throw new DeltaFormatError(`Source segment ${header.segmentPosition}+${header.segmentLength} exceeds source size ${source.size}`);
      }
      segment = await source.read(header.segmentPosition, header.segmentLength);
    }

    const body = await cursor.bytes(header.deltaLength, 'delta encoding');
    await sink.write(decodeWindow(header, body, segment, cache));
  }
}

/**
 * Sum of the target window sizes declared in an in-memory delta.
 * Used to size output buffers for backends that need one up front.
 */
export function readTargetSize(delta: Buffer): number {
  const cursor = new ByteCursor(delta, 'delta');
  const magic = cursor.bytes(4);
  if (magic[0] !== VCDIFF_MAGIC[0] || magic[1] !== VCDIFF_MAGIC[1] || magic[2] !== VCDIFF_MAGIC[2]) throw new DeltaFormatError('Invalid VCDIFF magic bytes');
  const indicator = cursor.byte();
  if (indicator & VCD_DECOMPRESS) cursor.byte();
  if (indicator & VCD_CODETABLE) cursor.bytes(cursor.integer());
  if (indicator & VCD_APPHEADER) cursor.bytes(cursor.integer());

  let total = 0;
  while (cursor.remaining > 0) {
    const windowIndicator = cursor.byte();
    if (windowIndicator & (VCD_SOURCE | VCD_TARGET)) {
      cursor.integer();
      cursor.integer();
    }
    const deltaLength = cursor.integer();
    const body = new ByteCursor(cursor.bytes(deltaLength), 'delta encoding');
    const targetLength = body.integer();
    if (targetLength > TARGET_WINDOW_LIMIT) throw new DeltaFormatError(`Target window size ${targetLength} exceeds limit ${TARGET_WINDOW_LIMIT}`);
    total += targetLength;
  }
  return total;
}
