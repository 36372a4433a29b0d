/**
 * VCDIFF Types and Constants
 *
 * Header/window indicator bits and the default instruction code table from
 * RFC 3284, plus the two extensions xdelta3 writes (application header and
 * per-window Adler-32 checksum).
 */

export const VCDIFF_MAGIC = [0xd6, 0xc3, 0xc4];
export const VCDIFF_VERSION = 0x00;

// Hdr_Indicator
export const VCD_DECOMPRESS = 0x01;
export const VCD_CODETABLE = 0x02;
export const VCD_APPHEADER = 0x04;

// Win_Indicator
export const VCD_SOURCE = 0x01;
export const VCD_TARGET = 0x02;
export const VCD_ADLER32 = 0x04;

// Address cache sizes for the default code table
export const NEAR_CACHE_SIZE = 4;
export const SAME_CACHE_SIZE = 3;

export const VCD_SELF = 0;
export const VCD_HERE = 1;

// Largest target window accepted by the decoder or produced by the encoder
// (open-vcdiff's default limit; xdelta3 never writes windows above 16 MiB)
export const MAX_TARGET_WINDOW_SIZE = 64 * 1024 * 1024;

export enum InstructionType {
  NOOP = 0,
  ADD = 1,
  RUN = 2,
  COPY = 3,
}

export interface Instruction {
  type: InstructionType;
  /** 0 means the size follows in the instruction section as an integer */
  size: number;
  mode: number;
}

export type CodeTableEntry = [Instruction, Instruction];

const NOOP: Instruction = { type: InstructionType.NOOP, size: 0, mode: 0 };

function single(type: InstructionType, size: number, mode = 0): CodeTableEntry {
  return [{ type, size, mode }, NOOP];
}

function pair(first: Instruction, second: Instruction): CodeTableEntry {
  return [first, second];
}

/**
 * Build the 256-entry default code table (RFC 3284 section 5.6)
 */
export function buildDefaultCodeTable(): CodeTableEntry[] {
  const table: CodeTableEntry[] = [];
  const modes = 2 + NEAR_CACHE_SIZE + SAME_CACHE_SIZE; // 9

  table.push(single(InstructionType.RUN, 0));

  // ADD sizes 0, 1..17
  for (let size = 0; size <= 17; size++) table.push(single(InstructionType.ADD, size));

  // COPY sizes 0, 4..18 for every mode
  for (let mode = 0; mode < modes; mode++) {
    table.push(single(InstructionType.COPY, 0, mode));
    for (let size = 4; size <= 18; size++) table.push(single(InstructionType.COPY, size, mode));
  }

  // ADD 1..4 + COPY 4..6 (near modes), ADD 1..4 + COPY 4 (same modes)
  for (let mode = 0; mode < modes; mode++) {
    const copySizes = mode < 2 + NEAR_CACHE_SIZE ? [4, 5, 6] : [4];
    for (let addSize = 1; addSize <= 4; addSize++) {
      for (let i = 0; i < copySizes.length; i++) {
        table.push(pair({ type: InstructionType.ADD, size: addSize, mode: 0 }, { type: InstructionType.COPY, size: copySizes[i], mode }));
      }
    }
  }

  // COPY 4 + ADD 1
  for (let mode = 0; mode < modes; mode++) {
    table.push(pair({ type: InstructionType.COPY, size: 4, mode }, { type: InstructionType.ADD, size: 1, mode: 0 }));
  }

  return table;
}

export const DEFAULT_CODE_TABLE = buildDefaultCodeTable();

// Opcode helpers for the single-instruction entries the encoder emits
export const OP_RUN = 0;

export function addOpcode(size: number): number {
  return size >= 1 && size <= 17 ? 1 + size : 1;
}

export function copyOpcode(size: number, mode: number): number {
  const base = 19 + mode * 16;
  return size >= 4 && size <= 18 ? base + size - 3 : base;
}
