/**
 * Pure TypeScript VCDIFF (RFC 3284) codec used by the bundled backends
 */

export { decodeVcdiff, decodeWindow, readTargetSize, type WindowHeader } from './VcdiffDecoder.ts';
export { DEFAULT_WINDOW_SIZE, type EncoderOptions, encodeHeader, encodeVcdiff, encodeWindow } from './VcdiffEncoder.ts';
export { adler32 } from './lib/adler32.ts';
export * from './types.ts';
