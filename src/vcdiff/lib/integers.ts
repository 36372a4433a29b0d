/**
 * VCDIFF integer encoding: base 128, most significant digit first, bit 7 set
 * on every byte but the last.
 */

import { DeltaFormatError } from '../../errors.ts';

// Values beyond this are not representable exactly and no sane delta needs them
const MAX_INTEGER = 2 ** 48;

export function encodeInteger(value: number): number[] {
  if (!Number.isInteger(value) || value < 0 || value > MAX_INTEGER) throw new RangeError(`Cannot encode integer ${value}`);
  const digits = [value % 128];
  let rest = Math.floor(value / 128);
  while (rest > 0) {
    digits.unshift((rest % 128) | 0x80);
    rest = Math.floor(rest / 128);
  }
  return digits;
}

/**
 * Growable byte array for building window sections
 */
export class ByteBuilder {
  private buffer: Buffer;
  length = 0;

  constructor(initialSize = 256) {
    this.buffer = Buffer.allocUnsafe(initialSize);
  }

  private reserve(extra: number): void {
    if (this.length + extra <= this.buffer.length) return;
    let size = this.buffer.length * 2;
    while (size < this.length + extra) size *= 2;
    const next = Buffer.allocUnsafe(size);
    this.buffer.copy(next, 0, 0, this.length);
    this.buffer = next;
  }

  byte(value: number): void {
    this.reserve(1);
    this.buffer[this.length++] = value;
  }

  integer(value: number): void {
    const digits = encodeInteger(value);
    for (let i = 0; i < digits.length; i++) this.byte(digits[i]);
  }

  bytes(data: Buffer, start = 0, end = data.length): void {
    this.reserve(end - start);
    data.copy(this.buffer, this.length, start, end);
    this.length += end - start;
  }

  toBuffer(): Buffer {
    return this.buffer.subarray(0, this.length);
  }
}

/**
 * Bounds-checked reader over one fully buffered section
 */
export class ByteCursor {
  readonly data: Buffer;
  position: number;
  readonly end: number;
  private readonly label: string;

  constructor(data: Buffer, label: string, start = 0, end = data.length) {
    this.data = data;
    this.position = start;
    this.end = end;
    this.label = label;
  }

  get remaining(): number {
    return this.end - this.position;
  }

  byte(): number {
    if (this.position >= this.end) throw new DeltaFormatError(`Truncated ${this.label}`);
    return this.data[this.position++];
  }

  integer(): number {
    let value = 0;
    for (;;) {
      const digit = this.byte();
      value = value * 128 + (digit & 0x7f);
      if (value > MAX_INTEGER) throw new DeltaFormatError(`Integer overflow in ${this.label}`);
      if ((digit & 0x80) === 0) return value;
    }
  }

  bytes(length: number): Buffer {
    if (length > this.remaining) throw new DeltaFormatError(`Truncated ${this.label}`);
    const slice = this.data.subarray(this.position, this.position + length);
    this.position += length;
    return slice;
  }
}
