/**
 * First occurrence of every 4-byte prefix in the source
 *
 * Open addressing over a Uint32Array holding position + 1 (0 marks an empty
 * slot). Keys are compared against the source itself, so a hit is always an
 * exact prefix match. The table is sized for the source but capped; once it
 * is half full, later prefixes are simply not indexed and the encoder falls
 * back to literal data for them.
 */

export const KEY_SIZE = 4;

const MIN_BITS = 4;
const MAX_BITS = 23;

export class SourceIndex {
  private readonly source: Buffer;
  private readonly slots: Uint32Array;
  private readonly mask: number;
  private readonly shift: number;
  private readonly limit: number;
  private size = 0;

  constructor(source: Buffer) {
    this.source = source;
    const positions = Math.max(0, source.length - KEY_SIZE + 1);

    let bits = MIN_BITS;
    while (bits < MAX_BITS && 1 << bits < positions * 2) bits++;
    this.slots = new Uint32Array(1 << bits);
    this.mask = (1 << bits) - 1;
    this.shift = 32 - bits;
    this.limit = 1 << (bits - 1);

    for (let i = 0; i < positions && this.size < this.limit; i++) this.insert(i);
  }

  private slotFor(key: number): number {
    return Math.imul(key, 0x9e3779b1) >>> this.shift;
  }

  private insert(position: number): void {
    const key = this.source.readUInt32BE(position);
    let slot = this.slotFor(key);
    while (this.slots[slot] !== 0) {
      if (this.source.readUInt32BE(this.slots[slot] - 1) === key) return;
      slot = (slot + 1) & this.mask;
    }
    this.slots[slot] = position + 1;
    this.size++;
  }

  /** Earliest indexed source position starting with `key`, or -1 */
  find(key: number): number {
    let slot = this.slotFor(key);
    while (this.slots[slot] !== 0) {
      const position = this.slots[slot] - 1;
      if (this.source.readUInt32BE(position) === key) return position;
      slot = (slot + 1) & this.mask;
    }
    return -1;
  }
}
