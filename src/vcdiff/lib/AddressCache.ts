import { DeltaFormatError } from '../../errors.ts';
import { NEAR_CACHE_SIZE, SAME_CACHE_SIZE, VCD_HERE, VCD_SELF } from '../types.ts';
import type { ByteCursor } from './integers.ts';

/**
 * COPY address decoder (RFC 3284 section 5.1)
 *
 * near holds the last NEAR_CACHE_SIZE addresses round robin; same is indexed
 * by address modulo SAME_CACHE_SIZE * 256. Both reset at every window.
 */
export class AddressCache {
  private near: number[] = new Array(NEAR_CACHE_SIZE).fill(0);
  private same: number[] = new Array(SAME_CACHE_SIZE * 256).fill(0);
  private nextSlot = 0;

  reset(): void {
    this.near.fill(0);
    this.same.fill(0);
    this.nextSlot = 0;
  }

  decode(here: number, mode: number, addresses: ByteCursor): number {
    let address: number;
    if (mode === VCD_SELF) {
      address = addresses.integer();
    } else if (mode === VCD_HERE) {
      address = here - addresses.integer();
    } else if (mode - 2 < NEAR_CACHE_SIZE) {
      address = this.near[mode - 2] + addresses.integer();
    } else {
      const slot = mode - (2 + NEAR_CACHE_SIZE);
      if (slot >= SAME_CACHE_SIZE) throw new DeltaFormatError(`Invalid address mode ${mode}`);
      address = this.same[slot * 256 + addresses.byte()];
    }

    if (address < 0 || address >= here) throw new DeltaFormatError(`COPY address ${address} out of range (here ${here})`);
    this.update(address);
    return address;
  }

  private update(address: number): void {
    this.near[this.nextSlot] = address;
    this.nextSlot = (this.nextSlot + 1) % NEAR_CACHE_SIZE;
    this.same[address % (SAME_CACHE_SIZE * 256)] = address;
  }
}
