const MOD_ADLER = 65521;
// largest n such that 255n(n+1)/2 + (n+1)(MOD_ADLER-1) stays below 2^32
const NMAX = 5552;

export function adler32(data: Buffer, seed = 1): number {
  let a = seed & 0xffff;
  let b = (seed >>> 16) & 0xffff;
  let offset = 0;

  while (offset < data.length) {
    const end = Math.min(offset + NMAX, data.length);
    for (; offset < end; offset++) {
      a += data[offset];
      b += a;
    }
    a %= MOD_ADLER;
    b %= MOD_ADLER;
  }

  return ((b << 16) | a) >>> 0;
}
