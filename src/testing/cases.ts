/**
 * Shared round-trip corpus
 *
 * Each case is diffed and patched by every backend in every argument
 * combination. Large cases cross the default window size so multi-window
 * deltas are exercised.
 */

export interface TestCase {
  readonly source: Buffer;
  readonly target: Buffer;
  readonly label: string;
}

function pseudoRandom(length: number, seed: number): Buffer {
  const out = Buffer.alloc(length);
  let state = seed >>> 0;
  for (let i = 0; i < length; i++) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    out[i] = state >>> 24;
  }
  return out;
}

function numberedLines(count: number, edit?: (line: number) => string | null): Buffer {
  const lines: string[] = [];
  for (let i = 0; i < count; i++) {
    const line = edit ? edit(i) : `${i}: the quick brown fox jumps over the lazy dog`;
    if (line !== null) lines.push(line);
  }
  return Buffer.from(`${lines.join('\n')}\n`);
}

function spliced(base: Buffer, start: number, deleteCount: number, insert: Buffer): Buffer {
  return Buffer.concat([base.subarray(0, start), insert, base.subarray(start + deleteCount)]);
}

function buildCases(): TestCase[] {
  const random = pseudoRandom(96 * 1024, 0x5eed);
  const lines = numberedLines(7000);

  const cases: TestCase[] = [
    { source: Buffer.from('hello'), target: Buffer.from('hello world'), label: 'hello to hello world' },
    { source: Buffer.alloc(0), target: Buffer.from('hello world'), label: 'empty source' },
    { source: Buffer.from('hello world'), target: Buffer.alloc(0), label: 'empty target' },
    { source: Buffer.alloc(0), target: Buffer.alloc(0), label: 'empty source and target' },
    { source: Buffer.from('same bytes on both sides'), target: Buffer.from('same bytes on both sides'), label: 'identical' },
    { source: Buffer.from([0, 1, 2, 0, 0, 0, 255, 254, 0, 0, 13, 10]), target: Buffer.from([0, 0, 0, 255, 254, 0, 1, 2, 0, 0, 0, 0, 0, 0, 0, 0, 0, 7]), label: 'binary with NUL bytes' },
    { source: Buffer.from('abc'), target: Buffer.alloc(4096, 0x78), label: 'long run' },
    { source: random, target: spliced(random, 40000, 512, pseudoRandom(700, 7)), label: 'random bytes with replaced block' },
    {
      source: lines,
      target: numberedLines(7000, (i) => (i % 250 === 0 ? null : i % 97 === 0 ? `${i}: edited line` : `${i}: the quick brown fox jumps over the lazy dog`)),
      label: 'multi-window text with edits',
    },
  ];
  return cases;
}

export const testCases: readonly TestCase[] = buildCases();
