import assert from 'assert';
import { createJsBackend, createStoreBackend, DeltaFormatError, Endpoint, type InputReader, openInput, openOutput, openSource, type SourceReader } from '../../src/index.ts';
import { encodeInteger } from '../../src/vcdiff/lib/integers.ts';
import { adler32, DEFAULT_CODE_TABLE, decodeVcdiff, InstructionType, MAX_TARGET_WINDOW_SIZE, readTargetSize } from '../../src/vcdiff/index.ts';

const HEADER = [0xd6, 0xc3, 0xc4, 0x00, 0x00];

function bytes(...parts: (number[] | string)[]): Buffer {
  return Buffer.concat(parts.map((part) => (typeof part === 'string' ? Buffer.from(part) : Buffer.from(part))));
}

async function encode(source: string, target: string, backend = createJsBackend()): Promise<Buffer> {
  const delta = await backend.diff(Endpoint.fromBuffer(source), Endpoint.fromBuffer(target));
  assert.ok(Buffer.isBuffer(delta));
  return delta;
}

async function decode(source: string, delta: Buffer): Promise<Buffer> {
  const target = await createJsBackend().patch(Endpoint.fromBuffer(source), Endpoint.fromBuffer(delta));
  assert.ok(Buffer.isBuffer(target));
  return target;
}

function pseudoRandom(length: number, seed: number): Buffer {
  const out = Buffer.alloc(length);
  let state = seed;
  for (let i = 0; i < length; i++) {
    state = (Math.imul(state, 1664525) + 1013904223) | 0;
    out[i] = state >>> 24;
  }
  return out;
}

async function expectDecodeFailure(source: string, delta: Buffer, matcher: RegExp): Promise<void> {
  await assert.rejects(decode(source, delta), (err: Error) => {
    assert.ok(err instanceof DeltaFormatError, `expected DeltaFormatError, got ${err.name}`);
    assert.match(err.message, matcher);
    return true;
  });
}

describe('VCDIFF codec', () => {
  describe('integers', () => {
    it('should encode most significant digit first', () => {
      assert.deepEqual(encodeInteger(0), [0x00]);
      assert.deepEqual(encodeInteger(127), [0x7f]);
      assert.deepEqual(encodeInteger(128), [0x81, 0x00]);
      assert.deepEqual(encodeInteger(123456789), [0xba, 0xef, 0x9a, 0x15]);
    });

    it('should reject negative values', () => {
      assert.throws(() => encodeInteger(-1), RangeError);
    });
  });

  describe('default code table', () => {
    it('should have 256 entries', () => {
      assert.equal(DEFAULT_CODE_TABLE.length, 256);
    });

    it('should match the RFC 3284 layout', () => {
      assert.deepEqual(DEFAULT_CODE_TABLE[0][0], { type: InstructionType.RUN, size: 0, mode: 0 });
      assert.deepEqual(DEFAULT_CODE_TABLE[18][0], { type: InstructionType.ADD, size: 17, mode: 0 });
      assert.deepEqual(DEFAULT_CODE_TABLE[19][0], { type: InstructionType.COPY, size: 0, mode: 0 });
      assert.deepEqual(DEFAULT_CODE_TABLE[162][0], { type: InstructionType.COPY, size: 18, mode: 8 });
      assert.deepEqual(DEFAULT_CODE_TABLE[163], [
        { type: InstructionType.ADD, size: 1, mode: 0 },
        { type: InstructionType.COPY, size: 4, mode: 0 },
      ]);
      assert.deepEqual(DEFAULT_CODE_TABLE[235], [
        { type: InstructionType.ADD, size: 1, mode: 0 },
        { type: InstructionType.COPY, size: 4, mode: 6 },
      ]);
      assert.deepEqual(DEFAULT_CODE_TABLE[255], [
        { type: InstructionType.COPY, size: 4, mode: 8 },
        { type: InstructionType.ADD, size: 1, mode: 0 },
      ]);
    });
  });

  describe('adler32', () => {
    it('should checksum known input', () => {
      assert.equal(adler32(Buffer.from('hello world')), 0x1a0b045d);
      assert.equal(adler32(Buffer.alloc(0)), 1);
    });
  });

  describe('encoder', () => {
    it('should copy from the source and add the rest', async () => {
      const delta = await encode('hello', 'hello world');
      const expected = bytes(HEADER, [0x01, 0x05, 0x00, 0x0e], [0x0b, 0x00, 0x06, 0x02, 0x01], ' world', [0x15, 0x07], [0x00]);
      assert.deepEqual(delta, expected);
    });

    it('should emit a sourceless window for an empty source', async () => {
      const delta = await encode('', 'hello world');
      assert.deepEqual(delta, bytes(HEADER, [0x00, 0x11], [0x0b, 0x00, 0x0b, 0x01, 0x00], 'hello world', [0x0c]));
    });

    it('should emit only the header for an empty target', async () => {
      assert.deepEqual(await encode('hello', ''), Buffer.from(HEADER));
    });

    it('should encode runs with a RUN instruction', async () => {
      const delta = await encode('', 'x'.repeat(40));
      assert.deepEqual(delta, bytes(HEADER, [0x00, 0x08], [0x28, 0x00, 0x01, 0x02, 0x00], 'x', [0x00, 0x28]));
      assert.equal((await decode('', delta)).toString(), 'x'.repeat(40));
    });

    it('should ignore the source in the store backend', async () => {
      const delta = await encode('hello', 'hello world', createStoreBackend());
      assert.deepEqual(delta, bytes(HEADER, [0x00, 0x11], [0x0b, 0x00, 0x0b, 0x01, 0x00], 'hello world', [0x0c]));
    });

    it('should split the target into windows', async () => {
      const delta = await encode('', 'hello world', createStoreBackend(4));
      assert.equal(delta.length, 40);
      assert.equal(readTargetSize(delta), 11);
      assert.equal((await decode('', delta)).toString(), 'hello world');
    });

    it('should declare only the referenced span as the source segment', async () => {
      const delta = await encode('hello world', 'world');
      assert.deepEqual(delta, bytes(HEADER, [0x01, 0x05, 0x06, 0x07], [0x05, 0x00, 0x00, 0x01, 0x01], [0x15], [0x00]));
      assert.equal((await decode('hello world', delta)).toString(), 'world');
    });

    it('should read one segment per window when patching', async () => {
      const source = Buffer.alloc(1024);
      for (let i = 0; i < 512; i++) source.writeUInt16BE(i, i * 2);
      const delta = await createJsBackend({ windowSize: 256 }).diff(Endpoint.fromBuffer(source), Endpoint.fromBuffer(source));
      assert.ok(Buffer.isBuffer(delta));

      const reader = await openSource(Endpoint.fromBuffer(source));
      const reads: number[] = [];
      const counting: SourceReader = {
        size: reader.size,
        read: (position, length) => {
          reads.push(length);
          return reader.read(position, length);
        },
      };
      const sink = openOutput(undefined);
      await decodeVcdiff(counting, openInput(Endpoint.fromBuffer(delta)), sink);
      assert.deepEqual(reads, [256, 256, 256, 256]);
      assert.deepEqual(sink.finish(), source);
    });

    it('should match against a source larger than 16M positions', async () => {
      const source = pseudoRandom(18 * 1024 * 1024, 7);
      const target = Buffer.concat([source.subarray(0, 1000), Buffer.from('x')]);
      const delta = await createJsBackend().diff(Endpoint.fromBuffer(source), Endpoint.fromBuffer(target));
      assert.ok(Buffer.isBuffer(delta));
      assert.ok(delta.length < 64, `delta is ${delta.length} bytes`);

      const patched = await createJsBackend().patch(Endpoint.fromBuffer(source), Endpoint.fromBuffer(delta));
      assert.deepEqual(patched, target);
    });

    it('should reject a window size above the target window limit', async () => {
      await assert.rejects(createJsBackend({ windowSize: MAX_TARGET_WINDOW_SIZE + 1 }).diff(Endpoint.fromBuffer('a'), Endpoint.fromBuffer('b')), RangeError);
    });
  });

  describe('decoder', () => {
    it('should round trip the encoder output', async () => {
      assert.equal((await decode('hello', await encode('hello', 'hello world'))).toString(), 'hello world');
    });

    it('should decode every address mode and paired opcodes', async () => {
      const delta = bytes(HEADER, [0x01, 0x08, 0x00, 0x10], [0x15, 0x00, 0x01, 0x05, 0x05], 'Z', [0x14, 0x24, 0x34, 0x74, 0xa3], [0x00, 0x04, 0x04, 0x04, 0x00]);
      assert.equal((await decode('abcdefgh', delta)).toString(), 'abcdabcdefghefghZabcd');
    });

    it('should decode overlapping copies within the target window', async () => {
      const delta = bytes(HEADER, [0x00, 0x09], [0x06, 0x00, 0x01, 0x02, 0x01], 'a', [0x02, 0x15], [0x00]);
      assert.equal((await decode('', delta)).toString(), 'aaaaaa');
    });

    it('should skip an application header', async () => {
      const delta = bytes([0xd6, 0xc3, 0xc4, 0x00, 0x04, 0x03], 'abc', [0x00, 0x11], [0x0b, 0x00, 0x0b, 0x01, 0x00], 'hello world', [0x0c]);
      assert.equal((await decode('', delta)).toString(), 'hello world');
    });

    it('should verify the window checksum', async () => {
      const delta = bytes(HEADER, [0x04, 0x15], [0x0b, 0x00, 0x0b, 0x01, 0x00], [0x1a, 0x0b, 0x04, 0x5d], 'hello world', [0x0c]);
      assert.equal((await decode('', delta)).toString(), 'hello world');
    });

    it('should reject a checksum mismatch', async () => {
      const delta = bytes(HEADER, [0x04, 0x15], [0x0b, 0x00, 0x0b, 0x01, 0x00], [0x00, 0x00, 0x00, 0x00], 'hello world', [0x0c]);
      await expectDecodeFailure('', delta, /checksum mismatch/);
    });

    it('should reject invalid magic bytes', async () => {
      await expectDecodeFailure('', Buffer.from('not a delta'), /Invalid VCDIFF magic bytes/);
    });

    it('should reject a truncated header', async () => {
      await expectDecodeFailure('', Buffer.from([0xd6, 0xc3, 0xc4]), /Truncated delta/);
    });

    it('should reject a truncated window', async () => {
      const delta = bytes(HEADER, [0x00, 0x11], [0x0b, 0x00, 0x0b, 0x01, 0x00], 'hello');
      await expectDecodeFailure('', delta, /Truncated delta/);
    });

    it('should reject secondary compression', async () => {
      await expectDecodeFailure('', Buffer.from([0xd6, 0xc3, 0xc4, 0x00, 0x01, 0x02]), /Secondary compression is not supported/);
    });

    it('should reject VCD_TARGET windows', async () => {
      await expectDecodeFailure('', bytes(HEADER, [0x02, 0x00, 0x00, 0x00]), /VCD_TARGET windows are not supported/);
    });

    it('should reject a source segment beyond the source', async () => {
      const delta = bytes(HEADER, [0x01, 0x0a, 0x00, 0x0e], [0x0b, 0x00, 0x06, 0x02, 0x01], ' world', [0x15, 0x07], [0x00]);
      await expectDecodeFailure('hello', delta, /exceeds source size 5/);
    });

    it('should reject a copy from beyond the current position', async () => {
      const delta = bytes(HEADER, [0x00, 0x07], [0x04, 0x00, 0x00, 0x01, 0x01], [0x14], [0x00]);
      await expectDecodeFailure('', delta, /COPY address 0 out of range/);
    });

    it('should reject a target window above the limit before allocating it', async () => {
      const delta = bytes(HEADER, [0x00, 0x0a], [0x82, 0x80, 0x80, 0x80, 0x80, 0x00, 0x00, 0x00, 0x00, 0x00]);
      await expectDecodeFailure('', delta, /Target window size 68719476736 exceeds limit 67108864/);
      assert.throws(() => readTargetSize(delta), /Target window size 68719476736 exceeds limit/);
    });

    it('should decode a large window delivered in small chunks', async () => {
      const target = Buffer.alloc(4 * 1024 * 1024);
      for (let i = 0; i < target.length; i++) target[i] = i & 0xff;
      const delta = await createStoreBackend(target.length).diff(Endpoint.fromBuffer(''), Endpoint.fromBuffer(target));
      assert.ok(Buffer.isBuffer(delta));

      let offset = 0;
      const input: InputReader = {
        next: async () => {
          if (offset >= delta.length) return null;
          const chunk = delta.subarray(offset, offset + 16);
          offset += chunk.length;
          return chunk;
        },
      };
      const sink = openOutput(undefined);
      await decodeVcdiff(await openSource(Endpoint.fromBuffer('')), input, sink);
      assert.deepEqual(sink.finish(), target);
    });
  });
});
