import assert from 'node:assert/strict';
import { test } from './testHarness';
import { readHexFixture } from './support/hex';
import { decodeProgram } from './support/prgDecoder';
import { ValidationError } from '../src/domain/errors';
import { encodeSequence } from '../src/domain/sequence/sequenceCodec';
import type { CompiledSegment, CompiledSequence, Rgb } from '../src/domain/sequence/types';

function segment(durationUnits: number, color: Rgb, pixelCount = 4, sourceIndex = 0): CompiledSegment {
  return { durationUnits, color, pixelCount, sourceIndex };
}

function sequence(segments: CompiledSegment[], pixelCount = 4, refreshRate = 1): CompiledSequence {
  return { pixelCount, refreshRate, segments };
}

function assertValidation(fn: () => unknown, code: string): void {
  assert.throws(fn, (error: unknown) => error instanceof ValidationError && error.code === code);
}

test('codec reproduces the single red segment reference file', () => {
  const encoded = encodeSequence(sequence([segment(100, [255, 0, 0])]));
  assert.equal(encoded.length, 357);
  assert.deepEqual(encoded, readHexFixture('4px-red-100.hex'));
});

test('codec reproduces the red/green/blue reference file', () => {
  const encoded = encodeSequence(
    sequence([segment(100, [255, 0, 0], 4, 0), segment(100, [0, 255, 0], 4, 1), segment(100, [0, 0, 255], 4, 2)]),
  );
  assert.equal(encoded.length, 995);
  assert.deepEqual(encoded, readHexFixture('4px-rgb-100.hex'));
});

test('codec writes the pixel count big-endian and the refresh rate little-endian', () => {
  const encoded = encodeSequence(sequence([segment(10, [1, 2, 3])], 3, 1000));
  assert.deepEqual([...encoded.subarray(0x08, 0x0a)], [0x00, 0x03]);
  assert.deepEqual([...encoded.subarray(0x0c, 0x0e)], [0xe8, 0x03]);
});

test('encoded length is 32 + 319 per segment + 6', () => {
  for (const count of [1, 2, 5, 17]) {
    const segments = Array.from({ length: count }, (_, index) => segment(50 + index, [index, 0, 0], 2, index));
    assert.equal(encodeSequence(sequence(segments, 2)).length, 32 + 19 * count + 300 * count + 6, `n=${count}`);
  }
});

test('the byte after the colour region is the sentinel', () => {
  for (const count of [1, 3, 8]) {
    const segments = Array.from({ length: count }, (_, index) => segment(200, [9, 9, 9], 1, index));
    const encoded = encodeSequence(sequence(segments, 1));
    assert.equal(encoded[32 + 19 * count + 300 * count], 0x42, `n=${count}`);
    assert.deepEqual([...encoded.subarray(encoded.length - 6)], [0x42, 0x54, 0, 0, 0, 0]);
  }
});

test('encoding is deterministic', () => {
  const input = sequence([segment(120, [10, 20, 30]), segment(80, [40, 50, 60], 4, 1)]);
  assert.deepEqual(encodeSequence(input), encodeSequence(input));
});

test('descriptors link to the following colour block and carry duration hints', () => {
  const encoded = encodeSequence(
    sequence([segment(150, [1, 1, 1], 4, 0), segment(150, [2, 2, 2], 4, 1), segment(40, [3, 3, 3], 4, 2), segment(300, [4, 4, 4], 4, 3)]),
  );
  const colorStart = 32 + 19 * 4;
  const descriptor = (index: number) => 32 + 19 * index;
  // link marker: 1, then duration when repeated, else index + 1
  assert.equal(encoded.readUInt16LE(descriptor(0) + 9), 1);
  assert.equal(encoded.readUInt16LE(descriptor(1) + 9), 150);
  assert.equal(encoded.readUInt16LE(descriptor(2) + 9), 3);
  assert.equal(encoded.readUInt16LE(descriptor(0) + 13), colorStart + 300);
  assert.equal(encoded.readUInt16LE(descriptor(2) + 13), colorStart + 900);
  // next-duration hints: 150 -> 150, 40 -> 40 (below 100), 300 -> 300
  assert.equal(encoded.readUInt16LE(descriptor(0) + 17), 150);
  assert.equal(encoded.readUInt16LE(descriptor(1) + 17), 40);
  assert.equal(encoded.readUInt16LE(descriptor(2) + 17), 300);
  // terminal colour intro
  assert.equal(encoded.toString('ascii', descriptor(3) + 9, descriptor(3) + 11), 'CD');
  assert.equal(encoded.readUInt16LE(descriptor(3) + 11), 1204);
  assert.equal(encoded.readUInt16LE(descriptor(3) + 15), 400);
});

test('decoded programs return the encoded segments', () => {
  const input = sequence(
    [segment(65535, [255, 128, 0], 2, 0), segment(3395, [255, 128, 0], 2, 0), segment(700, [0, 0, 1], 3, 1)],
    2,
    1000,
  );
  const decoded = decodeProgram(encodeSequence(input));
  assert.equal(decoded.pixelCount, 2);
  assert.equal(decoded.refreshRate, 1000);
  assert.equal(decoded.segmentTableLength, 2 + 19 * 3);
  assert.equal(decoded.fieldA, 655);
  assert.equal(decoded.fieldB, 35);
  assert.equal(decoded.sentinel, 0x42);
  assert.deepEqual(decoded.segments, [
    { pixelCount: 2, durationUnits: 65535, color: [255, 128, 0] },
    { pixelCount: 2, durationUnits: 3395, color: [255, 128, 0] },
    { pixelCount: 3, durationUnits: 700, color: [0, 0, 1] },
  ]);
});

test('codec rejects invalid sequences before writing', () => {
  assertValidation(() => encodeSequence(sequence([segment(100, [1, 2, 3])], 0)), 'invalid-pixel-count');
  assertValidation(() => encodeSequence(sequence([segment(100, [1, 2, 3])], 5)), 'invalid-pixel-count');
  assertValidation(() => encodeSequence(sequence([])), 'empty-sequence');
  assertValidation(() => encodeSequence(sequence([segment(0, [1, 2, 3])])), 'invalid-duration');
  assertValidation(() => encodeSequence(sequence([segment(65536, [1, 2, 3])])), 'invalid-duration');
  assertValidation(() => encodeSequence(sequence([segment(10, [256, 0, 0])])), 'invalid-color');
  assertValidation(() => encodeSequence(sequence([segment(10, [1, 2, 3], 7)])), 'invalid-pixel-count');
  assertValidation(() => encodeSequence(sequence([segment(10, [1, 2, 3])], 4, 0)), 'invalid-refresh-rate');
});
