import assert from 'node:assert/strict';
import { test } from './testHarness';
import { splitDuration, splitSegments } from '../src/domain/sequence/segmentSplitter';
import type { Segment } from '../src/domain/sequence/types';

const red = [255, 0, 0] as const;
const blue = [0, 0, 255] as const;

test('splitter passes short segments through unchanged', () => {
  const segments: Segment[] = [
    { durationUnits: 100, color: red, pixelCount: 4 },
    { durationUnits: 65535, color: blue, pixelCount: 2 },
  ];
  assert.deepEqual(splitSegments(segments), [
    { durationUnits: 100, color: red, pixelCount: 4, sourceIndex: 0 },
    { durationUnits: 65535, color: blue, pixelCount: 2, sourceIndex: 1 },
  ]);
});

test('splitter breaks 200000 units into three full pieces and a remainder', () => {
  const pieces = splitSegments([{ durationUnits: 200000, color: red, pixelCount: 4 }]);
  assert.deepEqual(
    pieces.map((piece) => piece.durationUnits),
    [65535, 65535, 65535, 3395],
  );
  assert.ok(pieces.every((piece) => piece.color === red && piece.pixelCount === 4 && piece.sourceIndex === 0));
});

test('splitter emits no empty remainder for exact multiples', () => {
  assert.deepEqual(splitDuration(131070), [65535, 65535]);
  assert.deepEqual(splitDuration(65536), [65535, 1]);
});

test('split pieces sum to the source duration and fit the field', () => {
  const durations = [1, 99, 65534, 65535, 65536, 131071, 200000, 1_000_000, 4_294_967_295];
  for (const duration of durations) {
    const pieces = splitDuration(duration);
    assert.equal(pieces.reduce((sum, piece) => sum + piece, 0), duration, `sum for ${duration}`);
    assert.ok(pieces.every((piece) => piece >= 1 && piece <= 65535), `range for ${duration}`);
  }
});

test('splitter keeps source order across split segments', () => {
  const pieces = splitSegments([
    { durationUnits: 70000, color: red, pixelCount: 1 },
    { durationUnits: 10, color: blue, pixelCount: 1 },
  ]);
  assert.deepEqual(
    pieces.map((piece) => [piece.sourceIndex, piece.durationUnits]),
    [
      [0, 65535],
      [0, 4465],
      [1, 10],
    ],
  );
});
