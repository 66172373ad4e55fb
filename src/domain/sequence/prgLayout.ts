/**
 * Byte layout of the `.prg` program format. Values come from known-good device
 * files; every constant here must be reproduced exactly.
 */

export const SIGNATURE_MAGIC = Buffer.from([0x50, 0x52, 0x03, 0x49, 0x4e, 0x05, 0x00, 0x00]);
export const SIGNATURE_CONST = Buffer.from([0x00, 0x08]);
/** "PI" */
export const SIGNATURE_TRAILER = Buffer.from([0x50, 0x49]);

export const SIGNATURE_HEADER_SIZE = 16;
export const VARIABLE_HEADER_SIZE = 16;
export const HEADER_SIZE = SIGNATURE_HEADER_SIZE + VARIABLE_HEADER_SIZE;

export const HEADER_OFFSETS = {
  pixelCount: 0x08,
  refreshRate: 0x0c,
  segmentTableLength: 0x10,
  segmentCount: 0x14,
  fieldA: 0x16,
  rgbRepetitions: 0x18,
  colorDataStart: 0x1a,
  fieldB: 0x1e,
} as const;

export const DESCRIPTOR_SIZE = 19;
/** Extra bytes counted by the segment-table length field on top of the descriptors. */
export const SEGMENT_TABLE_BIAS = 2;

export const DESCRIPTOR_OFFSETS = {
  pixelCount: 0x00,
  marker: 0x02,
  duration: 0x05,
  linkMarker: 0x09,
  linkDuration: 0x0b,
  nextBlockOffset: 0x0d,
  nextDurationHint: 0x11,
  colorIntroTag: 0x09,
  colorIntroPart1: 0x0b,
  colorIntroPart2: 0x0f,
} as const;

export const DESCRIPTOR_MARKER = Buffer.from([0x01, 0x00, 0x00]);
/** "CD" opens the terminal descriptor's colour intro. */
export const COLOR_INTRO_TAG = Buffer.from([0x43, 0x44]);
export const COLOR_INTRO_BIAS = 4;

export const RGB_REPETITIONS = 100;
export const COLOR_BLOCK_SIZE = RGB_REPETITIONS * 3;

export const SENTINEL = 0x42;
/** Sentinel + "T" + four zero bytes. */
export const FOOTER = Buffer.from([SENTINEL, 0x54, 0x00, 0x00, 0x00, 0x00]);

export const DEFAULT_PRG_REFRESH_RATE = 1000;

export function segmentTableLength(segmentCount: number): number {
  return SEGMENT_TABLE_BIAS + DESCRIPTOR_SIZE * segmentCount;
}

export function colorDataStart(segmentCount: number): number {
  return HEADER_SIZE + DESCRIPTOR_SIZE * segmentCount;
}

export function encodedLength(segmentCount: number): number {
  return colorDataStart(segmentCount) + COLOR_BLOCK_SIZE * segmentCount + FOOTER.length;
}
