import { ValidationError } from '@/domain/errors';
import { deriveHeaderFields } from '@/domain/sequence/headerFields';
import {
  COLOR_BLOCK_SIZE,
  COLOR_INTRO_BIAS,
  COLOR_INTRO_TAG,
  DESCRIPTOR_MARKER,
  DESCRIPTOR_OFFSETS,
  DESCRIPTOR_SIZE,
  FOOTER,
  HEADER_OFFSETS,
  HEADER_SIZE,
  RGB_REPETITIONS,
  SIGNATURE_CONST,
  SIGNATURE_MAGIC,
  SIGNATURE_TRAILER,
  colorDataStart,
  encodedLength,
  segmentTableLength,
} from '@/domain/sequence/prgLayout';
import {
  MAX_PIXEL_COUNT,
  MAX_SEGMENT_DURATION,
  MIN_PIXEL_COUNT,
  type CompiledSegment,
  type CompiledSequence,
  type Rgb,
} from '@/domain/sequence/types';

/**
 * Serializes a compiled sequence into the device `.prg` layout.
 * Pure and deterministic; throws `ValidationError` before allocating output.
 */
export function encodeSequence(sequence: CompiledSequence): Buffer {
  validateCompiledSequence(sequence);

  const { segments } = sequence;
  const count = segments.length;
  const buffer = Buffer.alloc(encodedLength(count));

  writeHeader(buffer, sequence);

  for (let index = 0; index < count; index += 1) {
    writeDescriptor(buffer, HEADER_SIZE + index * DESCRIPTOR_SIZE, segments, index);
  }

  const colorStart = colorDataStart(count);
  segments.forEach((segment, index) => {
    writeColorBlock(buffer, colorStart + index * COLOR_BLOCK_SIZE, segment.color);
  });

  FOOTER.copy(buffer, colorStart + count * COLOR_BLOCK_SIZE);
  return buffer;
}

export function validateCompiledSequence(sequence: CompiledSequence): void {
  if (!isPixelCount(sequence.pixelCount)) {
    throw new ValidationError('invalid-pixel-count', `pixel count must be ${MIN_PIXEL_COUNT}..${MAX_PIXEL_COUNT}`, {
      pixelCount: sequence.pixelCount,
    });
  }
  if (!Number.isInteger(sequence.refreshRate) || sequence.refreshRate < 1 || sequence.refreshRate > 0xffff) {
    throw new ValidationError('invalid-refresh-rate', 'refresh rate must fit an unsigned 16-bit field', {
      refreshRate: sequence.refreshRate,
    });
  }
  if (sequence.segments.length === 0) {
    throw new ValidationError('empty-sequence', 'sequence has no segments');
  }
  if (sequence.segments.length > 0xffff) {
    throw new ValidationError('invalid-document', 'too many segments for the segment count field', {
      segments: sequence.segments.length,
    });
  }
  sequence.segments.forEach((segment, index) => {
    const duration = segment.durationUnits;
    if (!Number.isInteger(duration) || duration < 1 || duration > MAX_SEGMENT_DURATION) {
      throw new ValidationError('invalid-duration', 'segment duration must be 1..65535 units', {
        index,
        duration,
      });
    }
    if (!isPixelCount(segment.pixelCount)) {
      throw new ValidationError('invalid-pixel-count', 'segment pixel count out of range', {
        index,
        pixelCount: segment.pixelCount,
      });
    }
    if (!isRgb(segment.color)) {
      throw new ValidationError('invalid-color', 'segment colour must be three integers 0..255', {
        index,
        color: segment.color,
      });
    }
  });
}

function writeHeader(buffer: Buffer, sequence: CompiledSequence): void {
  const count = sequence.segments.length;
  const { fieldA, fieldB } = deriveHeaderFields(sequence.segments[0].durationUnits);

  SIGNATURE_MAGIC.copy(buffer, 0);
  // Big-endian, unlike every other field in the file.
  buffer.writeUInt16BE(sequence.pixelCount, HEADER_OFFSETS.pixelCount);
  SIGNATURE_CONST.copy(buffer, HEADER_OFFSETS.pixelCount + 2);
  buffer.writeUInt16LE(sequence.refreshRate, HEADER_OFFSETS.refreshRate);
  SIGNATURE_TRAILER.copy(buffer, HEADER_OFFSETS.refreshRate + 2);

  buffer.writeUInt32LE(segmentTableLength(count), HEADER_OFFSETS.segmentTableLength);
  buffer.writeUInt16LE(count, HEADER_OFFSETS.segmentCount);
  buffer.writeUInt16LE(fieldA, HEADER_OFFSETS.fieldA);
  buffer.writeUInt16LE(RGB_REPETITIONS, HEADER_OFFSETS.rgbRepetitions);
  buffer.writeUInt16LE(colorDataStart(count) & 0xffff, HEADER_OFFSETS.colorDataStart);
  buffer.writeUInt16LE(fieldB, HEADER_OFFSETS.fieldB);
}

function writeDescriptor(
  buffer: Buffer,
  offset: number,
  segments: readonly CompiledSegment[],
  index: number,
): void {
  const segment = segments[index];
  const count = segments.length;

  buffer.writeUInt16LE(segment.pixelCount, offset + DESCRIPTOR_OFFSETS.pixelCount);
  DESCRIPTOR_MARKER.copy(buffer, offset + DESCRIPTOR_OFFSETS.marker);
  buffer.writeUInt16LE(segment.durationUnits, offset + DESCRIPTOR_OFFSETS.duration);

  if (index === count - 1) {
    COLOR_INTRO_TAG.copy(buffer, offset + DESCRIPTOR_OFFSETS.colorIntroTag);
    const intro = colorIntroParts(count);
    buffer.writeUInt16LE(intro.part1, offset + DESCRIPTOR_OFFSETS.colorIntroPart1);
    buffer.writeUInt16LE(intro.part2, offset + DESCRIPTOR_OFFSETS.colorIntroPart2);
    return;
  }

  const next = segments[index + 1];
  const previous = index > 0 ? segments[index - 1] : undefined;
  buffer.writeUInt16LE(linkMarker(segment, previous, index), offset + DESCRIPTOR_OFFSETS.linkMarker);
  buffer.writeUInt16LE(segment.durationUnits, offset + DESCRIPTOR_OFFSETS.linkDuration);
  buffer.writeUInt16LE(nextColorBlockOffset(index + 1, count), offset + DESCRIPTOR_OFFSETS.nextBlockOffset);
  buffer.writeUInt16LE(
    nextDurationHint(segment.durationUnits, next.durationUnits),
    offset + DESCRIPTOR_OFFSETS.nextDurationHint,
  );
}

function writeColorBlock(buffer: Buffer, offset: number, color: Rgb): void {
  for (let i = 0; i < RGB_REPETITIONS; i += 1) {
    const base = offset + i * 3;
    buffer[base] = color[0];
    buffer[base + 1] = color[1];
    buffer[base + 2] = color[2];
  }
}

/**
 * File offset of colour block `target`, truncated to 16 bits.
 */
export function nextColorBlockOffset(target: number, segmentCount: number): number {
  return (colorDataStart(segmentCount) + target * COLOR_BLOCK_SIZE) & 0xffff;
}

export function colorIntroParts(segmentCount: number): { part1: number; part2: number } {
  return {
    part1: (segmentCount * COLOR_BLOCK_SIZE + COLOR_INTRO_BIAS) & 0xffff,
    part2: (segmentCount * RGB_REPETITIONS) & 0xffff,
  };
}

function linkMarker(segment: CompiledSegment, previous: CompiledSegment | undefined, index: number): number {
  if (!previous) {
    return 1;
  }
  return segment.durationUnits === previous.durationUnits ? segment.durationUnits : index + 1;
}

export function nextDurationHint(current: number, next: number): number {
  if (next < 100) {
    return next;
  }
  if (next === 100) {
    return 0;
  }
  return current === 100 ? 0 : next;
}

function isPixelCount(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_PIXEL_COUNT && value <= MAX_PIXEL_COUNT;
}

function isRgb(color: Rgb): boolean {
  return color.length === 3 && color.every((c) => Number.isInteger(c) && c >= 0 && c <= 255);
}
