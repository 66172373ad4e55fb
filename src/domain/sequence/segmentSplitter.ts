import { MAX_SEGMENT_DURATION, type CompiledSegment, type Segment } from '@/domain/sequence/types';

/**
 * Splits segments longer than the 16-bit duration field into consecutive
 * full-width pieces plus a remainder piece. Colour, pixel count and order are kept;
 * the pieces of one segment always sum to its original duration.
 */
export function splitSegments(segments: readonly Segment[]): CompiledSegment[] {
  const compiled: CompiledSegment[] = [];
  segments.forEach((segment, sourceIndex) => {
    for (const duration of splitDuration(segment.durationUnits)) {
      compiled.push({
        durationUnits: duration,
        color: segment.color,
        pixelCount: segment.pixelCount,
        sourceIndex,
      });
    }
  });
  return compiled;
}

export function splitDuration(durationUnits: number, maxDuration = MAX_SEGMENT_DURATION): number[] {
  if (durationUnits <= maxDuration) {
    return [durationUnits];
  }
  const fullPieces = Math.floor(durationUnits / maxDuration);
  const remainder = durationUnits % maxDuration;
  const pieces = new Array<number>(fullPieces).fill(maxDuration);
  if (remainder > 0) {
    pieces.push(remainder);
  }
  return pieces;
}
