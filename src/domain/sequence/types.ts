/**
 * 8-bit RGB triplet.
 */
export type Rgb = readonly [number, number, number];

/**
 * A colour change at `timeUnits` (ticks of the document refresh rate).
 */
export interface ColorSample {
  timeUnits: number;
  color: Rgb;
  pixelCount: number;
}

/**
 * One constant-colour interval. `durationUnits` is always positive.
 */
export interface Segment {
  durationUnits: number;
  color: Rgb;
  pixelCount: number;
}

/**
 * A segment whose duration fits the 16-bit duration field.
 */
export interface CompiledSegment extends Segment {
  /** Index of the source segment this piece was split from. */
  sourceIndex: number;
}

export interface CompiledSequence {
  readonly pixelCount: number;
  /** Ticks per second recorded in the file header. */
  readonly refreshRate: number;
  readonly segments: readonly CompiledSegment[];
}

export const MAX_SEGMENT_DURATION = 0xffff;
export const MIN_PIXEL_COUNT = 1;
export const MAX_PIXEL_COUNT = 4;
