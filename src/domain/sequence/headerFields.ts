const NOMINAL_BASE = 100;
const LONG_FIRST_SEGMENT_THRESHOLD = 1000;

export interface DerivedHeaderFields {
  /** Header offset 0x16. */
  fieldA: number;
  /** Header offset 0x1E. */
  fieldB: number;
}

/**
 * Derives the two firmware-dependent header scalars from the first segment's
 * duration. These rules are fitted to known-good device files and are not
 * guaranteed outside the duration ranges those files cover.
 */
export function deriveHeaderFields(firstSegmentDuration: number): DerivedHeaderFields {
  const fieldA = Math.floor(firstSegmentDuration / NOMINAL_BASE);
  const remainder = firstSegmentDuration - fieldA * NOMINAL_BASE;
  const fieldB =
    remainder === 0 && firstSegmentDuration >= LONG_FIRST_SEGMENT_THRESHOLD
      ? firstSegmentDuration & 0xffff
      : remainder;
  return { fieldA: fieldA & 0xffff, fieldB };
}
