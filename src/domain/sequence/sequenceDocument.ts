import { ValidationError } from '@/domain/errors';
import { splitSegments } from '@/domain/sequence/segmentSplitter';
import {
  MAX_PIXEL_COUNT,
  MIN_PIXEL_COUNT,
  type ColorSample,
  type CompiledSequence,
  type Rgb,
  type Segment,
} from '@/domain/sequence/types';
import { DEFAULT_PRG_REFRESH_RATE } from '@/domain/sequence/prgLayout';

const DEFAULT_DOCUMENT_PIXELS = 1;
const DEFAULT_DOCUMENT_REFRESH_RATE = 100;

/**
 * Validated form of the JSON sequence document shared with the editing tools:
 * `{ pixels, refresh_rate, end_time, sequence: { "<time>": { color, pixels? } } }`.
 */
export interface SequenceDocument {
  pixelCount: number;
  refreshRate: number;
  endTime: number;
  samples: ColorSample[];
}

export interface CompileOptions {
  /** Tick rate written to the program header; document times are rescaled to it. */
  prgRefreshRate?: number;
}

export function parseSequenceDocument(raw: unknown): SequenceDocument {
  if (!isRecord(raw)) {
    throw new ValidationError('invalid-document', 'sequence document must be a JSON object');
  }

  const pixelCount = readPixelCount(raw.pixels ?? raw.default_pixels, DEFAULT_DOCUMENT_PIXELS, 'pixels');
  const refreshRate = raw.refresh_rate ?? DEFAULT_DOCUMENT_REFRESH_RATE;
  if (typeof refreshRate !== 'number' || !Number.isInteger(refreshRate) || refreshRate <= 0) {
    throw new ValidationError('invalid-refresh-rate', 'refresh_rate must be a positive integer', { refreshRate });
  }
  if (typeof raw.end_time !== 'number' || !Number.isFinite(raw.end_time) || raw.end_time < 0) {
    throw new ValidationError('invalid-end-time', 'end_time is required and must be a non-negative number', {
      endTime: raw.end_time,
    });
  }
  const entries = raw.sequence;
  if (!isRecord(entries) || Object.keys(entries).length === 0) {
    throw new ValidationError('empty-sequence', 'sequence must be a non-empty object');
  }

  const samples: ColorSample[] = Object.entries(entries).map(([key, entry]) => {
    const time = Number(key);
    if (key.trim() === '' || !Number.isFinite(time) || time < 0) {
      throw new ValidationError('invalid-time', 'sequence keys must be non-negative numbers', { key });
    }
    if (!isRecord(entry)) {
      throw new ValidationError('invalid-document', 'sequence entries must be objects', { key });
    }
    return {
      timeUnits: Math.round(time),
      color: readColor(entry.color, key),
      pixelCount: readPixelCount(entry.pixels, pixelCount, `sequence.${key}.pixels`),
    };
  });
  samples.sort((left, right) => left.timeUnits - right.timeUnits);

  return { pixelCount, refreshRate, endTime: Math.round(raw.end_time), samples };
}

/**
 * Differences consecutive sample times into segments; the final segment runs to `endTime`.
 */
export function buildSegments(samples: readonly ColorSample[], endTime: number): Segment[] {
  if (samples.length === 0) {
    throw new ValidationError('empty-sequence', 'at least one colour sample is required');
  }
  return samples.map((sample, index) => {
    const nextTime = index + 1 < samples.length ? samples[index + 1].timeUnits : endTime;
    const durationUnits = nextTime - sample.timeUnits;
    if (durationUnits <= 0) {
      throw new ValidationError('non-monotonic', 'sample times must be unique, ascending and before end_time', {
        index,
        timeUnits: sample.timeUnits,
        nextTime,
      });
    }
    return { durationUnits, color: sample.color, pixelCount: sample.pixelCount };
  });
}

export function rescaleTime(timeUnits: number, fromRate: number, toRate: number): number {
  return Math.round((timeUnits / fromRate) * toRate);
}

/**
 * Document -> immutable compiled sequence at the program refresh rate.
 */
export function compileSequence(document: SequenceDocument, options: CompileOptions = {}): CompiledSequence {
  const prgRate = options.prgRefreshRate ?? DEFAULT_PRG_REFRESH_RATE;
  const samples = document.samples.map((sample) => ({
    ...sample,
    timeUnits: rescaleTime(sample.timeUnits, document.refreshRate, prgRate),
  }));
  const endTime = rescaleTime(document.endTime, document.refreshRate, prgRate);
  const segments = splitSegments(buildSegments(samples, endTime));
  return Object.freeze({
    pixelCount: document.pixelCount,
    refreshRate: prgRate,
    segments: Object.freeze(segments.map((segment) => Object.freeze(segment))),
  });
}

function readPixelCount(value: unknown, fallback: number, field: string): number {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (
    typeof value !== 'number' ||
    !Number.isInteger(value) ||
    value < MIN_PIXEL_COUNT ||
    value > MAX_PIXEL_COUNT
  ) {
    throw new ValidationError('invalid-pixel-count', `${field} must be an integer ${MIN_PIXEL_COUNT}..${MAX_PIXEL_COUNT}`, {
      value,
    });
  }
  return value;
}

function readColor(value: unknown, key: string): Rgb {
  if (!Array.isArray(value) || value.length !== 3) {
    throw new ValidationError('invalid-color', 'color must be an [r, g, b] array', { key });
  }
  const [r, g, b] = value.map((component: unknown) => {
    if (typeof component !== 'number' || !Number.isInteger(component) || component < 0 || component > 255) {
      throw new ValidationError('invalid-color', 'colour components must be integers 0..255', { key, value });
    }
    return component;
  });
  return [r, g, b];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
