import { ValidationError } from '@/domain/errors';
import {
  COMMAND_GROUP,
  COMMAND_SUBTYPE,
  CONTROL_COMMAND_LENGTH,
  CONTROL_COMMAND_TAG,
  CONTROL_OPCODE_OFFSET,
  FIRST_PLAY_OP_ID,
  OPCODE_BRIGHTNESS,
  OPCODE_COLOR,
  OP_ID_INCREMENT,
  PROBE_PRIORITY,
  RESERVED_OP_ID,
  STOP_OP_ID_OFFSET,
  TRIGGER_COMMAND_LENGTH,
} from '@/domain/protocol/constants';
import type { Rgb } from '@/domain/sequence/types';

/** Two bytes, high first, as they appear on the wire. */
export type BytePair = readonly [number, number];

/**
 * `61 opId 01 00 00 n1 n2 ts1 ts2`
 */
export function buildPlayCommand(opId: number, nonce: BytePair, timestamp: BytePair): Buffer {
  return Buffer.from([
    COMMAND_GROUP,
    opId & 0xff,
    COMMAND_SUBTYPE,
    0x00,
    0x00,
    nonce[0] & 0xff,
    nonce[1] & 0xff,
    timestamp[0] & 0xff,
    timestamp[1] & 0xff,
  ]);
}

/**
 * `61 (last+0A) 01 00 00 00 00 t1 t2`; trailing bytes are the echoed timestamp, or zero.
 */
export function buildStopCommand(lastPlayingOpId: number, timestamp: BytePair | null): Buffer {
  const command = Buffer.alloc(TRIGGER_COMMAND_LENGTH);
  command[0] = COMMAND_GROUP;
  command[1] = stopOpId(lastPlayingOpId);
  command[2] = COMMAND_SUBTYPE;
  if (timestamp) {
    command[7] = timestamp[0] & 0xff;
    command[8] = timestamp[1] & 0xff;
  }
  return command;
}

export function stopOpId(lastPlayingOpId: number): number {
  return (lastPlayingOpId + STOP_OP_ID_OFFSET) & 0xff;
}

/**
 * Op-id for the play that follows a stop. `0x00` is reserved and maps to the first op-id.
 */
export function nextPlayOpId(lastPlayingOpId: number): number {
  const next = (lastPlayingOpId + OP_ID_INCREMENT) & 0xff;
  return next === RESERVED_OP_ID ? FIRST_PLAY_OP_ID : next;
}

/**
 * `42 prio 00 00 00 00 00 00 opcode d1 d2 d3`
 */
export function buildControlCommand(priority: number, opcode: number, data: readonly number[]): Buffer {
  if (data.length > CONTROL_COMMAND_LENGTH - CONTROL_OPCODE_OFFSET - 1) {
    throw new ValidationError('invalid-document', 'control command carries at most three data bytes', {
      length: data.length,
    });
  }
  const command = Buffer.alloc(CONTROL_COMMAND_LENGTH);
  command[0] = CONTROL_COMMAND_TAG;
  command[1] = priority & 0xff;
  command[CONTROL_OPCODE_OFFSET] = opcode;
  data.forEach((value, index) => {
    command[CONTROL_OPCODE_OFFSET + 1 + index] = value & 0xff;
  });
  return command;
}

export function buildColorCommand(priority: number, color: Rgb): Buffer {
  for (const component of color) {
    if (!Number.isInteger(component) || component < 0 || component > 255) {
      throw new ValidationError('invalid-color', 'colour components must be integers 0..255', { color });
    }
  }
  return buildControlCommand(priority, OPCODE_COLOR, color);
}

export function buildBrightnessCommand(priority: number, level: number): Buffer {
  if (!Number.isInteger(level) || level < 0 || level > 255) {
    throw new ValidationError('invalid-brightness', 'brightness must be an integer 0..255', { level });
  }
  return buildControlCommand(priority, OPCODE_BRIGHTNESS, [level]);
}

/**
 * Black colour command; harmless on a device and answered by any live one.
 */
export function buildProbeCommand(): Buffer {
  return buildColorCommand(PROBE_PRIORITY, [0, 0, 0]);
}
