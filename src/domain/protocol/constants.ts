/** UDP port used for beacons, probes and play/stop/control commands. */
export const CONTROL_PORT = 41412;
/** TCP port that accepts program uploads. */
export const UPLOAD_PORT = 8888;

export const DEVICE_IDENTIFIER = 'NPLAYLTXBALL';
export const DEVICE_IDENTIFIER_BYTES = Buffer.from(DEVICE_IDENTIFIER, 'ascii');

export const BEACON_OFFSETS = {
  commandEcho: 10,
  status: 12,
  timestampHigh: 15,
  timestampLow: 16,
} as const;
/** Shortest packet that carries the status and timestamp fields. */
export const MIN_STATUS_PACKET_LENGTH = BEACON_OFFSETS.timestampLow + 1;
export const UPLOAD_OK_MARKER = 'upload ok';

export const COMMAND_GROUP = 0x61;
export const COMMAND_SUBTYPE = 0x01;
export const TRIGGER_COMMAND_LENGTH = 9;

export const FIRST_PLAY_OP_ID = 0x14;
export const OP_ID_INCREMENT = 0x14;
export const STOP_OP_ID_OFFSET = 0x0a;
export const RESERVED_OP_ID = 0x00;

export const CONTROL_COMMAND_TAG = 0x42;
export const CONTROL_COMMAND_LENGTH = 12;
export const CONTROL_OPCODE_OFFSET = 8;
export const OPCODE_COLOR = 0x0a;
export const OPCODE_BRIGHTNESS = 0x10;
/** Priority byte per redundant copy of a colour or brightness command. */
export const REDUNDANCY_PRIORITIES: readonly number[] = [0x1e, 0x19, 0x14, 0x0f, 0x0a, 0x05];
export const PROBE_PRIORITY = 0x00;

export const UPLOAD_FRAME_SUFFIX = Buffer.from([0x20, 0x00, 0x00]);
export const UPLOAD_NONCE_LENGTH = 4;
export const PLAY_NONCE_LENGTH = 2;
