import assert from 'node:assert/strict';
import { test } from './testHarness';
import { udpFrame } from './support/ipv4';
import { ValidationError } from '../src/domain/errors';
import { parseBeacon, parseStatus } from '../src/domain/protocol/beacon';
import {
  buildBrightnessCommand,
  buildColorCommand,
  buildControlCommand,
  buildPlayCommand,
  buildProbeCommand,
  buildStopCommand,
  nextPlayOpId,
  stopOpId,
} from '../src/domain/protocol/commands';
import { decodeIpv4UdpFrame } from '../src/domain/protocol/ipv4Frame';
import { buildUploadFrame } from '../src/domain/protocol/uploadFrame';
import { programChecksum } from '../src/shared/utils/checksum';
import { formatIpv4, isIpv4, parseIpv4 } from '../src/shared/utils/net';

function assertValidation(fn: () => unknown, code: string): void {
  assert.throws(fn, (error: unknown) => error instanceof ValidationError && error.code === code);
}

function statusPacket(status: number, timestamp: [number, number], extra = ''): Buffer {
  const packet = Buffer.alloc(20);
  packet.write('NPLAYLTXBALL', 0, 'ascii');
  packet[12] = status;
  packet[15] = timestamp[0];
  packet[16] = timestamp[1];
  return Buffer.concat([packet, Buffer.from(extra, 'ascii')]);
}

test('play command carries op-id, nonce and echoed timestamp', () => {
  assert.equal(buildPlayCommand(0x14, [0xaa, 0xbb], [0x12, 0x34]).toString('hex'), '6114010000aabb1234');
});

test('stop command offsets the last op-id and echoes or zeroes the timestamp', () => {
  assert.equal(buildStopCommand(0x14, [0x12, 0x34]).toString('hex'), '611e01000000001234');
  assert.equal(buildStopCommand(0x14, null).toString('hex'), '611e01000000000000');
  assert.equal(stopOpId(0xfa), 0x04);
});

test('next play op-id advances by 0x14 and skips the reserved zero', () => {
  assert.equal(nextPlayOpId(0x14), 0x28);
  assert.equal(nextPlayOpId(0xec), 0x14);
  assert.equal(nextPlayOpId(0xf0), 0x04);
});

test('control commands place priority, opcode and data', () => {
  assert.equal(buildColorCommand(0x1e, [255, 128, 1]).toString('hex'), '421e0000000000000aff8001');
  assert.equal(buildBrightnessCommand(0x05, 200).toString('hex'), '420500000000000010c80000');
  assert.equal(buildProbeCommand().toString('hex'), '42000000000000000a000000');
});

test('control commands reject out-of-range values', () => {
  assertValidation(() => buildColorCommand(0x1e, [0, 0, 300]), 'invalid-color');
  assertValidation(() => buildColorCommand(0x1e, [0, 1.5, 0]), 'invalid-color');
  assertValidation(() => buildBrightnessCommand(0x1e, 256), 'invalid-brightness');
  assertValidation(() => buildBrightnessCommand(0x1e, -1), 'invalid-brightness');
  assertValidation(() => buildControlCommand(0x1e, 0x0a, [1, 2, 3, 4]), 'invalid-document');
});

test('beacon parser reads status, echo and timestamp', () => {
  const beacon = parseBeacon(statusPacket(0x03, [0x12, 0x34]));
  assert.deepEqual(beacon, {
    status: { status: 0x03, commandEcho: 0x4c, timestamp: [0x12, 0x34] },
    uploadOk: false,
  });
});

test('beacon parser flags completed uploads and tolerates short packets', () => {
  assert.equal(parseBeacon(statusPacket(0x01, [0, 0], 'upload ok'))?.uploadOk, true);
  assert.deepEqual(parseBeacon(Buffer.from('xxNPLAYLTXBALL', 'ascii')), { status: null, uploadOk: false });
  assert.equal(parseStatus(Buffer.alloc(16)), null);
});

test('beacon parser ignores packets without the identifier', () => {
  assert.equal(parseBeacon(Buffer.from('NPLAYLTXBAL_ with enough bytes', 'ascii')), null);
});

test('upload frame prefixes size, nonce and filename', () => {
  const frame = buildUploadFrame({
    filename: 'a.prg',
    payload: Buffer.from([1, 2, 3]),
    nonce: Buffer.from([9, 8, 7, 6]),
  });
  assert.equal(frame.toString('hex'), '000000000300000009080706200000' + '00612e70726700010203');
});

test('upload frame honours a declared size', () => {
  const frame = buildUploadFrame({
    filename: 'b',
    payload: Buffer.from([0xff]),
    declaredSize: 0x01020304,
    nonce: Buffer.from([1, 1, 1, 1]),
  });
  assert.equal(frame.readUInt32LE(4), 0x01020304);
});

test('upload frame rejects bad filenames and nonces', () => {
  const nonce = Buffer.from([1, 2, 3, 4]);
  assertValidation(() => buildUploadFrame({ filename: '', payload: Buffer.alloc(1), nonce }), 'invalid-filename');
  assertValidation(() => buildUploadFrame({ filename: 'café.prg', payload: Buffer.alloc(1), nonce }), 'invalid-filename');
  assertValidation(() => buildUploadFrame({ filename: 'a\nb', payload: Buffer.alloc(1), nonce }), 'invalid-filename');
  assertValidation(
    () => buildUploadFrame({ filename: 'a', payload: Buffer.alloc(1), nonce: Buffer.from([1, 2]) }),
    'invalid-document',
  );
});

test('raw IPv4 frames decode to addresses, ports and payload', () => {
  const payload = statusPacket(0x02, [0, 1]);
  const decoded = decodeIpv4UdpFrame(Buffer.concat([udpFrame(payload, { destinationPort: 41412 }), Buffer.alloc(4)]));
  assert.ok(decoded);
  assert.equal(decoded.sourceAddress, '192.168.1.50');
  assert.equal(decoded.destinationAddress, '255.255.255.255');
  assert.equal(decoded.sourcePort, 41412);
  assert.equal(decoded.destinationPort, 41412);
  assert.deepEqual(decoded.payload, payload);
});

test('non-UDP and truncated frames are rejected', () => {
  assert.equal(decodeIpv4UdpFrame(udpFrame(Buffer.alloc(4), { destinationPort: 41412, protocol: 6 })), null);
  assert.equal(decodeIpv4UdpFrame(Buffer.alloc(10)), null);
  const ipv6ish = udpFrame(Buffer.alloc(4), { destinationPort: 41412 });
  ipv6ish[0] = 0x60;
  assert.equal(decodeIpv4UdpFrame(ipv6ish), null);
});

test('network helpers parse, format and validate IPv4', () => {
  assert.equal(parseIpv4('192.168.1.255'), 0xc0a801ff);
  assert.equal(formatIpv4(0x0a000001), '10.0.0.1');
  assert.equal(isIpv4('192.168.1.256'), false);
  assert.equal(isIpv4('10.0.0.1'), true);
});

test('program checksum is lowercase crc32 hex', () => {
  assert.equal(programChecksum(Buffer.from('123456789', 'ascii')), 'cbf43926');
});
