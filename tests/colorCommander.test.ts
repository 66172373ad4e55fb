import assert from 'node:assert/strict';
import { test } from './testHarness';
import { makeRecordingTransport } from './fakes/recordingTransport';
import { ColorCommander } from '../src/application/control/colorCommander';
import { ValidationError } from '../src/domain/errors';

test('colour commands go out once per priority, highest first', async () => {
  const transport = makeRecordingTransport();
  const commander = new ColorCommander(transport, 41412);

  const result = await commander.sendColor('192.168.1.50', [255, 0, 16]);

  assert.deepEqual(result, { kind: 'sent', address: '192.168.1.50', packets: 6 });
  assert.deepEqual(
    transport.sent.map((datagram) => datagram.payload.toString('hex')),
    ['1e', '19', '14', '0f', '0a', '05'].map((priority) => `42${priority}0000000000000aff0010`),
  );
  assert.ok(transport.sent.every((datagram) => datagram.address === '192.168.1.50' && datagram.port === 41412));
});

test('brightness commands use the brightness opcode', async () => {
  const transport = makeRecordingTransport();

  await new ColorCommander(transport, 41412).sendBrightness('192.168.1.50', 64);

  assert.equal(transport.sent[0].payload.toString('hex'), '421e000000000000' + '10400000');
  assert.equal(transport.sent.length, 6);
});

test('a send failure stops the burst and reports packets already sent', async () => {
  const transport = makeRecordingTransport();
  transport.failAfter = 2;

  const result = await new ColorCommander(transport, 41412).sendColor('192.168.1.50', [1, 2, 3]);

  assert.equal(result.kind, 'send-failed');
  assert.equal(result.packets, 2);
  assert.equal(transport.sent.length, 2);
});

test('invalid values are rejected before anything is sent', async () => {
  const transport = makeRecordingTransport();
  const commander = new ColorCommander(transport, 41412);

  await assert.rejects(
    commander.sendBrightness('192.168.1.50', 300),
    (error: unknown) => error instanceof ValidationError && error.code === 'invalid-brightness',
  );
  await assert.rejects(
    commander.sendColor('192.168.1.50', [0, -1, 0]),
    (error: unknown) => error instanceof ValidationError && error.code === 'invalid-color',
  );
  assert.equal(transport.sent.length, 0);
});
