import assert from 'node:assert/strict';
import net from 'node:net';
import { test } from './testHarness';
import { makeFixedNonceSource } from './fakes/fixedNonceSource';
import { SequenceUploader } from '../src/application/upload/sequenceUploader';
import { ValidationError } from '../src/domain/errors';
import { programChecksum } from '../src/shared/utils/checksum';

type UploadServer = {
  port: number;
  /** Bytes received once the client half-closes. */
  received: Promise<Buffer>;
  close: () => Promise<void>;
};

async function startServer(reply: 'close' | 'hold'): Promise<UploadServer> {
  const sockets = new Set<net.Socket>();
  let resolveReceived: (data: Buffer) => void = () => undefined;
  const received = new Promise<Buffer>((resolve) => {
    resolveReceived = resolve;
  });
  const server = net.createServer({ allowHalfOpen: true }, (socket) => {
    sockets.add(socket);
    const chunks: Buffer[] = [];
    socket.on('data', (chunk: Buffer) => chunks.push(chunk));
    socket.on('end', () => {
      resolveReceived(Buffer.concat(chunks));
      if (reply === 'close') {
        socket.end(Buffer.from('ok'));
      }
    });
    socket.on('error', () => socket.destroy());
    socket.on('close', () => sockets.delete(socket));
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server has no port');
  }
  return {
    port: address.port,
    received,
    close: () =>
      new Promise<void>((resolve) => {
        sockets.forEach((socket) => socket.destroy());
        server.close(() => resolve());
      }),
  };
}

function makeUploader(port: number, readTimeoutMs = 1000): SequenceUploader {
  return new SequenceUploader(makeFixedNonceSource([9, 8, 7, 6]), { port, connectTimeoutMs: 1000, readTimeoutMs });
}

test('upload sends the framed program and treats device EOF as acknowledgment', async () => {
  const server = await startServer('close');
  try {
    const payload = Buffer.from([1, 2, 3]);
    const result = await makeUploader(server.port).upload('127.0.0.1', payload, { filename: 'a.prg' });

    assert.equal(result.kind, 'acknowledged');
    if (result.kind !== 'acknowledged') {
      return;
    }
    assert.equal(result.bytesSent, 25);
    assert.equal(result.checksum, programChecksum(payload));
    assert.equal(result.response.toString('ascii'), 'ok');
    assert.equal((await server.received).toString('hex'), '00000000030000000908070620000000612e70726700010203');
  } finally {
    await server.close();
  }
});

test('upload without a device close is reported as unconfirmed', async () => {
  const server = await startServer('hold');
  try {
    const result = await makeUploader(server.port, 50).upload('127.0.0.1', Buffer.alloc(10, 7), {
      filename: 'show.prg',
    });

    assert.equal(result.kind, 'unconfirmed');
    assert.equal((await server.received).length, 8 + 4 + 3 + 1 + 8 + 1 + 10);
  } finally {
    await server.close();
  }
});

test('refused connections are reported as failed uploads', async () => {
  const server = await startServer('close');
  const { port } = server;
  await server.close();

  const result = await makeUploader(port).upload('127.0.0.1', Buffer.from([1]), { filename: 'x.prg' });

  assert.equal(result.kind, 'failed');
  assert.equal(result.kind === 'failed' ? result.error.code : null, 'connection-refused');
});

test('invalid filenames are rejected before connecting', async () => {
  await assert.rejects(
    makeUploader(1).upload('127.0.0.1', Buffer.from([1]), { filename: '' }),
    (error: unknown) => error instanceof ValidationError && error.code === 'invalid-filename',
  );
});
