import net from 'node:net';
import { TransportError } from '@/domain/errors';
import { UPLOAD_NONCE_LENGTH } from '@/domain/protocol/constants';
import { buildUploadFrame, validateUploadFilename } from '@/domain/protocol/uploadFrame';
import type { NonceSource } from '@/ports/NonceSource';
import { createLogger } from '@/shared/logging/logger';
import { programChecksum } from '@/shared/utils/checksum';

export interface SequenceUploaderOptions {
  port: number;
  connectTimeoutMs: number;
  /** How long to wait for the device to close its side after the payload is sent. */
  readTimeoutMs: number;
}

export interface UploadRequest {
  /** Name the device stores the program under. */
  filename: string;
  /** Size announced in the frame prefix; defaults to the payload length. */
  declaredSize?: number;
}

export type UploadResult =
  | { kind: 'acknowledged'; address: string; bytesSent: number; checksum: string; response: Buffer }
  | { kind: 'unconfirmed'; address: string; bytesSent: number; checksum: string }
  | { kind: 'failed'; address: string; error: TransportError };

/**
 * One TCP round trip per upload: connect, send the framed program, half-close,
 * then treat the device's EOF as acknowledgment.
 */
export class SequenceUploader {
  private readonly log = createLogger('Upload');

  constructor(
    private readonly nonces: NonceSource,
    private readonly options: SequenceUploaderOptions,
  ) {}

  public async upload(address: string, payload: Buffer, request: UploadRequest): Promise<UploadResult> {
    validateUploadFilename(request.filename);
    const frame = buildUploadFrame({
      filename: request.filename,
      payload,
      declaredSize: request.declaredSize,
      nonce: this.nonces.bytes(UPLOAD_NONCE_LENGTH),
    });
    const checksum = programChecksum(payload);
    this.log.info('upload starting', {
      address,
      port: this.options.port,
      filename: request.filename,
      bytes: payload.length,
      checksum,
    });
    this.log.debug('upload frame prefix', { prefix: frame.subarray(0, frame.length - payload.length) });

    const result = await this.transfer(address, frame, checksum);
    if (result.kind === 'acknowledged') {
      this.log.info('upload acknowledged', { address, bytesSent: result.bytesSent, checksum });
    } else if (result.kind === 'unconfirmed') {
      this.log.warn('upload sent but not acknowledged; retry may be needed', {
        address,
        readTimeoutMs: this.options.readTimeoutMs,
      });
    } else {
      this.log.warn('upload failed', { address, code: result.error.code, message: result.error.message });
    }
    return result;
  }

  private transfer(address: string, frame: Buffer, checksum: string): Promise<UploadResult> {
    return new Promise((resolve) => {
      const socket = net.createConnection({ host: address, port: this.options.port, allowHalfOpen: true });
      const received: Buffer[] = [];
      let connected = false;
      let settled = false;

      const finish = (result: UploadResult) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(connectTimer);
        socket.setTimeout(0);
        socket.destroy();
        resolve(result);
      };

      const connectTimer = setTimeout(() => {
        finish({
          kind: 'failed',
          address,
          error: new TransportError('connect-timeout', `connect to ${address}:${this.options.port} timed out`),
        });
      }, this.options.connectTimeoutMs);

      socket.on('connect', () => {
        connected = true;
        clearTimeout(connectTimer);
        socket.setTimeout(this.options.readTimeoutMs);
        socket.end(frame);
        this.log.debug('upload payload written; write side closed', { address, bytes: frame.length });
      });

      socket.on('data', (chunk: Buffer) => {
        received.push(chunk);
      });

      socket.on('end', () => {
        finish({
          kind: 'acknowledged',
          address,
          bytesSent: frame.length,
          checksum,
          response: Buffer.concat(received),
        });
      });

      socket.on('timeout', () => {
        finish({ kind: 'unconfirmed', address, bytesSent: frame.length, checksum });
      });

      socket.on('error', (error) => {
        finish({
          kind: 'failed',
          address,
          error: TransportError.fromSocketError(error, connected ? 'send-failed' : 'socket-error'),
        });
      });
    });
  }
}
