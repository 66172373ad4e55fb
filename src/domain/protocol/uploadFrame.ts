import { ValidationError } from '@/domain/errors';
import { UPLOAD_FRAME_SUFFIX, UPLOAD_NONCE_LENGTH } from '@/domain/protocol/constants';

export interface UploadFrameInput {
  filename: string;
  payload: Buffer;
  /** Size announced in the prefix; the payload length when omitted. */
  declaredSize?: number;
  nonce: Buffer;
}

const PRINTABLE_ASCII = /^[\x20-\x7e]+$/;

export function validateUploadFilename(filename: string): void {
  if (!PRINTABLE_ASCII.test(filename)) {
    throw new ValidationError('invalid-filename', 'filename must be non-empty printable ASCII', { filename });
  }
}

/**
 * `00000000 | size u32le | nonce[4] | 20 00 00 | 00 | filename | 00 | payload`
 */
export function buildUploadFrame(input: UploadFrameInput): Buffer {
  validateUploadFilename(input.filename);
  if (input.nonce.length !== UPLOAD_NONCE_LENGTH) {
    throw new ValidationError('invalid-document', 'upload nonce must be four bytes', {
      length: input.nonce.length,
    });
  }
  const declaredSize = input.declaredSize ?? input.payload.length;
  if (!Number.isInteger(declaredSize) || declaredSize < 0 || declaredSize > 0xffffffff) {
    throw new ValidationError('invalid-document', 'declared size must fit an unsigned 32-bit field', {
      declaredSize,
    });
  }

  const prefix = Buffer.alloc(8);
  prefix.writeUInt32LE(declaredSize, 4);
  return Buffer.concat([
    prefix,
    input.nonce,
    UPLOAD_FRAME_SUFFIX,
    Buffer.from([0x00]),
    Buffer.from(input.filename, 'ascii'),
    Buffer.from([0x00]),
    input.payload,
  ]);
}
