import { randomInt } from 'node:crypto';
import type { NonceSource } from '@/ports/NonceSource';

export const cryptoNonceSource: NonceSource = {
  bytes: (length) => {
    const nonce = Buffer.alloc(length);
    for (let i = 0; i < length; i += 1) {
      nonce[i] = randomInt(1, 255);
    }
    return nonce;
  },
};
