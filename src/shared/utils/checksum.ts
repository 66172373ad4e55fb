import { crc32 } from 'crc';

/**
 * CRC-32 of a binary payload as eight lowercase hex digits.
 * Used to fingerprint compiled programs in logs and upload reports.
 */
export function programChecksum(payload: Buffer): string {
  return (crc32(payload) >>> 0).toString(16).padStart(8, '0');
}
