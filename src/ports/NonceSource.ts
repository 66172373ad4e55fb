export interface NonceSource {
  /** Random bytes, none of them 0x00 or 0xFF. */
  bytes(length: number): Buffer;
}
