/**
 * Fire-and-forget UDP sender. Resolves once the datagram has been handed to the socket.
 */
export interface DatagramTransport {
  send(payload: Buffer, address: string, port: number): Promise<void>;
  close(): Promise<void>;
}
