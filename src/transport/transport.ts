/**
 * Byte-stream contract consumed by the client.
 */
export interface Transport {
  /**
   * Resolve with exactly `length` bytes, in arrival order.
   *
   * @throws {TransportError} On I/O failure or stream closure
   */
  read(length: number): Promise<Uint8Array>;

  /**
   * Resolve once all of `data` has been handed to the stream.
   *
   * @throws {TransportError} On I/O failure or stream closure
   */
  write(data: Uint8Array): Promise<void>;

  close(): Promise<void>;
}
