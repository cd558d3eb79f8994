/**
 * Byte queue behind a stream transport.
 *
 * Incoming stream chunks arrive as events of arbitrary size. This queue
 * buffers them and serves exact-length reads through promises, so that a
 * caller waiting for N bytes is resolved as soon as N bytes have arrived.
 */

import { TransportError } from '../exceptions';

interface PendingRead {
  length: number;
  resolve: (data: Uint8Array) => void;
  reject: (error: Error) => void;
}

/**
 * FIFO of received bytes with at most one waiting reader.
 */
export class ByteQueue {
  // Received chunks; `offset` is the read position inside the first one.
  private chunks: Uint8Array[] = [];
  private offset = 0;
  private buffered = 0;
  private pending: PendingRead | null = null;
  private failure: TransportError | null = null;

  /**
   * Append received bytes and resolve the waiting reader if it is satisfied.
   *
   * @param data - Chunk received from the stream, kept without copying
   */
  enqueue(data: Uint8Array): void {
    if (data.length === 0) {
      return;
    }
    this.chunks.push(data);
    this.buffered += data.length;

    if (this.pending && this.buffered >= this.pending.length) {
      const pending = this.pending;
      this.pending = null;
      pending.resolve(this.take(pending.length));
    }
  }

  /**
   * Take exactly `length` bytes, waiting for them if needed.
   *
   * Bytes already buffered are still served after the queue has failed.
   *
   * @throws {TransportError} If the queue failed before enough bytes arrived,
   *   or another read is already waiting
   */
  async dequeue(length: number): Promise<Uint8Array> {
    if (this.pending) {
      throw new TransportError('Another read is already waiting for data');
    }
    if (this.buffered >= length) {
      return this.take(length);
    }
    if (this.failure) {
      throw this.failure;
    }

    return new Promise<Uint8Array>((resolve, reject) => {
      this.pending = { length, resolve, reject };
    });
  }

  /**
   * Mark the stream as failed and reject the waiting reader.
   *
   * The first failure is kept; later ones are ignored.
   */
  fail(error: TransportError): void {
    if (this.failure) {
      return;
    }
    this.failure = error;

    if (this.pending) {
      const pending = this.pending;
      this.pending = null;
      pending.reject(error);
    }
  }

  /**
   * Number of buffered bytes.
   */
  get size(): number {
    return this.buffered;
  }

  get hasPendingRead(): boolean {
    return this.pending !== null;
  }

  private take(length: number): Uint8Array {
    const data = new Uint8Array(length);
    let filled = 0;
    while (filled < length) {
      const head = this.chunks[0];
      const count = Math.min(head.length - this.offset, length - filled);
      data.set(head.subarray(this.offset, this.offset + count), filled);
      filled += count;
      this.offset += count;
      if (this.offset === head.length) {
        this.chunks.shift();
        this.offset = 0;
      }
    }
    this.buffered -= length;
    return data;
  }
}
