/**
 * Transport over a Node.js duplex stream, such as an open serial port.
 */

import type { Duplex } from 'node:stream';
import { TransportError } from '../exceptions';
import { ByteQueue } from './byte-queue';
import type { Transport } from './transport';

/**
 * Exact-length reads and whole writes on top of a `Duplex`.
 *
 * Incoming chunks are buffered by a `ByteQueue`. Stream errors, end and close
 * fail any read that cannot be served from the buffer.
 */
export class StreamTransport implements Transport {
  private readonly queue = new ByteQueue();

  constructor(private readonly stream: Duplex) {
    stream.on('data', this.handleData);
    stream.on('error', this.handleError);
    stream.on('end', this.handleEnd);
    stream.on('close', this.handleClose);
  }

  /**
   * Whether the stream still accepts writes.
   */
  get isOpen(): boolean {
    return !this.stream.destroyed && this.stream.writable;
  }

  /**
   * Number of received bytes not yet read.
   */
  get buffered(): number {
    return this.queue.size;
  }

  async read(length: number): Promise<Uint8Array> {
    return this.queue.dequeue(length);
  }

  async write(data: Uint8Array): Promise<void> {
    if (!this.isOpen) {
      throw new TransportError('Transport is closed');
    }

    await new Promise<void>((resolve, reject) => {
      this.stream.write(data, (error) => {
        if (error) {
          reject(new TransportError(`Failed to write: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Destroy the stream and wait for it to close.
   */
  async close(): Promise<void> {
    if (this.stream.destroyed) {
      return;
    }

    await new Promise<void>((resolve) => {
      this.stream.once('close', () => resolve());
      this.stream.destroy();
    });
  }

  private readonly handleData = (chunk: Uint8Array): void => {
    this.queue.enqueue(new Uint8Array(chunk));
  };

  private readonly handleError = (error: Error): void => {
    this.queue.fail(new TransportError(`Stream error: ${error.message}`));
  };

  private readonly handleEnd = (): void => {
    this.queue.fail(new TransportError('Stream ended'));
  };

  private readonly handleClose = (): void => {
    console.debug('Transport stream closed');
    this.queue.fail(new TransportError('Transport is closed'));
  };
}
