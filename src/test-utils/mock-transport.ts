import { TransportError } from '../exceptions';
import { concatBytes, EMPTY_BYTES } from '../protocol/bytes';
import type { Transport } from '../transport/transport';

/**
 * In-memory transport: records writes and serves reads from fed bytes.
 *
 * A read that cannot be served from what was fed fails as if the stream had
 * closed, so tests never hang.
 */
export class MockTransport implements Transport {
  readonly writes: Uint8Array[] = [];
  readonly reads: number[] = [];
  closed = false;
  private incoming: Uint8Array = EMPTY_BYTES;

  /** Queue bytes for later reads */
  feed(...frames: Uint8Array[]): void {
    this.incoming = concatBytes(this.incoming, ...frames);
  }

  /** Everything written so far, concatenated */
  get written(): Uint8Array {
    return concatBytes(...this.writes);
  }

  get remaining(): number {
    return this.incoming.length;
  }

  async read(length: number): Promise<Uint8Array> {
    this.reads.push(length);
    if (this.incoming.length < length) {
      throw new TransportError('Transport is closed');
    }
    const data = this.incoming.slice(0, length);
    this.incoming = this.incoming.slice(length);
    return data;
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new TransportError('Transport is closed');
    }
    this.writes.push(data.slice());
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
