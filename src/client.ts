/**
 * BGAPI client: framed writes, typed reads and dispatch over a transport.
 */

import { EMPTY_BYTES, bytesToHex } from './protocol/bytes';
import { HEADER_SIZE } from './protocol/constants';
import { selectHandler, type Handler } from './protocol/dispatch';
import { decodeHeader, type Header } from './protocol/header';
import {
  encodeMessage,
  splitPayload,
  type MessageDefinition,
  type PartialPayload,
} from './protocol/message';
import { checkHeader } from './protocol/validator';
import { LengthMismatchError } from './exceptions';
import type { Transport } from './transport/transport';

/**
 * Command/response and event client for a BLED112 dongle.
 *
 * Usage is strictly one request at a time: write a command, then read its
 * response before sending the next. The client does not enforce this and
 * holds no lock; callers must not overlap calls on one instance.
 *
 * @example
 * ```typescript
 * const client = new Bled112Client(await openSerialTransport({ path: '/dev/ttyACM0' }));
 * await client.send(SystemHello, {});
 * await client.receiveExpected(SystemHelloResponse);
 * ```
 */
export class Bled112Client {
  constructor(private readonly transport: Transport) {}

  /**
   * Write one message. `trailing` follows the fixed payload and is counted in
   * the header length.
   *
   * @throws {InvalidFrameError} If the payload cannot be encoded
   * @throws {TransportError} If the write fails
   */
  async send<T>(
    message: MessageDefinition<T>,
    payload: T,
    trailing: Uint8Array = EMPTY_BYTES
  ): Promise<void> {
    const frame = encodeMessage(message, payload, trailing);
    console.debug(`-> ${message.name} ${bytesToHex(frame)}`);
    await this.transport.write(frame);
  }

  /**
   * Read one message that must be `message`.
   *
   * The whole payload is consumed before validation, so the stream stays
   * framed after a mismatch.
   *
   * @returns The decoded payload, plus the trailing bytes for partial messages
   * @throws {HeaderMismatchError} If the header announces a different message
   * @throws {TransportError} If the transport fails
   */
  async receiveExpected<T>(message: MessageDefinition<T, 'fixed'>): Promise<T>;
  async receiveExpected<T>(
    message: MessageDefinition<T, 'partial'>
  ): Promise<PartialPayload<T>>;
  async receiveExpected<T>(
    message: MessageDefinition<T>
  ): Promise<T | PartialPayload<T>> {
    const header = await this.readHeader();
    const body = await this.readBody(header);

    checkHeader(message, header);
    if (message.kind === 'fixed') {
      return splitPayload(message, body).payload;
    }
    if (header.length < message.fixedSize) {
      throw new LengthMismatchError(message.fixedSize, header.length);
    }
    return splitPayload(message, body);
  }

  /**
   * Read one message and hand it to the first matching handler.
   *
   * Handlers are tested in argument order. A message no handler matches is
   * dropped without error.
   *
   * @returns Whether a handler was invoked
   * @throws {TransportError} If the transport fails
   */
  async receiveOneOf(...handlers: Handler[]): Promise<boolean> {
    const header = await this.readHeader();
    const body = await this.readBody(header);

    const handler = selectHandler(handlers, header);
    if (!handler) {
      console.debug(
        `Discarding unhandled message class=${header.classId} ` +
          `command=${header.commandId} length=${header.length}`
      );
      return false;
    }

    await handler.invoke(body);
    return true;
  }

  private async readHeader(): Promise<Header> {
    return decodeHeader(await this.transport.read(HEADER_SIZE));
  }

  private async readBody(header: Header): Promise<Uint8Array> {
    const body = header.length > 0 ? await this.transport.read(header.length) : EMPTY_BYTES;
    console.debug(
      `<- class=${header.classId} command=${header.commandId} ${bytesToHex(body)}`
    );
    return body;
  }
}
