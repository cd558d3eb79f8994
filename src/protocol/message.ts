/**
 * Message descriptors and the payload codec.
 *
 * Every BGAPI message is declared once with `defineMessage()`, which fixes its
 * identity (class id, command id), payload layout and kind. A fixed message
 * occupies exactly `fixedSize` bytes; a partial message is a `fixedSize` prefix
 * followed by raw trailing bytes (the contents of a BGAPI `uint8array`).
 */

import { InvalidFrameError } from '../exceptions';
import { EMPTY_BYTES, concatBytes } from './bytes';
import { MessageType, Technology } from './constants';
import { schemaSize, type Schema } from './fields';
import { encodeHeader, type Header } from './header';

export type PayloadKind = 'fixed' | 'partial';

export interface MessageDescriptor {
  readonly name: string;
  readonly messageType: MessageType;
  readonly classId: number;
  readonly commandId: number;
  /** Bytes occupied by the decodable part of the payload */
  readonly fixedSize: number;
  readonly kind: PayloadKind;
}

export interface MessageDefinition<T, K extends PayloadKind = PayloadKind>
  extends MessageDescriptor {
  readonly kind: K;
  readonly schema: Schema<T>;
}

/**
 * Decoded partial message: the fixed prefix and the raw bytes after it.
 */
export interface PartialPayload<T> {
  payload: T;
  trailing: Uint8Array;
}

/**
 * Payload type carried by a message definition.
 *
 * @example
 * ```typescript
 * type Status = PayloadOf<typeof ConnectionStatusEvent>;
 * ```
 */
export type PayloadOf<D> = D extends MessageDefinition<infer T> ? T : never;

export interface MessageOptions<T> {
  name: string;
  messageType: MessageType;
  classId: number;
  commandId: number;
  /** Defaults to 'fixed' */
  kind?: PayloadKind;
  schema: Schema<T>;
}

/**
 * Declare a message type. The payload type is inferred from the schema.
 *
 * @example
 * ```typescript
 * const ReadByHandle = defineMessage({
 *   name: 'attclient_read_by_handle',
 *   messageType: MessageType.COMMAND,
 *   classId: MessageClass.ATTRIBUTE_CLIENT,
 *   commandId: 4,
 *   schema: { connection: uint8, chrHandle: uint16 },
 * });
 * ```
 */
export function defineMessage<T extends object>(
  options: MessageOptions<T> & { kind?: 'fixed' }
): MessageDefinition<T, 'fixed'>;
export function defineMessage<T extends object>(
  options: MessageOptions<T> & { kind: 'partial' }
): MessageDefinition<T, 'partial'>;
export function defineMessage<T extends object>(
  options: MessageOptions<T>
): MessageDefinition<T> {
  return Object.freeze({
    name: options.name,
    messageType: options.messageType,
    classId: options.classId,
    commandId: options.commandId,
    fixedSize: schemaSize(options.schema),
    kind: options.kind ?? 'fixed',
    schema: options.schema,
  });
}

export function isPartial<T>(
  message: MessageDefinition<T>
): message is MessageDefinition<T, 'partial'> {
  return message.kind === 'partial';
}

/**
 * Header announcing `message` with `trailingLength` bytes after its fixed part.
 */
export function headerFor(message: MessageDescriptor, trailingLength: number = 0): Header {
  return {
    messageType: message.messageType,
    technology: Technology.BLUETOOTH_SMART,
    classId: message.classId,
    commandId: message.commandId,
    length: message.fixedSize + trailingLength,
  };
}

/**
 * Encode a payload into exactly `message.fixedSize` bytes.
 */
export function encodePayload<T>(message: MessageDefinition<T>, value: T): Uint8Array {
  const bytes = new Uint8Array(message.fixedSize);
  const view = new DataView(bytes.buffer);

  let offset = 0;
  for (const key in message.schema) {
    const field = message.schema[key];
    field.write(view, offset, value[key]);
    offset += field.size;
  }
  return bytes;
}

/**
 * Decode the fixed part of a payload.
 *
 * Fixed messages need exactly `fixedSize` bytes, partial messages at least that
 * many; bytes past the prefix are left for the caller.
 *
 * @throws {InvalidFrameError} If the byte count does not fit the message kind
 */
export function decodePayload<T>(message: MessageDefinition<T>, bytes: Uint8Array): T {
  if (message.kind === 'fixed' && bytes.length !== message.fixedSize) {
    throw new InvalidFrameError(
      `${message.name}: expected ${message.fixedSize} payload bytes, got ${bytes.length}`
    );
  }
  if (bytes.length < message.fixedSize) {
    throw new InvalidFrameError(
      `${message.name}: expected at least ${message.fixedSize} payload bytes, got ${bytes.length}`
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const target: Partial<T> = {};

  let offset = 0;
  for (const key in message.schema) {
    const field = message.schema[key];
    target[key] = field.read(view, offset);
    offset += field.size;
  }
  // Every schema key was assigned above.
  return target as T;
}

/**
 * Split a received body into the decoded prefix and the trailing bytes.
 * Fixed messages always yield an empty trailing buffer.
 */
export function splitPayload<T>(
  message: MessageDefinition<T>,
  body: Uint8Array
): PartialPayload<T> {
  const payload = decodePayload(message, body);
  const trailing =
    body.length > message.fixedSize ? body.slice(message.fixedSize) : EMPTY_BYTES;
  return { payload, trailing };
}

/**
 * Complete frame: header, fixed payload, then trailing bytes.
 */
export function encodeMessage<T>(
  message: MessageDefinition<T>,
  value: T,
  trailing: Uint8Array = EMPTY_BYTES
): Uint8Array {
  return concatBytes(
    encodeHeader(headerFor(message, trailing.length)),
    encodePayload(message, value),
    trailing
  );
}
