/**
 * BGAPI message header codec.
 *
 * Layout (4 bytes):
 *   [0] bit 7: message type, bits 6-3: technology, bits 2-0: length bits 10-8
 *   [1] length bits 7-0
 *   [2] class id
 *   [3] command id
 */

import { InvalidFrameError } from '../exceptions';
import { HEADER_SIZE, MAX_PAYLOAD_LENGTH, MessageType, Technology } from './constants';

export interface Header {
  readonly messageType: MessageType;
  readonly technology: Technology;
  readonly classId: number;
  readonly commandId: number;
  /** Payload byte count */
  readonly length: number;
}

function checkByte(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new InvalidFrameError(`Header ${name} out of range: ${value}`);
  }
}

export function encodeHeader(header: Header): Uint8Array {
  if (
    !Number.isInteger(header.length) ||
    header.length < 0 ||
    header.length > MAX_PAYLOAD_LENGTH
  ) {
    throw new InvalidFrameError(
      `Payload length ${header.length} exceeds maximum ${MAX_PAYLOAD_LENGTH}`
    );
  }
  if (header.technology < 0 || header.technology > 0x0f) {
    throw new InvalidFrameError(`Header technology out of range: ${header.technology}`);
  }
  checkByte('class id', header.classId);
  checkByte('command id', header.commandId);

  const bytes = new Uint8Array(HEADER_SIZE);
  bytes[0] =
    ((header.messageType & 0x01) << 7) |
    ((header.technology & 0x0f) << 3) |
    ((header.length >> 8) & 0x07);
  bytes[1] = header.length & 0xff;
  bytes[2] = header.classId;
  bytes[3] = header.commandId;
  return bytes;
}

export function decodeHeader(bytes: Uint8Array): Header {
  if (bytes.length !== HEADER_SIZE) {
    throw new InvalidFrameError(
      `Header must be ${HEADER_SIZE} bytes, got ${bytes.length}`
    );
  }

  return {
    messageType: bytes[0] & 0x80 ? MessageType.EVENT : MessageType.COMMAND,
    technology: (bytes[0] >> 3) & 0x0f,
    classId: bytes[2],
    commandId: bytes[3],
    length: ((bytes[0] & 0x07) << 8) | bytes[1],
  };
}
