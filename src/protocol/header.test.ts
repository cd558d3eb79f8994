import { describe, expect, it } from 'vitest';
import { InvalidFrameError } from '../exceptions';
import { MessageType, Technology } from './constants';
import { decodeHeader, encodeHeader, type Header } from './header';

function commandHeader(classId: number, commandId: number, length: number): Header {
  return {
    messageType: MessageType.COMMAND,
    technology: Technology.BLUETOOTH_SMART,
    classId,
    commandId,
    length,
  };
}

describe('encodeHeader', () => {
  it('packs class, command and length into four bytes', () => {
    expect(encodeHeader(commandHeader(5, 9, 12))).toEqual(
      new Uint8Array([0x00, 0x0c, 0x05, 0x09])
    );
  });

  it('puts the event flag and high length bits in the first byte', () => {
    const header: Header = { ...commandHeader(4, 5, 0x123), messageType: MessageType.EVENT };
    expect(encodeHeader(header)).toEqual(new Uint8Array([0x81, 0x23, 0x04, 0x05]));
  });

  it('rejects a length beyond 11 bits', () => {
    expect(() => encodeHeader(commandHeader(0, 0, 0x800))).toThrow(InvalidFrameError);
  });

  it('rejects ids that do not fit in a byte', () => {
    expect(() => encodeHeader(commandHeader(0x100, 0, 0))).toThrow(InvalidFrameError);
    expect(() => encodeHeader(commandHeader(0, -1, 0))).toThrow(InvalidFrameError);
  });
});

describe('decodeHeader', () => {
  it('round-trips a header', () => {
    const header = commandHeader(5, 9, 12);
    expect(decodeHeader(encodeHeader(header))).toEqual(header);
  });

  it('decodes message type, technology and the 11-bit length', () => {
    expect(decodeHeader(new Uint8Array([0x8f, 0xff, 0x04, 0x05]))).toEqual({
      messageType: MessageType.EVENT,
      technology: Technology.WIFI,
      classId: 4,
      commandId: 5,
      length: 0x7ff,
    });
  });

  it('requires exactly four bytes', () => {
    expect(() => decodeHeader(new Uint8Array([0, 0, 0]))).toThrow(InvalidFrameError);
    expect(() => decodeHeader(new Uint8Array(5))).toThrow(InvalidFrameError);
  });
});
