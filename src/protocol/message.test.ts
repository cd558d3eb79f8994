import { describe, expect, it } from 'vitest';
import { InvalidFrameError } from '../exceptions';
import { AttclientAttributeWrite, GapConnectDirect } from './commands';
import { MessageClass, MessageType } from './constants';
import { AttclientAttributeValueEvent, ConnectionStatusEvent } from './events';
import { bdAddr, int16, int8, uint16, uint32, uint8 } from './fields';
import {
  decodePayload,
  defineMessage,
  encodeMessage,
  encodePayload,
  headerFor,
  isPartial,
  splitPayload,
} from './message';
import { SystemGetInfoResponse } from './responses';

const Sample = defineMessage({
  name: 'sample',
  messageType: MessageType.COMMAND,
  classId: 4,
  commandId: 5,
  schema: {
    flag: uint8,
    handle: uint16,
  },
});

const Chunk = defineMessage({
  name: 'chunk',
  messageType: MessageType.EVENT,
  classId: 7,
  commandId: 1,
  kind: 'partial',
  schema: {
    first: uint8,
    second: uint8,
  },
});

describe('defineMessage', () => {
  it('derives the fixed size from the schema', () => {
    expect(Sample.fixedSize).toBe(3);
    expect(Sample.kind).toBe('fixed');
    expect(Chunk.fixedSize).toBe(2);
    expect(Chunk.kind).toBe('partial');
    expect(isPartial(Chunk)).toBe(true);
    expect(isPartial(Sample)).toBe(false);
  });

  it('sizes the catalog messages as on the wire', () => {
    expect(ConnectionStatusEvent.fixedSize).toBe(16);
    expect(SystemGetInfoResponse.fixedSize).toBe(12);
    expect(GapConnectDirect.fixedSize).toBe(15);
    expect(AttclientAttributeValueEvent.fixedSize).toBe(5);
    expect(AttclientAttributeValueEvent.classId).toBe(MessageClass.ATTRIBUTE_CLIENT);
  });
});

describe('payload codec', () => {
  it('encodes fields in schema order, little-endian', () => {
    expect(encodePayload(Sample, { flag: 1, handle: 0x0302 })).toEqual(
      new Uint8Array([0x01, 0x02, 0x03])
    );
  });

  it('decodes what it encodes', () => {
    const value = { flag: 0xff, handle: 0xbeef };
    expect(decodePayload(Sample, encodePayload(Sample, value))).toEqual(value);
  });

  it('reads signed and 32-bit fields', () => {
    const Mixed = defineMessage({
      name: 'mixed',
      messageType: MessageType.COMMAND,
      classId: 0,
      commandId: 0,
      schema: { small: int8, medium: int16, large: uint32 },
    });

    const bytes = new Uint8Array([0xff, 0xfe, 0xff, 0x78, 0x56, 0x34, 0x12]);
    expect(decodePayload(Mixed, bytes)).toEqual({ small: -1, medium: -2, large: 0x12345678 });
  });

  it('requires exactly the fixed size for fixed messages', () => {
    expect(() => decodePayload(Sample, new Uint8Array(2))).toThrow(InvalidFrameError);
    expect(() => decodePayload(Sample, new Uint8Array(4))).toThrow(InvalidFrameError);
  });

  it('requires at least the fixed size for partial messages', () => {
    expect(() => decodePayload(Chunk, new Uint8Array(1))).toThrow(InvalidFrameError);
    expect(decodePayload(Chunk, new Uint8Array([1, 2, 3]))).toEqual({ first: 1, second: 2 });
  });

  it('decodes from a view into a larger buffer', () => {
    const backing = new Uint8Array([0xaa, 0x07, 0x34, 0x12]);
    expect(decodePayload(Sample, backing.subarray(1))).toEqual({ flag: 7, handle: 0x1234 });
  });

  it('rejects integers a field cannot hold', () => {
    expect(() => encodePayload(Sample, { flag: 0x100, handle: 0 })).toThrow(
      'Value 256 out of range for uint8'
    );
    expect(() => encodePayload(Sample, { flag: 0, handle: -1 })).toThrow(InvalidFrameError);
    expect(() => encodePayload(Sample, { flag: 1.5, handle: 0 })).toThrow(InvalidFrameError);
  });

  it('checks signed ranges', () => {
    const Signed = defineMessage({
      name: 'signed',
      messageType: MessageType.COMMAND,
      classId: 0,
      commandId: 0,
      schema: { small: int8 },
    });

    expect(encodePayload(Signed, { small: -128 })).toEqual(new Uint8Array([0x80]));
    expect(() => encodePayload(Signed, { small: 128 })).toThrow(InvalidFrameError);
    expect(() => encodePayload(Signed, { small: -129 })).toThrow(InvalidFrameError);
  });

  it('rejects an address of the wrong length', () => {
    const Address = defineMessage({
      name: 'address',
      messageType: MessageType.COMMAND,
      classId: 0,
      commandId: 2,
      schema: { address: bdAddr },
    });
    expect(() => encodePayload(Address, { address: new Uint8Array(5) })).toThrow(
      InvalidFrameError
    );
  });
});

describe('splitPayload', () => {
  it('splits a partial body into prefix and trailing bytes', () => {
    const body = new Uint8Array([1, 2, 3, 4, 5, 6]);
    const { payload, trailing } = splitPayload(Chunk, body);

    expect(payload).toEqual({ first: 1, second: 2 });
    expect(trailing).toEqual(new Uint8Array([3, 4, 5, 6]));
    expect(trailing.length).toBe(body.length - Chunk.fixedSize);
  });

  it('gives fixed messages an empty trailing buffer', () => {
    const { trailing } = splitPayload(Sample, new Uint8Array([1, 2, 3]));
    expect(trailing.length).toBe(0);
  });
});

describe('encodeMessage', () => {
  it('counts trailing bytes in the header length', () => {
    expect(headerFor(AttclientAttributeWrite, 2).length).toBe(6);

    const frame = encodeMessage(
      AttclientAttributeWrite,
      { connection: 0, attHandle: 0x0025, length: 2 },
      new Uint8Array([0xaa, 0xbb])
    );
    expect(frame).toEqual(
      new Uint8Array([0x00, 0x06, 0x04, 0x05, 0x00, 0x25, 0x00, 0x02, 0xaa, 0xbb])
    );
  });

  it('flags events in the header', () => {
    const frame = encodeMessage(Chunk, { first: 9, second: 8 });
    expect(frame).toEqual(new Uint8Array([0x80, 0x02, 0x07, 0x01, 0x09, 0x08]));
  });
});
