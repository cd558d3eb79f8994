import { describe, expect, it } from 'vitest';
import { formatAddress, formatUuid, parseAddress } from './address';

describe('formatAddress', () => {
  it('prints the most significant byte first', () => {
    expect(formatAddress(new Uint8Array([0x56, 0x34, 0x12, 0x80, 0x07, 0x00]))).toBe(
      '00:07:80:12:34:56'
    );
  });

  it('rejects addresses that are not 6 bytes', () => {
    expect(() => formatAddress(new Uint8Array(5))).toThrow(RangeError);
  });
});

describe('parseAddress', () => {
  it('returns wire order', () => {
    expect(parseAddress('00:07:80:12:34:56')).toEqual(
      new Uint8Array([0x56, 0x34, 0x12, 0x80, 0x07, 0x00])
    );
  });

  it('accepts dashes and upper case', () => {
    expect(parseAddress('AA-BB-CC-DD-EE-0F')).toEqual(
      new Uint8Array([0x0f, 0xee, 0xdd, 0xcc, 0xbb, 0xaa])
    );
  });

  it('round-trips with formatAddress', () => {
    expect(formatAddress(parseAddress('c0:ff:ee:00:12:34'))).toBe('c0:ff:ee:00:12:34');
  });

  it.each(['', '00:07:80:12:34', '00:07:80:12:34:5g', '0:07:80:12:34:56'])(
    'rejects %j',
    (text) => {
      expect(() => parseAddress(text)).toThrow(RangeError);
    }
  );
});

describe('formatUuid', () => {
  it('formats 16-bit UUIDs as four hex digits', () => {
    expect(formatUuid(new Uint8Array([0x00, 0x2a]))).toBe('2a00');
  });

  it('formats 128-bit UUIDs in dashed form', () => {
    const uuid = new Uint8Array([
      0xfb, 0x34, 0x9b, 0x5f, 0x80, 0x00, 0x00, 0x80, 0x00, 0x10, 0x00, 0x00, 0x0a, 0x18,
      0x00, 0x00,
    ]);
    expect(formatUuid(uuid)).toBe('0000180a-0000-1000-8000-00805f9b34fb');
  });

  it('leaves the input untouched', () => {
    const uuid = new Uint8Array([0x01, 0x02]);
    formatUuid(uuid);
    expect(uuid).toEqual(new Uint8Array([0x01, 0x02]));
  });
});
