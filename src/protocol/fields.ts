/**
 * Binary field primitives for BGAPI payloads.
 *
 * All multi-byte integers travel little-endian.
 */

import { BD_ADDR_SIZE } from './constants';
import { InvalidFrameError } from '../exceptions';

/**
 * How one value is written to and read from a fixed number of bytes.
 */
export interface Field<T> {
  /** Size of the field in bytes */
  readonly size: number;
  write(view: DataView, offset: number, value: T): void;
  read(view: DataView, offset: number): T;
}

/**
 * Maps payload property names to fields. Property insertion order is the wire order.
 */
export type Schema<T> = {
  [K in keyof T]: Field<T[K]>;
};

/**
 * Integer field that rejects values it cannot represent instead of letting
 * `DataView` wrap them.
 */
function integerField(
  name: string,
  size: number,
  min: number,
  max: number,
  write: (view: DataView, offset: number, value: number) => void,
  read: (view: DataView, offset: number) => number
): Field<number> {
  return {
    size,
    write(view, offset, value) {
      if (!Number.isInteger(value) || value < min || value > max) {
        throw new InvalidFrameError(`Value ${value} out of range for ${name}`);
      }
      write(view, offset, value);
    },
    read,
  };
}

export const uint8 = integerField(
  'uint8',
  1,
  0,
  0xff,
  (view, offset, value) => view.setUint8(offset, value),
  (view, offset) => view.getUint8(offset)
);

export const uint16 = integerField(
  'uint16',
  2,
  0,
  0xffff,
  (view, offset, value) => view.setUint16(offset, value, true),
  (view, offset) => view.getUint16(offset, true)
);

export const uint32 = integerField(
  'uint32',
  4,
  0,
  0xffffffff,
  (view, offset, value) => view.setUint32(offset, value, true),
  (view, offset) => view.getUint32(offset, true)
);

export const int8 = integerField(
  'int8',
  1,
  -0x80,
  0x7f,
  (view, offset, value) => view.setInt8(offset, value),
  (view, offset) => view.getInt8(offset)
);

export const int16 = integerField(
  'int16',
  2,
  -0x8000,
  0x7fff,
  (view, offset, value) => view.setInt16(offset, value, true),
  (view, offset) => view.getInt16(offset, true)
);

export const int32 = integerField(
  'int32',
  4,
  -0x80000000,
  0x7fffffff,
  (view, offset, value) => view.setInt32(offset, value, true),
  (view, offset) => view.getInt32(offset, true)
);

/**
 * Fixed-length raw byte array. Reads return a copy.
 */
export function fixedBytes(size: number): Field<Uint8Array> {
  return {
    size,
    write(view, offset, value) {
      if (value.length !== size) {
        throw new InvalidFrameError(
          `Expected ${size} bytes for field, got ${value.length}`
        );
      }
      new Uint8Array(view.buffer, view.byteOffset + offset, size).set(value);
    },
    read(view, offset) {
      return new Uint8Array(view.buffer, view.byteOffset + offset, size).slice();
    },
  };
}

/** Bluetooth device address, least significant byte first */
export const bdAddr = fixedBytes(BD_ADDR_SIZE);

/**
 * Total encoded size of a schema.
 */
export function schemaSize<T>(schema: Schema<T>): number {
  let size = 0;
  for (const key in schema) {
    size += schema[key].size;
  }
  return size;
}
