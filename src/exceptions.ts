/**
 * Exception classes for the BLED112 client.
 */

import { describeResult } from './protocol/constants';

export class Bled112Error extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'Bled112Error';
  }
}

/**
 * I/O failure or closure of the underlying byte stream.
 */
export class TransportError extends Bled112Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

export class NotConnectedError extends Bled112Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotConnectedError';
  }
}

export class ProtocolError extends Bled112Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/**
 * A header or payload that cannot be encoded or decoded at its size.
 */
export class InvalidFrameError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFrameError';
  }
}

/**
 * Which part of a received header disagreed with the expected message.
 */
export enum MismatchKind {
  CLASS = 'ClassMismatch',
  COMMAND = 'CommandMismatch',
  LENGTH = 'LengthMismatch',
}

export class HeaderMismatchError extends ProtocolError {
  constructor(
    message: string,
    readonly kind: MismatchKind,
    readonly expected: number,
    readonly actual: number
  ) {
    super(message);
    this.name = 'HeaderMismatchError';
  }
}

export class ClassMismatchError extends HeaderMismatchError {
  constructor(expected: number, actual: number) {
    super(
      `Class index does not match: expected ${expected}, got ${actual}`,
      MismatchKind.CLASS,
      expected,
      actual
    );
    this.name = 'ClassMismatchError';
  }
}

export class CommandMismatchError extends HeaderMismatchError {
  constructor(expected: number, actual: number) {
    super(
      `Command index does not match: expected ${expected}, got ${actual}`,
      MismatchKind.COMMAND,
      expected,
      actual
    );
    this.name = 'CommandMismatchError';
  }
}

export class LengthMismatchError extends HeaderMismatchError {
  constructor(expected: number, actual: number) {
    super(
      `Payload size does not match: expected ${expected} bytes, got ${actual}`,
      MismatchKind.LENGTH,
      expected,
      actual
    );
    this.name = 'LengthMismatchError';
  }
}

/**
 * The adapter reported a non-zero result code for a procedure.
 */
export class GattError extends ProtocolError {
  constructor(
    operation: string,
    readonly result: number
  ) {
    super(`${operation} failed: ${describeResult(result)}`);
    this.name = 'GattError';
  }
}
