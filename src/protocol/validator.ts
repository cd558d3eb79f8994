/**
 * Header validation against an expected message.
 */

import {
  ClassMismatchError,
  CommandMismatchError,
  LengthMismatchError,
} from '../exceptions';
import type { Header } from './header';
import type { MessageDescriptor } from './message';

/**
 * Check that `header` announces `message`.
 *
 * Partial messages only get their class and command checked; their minimum
 * length is enforced when the payload is decoded.
 *
 * @throws {ClassMismatchError}
 * @throws {CommandMismatchError}
 * @throws {LengthMismatchError} If a fixed message's length differs
 */
export function checkHeader(message: MessageDescriptor, header: Header): void {
  if (header.classId !== message.classId) {
    throw new ClassMismatchError(message.classId, header.classId);
  }
  if (header.commandId !== message.commandId) {
    throw new CommandMismatchError(message.commandId, header.commandId);
  }
  if (message.kind === 'fixed' && header.length !== message.fixedSize) {
    throw new LengthMismatchError(message.fixedSize, header.length);
  }
}

/**
 * Whether `header` can carry `message`: exact length for fixed messages,
 * at least the fixed size for partial ones.
 */
export function matchesHeader(message: MessageDescriptor, header: Header): boolean {
  if (header.classId !== message.classId || header.commandId !== message.commandId) {
    return false;
  }
  return message.kind === 'fixed'
    ? header.length === message.fixedSize
    : header.length >= message.fixedSize;
}
